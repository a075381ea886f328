import { z } from "zod";
import {
  createChildLogger,
  env,
  FatalError,
  TransientError,
  type EmbeddingConfig,
} from "@draftloom/core";

const logger = createChildLogger({ module: "knowledge-base:embedder" });

export interface Embedder {
  readonly name: string;
  readonly dimensions: number;
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

// ─── Feature-hashing embedder ───────────────────────────────────────────────

const TOKEN = /[\p{L}\p{N}]+/gu;

/**
 * Deterministic local embedder: signed feature hashing of lowercased word
 * unigrams and bigrams, L2-normalised. Needs no network.
 */
export class HashingEmbedder implements Embedder {
  readonly name = "hashing";

  constructor(readonly dimensions = 256) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().match(TOKEN) ?? [];

    const features = [...tokens];
    for (let i = 1; i < tokens.length; i++) {
      features.push(`${tokens[i - 1]} ${tokens[i]}`);
    }

    for (const feature of features) {
      const h = fnv1a(feature);
      const sign = h & 1 ? -1 : 1;
      vector[(h >>> 1) % this.dimensions] += sign;
    }

    return normalize(vector);
  }
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

// ─── Gemini embedder ────────────────────────────────────────────────────────

const GEMINI_EMBED_MODEL = "text-embedding-004";
const GEMINI_BATCH = 100;

const BatchEmbedResponseSchema = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

export class GeminiEmbedder implements Embedder {
  readonly name = "gemini";
  readonly dimensions = 768;

  constructor(private readonly apiKey: string) {}

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += GEMINI_BATCH) {
      vectors.push(...(await this.embedBatch(texts.slice(i, i + GEMINI_BATCH))));
    }
    return vectors;
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${GEMINI_EMBED_MODEL}:batchEmbedContents?key=${this.apiKey}`;

    logger.debug({ model: GEMINI_EMBED_MODEL, count: texts.length }, "Calling Gemini embeddings");

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          requests: texts.map((text) => ({
            model: `models/${GEMINI_EMBED_MODEL}`,
            content: { parts: [{ text }] },
          })),
        }),
      });
    } catch (err) {
      throw new TransientError("Gemini embeddings request failed", undefined, { cause: err });
    }

    if (!response.ok) {
      const body = await response.text();
      const message = `Gemini embeddings error ${response.status}: ${body.slice(0, 200)}`;
      if (response.status === 429 || response.status >= 500) {
        throw new TransientError(message, response.status);
      }
      throw new FatalError(message);
    }

    const parsed = BatchEmbedResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
      throw new FatalError("Gemini embeddings returned an unexpected payload");
    }
    return parsed.data.embeddings.map((e) => e.values);
  }
}

export function createEmbedder(config: EmbeddingConfig): Embedder {
  const provider = env.embedder === "gemini" ? "gemini" : config.provider;
  if (provider === "gemini") {
    const apiKey = env.geminiApiKey;
    if (!apiKey) {
      throw new FatalError("GEMINI_API_KEY is required for the gemini embedder");
    }
    return new GeminiEmbedder(apiKey);
  }
  return new HashingEmbedder(config.dimensions);
}
