import Anthropic from "@anthropic-ai/sdk";
import type { ZodType, ZodTypeDef } from "zod";
import {
  createChildLogger,
  env,
  FatalError,
  TransientError,
} from "@draftloom/core";

const logger = createChildLogger({ module: "content-pipeline:llm" });

export type ModelTier = "opus" | "sonnet";

export type GeneratePurpose = "research" | "outline" | "write" | "critique" | "optimize";

export interface GenerateRequest {
  purpose: GeneratePurpose;
  tier: ModelTier;
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
  /** Text the response is forced to start with. */
  prefill?: string;
}

/**
 * Text generation capability. Implementations throw TransientError for
 * network or rate-limit failures and FatalError for anything permanent.
 */
export interface Generator {
  generate(request: GenerateRequest): Promise<string>;
}

type Provider = "anthropic" | "gemini";

const MODEL_MAP: Record<ModelTier, string> = {
  opus: "claude-opus-4-1",
  sonnet: "claude-sonnet-4-5",
};

const GEMINI_MODEL_MAP: Record<ModelTier, string> = {
  sonnet: "gemini-2.0-flash",
  opus: "gemini-2.5-pro",
};

function detectProvider(): Provider {
  if (env.anthropicApiKey || process.env.ANTHROPIC_BASE_URL) return "anthropic";
  if (env.geminiApiKey) return "gemini";
  throw new FatalError(
    "No LLM provider found. Set ANTHROPIC_API_KEY, ANTHROPIC_BASE_URL, or GEMINI_API_KEY."
  );
}

function isTransientStatus(status: number | undefined): boolean {
  return status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
}

/**
 * Anthropic with a Gemini REST fallback, picked from the environment.
 */
export class LlmGenerator implements Generator {
  private client: Anthropic | null = null;

  async generate(request: GenerateRequest): Promise<string> {
    const provider = detectProvider();
    return provider === "gemini" ? this.callGemini(request) : this.callAnthropic(request);
  }

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
        apiKey: env.anthropicApiKey || "unused",
        maxRetries: 0,
      });
    }
    return this.client;
  }

  private async callAnthropic(request: GenerateRequest): Promise<string> {
    const model = MODEL_MAP[request.tier];
    logger.debug({ model, purpose: request.purpose, systemLength: request.system.length }, "Calling LLM");

    const messages: Array<{ role: "user" | "assistant"; content: string }> = [
      { role: "user", content: request.prompt },
    ];
    // Prefill forces the model to continue from a specific starting point
    if (request.prefill) {
      messages.push({ role: "assistant", content: request.prefill });
    }

    let response: Anthropic.Message;
    try {
      response = await this.getClient().messages.create({
        model,
        max_tokens: request.maxTokens ?? 8192,
        temperature: request.temperature ?? 1,
        system: request.system,
        messages,
      });
    } catch (err) {
      if (err instanceof Anthropic.APIError) {
        const message = `Anthropic API error ${err.status ?? "(no status)"}: ${err.message}`;
        if (isTransientStatus(err.status)) throw new TransientError(message, err.status, { cause: err });
        throw new FatalError(message, { cause: err });
      }
      throw err;
    }

    const raw = response.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("\n");

    logger.debug(
      {
        model,
        purpose: request.purpose,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      "LLM call complete"
    );

    // Prepend the prefill to reconstruct the full response
    return request.prefill ? request.prefill + raw : raw;
  }

  private async callGemini(request: GenerateRequest): Promise<string> {
    const model = GEMINI_MODEL_MAP[request.tier];
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent?key=${env.geminiApiKey ?? ""}`;

    logger.debug({ model, purpose: request.purpose }, "Calling Gemini");

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          system_instruction: { parts: [{ text: request.system }] },
          contents: [{ role: "user", parts: [{ text: request.prompt }] }],
          generationConfig: {
            temperature: request.temperature ?? 1,
            maxOutputTokens: request.maxTokens ?? 8192,
          },
        }),
      });
    } catch (err) {
      throw new TransientError("Gemini request failed", undefined, { cause: err });
    }

    if (!response.ok) {
      const text = await response.text();
      const message = `Gemini API error ${response.status}: ${text.slice(0, 300)}`;
      if (isTransientStatus(response.status)) throw new TransientError(message, response.status);
      throw new FatalError(message);
    }

    const data: unknown = await response.json();
    const content = extractGeminiText(data);

    logger.debug({ model, purpose: request.purpose, length: content.length }, "Gemini call complete");
    return content;
  }
}

function extractGeminiText(data: unknown): string {
  const candidates = field(data, "candidates");
  const first = Array.isArray(candidates) ? candidates[0] : undefined;
  const parts = field(field(first, "content"), "parts");
  if (!Array.isArray(parts)) return "";
  return parts
    .map((p) => field(p, "text"))
    .filter((t): t is string => typeof t === "string")
    .join("\n");
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

/**
 * Parse JSON, handling trailing non-JSON content that LLMs sometimes append.
 * If strict JSON.parse fails, extract just the JSON object by tracking brace depth.
 */
export function parseJsonPermissive(str: string): unknown {
  try {
    return JSON.parse(str);
  } catch (err) {
    if (str.startsWith("{")) {
      let depth = 0;
      let inString = false;
      let escaped = false;
      for (let i = 0; i < str.length; i++) {
        const ch = str[i];
        if (escaped) {
          escaped = false;
          continue;
        }
        if (ch === "\\") {
          escaped = true;
          continue;
        }
        if (ch === '"') {
          inString = !inString;
          continue;
        }
        if (inString) continue;
        if (ch === "{") depth++;
        else if (ch === "}") {
          depth--;
          if (depth === 0) return JSON.parse(str.slice(0, i + 1));
        }
      }
    }
    throw err;
  }
}

/**
 * Pull the JSON payload out of a model response: fenced block first,
 * then the raw text.
 */
export function extractJson(content: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content);
  const jsonStr = (fenced?.[1] ?? content).trim();
  return parseJsonPermissive(jsonStr);
}

/**
 * Generate and validate a JSON response. Unparseable or off-schema output is
 * re-requested once, then reported as a FatalError.
 */
export async function generateJson<T>(
  generator: Generator,
  request: GenerateRequest,
  schema: ZodType<T, ZodTypeDef, unknown>,
  maxParseAttempts = 2
): Promise<T> {
  let lastProblem = "empty response";

  for (let attempt = 1; attempt <= maxParseAttempts; attempt++) {
    const content = await generator.generate({ ...request, prefill: request.prefill ?? "{" });

    if (!content.trim()) {
      lastProblem = "empty response";
      logger.warn({ purpose: request.purpose, attempt }, "LLM returned empty content");
      continue;
    }

    let data: unknown;
    try {
      data = extractJson(content);
    } catch (err) {
      lastProblem = `unparseable JSON: ${String(err)}`;
      logger.warn({ purpose: request.purpose, attempt, preview: content.slice(0, 200) }, "Failed to parse JSON from LLM response");
      continue;
    }

    const parsed = schema.safeParse(data);
    if (parsed.success) return parsed.data;

    lastProblem = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    logger.warn({ purpose: request.purpose, attempt, problem: lastProblem }, "LLM JSON did not match schema");
  }

  throw new FatalError(`Unusable ${request.purpose} output: ${lastProblem}`);
}
