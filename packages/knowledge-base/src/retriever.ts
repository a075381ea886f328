import {
  createChildLogger,
  FatalError,
  withRetry,
  type RetrievalConfig,
  type RetrievalContext,
  type RetryOptions,
  type ScoredChunk,
} from "@draftloom/core";
import type { Embedder } from "./embedders.js";
import type { IndexSnapshot } from "./index-registry.js";
import type { SearchHit } from "./vector-index.js";

const logger = createChildLogger({ module: "knowledge-base:retriever" });

export interface RetrieverOptions {
  retrieval: RetrievalConfig;
  /** contexts scoring under this are flagged lowConfidence */
  confidenceThreshold: number;
  retry?: Partial<RetryOptions>;
}

/**
 * Apply the similarity floor and the per-source cap to ranked hits, then
 * keep the top k. Input order is preserved.
 */
export function selectHits(hits: SearchHit[], config: RetrievalConfig): ScoredChunk[] {
  const perSource = new Map<string, number>();
  const selected: ScoredChunk[] = [];

  for (const hit of hits) {
    if (selected.length >= config.topK) break;
    if (!Number.isFinite(hit.score) || hit.score < config.minSimilarity) continue;

    const documentId = hit.entry.chunk.documentId;
    const count = perSource.get(documentId) ?? 0;
    if (count >= config.perSourceCap) continue;

    perSource.set(documentId, count + 1);
    selected.push({ chunk: hit.entry.chunk, score: hit.score });
  }

  return selected;
}

/** min(1, mean(score) * n / k); 0 when nothing was retrieved. */
export function retrievalConfidence(scores: number[], topK: number): number {
  if (scores.length === 0 || topK <= 0) return 0;
  const mean = scores.reduce((a, b) => a + b, 0) / scores.length;
  return Math.max(0, Math.min(1, (mean * scores.length) / topK));
}

export class Retriever {
  constructor(
    private readonly embedder: Embedder,
    private readonly options: RetrieverOptions
  ) {}

  async retrieve(query: string, snapshot: IndexSnapshot): Promise<RetrievalContext> {
    const { retrieval, confidenceThreshold } = this.options;

    const vectors = await withRetry(
      () => this.embedder.embed([query]),
      "embed-query",
      this.options.retry
    );
    const queryVector = vectors[0];
    if (!queryVector) {
      throw new FatalError(`Embedder ${this.embedder.name} returned no vector for the query`);
    }

    const hits = snapshot.index.search(queryVector, retrieval.metric);
    const items = selectHits(hits, retrieval);
    const confidence = retrievalConfidence(
      items.map((i) => i.score),
      retrieval.topK
    );

    logger.info(
      {
        query: query.slice(0, 80),
        indexVersion: snapshot.version,
        candidates: hits.length,
        returned: items.length,
        confidence: Number(confidence.toFixed(3)),
      },
      "Retrieval complete"
    );

    return {
      query,
      items,
      confidence,
      lowConfidence: confidence < confidenceThreshold,
    };
  }
}
