import pLimit from "p-limit";
import {
  createChildLogger,
  formatError,
  IngestionError,
  withRetry,
  type Chunk,
  type Document,
  type PipelineConfig,
} from "@draftloom/core";
import { CorpusStore } from "./corpus-store.js";
import type { Embedder } from "./embedders.js";
import { IndexRegistry, type IndexSnapshot } from "./index-registry.js";
import type { LoadedSource } from "./loaders.js";
import { Retriever } from "./retriever.js";
import { VectorIndex, type IndexEntry } from "./vector-index.js";

const logger = createChildLogger({ module: "knowledge-base" });

const EMBED_BATCH = 32;

export interface IngestReport {
  added: Document[];
  unchanged: Document[];
  skipped: Array<{ source: string; reason: string }>;
  chunksIndexed: number;
  indexVersion: number;
}

export type KnowledgeBaseConfig = Pick<
  PipelineConfig,
  "chunking" | "embedding" | "retrieval" | "research" | "retry"
>;

/**
 * Corpus store, embedder and index registry wired together.
 * Ingestion registers documents under the corpus lock, embeds outside it,
 * then publishes a new index snapshot.
 */
export class KnowledgeBase {
  readonly corpus: CorpusStore;
  readonly registry: IndexRegistry;
  private readonly publishLock = pLimit(1);

  constructor(
    readonly embedder: Embedder,
    readonly config: KnowledgeBaseConfig,
    initial?: VectorIndex
  ) {
    this.corpus = new CorpusStore(config.chunking);
    this.registry = new IndexRegistry(initial ?? VectorIndex.empty(embedder.dimensions));
  }

  createRetriever(): Retriever {
    return new Retriever(this.embedder, {
      retrieval: this.config.retrieval,
      confidenceThreshold: this.config.research.confidenceThreshold,
      retry: this.config.retry,
    });
  }

  async ingest(sources: LoadedSource[], skipped: IngestReport["skipped"] = []): Promise<IngestReport> {
    const added: Document[] = [];
    const unchanged: Document[] = [];
    const pending: Array<{ chunk: Chunk; documentOrdinal: number }> = [];

    const indexed = this.registry.pin().index;
    const registered: string[] = [];
    const queued = new Set<string>();

    for (const source of sources) {
      const result = await this.corpus.register(source);
      if (result.created) registered.push(result.document.id);
      // a document whose earlier ingest failed before indexing is embedded again
      const missing = result.chunks.filter((chunk) => !indexed.has(chunk.id));
      if (!result.created && (missing.length === 0 || queued.has(result.document.id))) {
        unchanged.push(result.document);
        continue;
      }
      added.push(result.document);
      queued.add(result.document.id);
      for (const chunk of missing) {
        pending.push({ chunk, documentOrdinal: result.document.ordinal });
      }
    }

    let entries: IndexEntry[];
    let snapshot: IndexSnapshot;
    try {
      entries = await this.embedChunks(pending);
      snapshot = await this.publish(entries);
    } catch (err) {
      await this.corpus.forget(registered);
      logger.error(
        { documents: registered.length, error: formatError(err) },
        "Ingestion failed, registrations rolled back"
      );
      throw err;
    }

    logger.info(
      {
        added: added.length,
        unchanged: unchanged.length,
        skipped: skipped.length,
        chunksIndexed: entries.length,
        indexVersion: snapshot.version,
      },
      "Ingestion complete"
    );

    return {
      added,
      unchanged,
      skipped,
      chunksIndexed: entries.length,
      indexVersion: snapshot.version,
    };
  }

  private async embedChunks(
    pending: Array<{ chunk: Chunk; documentOrdinal: number }>
  ): Promise<IndexEntry[]> {
    if (pending.length === 0) return [];

    const limit = pLimit(this.config.embedding.concurrency);
    const batches: Array<typeof pending> = [];
    for (let i = 0; i < pending.length; i += EMBED_BATCH) {
      batches.push(pending.slice(i, i + EMBED_BATCH));
    }

    const results = await Promise.all(
      batches.map((batch, n) =>
        limit(async () => {
          const vectors = await withRetry(
            () => this.embedder.embed(batch.map((p) => p.chunk.text)),
            `embed-batch-${n}`,
            this.config.retry
          );
          return batch.map((p, i) => ({
            chunk: p.chunk,
            documentOrdinal: p.documentOrdinal,
            vector: vectors[i] ?? [],
          }));
        })
      )
    );

    return results.flat();
  }

  private publish(entries: IndexEntry[]): Promise<IndexSnapshot> {
    return this.publishLock(() => {
      const current = this.registry.pin();
      if (entries.length === 0) return current;
      return this.registry.swap(current.index.withEntries(entries));
    });
  }

  /** Skip-and-log wrapper used by loaders that fail per document. */
  static describeSkip(err: unknown, fallbackSource: string): { source: string; reason: string } {
    const source = err instanceof IngestionError ? err.source : fallbackSource;
    logger.warn({ source, error: formatError(err) }, "Skipping document");
    return { source, reason: formatError(err) };
  }
}
