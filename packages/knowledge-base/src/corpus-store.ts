import { createHash } from "node:crypto";
import pLimit from "p-limit";
import {
  createChildLogger,
  type Chunk,
  type ChunkingConfig,
  type Document,
} from "@draftloom/core";
import { chunkDocument } from "./chunker.js";
import type { LoadedSource } from "./loaders.js";

const logger = createChildLogger({ module: "knowledge-base:corpus" });

/**
 * Content hash used as document identity.
 */
export function contentHash(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

export interface RegisterResult {
  document: Document;
  chunks: Chunk[];
  /** false when a document with the same content hash was already present */
  created: boolean;
}

/**
 * Append-only store of documents and their chunks. A failed ingest forgets
 * the documents it registered.
 * Registration is serialized; nothing else runs under the lock.
 */
export class CorpusStore {
  private readonly documents = new Map<string, Document>();
  private readonly chunks = new Map<string, Chunk[]>();
  private readonly lock = pLimit(1);
  private nextOrdinal = 0;

  constructor(private readonly chunking: ChunkingConfig) {}

  register(source: LoadedSource): Promise<RegisterResult> {
    return this.lock(() => this.registerLocked(source));
  }

  private registerLocked(source: LoadedSource): RegisterResult {
    const id = contentHash(source.text);
    const existing = this.documents.get(id);
    if (existing) {
      logger.debug({ source: source.source, id }, "Document already ingested");
      return { document: existing, chunks: this.chunks.get(id) ?? [], created: false };
    }

    const document: Document = {
      id,
      source: source.source,
      mediaType: source.mediaType,
      text: source.text,
      ordinal: this.nextOrdinal++,
      ingestedAt: new Date().toISOString(),
    };
    const chunks = chunkDocument(document, this.chunking);

    this.documents.set(id, document);
    this.chunks.set(id, chunks);

    logger.info(
      { source: document.source, id, ordinal: document.ordinal, chunks: chunks.length },
      "Registered document"
    );
    return { document, chunks, created: true };
  }

  /** Drop documents whose chunks never reached the index. */
  forget(documentIds: string[]): Promise<void> {
    return this.lock(() => {
      for (const id of documentIds) {
        this.documents.delete(id);
        this.chunks.delete(id);
      }
    });
  }

  /** Re-add documents and chunks restored from disk, keeping their ordinals. */
  restore(documents: Document[], chunks: Chunk[]): void {
    for (const document of documents) {
      this.documents.set(document.id, document);
      this.nextOrdinal = Math.max(this.nextOrdinal, document.ordinal + 1);
    }
    for (const chunk of chunks) {
      const list = this.chunks.get(chunk.documentId) ?? [];
      list.push(chunk);
      this.chunks.set(chunk.documentId, list);
    }
  }

  has(documentId: string): boolean {
    return this.documents.has(documentId);
  }

  getDocument(documentId: string): Document | undefined {
    return this.documents.get(documentId);
  }

  listDocuments(): Document[] {
    return [...this.documents.values()].sort((a, b) => a.ordinal - b.ordinal);
  }

  chunksFor(documentId: string): Chunk[] {
    return this.chunks.get(documentId) ?? [];
  }

  get documentCount(): number {
    return this.documents.size;
  }
}
