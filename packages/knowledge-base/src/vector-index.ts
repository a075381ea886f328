import { DimensionMismatchError, type Chunk } from "@draftloom/core";

export type SimilarityMetric = "cosine" | "dot";

export interface IndexEntry {
  chunk: Chunk;
  vector: number[];
  /** ingestion ordinal of the owning document, used for tie-breaking */
  documentOrdinal: number;
}

export interface SearchHit {
  entry: IndexEntry;
  score: number;
}

/**
 * Immutable snapshot of (chunk, vector) pairs with a fixed dimension.
 * Adding entries returns a new snapshot; readers of the old one are unaffected.
 */
export class VectorIndex {
  private readonly ids: ReadonlySet<string>;

  private constructor(
    readonly dimensions: number,
    private readonly items: readonly IndexEntry[]
  ) {
    this.ids = new Set(items.map((e) => e.chunk.id));
  }

  static empty(dimensions: number): VectorIndex {
    return new VectorIndex(dimensions, []);
  }

  static from(dimensions: number, entries: IndexEntry[]): VectorIndex {
    return VectorIndex.empty(dimensions).withEntries(entries);
  }

  get size(): number {
    return this.items.length;
  }

  has(chunkId: string): boolean {
    return this.ids.has(chunkId);
  }

  entries(): readonly IndexEntry[] {
    return this.items;
  }

  /** New snapshot with the given entries appended. Already-indexed chunk ids are skipped. */
  withEntries(entries: IndexEntry[]): VectorIndex {
    const seen = new Set(this.ids);
    const added: IndexEntry[] = [];
    for (const entry of entries) {
      if (entry.vector.length !== this.dimensions) {
        throw new DimensionMismatchError(this.dimensions, entry.vector.length);
      }
      if (seen.has(entry.chunk.id)) continue;
      seen.add(entry.chunk.id);
      added.push({ ...entry, vector: [...entry.vector] });
    }
    if (added.length === 0) return this;
    return new VectorIndex(this.dimensions, [...this.items, ...added]);
  }

  /**
   * Score every entry against the query, best first. Equal scores order by
   * document ingestion ordinal, then chunk ordinal.
   */
  search(query: number[], metric: SimilarityMetric = "cosine", limit?: number): SearchHit[] {
    if (query.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, query.length);
    }

    const hits = this.items.map((entry) => ({
      entry,
      score: metric === "dot" ? dot(query, entry.vector) : cosine(query, entry.vector),
    }));

    hits.sort(
      (a, b) =>
        b.score - a.score ||
        a.entry.documentOrdinal - b.entry.documentOrdinal ||
        a.entry.chunk.ordinal - b.entry.chunk.ordinal
    );

    return limit === undefined ? hits : hits.slice(0, limit);
  }
}

export function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

export function cosine(a: number[], b: number[]): number {
  const denom = Math.sqrt(dot(a, a)) * Math.sqrt(dot(b, b));
  return denom === 0 ? 0 : dot(a, b) / denom;
}
