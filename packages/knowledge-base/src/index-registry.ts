import { createChildLogger } from "@draftloom/core";
import { VectorIndex } from "./vector-index.js";

const logger = createChildLogger({ module: "knowledge-base:registry" });

export interface IndexSnapshot {
  index: VectorIndex;
  version: number;
}

/**
 * Holds the active index. Swaps replace the reference in one step, so a
 * caller that pinned a snapshot keeps reading it after a rebuild.
 */
export class IndexRegistry {
  private active: IndexSnapshot;

  constructor(initial: VectorIndex) {
    this.active = { index: initial, version: 0 };
  }

  pin(): IndexSnapshot {
    return this.active;
  }

  get version(): number {
    return this.active.version;
  }

  swap(next: VectorIndex): IndexSnapshot {
    const previous = this.active;
    this.active = { index: next, version: previous.version + 1 };
    logger.info(
      { version: this.active.version, size: next.size, previousSize: previous.index.size },
      "Swapped active index"
    );
    return this.active;
  }
}
