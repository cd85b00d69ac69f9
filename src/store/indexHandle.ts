// ============================================
// Index Handle — immutable snapshot reference with atomic swap
// ============================================

import { DecisionError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { EmbeddingIndex } from "./embeddingIndex.js";

export interface IndexSnapshot {
  readonly index: EmbeddingIndex;
  /** Bumped on every swap; 1 for the first snapshot */
  readonly generation: number;
  readonly builtAt: string;
}

/**
 * Queries capture `current()` once and keep that snapshot for their whole run,
 * so a rebuild swapped in mid-query never changes what the query reads.
 */
export class IndexHandle {
  private snapshot: IndexSnapshot;

  constructor(
    initial: EmbeddingIndex,
    private readonly now: () => Date = () => new Date()
  ) {
    this.snapshot = this.makeSnapshot(initial, 1);
  }

  current(): IndexSnapshot {
    return this.snapshot;
  }

  /** Replace the served index with a freshly built, frozen one */
  swap(next: EmbeddingIndex): IndexSnapshot {
    const previous = this.snapshot;
    this.snapshot = this.makeSnapshot(next, previous.generation + 1);

    logger.info("Index snapshot swapped", {
      stage: "index",
      generation: this.snapshot.generation,
      previousSize: previous.index.size,
      size: next.size,
    });

    return this.snapshot;
  }

  private makeSnapshot(index: EmbeddingIndex, generation: number): IndexSnapshot {
    if (!index.isFrozen) {
      throw new DecisionError({
        code: "VALIDATION_ERROR",
        message: "Only frozen indexes can be served; call freeze() after building",
      });
    }
    return Object.freeze({ index, generation, builtAt: this.now().toISOString() });
  }
}
