// ============================================
// Embedding Index — exact cosine search over chunk vectors
// Built once per corpus snapshot, frozen before serving.
// ============================================

import { DecisionError, DuplicateIdError, validationError } from "../lib/errors.js";
import type { Chunk, ChunkPredicate, SourceType } from "../types/index.js";

/** One chunk and its vector in the searchable structure */
export interface IndexEntry {
  readonly chunk: Chunk;
  readonly vector: readonly number[];
  /** Insertion position, the similarity tie-breaker */
  readonly position: number;
  readonly norm: number;
}

export interface SearchHit {
  entry: IndexEntry;
  similarity: number;
}

export interface IndexStats {
  totalChunks: number;
  dimension: number | null;
  bySourceType: Record<SourceType, number>;
  byDocument: Record<string, number>;
}

export class EmbeddingIndex {
  private readonly entries: IndexEntry[] = [];
  private readonly ids = new Set<string>();
  private dimension: number | null = null;
  private frozen = false;

  get size(): number {
    return this.entries.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  add(chunk: Chunk, vector: number[]): void {
    if (this.frozen) {
      throw new DecisionError({
        code: "INDEX_FROZEN",
        message: `Cannot add "${chunk.id}": index is frozen`,
        context: { chunkId: chunk.id },
      });
    }
    if (this.ids.has(chunk.id)) {
      throw new DuplicateIdError(chunk.id);
    }
    if (vector.length === 0 || vector.some((v) => !Number.isFinite(v))) {
      throw validationError(`Vector for "${chunk.id}" must be a non-empty list of finite numbers`, {
        chunkId: chunk.id,
      });
    }
    if (this.dimension !== null && vector.length !== this.dimension) {
      throw validationError(
        `Vector for "${chunk.id}" has dimension ${vector.length}, index expects ${this.dimension}`,
        { chunkId: chunk.id }
      );
    }

    this.dimension ??= vector.length;
    this.ids.add(chunk.id);
    this.entries.push({
      chunk,
      vector: Object.freeze([...vector]),
      position: this.entries.length,
      norm: magnitude(vector),
    });
  }

  has(chunkId: string): boolean {
    return this.ids.has(chunkId);
  }

  /** Make the index read-only. Serving only ever sees frozen indexes. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  /**
   * Up to `k` entries by descending cosine similarity, ties by insertion order.
   * Returns [] when the (filtered) index is empty.
   */
  search(vector: readonly number[], k: number, filter?: ChunkPredicate): SearchHit[] {
    if (k <= 0 || this.entries.length === 0) {
      return [];
    }
    if (this.dimension !== null && vector.length !== this.dimension) {
      throw validationError(
        `Query vector has dimension ${vector.length}, index expects ${this.dimension}`
      );
    }
    if (vector.some((v) => !Number.isFinite(v))) {
      throw validationError("Query vector must contain only finite numbers");
    }

    const queryNorm = magnitude(vector);
    const hits: SearchHit[] = [];

    for (const entry of this.entries) {
      if (filter && !filter(entry.chunk)) continue;
      hits.push({ entry, similarity: cosine(vector, queryNorm, entry) });
    }

    hits.sort((a, b) => b.similarity - a.similarity || a.entry.position - b.entry.position);
    return hits.slice(0, k);
  }

  stats(): IndexStats {
    const bySourceType: Record<SourceType, number> = {
      narrative: 0,
      "tabular-row": 0,
      "chat-message": 0,
    };
    const byDocument: Record<string, number> = {};

    for (const { chunk } of this.entries) {
      bySourceType[chunk.metadata.source_type] += 1;
      const docId = chunk.metadata.document_id;
      byDocument[docId] = (byDocument[docId] ?? 0) + 1;
    }

    return {
      totalChunks: this.entries.length,
      dimension: this.dimension,
      bySourceType,
      byDocument,
    };
  }
}

function magnitude(vector: readonly number[]): number {
  let sum = 0;
  for (const v of vector) sum += v * v;
  return Math.sqrt(sum);
}

function cosine(query: readonly number[], queryNorm: number, entry: IndexEntry): number {
  if (queryNorm === 0 || entry.norm === 0) {
    return 0;
  }
  let dot = 0;
  for (let i = 0; i < query.length; i++) {
    dot += (query[i] ?? 0) * (entry.vector[i] ?? 0);
  }
  return dot / (queryNorm * entry.norm);
}
