// ============================================
// Embedding Index Tests
// ============================================

import { describe, it, expect } from "vitest";
import { EmbeddingIndex } from "../src/store/embeddingIndex.js";
import { DecisionError, DuplicateIdError } from "../src/lib/errors.js";
import { chatChunk, narrativeChunk, rowChunk } from "./helpers/factories.js";

function sampleIndex(): EmbeddingIndex {
  const index = new EmbeddingIndex();
  index.add(narrativeChunk("a", "doc-1", "alpha"), [1, 0]);
  index.add(narrativeChunk("b", "doc-1", "beta"), [0, 1]);
  index.add(rowChunk("c", "doc-2", "gamma"), [1, 1]);
  index.add(chatChunk("d", "doc-3", "delta"), [1, 0]);
  return index;
}

describe("EmbeddingIndex", () => {
  describe("add", () => {
    it("rejects a duplicate chunk id", () => {
      const index = sampleIndex();
      expect(() => index.add(narrativeChunk("a", "doc-9", "again"), [0, 1])).toThrow(DuplicateIdError);
      expect(index.size).toBe(4);
      expect(index.has("a")).toBe(true);
      expect(index.has("zz")).toBe(false);
    });

    it("rejects a vector whose dimension differs from the first entry", () => {
      const index = sampleIndex();
      try {
        index.add(narrativeChunk("e", "doc-1", "epsilon"), [1, 0, 0]);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(DecisionError);
        expect(err instanceof DecisionError && err.code).toBe("VALIDATION_ERROR");
      }
    });

    it("rejects empty and non-finite vectors", () => {
      const index = new EmbeddingIndex();
      expect(() => index.add(narrativeChunk("x", "doc", "x"), [])).toThrow(/non-empty list of finite numbers/);
      expect(() => index.add(narrativeChunk("y", "doc", "y"), [Number.NaN])).toThrow(/finite/);
    });

    it("rejects writes after freeze", () => {
      const index = sampleIndex().freeze();
      try {
        index.add(narrativeChunk("z", "doc", "z"), [1, 0]);
        expect.unreachable();
      } catch (err) {
        expect(err instanceof DecisionError && err.code).toBe("INDEX_FROZEN");
      }
      expect(index.isFrozen).toBe(true);
    });

    it("copies the vector so later mutation has no effect", () => {
      const index = new EmbeddingIndex();
      const vector = [1, 0];
      index.add(narrativeChunk("a", "doc", "a"), vector);
      vector[0] = 0;
      vector[1] = 1;

      const [hit] = index.search([1, 0], 1);
      expect(hit?.similarity).toBeCloseTo(1, 10);
    });
  });

  describe("search", () => {
    it("orders by cosine similarity and breaks ties by insertion order", () => {
      const hits = sampleIndex().search([1, 0], 4);
      expect(hits.map((h) => h.entry.chunk.id)).toEqual(["a", "d", "c", "b"]);
      expect(hits[0]?.similarity).toBeCloseTo(1, 10);
      expect(hits[2]?.similarity).toBeCloseTo(Math.SQRT1_2, 10);
      expect(hits[3]?.similarity).toBeCloseTo(0, 10);
    });

    it("returns at most k entries", () => {
      expect(sampleIndex().search([0, 1], 2).map((h) => h.entry.chunk.id)).toEqual(["b", "c"]);
    });

    it("returns fewer than k when the filtered set is smaller", () => {
      const hits = sampleIndex().search([1, 0], 10, (chunk) => chunk.metadata.document_id === "doc-1");
      expect(hits.map((h) => h.entry.chunk.id)).toEqual(["a", "b"]);
    });

    it("returns an empty list when nothing matches the filter", () => {
      expect(sampleIndex().search([1, 0], 5, () => false)).toEqual([]);
    });

    it("returns an empty list for an empty index or k <= 0", () => {
      expect(new EmbeddingIndex().search([1, 0], 3)).toEqual([]);
      expect(sampleIndex().search([1, 0], 0)).toEqual([]);
    });

    it("scores a zero query vector as 0 for every entry", () => {
      const hits = sampleIndex().search([0, 0], 4);
      expect(hits.map((h) => h.similarity)).toEqual([0, 0, 0, 0]);
      expect(hits.map((h) => h.entry.chunk.id)).toEqual(["a", "b", "c", "d"]);
    });

    it("rejects a query vector of the wrong dimension", () => {
      expect(() => sampleIndex().search([1, 0, 0], 2)).toThrow(/dimension 3/);
    });

    it("rejects a query vector with non-finite values", () => {
      expect(() => sampleIndex().search([Number.NaN, 1], 2)).toThrow("Query vector must contain only finite numbers");
      expect(() => sampleIndex().search([Number.POSITIVE_INFINITY, 0], 2)).toThrow(/finite/);
    });
  });

  describe("stats", () => {
    it("counts chunks by source type and by document", () => {
      expect(sampleIndex().stats()).toEqual({
        totalChunks: 4,
        dimension: 2,
        bySourceType: { narrative: 2, "tabular-row": 1, "chat-message": 1 },
        byDocument: { "doc-1": 2, "doc-2": 1, "doc-3": 1 },
      });
    });
  });
});
