// ============================================
// Evidence Assembler Tests
// ============================================

import { describe, it, expect } from "vitest";
import { assembleEvidence, estimateTokens } from "../src/evidence/assembleEvidence.js";
import { candidate, chatChunk, narrativeChunk, rowChunk } from "./helpers/factories.js";

describe("estimateTokens", () => {
  it("rounds four characters per token up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});

describe("assembleEvidence", () => {
  it("merges duplicate tabular rows of one record into a single unit", () => {
    const r1 = rowChunk("r1", "incidents", "INC-1 | queue backlog", { recordId: "INC-1", rowNumber: 2 });
    const n1 = narrativeChunk("n1", "memo", "The memo favors the managed queue.");
    const r2 = rowChunk("r2", "incidents", "INC-1 | queue backlog", { recordId: "INC-1", rowNumber: 5 });
    const r3 = rowChunk("r3", "incidents", "INC-2 | disk full", { recordId: "INC-2", rowNumber: 3 });

    const { units, dropped, gaps } = assembleEvidence(
      [candidate(r3, 4), candidate(n1, 2), candidate(r2, 3), candidate(r1, 1)],
      1000
    );

    expect(units.map((u) => u.id)).toEqual(["E1", "E2", "E3"]);
    expect(units[0]).toEqual({
      id: "E1",
      claim: "INC-1 | queue backlog",
      sourceDocumentId: "incidents",
      sourceType: "tabular-row",
      location: "incidents row 2; incidents row 5",
      chunkIds: ["r1", "r2"],
      entityIds: ["INC-1"],
      date: undefined,
      rank: 1,
      score: expect.closeTo(0.89, 10),
    });
    expect(units[1]?.chunkIds).toEqual(["r3"]);
    expect(units[2]).toMatchObject({ sourceDocumentId: "memo", chunkIds: ["n1"], rank: 2 });
    expect(dropped).toEqual([]);
    expect(gaps).toEqual([]);
  });

  it("falls back to the first entity id when a row has no record id", () => {
    const a = rowChunk("a", "vendors", "Vendor X | 2400 USD", { entityIds: ["vendor-x"] });
    const b = rowChunk("b", "vendors", "Vendor X | SLA 99.9%", { entityIds: ["vendor-x"] });

    const { units } = assembleEvidence([candidate(a, 1), candidate(b, 2)], 1000);

    expect(units).toHaveLength(1);
    expect(units[0]?.claim).toBe("Vendor X | 2400 USD\nVendor X | SLA 99.9%");
  });

  it("keeps narrative sections and chat messages as separate units", () => {
    const s1 = narrativeChunk("s1", "memo", "First section.");
    const s2 = narrativeChunk("s2", "memo", "Second section.");
    const m1 = chatChunk("m1", "chat", "A message.");

    const { units } = assembleEvidence([candidate(s1, 1), candidate(m1, 2), candidate(s2, 3)], 1000);

    expect(units.map((u) => u.chunkIds)).toEqual([["s1"], ["s2"], ["m1"]]);
  });

  it("stops at the first unit that overflows the budget and reports a top-3 gap", () => {
    const d1 = narrativeChunk("d1", "d1", "a".repeat(40));
    const d2 = narrativeChunk("d2", "d2", "b".repeat(40));
    const d3 = narrativeChunk("d3", "d3", "c".repeat(40));
    const d4 = narrativeChunk("d4", "d4", "dddd");
    const candidates = [candidate(d1, 1), candidate(d2, 2), candidate(d3, 3), candidate(d4, 4)];

    const { units, dropped, gaps } = assembleEvidence(candidates, 25);

    expect(units.map((u) => u.sourceDocumentId)).toEqual(["d1", "d2"]);
    expect(dropped.map((c) => c.chunk.id)).toEqual(["d3", "d4"]);
    expect(gaps).toEqual([
      'Evidence from "d3" ranked in the top 3 but was omitted to fit the context budget.',
    ]);
  });

  it("never splits a unit, even when nothing fits", () => {
    const d1 = narrativeChunk("d1", "d1", "a".repeat(40));
    const d2 = narrativeChunk("d2", "d2", "b".repeat(40));

    const { units, dropped, gaps } = assembleEvidence([candidate(d1, 1), candidate(d2, 2)], 5);

    expect(units).toEqual([]);
    expect(dropped).toHaveLength(2);
    expect(gaps).toHaveLength(2);
  });

  it("returns nothing for no candidates", () => {
    expect(assembleEvidence([], 100)).toEqual({ units: [], dropped: [], gaps: [] });
  });
});
