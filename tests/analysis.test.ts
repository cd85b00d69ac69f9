// ============================================
// Conflict & Confidence Analyzer Tests
// ============================================

import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { detectStance, loadStanceLexicon, DEFAULT_STANCE_LEXICON } from "../src/analysis/stanceLexicon.js";
import { analyzeConflicts, subjectsOf } from "../src/analysis/conflicts.js";
import { scoreConfidence } from "../src/analysis/confidence.js";
import { unit } from "./helpers/factories.js";

// ============================================
// detectStance
// ============================================

describe("detectStance", () => {
  it("detects support and opposition markers", () => {
    expect(detectStance("Team X favors option A.")).toBe("support");
    expect(detectStance("Finance opposes the contract.")).toBe("oppose");
  });

  it("reads negated recommendations as opposition", () => {
    expect(detectStance("The board does not recommend Team X.")).toBe("oppose");
    expect(detectStance("Migrating now is not recommended")).toBe("oppose");
  });

  it("returns undefined for neutral or mixed text", () => {
    expect(detectStance("The queue processed 4000 jobs.")).toBeUndefined();
    expect(detectStance("We support plan A but oppose plan B.")).toBeUndefined();
  });

  it("ignores case and punctuation around markers", () => {
    expect(detectStance("FAVORS, strongly!")).toBe("support");
  });

  it("uses a custom lexicon when given one", () => {
    const lexicon = { support: ["greenlit"], oppose: ["vetoed"] };
    expect(detectStance("Project greenlit by finance", lexicon)).toBe("support");
    expect(detectStance("Team X favors it", lexicon)).toBeUndefined();
  });
});

describe("loadStanceLexicon", () => {
  function writeTemp(content: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "lexicon-"));
    const file = path.join(dir, "lexicon.json");
    fs.writeFileSync(file, content);
    return file;
  }

  it("reads a valid lexicon file", () => {
    const file = writeTemp(JSON.stringify({ support: ["backs"], oppose: ["blocks"] }));
    expect(loadStanceLexicon(file)).toEqual({ support: ["backs"], oppose: ["blocks"] });
  });

  it("rejects unknown keys and empty lists", () => {
    expect(() => loadStanceLexicon(writeTemp(JSON.stringify({ support: [], oppose: ["x"] })))).toThrow(
      /Invalid stance lexicon/
    );
    expect(() =>
      loadStanceLexicon(writeTemp(JSON.stringify({ support: ["a"], oppose: ["b"], neutral: ["c"] })))
    ).toThrow(/Invalid stance lexicon/);
  });

  it("rejects unreadable JSON", () => {
    expect(() => loadStanceLexicon(writeTemp("{not json"))).toThrow(/Could not read stance lexicon/);
  });

  it("ships a default lexicon with negated phrases", () => {
    expect(DEFAULT_STANCE_LEXICON.oppose).toContain("does not recommend");
  });
});

// ============================================
// analyzeConflicts
// ============================================

describe("subjectsOf", () => {
  it("collects entity ids and capitalised name phrases", () => {
    const u = unit({
      id: "E1",
      sourceDocumentId: "memo",
      claim: "Team X favors the Managed Queue Pro plan.",
      entityIds: ["billing-service"],
    });
    expect(subjectsOf(u).map((s) => s.label)).toEqual(["billing-service", "Team X", "Managed Queue Pro"]);
  });
});

describe("analyzeConflicts", () => {
  const favors = unit({ id: "E1", sourceDocumentId: "memo", claim: "Team X favors the managed queue." });
  const opposes = unit({ id: "E2", sourceDocumentId: "chat", claim: "Finance opposes Team X on this." });

  it("emits one record for opposing stances on a shared subject", () => {
    const conflicts = analyzeConflicts([favors, opposes]);

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]).toEqual({
      subject: "Team X",
      description:
        'Sources disagree on Team X: "memo" (memo > section) is in favour while "chat" (chat > section) is opposed.',
      left: favors,
      right: opposes,
    });
  });

  it("flags two messages of one chat thread that disagree", () => {
    const first = unit({
      id: "E1",
      sourceDocumentId: "ops-chat",
      sourceType: "chat-message",
      claim: "Team X favors Option C.",
      entityIds: ["team-x"],
    });
    const second = unit({
      id: "E2",
      sourceDocumentId: "ops-chat",
      sourceType: "chat-message",
      claim: "Team X opposes Option C.",
      entityIds: ["team-x"],
    });
    const neutralA = unit({ id: "E3", sourceDocumentId: "staffing", claim: "Team X has six engineers." });
    const neutralB = unit({ id: "E4", sourceDocumentId: "vendors", claim: "Option C costs 2400 USD." });
    const units = [first, second, neutralA, neutralB];

    const conflicts = analyzeConflicts(units);

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]?.subject).toBe("team-x");
    expect(conflicts[0]?.left).toBe(first);
    expect(conflicts[0]?.right).toBe(second);
    expect(scoreConfidence(units, conflicts)).toBe("medium");
  });

  it("ignores opposing stances on different subjects", () => {
    const other = unit({ id: "E2", sourceDocumentId: "chat", claim: "Finance opposes Option C." });
    expect(analyzeConflicts([favors, other])).toEqual([]);
  });

  it("ignores agreeing or neutral units", () => {
    const agrees = unit({ id: "E2", sourceDocumentId: "chat", claim: "Ops also favors Team X." });
    const neutral = unit({ id: "E3", sourceDocumentId: "sheet", claim: "Team X has six engineers." });
    expect(analyzeConflicts([favors, agrees, neutral])).toEqual([]);
  });

  it("matches shared entity ids regardless of separators and case", () => {
    const left = unit({
      id: "E1",
      sourceDocumentId: "memo",
      claim: "we favor it",
      entityIds: ["managed-queue-pro"],
    });
    const right = unit({
      id: "E2",
      sourceDocumentId: "chat",
      claim: "we are against it",
      entityIds: ["Managed_Queue_Pro"],
    });

    const conflicts = analyzeConflicts([left, right]);
    expect(conflicts.map((c) => c.subject)).toEqual(["managed-queue-pro"]);
  });
});

// ============================================
// scoreConfidence
// ============================================

describe("scoreConfidence", () => {
  const a = unit({ id: "E1", sourceDocumentId: "a" });
  const b = unit({ id: "E2", sourceDocumentId: "b" });
  const c = unit({ id: "E3", sourceDocumentId: "c" });
  const a2 = unit({ id: "E4", sourceDocumentId: "a" });

  it("is low with fewer than two units", () => {
    expect(scoreConfidence([], [])).toBe("low");
    expect(scoreConfidence([a], [])).toBe("low");
  });

  it("is low when every unit comes from one document", () => {
    expect(scoreConfidence([a, a2], [])).toBe("low");
  });

  it("is medium with two independent documents", () => {
    expect(scoreConfidence([a, b, a2], [])).toBe("medium");
  });

  it("is high with three documents and no conflict", () => {
    expect(scoreConfidence([a, b, c], [])).toBe("high");
  });

  it("drops to medium when a conflict touches a unit", () => {
    const conflict = { subject: "Team X", description: "d", left: a, right: b };
    expect(scoreConfidence([a, b, c], [conflict])).toBe("medium");
  });

  it("drops to medium when the recommendation names a conflicted subject", () => {
    const outsider1 = unit({ id: "E8", sourceDocumentId: "x" });
    const outsider2 = unit({ id: "E9", sourceDocumentId: "y" });
    const conflict = { subject: "Team X", description: "d", left: outsider1, right: outsider2 };

    expect(scoreConfidence([a, b, c], [conflict], { recommendation: "Go with Team X." })).toBe("medium");
    expect(scoreConfidence([a, b, c], [conflict], { recommendation: "Go with Team Y." })).toBe("high");
    expect(scoreConfidence([a, b, c], [conflict])).toBe("high");
  });
});
