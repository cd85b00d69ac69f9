// ============================================
// Evidence Types — units, conflicts, decisions, refusals
// ============================================

import type { ScoredCandidate, SourceType } from "../types/index.js";

/**
 * A citation-ready claim traceable to one or more retrieved chunks
 * from a single source document.
 */
export type EvidenceUnit = {
  /** Citation handle shown to the model, e.g. "E3" */
  id: string;

  /** Claim text, never split across units */
  claim: string;

  sourceDocumentId: string;
  sourceType: SourceType;

  /** Human-readable location: section, row(s) or thread */
  location: string;

  /** Originating chunk ids; always at least one */
  chunkIds: string[];

  /** Entities referenced by any originating chunk */
  entityIds: string[];

  date?: string;

  /** Best (lowest) candidate rank among the originating chunks */
  rank: number;

  /** Best candidate score among the originating chunks */
  score: number;
};

/**
 * Two units taking opposing stances on one subject.
 */
export type ConflictRecord = {
  subject: string;
  description: string;
  left: EvidenceUnit;
  right: EvidenceUnit;
};

export const CONFIDENCE_TIERS = ["high", "medium", "low"] as const;
export type ConfidenceTier = (typeof CONFIDENCE_TIERS)[number];

export type DecisionOption = {
  name: string;
  pros: string[];
  cons: string[];
  risks: string[];
  cost: string;
};

/** Final structured output of a successful answer */
export type DecisionResponse = {
  status: "ok";
  summary: string;
  options: DecisionOption[];
  recommendation: string;
  confidence: ConfidenceTier;
  reasoning: string;
  /** Only units that survived citation validation */
  evidence: EvidenceUnit[];
  conflicts: ConflictRecord[];
  gaps: string[];
};

/** Explicit insufficient-evidence response */
export type Refusal = {
  status: "insufficient_evidence";
  /** Descriptions of what is missing; never empty */
  missing: string[];
};

export type AnswerResult = DecisionResponse | Refusal;

/** Output of the evidence assembler */
export type AssembledEvidence = {
  units: EvidenceUnit[];
  /** Candidates whose unit did not fit the budget */
  dropped: ScoredCandidate[];
  /** Budget-related gaps to surface in the response */
  gaps: string[];
};

/** Pre-pass signals fed into the synthesis prompt */
export type AnalysisSignals = {
  conflicts: ConflictRecord[];
  tier: ConfidenceTier;
  gaps: string[];
};

export function isRefusal(result: AnswerResult): result is Refusal {
  return result.status === "insufficient_evidence";
}

/** Refusal factory; falls back to a generic reason so `missing` is never empty */
export function createRefusal(missing: string[]): Refusal {
  const reasons = missing.map((m) => m.trim()).filter((m) => m.length > 0);
  return {
    status: "insufficient_evidence",
    missing: reasons.length > 0 ? reasons : ["No verifiable evidence supports an answer."],
  };
}
