// ============================================
// System prompts for decision synthesis
// ============================================

import type { AnalysisSignals, EvidenceUnit } from "../evidence/types.js";
import type { CompletionRequest } from "../llm/client.js";
import { DECISION_SCHEMA_NAME } from "../llm/schemas.js";

export const DECISION_SYSTEM_PROMPT = `You are a decision copilot for operations and product leads.
You turn internal evidence (documents, spreadsheet rows, chat messages) into a structured recommendation.

## Critical Rules
- ONLY use information from the EVIDENCE block
- Cite evidence by its id in square brackets, e.g. [E2], directly after the claim it supports
- Every claim in summary, recommendation and reasoning needs at least one citation
- Never cite an id that is not listed in EVIDENCE
- When sources disagree, say so and name both sides; do not pick a winner silently
- When evidence is thin or missing, list what is missing in conflicts_or_gaps instead of guessing

## Output
- summary: 1-2 sentences describing the decision at hand
- options: the realistic choices, each with pros, cons, risks and a short cost note
- recommendation: the option you recommend and why, with citations
- confidence: "high", "medium" or "low"
  - "high": 3+ independent sources agree and nothing contradicts the recommendation
  - "medium": some corroboration, or a known conflict
  - "low": a single source, or evidence that only touches the question
- reasoning: how the evidence leads to the recommendation
- citations: every evidence id you relied on
- conflicts_or_gaps: disagreements between sources and missing information`;

export const SIMPLIFIED_SYSTEM_PROMPT = `You write short, cited decision summaries from the EVIDENCE block only.
Cite evidence ids like [E1] after each claim. Never cite ids that are not listed.
If the evidence does not support a recommendation, say so in conflicts_or_gaps and set confidence to "low".`;

export interface PromptOptions {
  /** Shorter instructions and no analyzer notes, used for the retry */
  simplified?: boolean;
}

/** Render units as the EVIDENCE block */
export function formatEvidence(units: EvidenceUnit[]): string {
  return units
    .map((unit) => {
      const header = [
        `[${unit.id}]`,
        `source=${unit.sourceDocumentId}`,
        `type=${unit.sourceType}`,
        `location=${unit.location}`,
        unit.date ? `date=${unit.date}` : undefined,
      ]
        .filter((part) => part !== undefined)
        .join(" ");
      return `${header}\n${unit.claim}`;
    })
    .join("\n\n");
}

function formatSignals(signals: AnalysisSignals): string {
  const lines = [`Pre-computed confidence from corroboration: ${signals.tier}`];

  if (signals.conflicts.length > 0) {
    lines.push("Known conflicts:");
    for (const conflict of signals.conflicts) {
      lines.push(`- ${conflict.description} [${conflict.left.id}] [${conflict.right.id}]`);
    }
  }
  if (signals.gaps.length > 0) {
    lines.push("Known gaps:");
    for (const gap of signals.gaps) {
      lines.push(`- ${gap}`);
    }
  }
  return lines.join("\n");
}

/**
 * Build the completion request for a question over a set of evidence units.
 */
export function buildDecisionPrompt(
  question: string,
  units: EvidenceUnit[],
  signals: AnalysisSignals,
  options: PromptOptions = {}
): CompletionRequest {
  const sections = [`QUESTION:\n${question}`, `EVIDENCE:\n${formatEvidence(units)}`];

  if (!options.simplified) {
    sections.push(`ANALYSIS NOTES:\n${formatSignals(signals)}`);
  }

  return {
    system: options.simplified ? SIMPLIFIED_SYSTEM_PROMPT : DECISION_SYSTEM_PROMPT,
    user: sections.join("\n\n"),
    schemaName: DECISION_SCHEMA_NAME,
  };
}
