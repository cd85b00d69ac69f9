// ============================================
// Citation Gate — Binary grounding enforcement
//
// Rule: every cited id must name a supplied evidence unit.
// Unknown ids are stripped; no valid citation at all fails the answer.
// ============================================

import { citationIntegrityViolation } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { EvidenceUnit } from "../evidence/types.js";
import type { DecisionDraft } from "../llm/schemas.js";

const INLINE_REF = /\s*\[(E\d+)\]/g;

export type CitationGateResult =
  | {
      passed: true;
      /** Draft with unknown inline markers removed and citations narrowed */
      draft: DecisionDraft;
      /** Supplied units the draft cites, in supplied order */
      citedUnits: EvidenceUnit[];
      invalidRefs: string[];
    }
  | {
      passed: false;
      reason: string;
      invalidRefs: string[];
    };

/** "[e2]" / " E2 " -> "E2" */
export function normalizeRef(ref: string): string {
  return ref.trim().replace(/^\[|\]$/g, "").trim().toUpperCase();
}

/** All inline [E#] markers in a piece of text, in order of appearance */
export function extractInlineRefs(text: string): string[] {
  return Array.from(text.matchAll(INLINE_REF), (m) => m[1] ?? "").filter((ref) => ref.length > 0);
}

function narrativeFields(draft: DecisionDraft): string[] {
  return [
    draft.summary,
    draft.recommendation,
    draft.reasoning,
    ...draft.options.flatMap((o) => [o.name, o.cost, ...o.pros, ...o.cons, ...o.risks]),
  ];
}

/**
 * Apply the citation gate to a model draft.
 *
 * References come from the citations array plus inline markers in the
 * narrative fields. Each unknown reference is logged as a citation
 * integrity violation and removed from the output.
 */
export function applyCitationGate(
  draft: DecisionDraft,
  supplied: EvidenceUnit[],
  requestId?: string
): CitationGateResult {
  const byId = new Map(supplied.map((u) => [u.id, u]));
  const suppliedIds = supplied.map((u) => u.id);

  const refs = [...draft.citations.map(normalizeRef), ...narrativeFields(draft).flatMap(extractInlineRefs)];
  const valid = new Set<string>();
  const invalid = new Set<string>();
  for (const ref of refs) {
    if (ref.length === 0) continue;
    (byId.has(ref) ? valid : invalid).add(ref);
  }

  const invalidRefs = [...invalid];
  for (const ref of invalidRefs) {
    logger.warn("Citation integrity violation", {
      stage: "grounding",
      requestId,
      error: citationIntegrityViolation(ref, suppliedIds),
    });
  }

  if (valid.size === 0) {
    logger.warn("Citation gate FAILED - no valid citations", {
      stage: "grounding",
      requestId,
      invalidRefs,
    });
    return {
      passed: false,
      reason: "The generated answer cited none of the evidence retrieved for this question.",
      invalidRefs,
    };
  }

  const strip = (text: string): string =>
    text.replace(INLINE_REF, (marker: string, id: string) => (byId.has(id) ? marker : "")).trim();

  const sanitized: DecisionDraft = {
    ...draft,
    summary: strip(draft.summary),
    recommendation: strip(draft.recommendation),
    reasoning: strip(draft.reasoning),
    options: draft.options.map((o) => ({
      name: strip(o.name),
      pros: o.pros.map(strip),
      cons: o.cons.map(strip),
      risks: o.risks.map(strip),
      cost: strip(o.cost),
    })),
    citations: suppliedIds.filter((id) => valid.has(id)),
  };

  logger.info("Citation gate passed", {
    stage: "grounding",
    requestId,
    cited: sanitized.citations.length,
    invalid: invalidRefs.length,
  });

  return {
    passed: true,
    draft: sanitized,
    citedUnits: supplied.filter((u) => valid.has(u.id)),
    invalidRefs,
  };
}
