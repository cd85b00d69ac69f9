// ============================================
// Decision Synthesizer — evidence units -> cited decision
// ============================================

import { compareTiers, scoreConfidence } from "../analysis/confidence.js";
import { applyCitationGate } from "../grounding/citationGate.js";
import { SchemaViolationError, synthesisError } from "../lib/errors.js";
import { createRequestLogger } from "../lib/logger.js";
import { withDeadline, withSingleRetry } from "../lib/upstream.js";
import { buildDecisionPrompt } from "../prompts/decisionPrompt.js";
import {
  createRefusal,
  type AnalysisSignals,
  type AnswerResult,
  type EvidenceUnit,
} from "../evidence/types.js";
import type { Completer } from "./client.js";
import { decisionDraftSchema, type DecisionDraft } from "./schemas.js";

export const DEFAULT_COMPLETION_TIMEOUT_MS = 30_000;

export interface SynthesizeOptions {
  completer: Completer;
  signals: AnalysisSignals;
  timeoutMs?: number;
  requestId?: string;
}

interface Attempt {
  draft: DecisionDraft;
  supplied: EvidenceUnit[];
}

/**
 * Produce a decision response from assembled evidence.
 *
 * One retry on any completion failure, with a simplified prompt and the
 * lowest-ranked unit dropped. A second failure throws SYNTHESIS_FAILED.
 * The returned confidence is always recomputed over the cited units.
 */
export async function synthesizeDecision(
  question: string,
  units: EvidenceUnit[],
  options: SynthesizeOptions
): Promise<AnswerResult> {
  const requestId = options.requestId ?? "-";
  const log = createRequestLogger(requestId, "synthesize");
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;
  const { completer, signals } = options;

  if (units.length === 0) {
    return createRefusal(["No evidence was available to synthesize a decision from.", ...signals.gaps]);
  }

  const run = async (supplied: EvidenceUnit[], simplified: boolean): Promise<Attempt> => {
    const request = buildDecisionPrompt(question, supplied, signals, { simplified });
    const draft = await withDeadline("completion", timeoutMs, (signal) =>
      completer.complete(request, decisionDraftSchema, signal)
    );
    // Completer implementations are untrusted: validate again
    const checked = decisionDraftSchema.safeParse(draft);
    if (!checked.success) {
      throw new SchemaViolationError(
        "Decision draft failed validation",
        checked.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      );
    }
    return { draft: checked.data, supplied };
  };

  const startTime = Date.now();
  let attempt: Attempt;
  try {
    attempt = await withSingleRetry(
      "Decision completion",
      "synthesize",
      () => run(units, false),
      () => run(withoutLowestRanked(units), true)
    );
  } catch (err) {
    log.error("Decision synthesis failed after retry", { error: err, unitCount: units.length });
    throw synthesisError("Decision synthesis failed after one retry", requestId, err);
  }

  const { draft, supplied } = attempt;
  const gate = applyCitationGate(draft, supplied, requestId);
  if (!gate.passed) {
    return createRefusal([gate.reason, ...signals.gaps]);
  }

  const suppliedIds = new Set(supplied.map((u) => u.id));
  const conflicts = signals.conflicts.filter((c) => suppliedIds.has(c.left.id) && suppliedIds.has(c.right.id));

  const confidence = scoreConfidence(gate.citedUnits, conflicts, {
    recommendation: gate.draft.recommendation,
  });
  if (confidence !== draft.confidence) {
    log.warn("Model confidence overridden", {
      reported: draft.confidence,
      computed: confidence,
      direction: compareTiers(confidence, draft.confidence) < 0 ? "downgraded" : "upgraded",
    });
  }

  log.info("Decision synthesized", {
    latencyMs: Date.now() - startTime,
    supplied: supplied.length,
    cited: gate.citedUnits.length,
    conflicts: conflicts.length,
    confidence,
  });

  return {
    status: "ok",
    summary: gate.draft.summary,
    options: gate.draft.options,
    recommendation: gate.draft.recommendation,
    confidence,
    reasoning: gate.draft.reasoning,
    evidence: gate.citedUnits,
    conflicts,
    gaps: distinct([...gate.draft.conflicts_or_gaps, ...signals.gaps]),
  };
}

/** Units are grouped by document, so the lowest-ranked unit is not necessarily last */
function withoutLowestRanked(units: EvidenceUnit[]): EvidenceUnit[] {
  if (units.length <= 1) return units;
  const worst = units.reduce((w, u) => (u.rank >= w.rank ? u : w));
  return units.filter((u) => u !== worst);
}

function distinct(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v.length > 0))];
}
