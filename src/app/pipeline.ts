// ============================================
// Pipeline — Single orchestration flow
// ============================================

import crypto from "crypto";
import { scoreConfidence } from "../analysis/confidence.js";
import { analyzeConflicts } from "../analysis/conflicts.js";
import { DEFAULT_STANCE_LEXICON } from "../analysis/stanceLexicon.js";
import { assembleEvidence, DEFAULT_TOKEN_BUDGET } from "../evidence/assembleEvidence.js";
import { createRefusal, type AnswerResult } from "../evidence/types.js";
import { retrievalEmpty } from "../lib/errors.js";
import { createRequestLogger } from "../lib/logger.js";
import { DEFAULT_COMPLETION_TIMEOUT_MS, synthesizeDecision } from "../llm/synthesize.js";
import { DEFAULT_BOOST_WEIGHT } from "../retrieval/rerank.js";
import { DEFAULT_K_FINAL, DEFAULT_K_INITIAL, MIN_SIMILARITY, retrieve } from "../retrieval/retrieve.js";
import { describeFilter } from "../store/filters.js";
import type { AnswerOptions, Pipeline, PipelineDeps, PipelineSettings } from "./types.js";

export const DEFAULT_SETTINGS: PipelineSettings = {
  kInitial: DEFAULT_K_INITIAL,
  kFinal: DEFAULT_K_FINAL,
  minSimilarity: MIN_SIMILARITY,
  boostWeight: DEFAULT_BOOST_WEIGHT,
  tokenBudget: DEFAULT_TOKEN_BUDGET,
  timeoutMs: DEFAULT_COMPLETION_TIMEOUT_MS,
};

/**
 * Create the answer pipeline.
 *
 * Flow:
 * 1. Retrieve (embed, search, floor, boost)
 * 2. Assemble evidence units under the token budget
 * 3. Analyze conflicts and pre-compute confidence
 * 4. Synthesize (LLM, one retry)
 * 5. Ground (citation gate, confidence post-check)
 *
 * The index snapshot is read once per question so a concurrent swap
 * never mixes two corpora in one answer.
 */
export function createPipeline(deps: PipelineDeps): Pipeline {
  const settings: PipelineSettings = { ...DEFAULT_SETTINGS, ...deps.settings };
  const lexicon = deps.lexicon ?? DEFAULT_STANCE_LEXICON;

  async function answer(question: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const requestId = options.requestId ?? crypto.randomUUID().slice(0, 8);
    const log = createRequestLogger(requestId, "pipeline");
    const startTime = Date.now();
    const snapshot = deps.handle.current();

    log.info("Pipeline started", {
      question: question.slice(0, 80),
      generation: snapshot.generation,
      hasFilter: options.filters !== undefined,
    });

    const candidates = await retrieve(
      question,
      { index: snapshot.index, embedder: deps.embedder },
      {
        filter: options.filters,
        kInitial: settings.kInitial,
        kFinal: settings.kFinal,
        minSimilarity: settings.minSimilarity,
        boostWeight: settings.boostWeight,
        timeoutMs: settings.timeoutMs,
        requestId,
      }
    );

    if (candidates.length === 0) {
      const empty = retrievalEmpty(noEvidenceMessage(question, options), requestId);
      log.info("Refusing - no evidence retrieved", { code: empty.code, latencyMs: Date.now() - startTime });
      return createRefusal([empty.message]);
    }

    const assembled = assembleEvidence(candidates, settings.tokenBudget, requestId);
    if (assembled.units.length === 0) {
      log.info("Refusing - no evidence fits the context budget", { dropped: assembled.dropped.length });
      return createRefusal([
        `Retrieved evidence for "${question.trim()}" does not fit the context budget of ${settings.tokenBudget} tokens.`,
        ...assembled.gaps,
      ]);
    }

    const conflicts = analyzeConflicts(assembled.units, lexicon, requestId);
    const tier = scoreConfidence(assembled.units, conflicts);
    log.withStage("analysis").debug("Pre-pass signals", {
      tier,
      conflicts: conflicts.map((c) => c.subject),
      gaps: assembled.gaps.length,
    });

    const result = await synthesizeDecision(question, assembled.units, {
      completer: deps.completer,
      signals: { conflicts, tier, gaps: assembled.gaps },
      timeoutMs: settings.timeoutMs,
      requestId,
    });

    log.info("Pipeline completed", {
      latencyMs: Date.now() - startTime,
      status: result.status,
      units: assembled.units.length,
      conflicts: conflicts.length,
      preTier: tier,
      confidence: result.status === "ok" ? result.confidence : undefined,
    });

    return result;
  }

  return { answer };
}

function noEvidenceMessage(question: string, options: AnswerOptions): string {
  const topic = `No indexed evidence matches "${question.trim()}"`;
  if (typeof options.filters === "function") {
    return `${topic} under the supplied filter.`;
  }
  const filter = describeFilter(options.filters);
  return filter ? `${topic} with filter ${filter}.` : `${topic}.`;
}
