// ============================================
// Pipeline Types — wiring and per-request options
// ============================================

import type { StanceLexicon } from "../analysis/stanceLexicon.js";
import type { Completer } from "../llm/client.js";
import type { Embedder } from "../retrieval/embeddings.js";
import type { IndexHandle } from "../store/indexHandle.js";
import type { AnswerResult } from "../evidence/types.js";
import type { ChunkPredicate, MetadataFilter } from "../types/index.js";

/** Tunables; every field has a default */
export interface PipelineSettings {
  kInitial: number;
  kFinal: number;
  minSimilarity: number;
  boostWeight: number;
  tokenBudget: number;
  /** Deadline for each embedding or completion call */
  timeoutMs: number;
}

export interface PipelineDeps {
  handle: IndexHandle;
  embedder: Embedder;
  completer: Completer;
  lexicon?: StanceLexicon;
  settings?: Partial<PipelineSettings>;
}

export interface AnswerOptions {
  filters?: MetadataFilter | ChunkPredicate;
  /** Supplied by the API layer; generated otherwise */
  requestId?: string;
}

export interface Pipeline {
  /**
   * Answer a decision question. Returns a cited decision or a refusal;
   * throws only for fatal failures (upstream exhausted, synthesis failed).
   */
  answer(question: string, options?: AnswerOptions): Promise<AnswerResult>;
}
