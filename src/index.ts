// ============================================
// Public library surface
// ============================================

export { createPipeline, DEFAULT_SETTINGS } from "./app/pipeline.js";
export type { AnswerOptions, Pipeline, PipelineDeps, PipelineSettings } from "./app/types.js";

export { EmbeddingIndex, type IndexStats, type SearchHit } from "./store/embeddingIndex.js";
export { IndexHandle, type IndexSnapshot } from "./store/indexHandle.js";
export { compileFilter, describeFilter } from "./store/filters.js";
export { buildIndex, indexCorpus, loadCorpusFile, parseChunk } from "./indexer/buildIndex.js";

export { retrieve, type RetrieveOptions } from "./retrieval/retrieve.js";
export { OpenAIEmbedder, type Embedder } from "./retrieval/embeddings.js";
export { assembleEvidence, estimateTokens } from "./evidence/assembleEvidence.js";
export { analyzeConflicts } from "./analysis/conflicts.js";
export { scoreConfidence } from "./analysis/confidence.js";
export { DEFAULT_STANCE_LEXICON, detectStance, loadStanceLexicon, type StanceLexicon } from "./analysis/stanceLexicon.js";
export { synthesizeDecision } from "./llm/synthesize.js";
export { OpenAICompleter, createOpenAIClient, type Completer, type CompletionRequest } from "./llm/client.js";
export { applyCitationGate } from "./grounding/citationGate.js";
export { createApp } from "./api/index.js";

export {
  DecisionError,
  DuplicateIdError,
  SchemaViolationError,
  UpstreamTimeoutError,
  type ErrorCode,
} from "./lib/errors.js";

export type {
  AnswerResult,
  ConfidenceTier,
  ConflictRecord,
  DecisionOption,
  DecisionResponse,
  EvidenceUnit,
  Refusal,
} from "./evidence/types.js";
export { isRefusal } from "./evidence/types.js";
export type { Chunk, ChunkMetadata, MetadataFilter, ScoredCandidate, SourceType } from "./types/index.js";
