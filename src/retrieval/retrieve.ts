// ============================================
// Retriever — question -> ranked, deduplicated, filtered candidates
// ============================================

import { logger } from "../lib/logger.js";
import type { EmbeddingIndex } from "../store/embeddingIndex.js";
import { compileFilter } from "../store/filters.js";
import type { ChunkPredicate, MetadataFilter, ScoredCandidate } from "../types/index.js";
import { embedQuery, type Embedder } from "./embeddings.js";
import { DEFAULT_BOOST_WEIGHT, rerankCandidates, type PoolCandidate } from "./rerank.js";

/** Over-fetch pool for the re-rank step */
export const DEFAULT_K_INITIAL = 40;
export const DEFAULT_K_FINAL = 12;

/** Candidates below this raw similarity never count as evidence */
export const MIN_SIMILARITY = 0.2;

const DEFAULT_TIMEOUT_MS = 30_000;

export interface RetrieveOptions {
  filter?: MetadataFilter | ChunkPredicate;
  kInitial?: number;
  kFinal?: number;
  minSimilarity?: number;
  boostWeight?: number;
  timeoutMs?: number;
  requestId?: string;
}

export interface RetrieverDeps {
  index: EmbeddingIndex;
  embedder: Embedder;
}

/**
 * Retrieve candidates for a question.
 *
 * Flow:
 * 1. Embed the question (deadline + one retry)
 * 2. Over-fetch kInitial neighbours from the index
 * 3. Dedupe by chunk id, drop anything under the similarity floor
 * 4. Boost exact entity mentions, sort, truncate to kFinal
 *
 * Empty corpus, empty question or a filter that matches nothing: [].
 */
export async function retrieve(
  question: string,
  deps: RetrieverDeps,
  options: RetrieveOptions = {}
): Promise<ScoredCandidate[]> {
  const kFinal = Math.max(1, options.kFinal ?? DEFAULT_K_FINAL);
  const kInitial = Math.max(kFinal, options.kInitial ?? DEFAULT_K_INITIAL);
  const minSimilarity = options.minSimilarity ?? MIN_SIMILARITY;
  const trimmed = question.trim();

  if (trimmed.length === 0 || deps.index.size === 0) {
    logger.info("Retrieval skipped", {
      stage: "retrieval",
      requestId: options.requestId,
      reason: trimmed.length === 0 ? "empty_question" : "empty_index",
    });
    return [];
  }

  const predicate = typeof options.filter === "function" ? options.filter : compileFilter(options.filter);
  const vector = await embedQuery(deps.embedder, trimmed, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const hits = deps.index.search(vector, kInitial, predicate);

  const seen = new Set<string>();
  const pool: PoolCandidate[] = [];
  for (const hit of hits) {
    const id = hit.entry.chunk.id;
    if (seen.has(id)) continue;
    seen.add(id);
    if (hit.similarity < minSimilarity) continue;
    pool.push({ chunk: hit.entry.chunk, similarity: hit.similarity });
  }

  const candidates = rerankCandidates(trimmed, pool, kFinal, options.boostWeight ?? DEFAULT_BOOST_WEIGHT);

  logger.info("Retrieval complete", {
    stage: "retrieval",
    requestId: options.requestId,
    hitCount: hits.length,
    poolSize: pool.length,
    duplicates: hits.length - seen.size,
    belowFloor: seen.size - pool.length,
    resultCount: candidates.length,
    boosted: candidates.filter((c) => c.boost > 0).length,
    topScore: candidates[0]?.score.toFixed(3),
  });

  return candidates;
}
