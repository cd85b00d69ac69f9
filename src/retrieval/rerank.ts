// ============================================
// Re-rank — lexical entity boost over vector similarity
// A verbatim entity mention (incident id, team name) adds a fixed boost.
// ============================================

import { entityKeysOf, normalizeEntity, normalizeMentionText } from "../store/filters.js";
import type { Chunk, ScoredCandidate } from "../types/index.js";

/** Default additive boost for an exact entity mention */
export const DEFAULT_BOOST_WEIGHT = 0.15;

export interface PoolCandidate {
  chunk: Chunk;
  similarity: number;
}

/**
 * True when any entity the chunk refers to appears verbatim in the question.
 */
export function mentionsEntity(normalizedQuestion: string, chunk: Chunk): boolean {
  return entityKeysOf(chunk).some((entity) => {
    const key = normalizeEntity(entity);
    return key.length > 0 && normalizedQuestion.includes(` ${key} `);
  });
}

/**
 * Boost, sort and truncate a candidate pool.
 * Order is total: score desc, similarity desc, chunk id asc.
 */
export function rerankCandidates(
  question: string,
  pool: PoolCandidate[],
  kFinal: number,
  boostWeight: number = DEFAULT_BOOST_WEIGHT
): ScoredCandidate[] {
  const normalized = normalizeMentionText(question);

  const scored = pool.map(({ chunk, similarity }) => {
    const boost = mentionsEntity(normalized, chunk) ? boostWeight : 0;
    return { chunk, similarity, boost, score: similarity + boost };
  });

  scored.sort(
    (a, b) =>
      b.score - a.score ||
      b.similarity - a.similarity ||
      compareIds(a.chunk.id, b.chunk.id)
  );

  return scored.slice(0, Math.max(0, kFinal)).map((candidate, i) => ({ ...candidate, rank: i + 1 }));
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
