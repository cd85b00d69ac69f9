// ============================================
// Confidence scoring — corroboration + conflicts -> tier
// ============================================

import { normalizeEntity, normalizeMentionText } from "../store/filters.js";
import type { ConfidenceTier, ConflictRecord, EvidenceUnit } from "../evidence/types.js";

const TIER_ORDER: Record<ConfidenceTier, number> = { low: 0, medium: 1, high: 2 };

export function compareTiers(a: ConfidenceTier, b: ConfidenceTier): number {
  return TIER_ORDER[a] - TIER_ORDER[b];
}

export interface ScoreOptions {
  /** When set, conflicts whose subject the recommendation names also count */
  recommendation?: string;
}

/**
 * Compute the confidence tier for a set of (cited) units.
 *
 * - low: fewer than 2 units or fewer than 2 independent documents
 * - high: 3+ documents and no conflict touching the units or the recommendation
 * - medium: everything in between
 */
export function scoreConfidence(
  units: EvidenceUnit[],
  conflicts: ConflictRecord[],
  options: ScoreOptions = {}
): ConfidenceTier {
  if (units.length < 2) return "low";

  const documents = new Set(units.map((u) => u.sourceDocumentId));
  if (documents.size < 2) return "low";

  const unitIds = new Set(units.map((u) => u.id));
  const recommendation = options.recommendation ? normalizeMentionText(options.recommendation) : undefined;

  const touching = conflicts.filter(
    (c) =>
      unitIds.has(c.left.id) ||
      unitIds.has(c.right.id) ||
      (recommendation !== undefined && recommendation.includes(` ${normalizeEntity(c.subject)} `))
  );

  if (documents.size >= 3 && touching.length === 0) return "high";
  return "medium";
}
