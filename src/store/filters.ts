// ============================================
// Metadata filters — declarative filter -> chunk predicate
// ============================================

import type { Chunk, ChunkPredicate, MetadataFilter } from "../types/index.js";

/**
 * Compile a declarative filter into a predicate.
 * Every present clause must hold. Date bounds are inclusive and exclude undated chunks.
 */
export function compileFilter(filter: MetadataFilter | undefined): ChunkPredicate | undefined {
  if (!filter || Object.values(filter).every((v) => v === undefined)) {
    return undefined;
  }

  const sourceTypes = filter.sourceTypes ? new Set(filter.sourceTypes) : undefined;
  const documentIds = filter.documentIds ? new Set(filter.documentIds) : undefined;
  const entityIds = filter.entityIds ? new Set(filter.entityIds.map(normalizeEntity)) : undefined;

  return (chunk: Chunk): boolean => {
    const meta = chunk.metadata;

    if (sourceTypes && !sourceTypes.has(meta.source_type)) return false;
    if (documentIds && !documentIds.has(meta.document_id)) return false;

    if (entityIds) {
      const chunkEntities = entityKeysOf(chunk).map(normalizeEntity);
      if (!chunkEntities.some((e) => entityIds.has(e))) return false;
    }

    if (filter.dateFrom || filter.dateTo) {
      if (!meta.date) return false;
      if (filter.dateFrom && meta.date < filter.dateFrom) return false;
      if (filter.dateTo && meta.date > filter.dateTo) return false;
    }

    return true;
  };
}

/** Entity ids a chunk refers to, including a tabular row's record id */
export function entityKeysOf(chunk: Chunk): string[] {
  const meta = chunk.metadata;
  if (meta.source_type === "tabular-row" && meta.record_id && !meta.entity_ids.includes(meta.record_id)) {
    return [meta.record_id, ...meta.entity_ids];
  }
  return [...meta.entity_ids];
}

/** Lowercase and fold `-`, `_` and whitespace runs into one space */
export function normalizeEntity(value: string): string {
  return value.trim().toLowerCase().replace(/[-_\s]+/g, " ");
}

/**
 * Normalize free text like entity ids, padded with spaces so a mention
 * can be found at word boundaries with includes().
 */
export function normalizeMentionText(text: string): string {
  const folded = text.toLowerCase().replace(/[^\p{L}\p{N}\s_-]+/gu, " ");
  return ` ${normalizeEntity(folded)} `;
}

/** Describe a filter for logs and refusal messages */
export function describeFilter(filter: MetadataFilter | undefined): string | undefined {
  if (!filter) return undefined;

  const parts: string[] = [];
  if (filter.sourceTypes) parts.push(`source type in [${filter.sourceTypes.join(", ")}]`);
  if (filter.documentIds) parts.push(`document in [${filter.documentIds.join(", ")}]`);
  if (filter.entityIds) parts.push(`entity in [${filter.entityIds.join(", ")}]`);
  if (filter.dateFrom) parts.push(`date >= ${filter.dateFrom}`);
  if (filter.dateTo) parts.push(`date <= ${filter.dateTo}`);

  return parts.length > 0 ? parts.join(", ") : undefined;
}
