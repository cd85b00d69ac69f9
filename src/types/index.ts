// ============================================
// Core domain types — chunks, filters, candidates
// ============================================

import { z } from "zod";

/** Shape of the source a chunk was cut from */
export const SOURCE_TYPES = ["narrative", "tabular-row", "chat-message"] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD");

const baseMetadata = {
  document_id: z.string().min(1),
  /** Section title, row label or thread title */
  location: z.string().min(1),
  date: isoDate.optional(),
  author: z.string().min(1).optional(),
  entity_ids: z.array(z.string().min(1)).default([]),
};

/**
 * Metadata is a fixed record per source type.
 * Unknown keys are rejected so loaders can't smuggle untyped payloads downstream.
 */
export const chunkMetadataSchema = z.discriminatedUnion("source_type", [
  z
    .object({
      source_type: z.literal("narrative"),
      ...baseMetadata,
      section_level: z.number().int().min(1).max(6).optional(),
    })
    .strict(),
  z
    .object({
      source_type: z.literal("tabular-row"),
      ...baseMetadata,
      /** Primary entity of the row; duplicate rows share it */
      record_id: z.string().min(1).optional(),
      row_number: z.number().int().nonnegative().optional(),
    })
    .strict(),
  z
    .object({
      source_type: z.literal("chat-message"),
      ...baseMetadata,
      author: z.string().min(1),
      thread_id: z.string().min(1).optional(),
    })
    .strict(),
]);

export type ChunkMetadata = z.infer<typeof chunkMetadataSchema>;

export const chunkSchema = z
  .object({
    id: z.string().min(1),
    text: z.string().min(1),
    /** Position of the chunk within its source document */
    ordinal: z.number().int().nonnegative(),
    metadata: chunkMetadataSchema,
  })
  .strict();

/** Immutable unit of retrievable text */
export type Chunk = Readonly<z.infer<typeof chunkSchema>>;

/** Predicate form of a metadata filter, as the index consumes it */
export type ChunkPredicate = (chunk: Chunk) => boolean;

/** Declarative metadata filter accepted by the public API */
export const metadataFilterSchema = z
  .object({
    sourceTypes: z.array(z.enum(SOURCE_TYPES)).min(1).optional(),
    documentIds: z.array(z.string().min(1)).min(1).optional(),
    entityIds: z.array(z.string().min(1)).min(1).optional(),
    dateFrom: isoDate.optional(),
    dateTo: isoDate.optional(),
  })
  .strict();

export type MetadataFilter = z.infer<typeof metadataFilterSchema>;

/** A chunk scored for one question */
export interface ScoredCandidate {
  chunk: Chunk;
  /** Raw cosine similarity from the index */
  similarity: number;
  /** Lexical entity boost added on top of similarity */
  boost: number;
  /** similarity + boost, the ranking key */
  score: number;
  /** 1-based position after re-ranking */
  rank: number;
}

/** A chunk and its embedding, ready for indexing */
export interface EmbeddedChunk {
  chunk: Chunk;
  vector: number[];
}
