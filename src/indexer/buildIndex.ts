// ============================================
// Indexer — raw chunks -> frozen embedding index
// ============================================

import { readFile } from "fs/promises";
import { validationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { withDeadline, withSingleRetry } from "../lib/upstream.js";
import type { Embedder } from "../retrieval/embeddings.js";
import { EmbeddingIndex } from "../store/embeddingIndex.js";
import { chunkSchema, type Chunk, type EmbeddedChunk } from "../types/index.js";

/** Texts per embedding request */
export const EMBED_BATCH_SIZE = 64;

export interface IndexCorpusOptions {
  batchSize?: number;
  timeoutMs?: number;
}

/**
 * Validate one raw chunk. Unknown metadata keys and a metadata shape that
 * does not match its source_type are rejected.
 */
export function parseChunk(raw: unknown): Chunk {
  const result = chunkSchema.safeParse(raw);
  if (!result.success) {
    const id = typeof raw === "object" && raw !== null && "id" in raw ? String(raw.id) : undefined;
    throw validationError(`Invalid chunk${id ? ` "${id}"` : ""}`, {
      chunkId: id,
      issues: result.error.issues.map((issue) => `${issue.path.join(".") || "chunk"}: ${issue.message}`),
    });
  }
  const { metadata, ...rest } = result.data;
  Object.freeze(metadata.entity_ids);
  return Object.freeze({ ...rest, metadata: Object.freeze(metadata) });
}

/** Add every record, then freeze. Duplicate ids abort the build. */
export function buildIndex(records: EmbeddedChunk[]): EmbeddingIndex {
  const index = new EmbeddingIndex();
  for (const { chunk, vector } of records) {
    index.add(chunk, vector);
  }
  return index.freeze();
}

/**
 * Validate, embed in batches and build a frozen index.
 */
export async function indexCorpus(
  rawChunks: unknown[],
  embedder: Embedder,
  options: IndexCorpusOptions = {}
): Promise<EmbeddingIndex> {
  const batchSize = Math.max(1, options.batchSize ?? EMBED_BATCH_SIZE);
  const timeoutMs = options.timeoutMs ?? 30_000;
  const startTime = Date.now();

  const chunks = rawChunks.map(parseChunk);
  const records: EmbeddedChunk[] = [];

  for (let i = 0; i < chunks.length; i += batchSize) {
    const batch = chunks.slice(i, i + batchSize);
    const texts = batch.map((c) => c.text);
    const vectors = await withSingleRetry("corpus embedding", "indexer", () =>
      withDeadline("embedding", timeoutMs, (signal) => embedder.embedBatch(texts, signal))
    );

    if (vectors.length !== batch.length) {
      throw validationError("Embedder returned a different number of vectors than texts", {
        expected: batch.length,
        received: vectors.length,
      });
    }

    batch.forEach((chunk, j) => {
      const vector = vectors[j];
      if (vector) records.push({ chunk, vector });
    });

    logger.debug("Embedded batch", {
      stage: "indexer",
      batch: Math.floor(i / batchSize) + 1,
      size: batch.length,
    });
  }

  const index = buildIndex(records);
  const stats = index.stats();

  logger.info("Corpus indexed", {
    stage: "indexer",
    chunks: stats.totalChunks,
    documents: Object.keys(stats.byDocument).length,
    bySourceType: stats.bySourceType,
    latencyMs: Date.now() - startTime,
  });

  return index;
}

/** Read a JSON array of raw chunks */
export async function loadCorpusFile(path: string): Promise<unknown[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw validationError(`Could not read corpus file ${path}`, {
      path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  if (!Array.isArray(parsed)) {
    throw validationError(`Corpus file ${path} must contain a JSON array of chunks`, { path });
  }
  return parsed;
}
