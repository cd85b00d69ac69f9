// ============================================
// Embeddings — OpenAI embedding generation
// Pin versions for retrieval determinism.
// ============================================

import OpenAI from "openai";
import { upstreamError, DecisionError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { withDeadline, withSingleRetry } from "../lib/upstream.js";

/** Maps text to a fixed-length vector; deterministic for identical input */
export interface Embedder {
  readonly dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** Embedding model version. PINNED for retrieval determinism - bump carefully. */
export const EMBEDDING_MODEL = "text-embedding-3-small";
export const EMBEDDING_DIMENSIONS = 1536;

/** Model input limit, in characters */
const MAX_INPUT_CHARS = 8000;

export interface OpenAIEmbedderOptions {
  client: OpenAI;
  model?: string;
  dimensions?: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly dimensions: number;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAIEmbedderOptions) {
    this.client = options.client;
    this.model = options.model ?? EMBEDDING_MODEL;
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], signal);
    if (!embedding) {
      throw upstreamError("embedding", new Error("No embedding returned from OpenAI"));
    }
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
          dimensions: this.dimensions,
        },
        { signal }
      );
      return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (err) {
      logger.error("Embedding generation failed", {
        stage: "retrieval",
        textCount: texts.length,
        error: err,
      });
      throw err instanceof DecisionError ? err : upstreamError("embedding", err);
    }
  }
}

/**
 * Embed a query with a per-call deadline and one retry.
 */
export async function embedQuery(
  embedder: Embedder,
  text: string,
  timeoutMs: number
): Promise<number[]> {
  const attempt = () => withDeadline("embedding", timeoutMs, (signal) => embedder.embed(text, signal));
  return withSingleRetry("embedding", "retrieval", attempt);
}
