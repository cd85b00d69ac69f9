// ============================================
// LLM Client — OpenAI API wrapper
// ============================================

import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import type { z } from "zod";
import { DecisionError, SchemaViolationError, upstreamError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

/**
 * LLM model configuration.
 * Pin versions for reproducibility.
 */
export const COMPLETION_MODEL = "gpt-4o-mini";

export interface CompletionRequest {
  system: string;
  user: string;
  /** Name the output schema is registered under */
  schemaName: string;
}

/**
 * Maps a prompt to an object conforming to `schema`, or throws
 * SchemaViolationError. Callers still re-validate: the model is untrusted.
 */
export interface Completer {
  complete<T>(request: CompletionRequest, schema: z.ZodType<T>, signal?: AbortSignal): Promise<T>;
}

export interface OpenAICompleterOptions {
  client: OpenAI;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAICompleter implements Completer {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAICompleterOptions) {
    this.client = options.client;
    this.model = options.model ?? COMPLETION_MODEL;
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 1500;
  }

  async complete<T>(request: CompletionRequest, schema: z.ZodType<T>, signal?: AbortSignal): Promise<T> {
    let content: string;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user },
          ],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
          response_format: zodResponseFormat(schema, request.schemaName),
        },
        { signal }
      );
      content = response.choices[0]?.message?.content ?? "";
    } catch (err) {
      logger.error("LLM completion failed", {
        stage: "llm",
        model: this.model,
        error: err,
      });
      throw err instanceof DecisionError ? err : upstreamError("completion", err);
    }

    return parseStructuredResponse(content, schema);
  }
}

/**
 * Parse JSON from an LLM response and validate it against a schema.
 * Tolerates a markdown code fence around the JSON.
 */
export function parseStructuredResponse<T>(response: string, schema: z.ZodType<T>): T {
  const fenced = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonStr = (fenced?.[1] ?? response).trim();

  if (jsonStr.length === 0) {
    throw new SchemaViolationError("Completion returned empty content");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch (err) {
    logger.warn("Failed to parse LLM JSON response", {
      stage: "llm",
      responsePreview: response.slice(0, 100),
    });
    throw new SchemaViolationError("Completion output is not valid JSON", [], err);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new SchemaViolationError(
      "Completion output does not match the requested schema",
      result.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
    );
  }
  return result.data;
}

/** Create the shared OpenAI client */
export function createOpenAIClient(apiKey: string, timeoutMs: number): OpenAI {
  // Retries are owned by the pipeline (one retry per call), not the SDK
  return new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 });
}
