// ============================================
// API Handler — /api/v1/answer and /api/v1/health
// ============================================

import type { Response } from "express";
import crypto from "crypto";
import { logger } from "../lib/logger.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import { createRefusal } from "../evidence/types.js";
import type { Pipeline } from "../app/types.js";
import type { IndexHandle } from "../store/indexHandle.js";
import type { SourceType } from "../types/index.js";
import type { AnswerRequest, RequestWithId } from "./middleware.js";

// ============================================
// Answer
// ============================================

/**
 * Handle /api/v1/answer requests.
 *
 * The body is always a decision or a refusal: fatal pipeline errors
 * become a 503 carrying a refusal.
 */
export function createAnswerHandler(pipeline: Pipeline) {
  return async (req: RequestWithId, res: Response): Promise<void> => {
    const requestId = req.requestId ?? crypto.randomUUID().slice(0, 8);
    const startTime = Date.now();
    // Validated by validateBody(answerRequestSchema)
    const body: AnswerRequest = req.body;
    const { question, filters } = body;

    logger.info("API request received", {
      stage: "api",
      requestId,
      questionLength: question.length,
      hasFilters: filters !== undefined,
    });

    try {
      const result = await pipeline.answer(question, { filters, requestId });

      logger.info("API request completed", {
        stage: "api",
        requestId,
        status: result.status,
        latencyMs: Date.now() - startTime,
      });

      res.status(200).json(result);
    } catch (err) {
      const appError = wrapError(err, requestId);

      logger.error("API request failed", {
        stage: "api",
        requestId,
        error: appError,
      });

      // Never leak internals: the user sees a refusal
      res.status(503).json(createRefusal([getUserMessage(appError)]));
    }
  };
}

// ============================================
// Health Check Response
// ============================================

export interface HealthResponse {
  status: "ok" | "degraded";
  generation: number;
  builtAt: string;
  size: number;
  bySourceType: Record<SourceType, number>;
}

/**
 * Report the served index snapshot. An empty index is degraded.
 */
export function createHealthHandler(handle: IndexHandle) {
  return (_req: RequestWithId, res: Response): void => {
    const { index, generation, builtAt } = handle.current();
    const stats = index.stats();

    const response: HealthResponse = {
      status: stats.totalChunks > 0 ? "ok" : "degraded",
      generation,
      builtAt,
      size: stats.totalChunks,
      bySourceType: stats.bySourceType,
    };

    res.status(200).json(response);
  };
}
