// ============================================
// API Middleware — Validation, request ids, error shaping
// ============================================

import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { logger } from "../lib/logger.js";
import { metadataFilterSchema } from "../types/index.js";

export interface RequestWithId extends Request {
  requestId?: string;
}

// ============================================
// Input Validation
// ============================================

/**
 * Request body schema for /api/v1/answer endpoint.
 */
export const answerRequestSchema = z
  .object({
    question: z
      .string()
      .trim()
      .min(1, "Question cannot be empty")
      .max(2000, "Question cannot exceed 2000 characters"),
    filters: metadataFilterSchema.optional(),
  })
  .strict();

export type AnswerRequest = z.infer<typeof answerRequestSchema>;

/**
 * Validation middleware factory.
 */
export function validateBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const errors = result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }));

      res.status(400).json({
        error: "VALIDATION_ERROR",
        message: "Invalid request body",
        details: errors,
      });
      return;
    }

    // Replace body with validated/transformed data
    req.body = result.data;
    next();
  };
}

// ============================================
// Request ID Middleware
// ============================================

/**
 * Add request ID to all requests for tracing.
 */
export function addRequestId(req: RequestWithId, res: Response, next: NextFunction): void {
  const header = req.headers["x-request-id"];
  const requestId = typeof header === "string" && header.length > 0 ? header : crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ============================================
// Body parse errors
// ============================================

/**
 * Turn malformed JSON bodies into the same 400 shape as schema failures.
 */
export function handleBodyParseError(
  err: unknown,
  req: RequestWithId,
  res: Response,
  next: NextFunction
): void {
  if (err instanceof SyntaxError) {
    logger.warn("Malformed request body", { stage: "api", requestId: req.requestId });
    res.status(400).json({
      error: "VALIDATION_ERROR",
      message: "Request body must be valid JSON",
    });
    return;
  }
  next(err);
}
