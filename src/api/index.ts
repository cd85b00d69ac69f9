// ============================================
// API Module — Public REST API for the decision copilot
// ============================================

import express from "express";
import type { Pipeline } from "../app/types.js";
import type { IndexHandle } from "../store/indexHandle.js";
import { createAnswerHandler, createHealthHandler } from "./handler.js";
import { addRequestId, answerRequestSchema, handleBodyParseError, validateBody } from "./middleware.js";

/**
 * Build the express app. Listening is left to the caller.
 */
export function createApp(pipeline: Pipeline, handle: IndexHandle): express.Express {
  const app = express();

  app.use(addRequestId);
  app.use(express.json({ limit: "100kb" }));
  app.use(handleBodyParseError);

  app.get("/api/v1/health", createHealthHandler(handle));
  app.post("/api/v1/answer", validateBody(answerRequestSchema), createAnswerHandler(pipeline));

  return app;
}

export {
  validateBody,
  answerRequestSchema,
  addRequestId,
  type AnswerRequest,
  type RequestWithId,
} from "./middleware.js";

export { createAnswerHandler, createHealthHandler, type HealthResponse } from "./handler.js";
