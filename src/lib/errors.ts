// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "RETRIEVAL_EMPTY"
  | "CITATION_INTEGRITY_VIOLATION"
  | "SCHEMA_VIOLATION"
  | "UPSTREAM_TIMEOUT"
  | "UPSTREAM_FAILED"
  | "DUPLICATE_ID"
  | "INDEX_FROZEN"
  | "VALIDATION_ERROR"
  | "SYNTHESIS_FAILED"
  | "CONFIG_ERROR"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class DecisionError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "DecisionError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

/** A chunk id was inserted twice while building an index. Fatal to that build. */
export class DuplicateIdError extends DecisionError {
  readonly chunkId: string;

  constructor(chunkId: string) {
    super({
      code: "DUPLICATE_ID",
      message: `Chunk id "${chunkId}" is already indexed`,
      context: { chunkId },
    });
    this.name = "DuplicateIdError";
    this.chunkId = chunkId;
  }
}

/** Completion output could not be parsed or did not match the requested schema. */
export class SchemaViolationError extends DecisionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super({ code: "SCHEMA_VIOLATION", message, cause, context: { issues } });
    this.name = "SchemaViolationError";
    this.issues = issues;
  }
}

/** An embedding or completion call exceeded its deadline. */
export class UpstreamTimeoutError extends DecisionError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super({
      code: "UPSTREAM_TIMEOUT",
      message: `${operation} exceeded ${timeoutMs}ms`,
      context: { operation, timeoutMs },
    });
    this.name = "UpstreamTimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/** No candidate survived filtering; handled as a refusal, never thrown past the pipeline */
export function retrievalEmpty(message: string, requestId?: string): DecisionError {
  return new DecisionError({
    code: "RETRIEVAL_EMPTY",
    message,
    requestId,
  });
}

/** Create a configuration error (environment, startup files) */
export function configError(message: string, context?: Record<string, unknown>): DecisionError {
  return new DecisionError({
    code: "CONFIG_ERROR",
    message,
    context,
  });
}

/** Create a validation error (ingestion, index shape, config files) */
export function validationError(message: string, context?: Record<string, unknown>): DecisionError {
  return new DecisionError({
    code: "VALIDATION_ERROR",
    message,
    context,
  });
}

/** Create an error for a model citation that names no supplied evidence unit */
export function citationIntegrityViolation(ref: string, suppliedIds: string[]): DecisionError {
  return new DecisionError({
    code: "CITATION_INTEGRITY_VIOLATION",
    message: `Model cited unknown evidence "${ref}"`,
    context: { ref, suppliedIds },
  });
}

/** Create an upstream (embedding / completion) failure */
export function upstreamError(operation: string, cause: unknown): DecisionError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new DecisionError({
    code: "UPSTREAM_FAILED",
    message: `${operation} failed: ${message}`,
    cause,
    context: { operation },
  });
}

/** Create a synthesis error */
export function synthesisError(message: string, requestId?: string, cause?: unknown): DecisionError {
  return new DecisionError({
    code: "SYNTHESIS_FAILED",
    message,
    requestId,
    cause,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): DecisionError {
  if (err instanceof DecisionError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new DecisionError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** User-friendly error messages */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "UPSTREAM_TIMEOUT":
    case "UPSTREAM_FAILED":
      return "The language or embedding service did not respond in time, so no verified answer could be produced.";
    case "SYNTHESIS_FAILED":
    case "SCHEMA_VIOLATION":
      return "Evidence was found but no verifiable recommendation could be produced from it.";
    case "RETRIEVAL_EMPTY":
      return "No indexed evidence matches this question.";
    case "VALIDATION_ERROR":
      return "Invalid request parameters.";
    default:
      return "Something went wrong. Please try again.";
  }
}
