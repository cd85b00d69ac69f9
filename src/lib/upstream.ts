// ============================================
// Upstream calls — per-call deadline + single retry
// ============================================

import { UpstreamTimeoutError } from "./errors.js";
import { logger, type Stage } from "./logger.js";

/**
 * Race a call against a deadline. The call receives an AbortSignal that
 * fires when the deadline passes so clients that honour it can stop early.
 */
export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new UpstreamTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `attempt` once; on failure run `retry` exactly once. No loops.
 * The second failure propagates.
 */
export async function withSingleRetry<T>(
  operation: string,
  stage: Stage,
  attempt: () => Promise<T>,
  retry: (firstError: unknown) => Promise<T> = () => attempt()
): Promise<T> {
  try {
    return await attempt();
  } catch (err) {
    logger.warn(`${operation} failed, retrying once`, { stage, operation, error: err });
    return retry(err);
  }
}
