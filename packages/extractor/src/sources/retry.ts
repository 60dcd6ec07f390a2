/**
 * Retry with exponential backoff for transient backend failures.
 *
 * Rate limiting, timeouts and retryable backend errors are retried up to
 * `attempts` times in total; the last failure is escalated to a
 * BackendError with the original error as its cause.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import type { RetryPolicy } from "../config.js";
import {
  BackendError,
  CancelledError,
  RateLimitedError,
  errorMessage,
  isTransient,
} from "../errors.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 15_000,
};

export interface RetryOptions {
  policy: RetryPolicy;
  /** Describes the operation in logs and the escalated error */
  operation: string;
  signal?: AbortSignal;
  logger?: Logger;
}

/** Delay before retry number `attempt` (1-based) */
export function backoffDelay(attempt: number, policy: RetryPolicy, retryAfterMs?: number): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  return Math.max(exponential, retryAfterMs ?? 0);
}

/** Sleep that turns an abort into CancelledError */
export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw new CancelledError();
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new CancelledError();
    throw err;
  }
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, operation, signal, logger } = options;

  for (let attempt = 1; ; attempt++) {
    // No new request once cancelled
    if (signal?.aborted) throw new CancelledError();
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isTransient(err)) throw err;
      if (attempt >= policy.attempts) {
        throw new BackendError(
          `${operation} failed after ${attempt} attempt(s): ${errorMessage(err)}`,
          { cause: err },
        );
      }
      const retryAfter = err instanceof RateLimitedError ? err.retryAfterMs : undefined;
      const delay = backoffDelay(attempt, policy, retryAfter);
      logger?.warn(
        { operation, attempt, delayMs: delay, err: errorMessage(err) },
        "Transient failure, retrying",
      );
      await abortableSleep(delay, signal);
    }
  }
}
