/**
 * Error taxonomy for the extraction pipeline.
 *
 * - ConfigError: bad input, raised before any network I/O (fatal)
 * - NotFoundError: metric absent at the source (per-metric, non-fatal)
 * - RateLimitedError / TimeoutError: transient, retried with backoff
 * - BackendError: auth failures, malformed responses, exhausted retries
 * - CancelledError: the run's abort signal fired
 */

import type { ExtractionResult } from "@metrics-extractor/shared";

export type ExtractorErrorCode =
  | "CONFIG"
  | "NAMING_COLLISION"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "TIMEOUT"
  | "BACKEND"
  | "CANCELLED"
  | "EXTRACTION_FAILED";

export class ExtractorError extends Error {
  readonly code: ExtractorErrorCode;

  constructor(code: ExtractorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ExtractorError {
  /** Individual problems, e.g. one per failing schema path */
  readonly details: string[];

  constructor(message: string, details: string[] = [], code: ExtractorErrorCode = "CONFIG") {
    super(code, details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.details = details;
  }
}

/** Two metric names derive the same output file */
export class NamingCollisionError extends ConfigError {
  readonly fileName: string;
  readonly metrics: string[];

  constructor(fileName: string, metrics: string[]) {
    super(
      metrics.length === 1
        ? `Metric "${metrics[0]}" has no file-name-safe characters (would write "${fileName}")`
        : `Output name collision: ${metrics.map((m) => `"${m}"`).join(" and ")} both map to "${fileName}"`,
      [],
      "NAMING_COLLISION",
    );
    this.fileName = fileName;
    this.metrics = metrics;
  }
}

export class NotFoundError extends ExtractorError {
  readonly metric: string;

  constructor(metric: string, message?: string) {
    super("NOT_FOUND", message ?? `Metric "${metric}" does not exist at the source`);
    this.metric = metric;
  }
}

export class RateLimitedError extends ExtractorError {
  /** Server-suggested wait (Retry-After), if any */
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super("RATE_LIMITED", message);
    this.retryAfterMs = retryAfterMs;
  }
}

export class TimeoutError extends ExtractorError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: { cause?: unknown }) {
    super("TIMEOUT", message, options);
    this.timeoutMs = timeoutMs;
  }
}

export class BackendError extends ExtractorError {
  readonly statusCode?: number;
  /** 5xx responses and dropped connections are worth retrying */
  readonly retryable: boolean;

  constructor(
    message: string,
    options?: { statusCode?: number; retryable?: boolean; cause?: unknown },
  ) {
    super("BACKEND", message, { cause: options?.cause });
    this.statusCode = options?.statusCode;
    this.retryable = options?.retryable ?? false;
  }
}

export class CancelledError extends ExtractorError {
  constructor(message = "Extraction cancelled") {
    super("CANCELLED", message);
  }
}

/** Every requested metric failed; the partial result is attached */
export class ExtractionFailedError extends ExtractorError {
  readonly result: ExtractionResult;

  constructor(result: ExtractionResult) {
    const reasons = result.outcomes
      .map((o) => `${o.metric}: ${o.status.state === "failed" ? o.status.reason : o.status.state}`)
      .join(", ");
    super("EXTRACTION_FAILED", `All metrics failed (${reasons})`);
    this.result = result;
  }
}

/** Whether an error is eligible for retry with backoff */
export function isTransient(error: unknown): boolean {
  if (error instanceof RateLimitedError || error instanceof TimeoutError) return true;
  if (error instanceof BackendError) return error.retryable;
  return false;
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
