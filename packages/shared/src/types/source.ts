/**
 * Source adapter interface is the public contract every metrics backend
 * implements.
 *
 * IMPORTANT: the orchestrator only ever talks to a backend through this
 * interface. New backends are added by implementing it, never by
 * branching on a backend type inside the orchestrator.
 */

import type { RawSample } from "./sample.js";
import type { TimeWindow } from "./window.js";

/** Shared gate that spaces out requests across all concurrent units */
export interface RequestLimiter {
  acquire(signal?: AbortSignal): Promise<void>;
}

/** Cancellation and rate limiting for any request an adapter makes */
export interface RequestOptions {
  /** Stops new requests when aborted */
  signal?: AbortSignal;
  limiter?: RequestLimiter;
}

/** Per-call query hints supplied by the orchestrator */
export interface QueryHints extends RequestOptions {
  /** Backend per-request point cap (e.g. 11000 for Prometheus query_range) */
  maxPointsPerRequest: number;
  /** Native step / expected sample interval in milliseconds */
  stepMs: number;
  /** Evaluation step for expressions that have no stored samples (default 1000) */
  expressionStepMs?: number;
  /** Upper bound on a single sub-window, regardless of point math */
  maxWindowMs?: number;
  /** Sub-window requests allowed in flight at once (default 1) */
  chunkConcurrency?: number;
}

export interface SourceAdapter {
  /** Backend identifier used in logs */
  readonly kind: string;

  /** All metric names the backend knows about */
  listMetrics(): Promise<string[]>;

  /** Timestamp of the metric's first stored sample (or a lower bound) */
  earliestTimestamp(metric: string, options?: RequestOptions): Promise<number>;

  /**
   * Raw samples in `[window.start, window.end)`, one chunk per sub-window.
   * Chunks may arrive out of time order when `chunkConcurrency > 1`.
   */
  queryRange(metric: string, window: TimeWindow, hints: QueryHints): AsyncIterable<RawSample[]>;
}
