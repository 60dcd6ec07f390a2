/**
 * Time windows for extraction.
 *
 * All timestamps are epoch milliseconds. Windows are half-open:
 * a sample at `end` belongs to the next window, never this one.
 */

/** Sentinel start meaning "from the metric's first stored sample" */
export type EarliestSentinel = "earliest";

/** A bounded, half-open `[start, end)` range */
export interface TimeWindow {
  start: number;
  end: number;
}

/**
 * A window as requested by a caller. `end` is always concrete: when the
 * caller omits it, "now" is captured once at the start of the extraction.
 */
export interface WindowRequest {
  start: number | EarliestSentinel;
  end: number;
}
