/**
 * Rectangular per-metric tables produced by the series normalizer.
 */

import type { SeriesKey } from "./sample.js";

/** One timestamp's observations; `values[i]` belongs to `columns[i]` */
export interface MetricRow {
  timestamp: number;
  /** `null` means no observation for that series at this timestamp */
  values: (number | null)[];
}

/**
 * A sparse wide table for one metric (or several, in combined mode).
 *
 * Rows are strictly increasing by timestamp. Columns keep the order in
 * which their series were first seen.
 */
export interface MetricTable {
  metric: string;
  columns: SeriesKey[];
  rows: MetricRow[];
}
