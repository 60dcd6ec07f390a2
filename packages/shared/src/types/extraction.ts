/**
 * Result shapes returned by the extraction orchestrator.
 */

import type { MetricTable } from "./table.js";
import type { WindowRequest } from "./window.js";

export type OutputMode = "separate" | "combined";

/** Per-metric outcome so callers can tell "no data" apart from "failed" */
export type MetricStatus =
  | { state: "ok" }
  | { state: "not_found"; message: string }
  | { state: "failed"; reason: string };

export type MetricState = MetricStatus["state"];

export interface MetricOutcome {
  metric: string;
  status: MetricStatus;
  /** Accumulated table; partial when the metric failed mid-extraction */
  table: MetricTable;
  /** Number of chunk requests the adapter completed for this metric */
  chunks: number;
}

interface BaseExtractionResult {
  /** The window as resolved at orchestration start */
  window: WindowRequest;
  /** One outcome per requested metric, in request order */
  outcomes: MetricOutcome[];
  /** True when the run was stopped by its cancellation signal */
  cancelled: boolean;
}

export interface SeparateExtractionResult extends BaseExtractionResult {
  mode: "separate";
  /** Tables of the metrics whose status is `ok`, in request order */
  tables: Map<string, MetricTable>;
}

export interface CombinedExtractionResult extends BaseExtractionResult {
  mode: "combined";
  /** All `ok` metrics in one table, columns prefixed with the metric name */
  table: MetricTable;
}

export type ExtractionResult = SeparateExtractionResult | CombinedExtractionResult;
