/**
 * Output materializer contract.
 */

import type { MetricTable } from "./table.js";

/** File formats the materializer can write */
export type FormatTag = "parquet" | "hdf5" | "csv" | "json" | "feather";

/** In-memory outputs; "pandas" is accepted as an alias of "frame" */
export type InMemoryFormat = "native" | "frame" | "pandas";

export type OutputFormat = FormatTag | InMemoryFormat;

/** Column-oriented in-memory frame */
export interface MetricFrame {
  index: Date[];
  columns: Record<string, (number | null)[]>;
}

export interface TableWriter {
  /** Default file extension including the dot, e.g. ".parquet" */
  readonly extension: string;
  write(table: MetricTable, destination: string): Promise<void>;
}
