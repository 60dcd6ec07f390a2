/**
 * Series normalizer: folds raw samples from any number of chunks into one
 * sparse wide table per metric.
 *
 * A normalizer instance is the single writer for its metric's table:
 * the orchestrator feeds it chunks one at a time, so column creation never
 * races. Chunks may arrive in any time order; rows are sorted on output.
 */

import type { Logger } from "pino";
import type { MetricRow, MetricTable, RawSample, SeriesKey } from "@metrics-extractor/shared";
import { seriesKey } from "./series-key.js";

export interface SeriesNormalizerOptions {
  /** Receives a warning whenever a later sample overwrites an earlier one */
  logger?: Logger;
}

/** Observation counts for the last merge, used for progress logging */
export interface MergeStats {
  samples: number;
  newSeries: number;
  overwrites: number;
}

export class SeriesNormalizer {
  readonly metric: string;
  private logger: Logger | null;

  /** Series keys in first-seen order */
  private columns: SeriesKey[] = [];
  private columnIndex = new Map<SeriesKey, number>();

  /** timestamp → values, each array padded to `columns.length` */
  private rows = new Map<number, (number | null)[]>();

  constructor(metric: string, options?: SeriesNormalizerOptions) {
    this.metric = metric;
    this.logger = options?.logger ?? null;
  }

  /** Start from an existing table (columns and rows are copied) */
  static from(table: MetricTable, options?: SeriesNormalizerOptions): SeriesNormalizer {
    const normalizer = new SeriesNormalizer(table.metric, options);
    for (const key of table.columns) normalizer.addColumn(key);
    for (const row of table.rows) {
      const values = row.values.slice();
      while (values.length < normalizer.columns.length) values.push(null);
      normalizer.rows.set(row.timestamp, values);
    }
    return normalizer;
  }

  get seriesCount(): number {
    return this.columns.length;
  }

  get rowCount(): number {
    return this.rows.size;
  }

  /** Fold one chunk of samples into the table */
  merge(chunk: Iterable<RawSample>): MergeStats {
    const stats: MergeStats = { samples: 0, newSeries: 0, overwrites: 0 };

    for (const sample of chunk) {
      stats.samples++;
      const key = seriesKey(sample.labels);
      let column = this.columnIndex.get(key);
      if (column === undefined) {
        column = this.addColumn(key);
        stats.newSeries++;
      }

      let values = this.rows.get(sample.timestamp);
      if (!values) {
        values = new Array<number | null>(this.columns.length).fill(null);
        this.rows.set(sample.timestamp, values);
      }

      if (values[column] !== null) {
        // Two chunks delivered the same point: the sub-window boundaries
        // overlap somewhere upstream.
        stats.overwrites++;
        this.logger?.warn(
          { metric: this.metric, timestamp: sample.timestamp, seriesKey: key },
          "Duplicate sample at timestamp; later value overwrites earlier one",
        );
      }
      values[column] = sample.value;
    }

    return stats;
  }

  /** Snapshot of the table with rows sorted by timestamp */
  toTable(): MetricTable {
    const timestamps = [...this.rows.keys()].sort((a, b) => a - b);
    const rows: MetricRow[] = timestamps.map((timestamp) => ({
      timestamp,
      values: this.rows.get(timestamp)?.slice() ?? [],
    }));
    return { metric: this.metric, columns: this.columns.slice(), rows };
  }

  private addColumn(key: SeriesKey): number {
    const index = this.columns.length;
    this.columns.push(key);
    this.columnIndex.set(key, index);
    // Backfill earlier rows so every row stays rectangular
    for (const values of this.rows.values()) values.push(null);
    return index;
  }
}

/** A table with no columns and no rows: a valid "no data in range" result */
export function emptyTable(metric: string): MetricTable {
  return { metric, columns: [], rows: [] };
}

/**
 * Functional form of {@link SeriesNormalizer.merge}. Returns `existing`
 * unchanged for an empty chunk, otherwise a new table.
 */
export function mergeSamples(
  existing: MetricTable,
  chunk: readonly RawSample[],
  options?: SeriesNormalizerOptions,
): MetricTable {
  if (chunk.length === 0) return existing;
  const normalizer = SeriesNormalizer.from(existing, options);
  normalizer.merge(chunk);
  return normalizer.toTable();
}
