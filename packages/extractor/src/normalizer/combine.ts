/**
 * Combined output: reconcile several per-metric tables into one.
 *
 * Timestamps are unioned; each column is prefixed with its metric name
 * because two metrics can carry identical label sets.
 */

import type { MetricTable } from "@metrics-extractor/shared";
import { prefixedSeriesKey } from "./series-key.js";

export const COMBINED_TABLE_NAME = "combined";

export function combineTables(tables: readonly MetricTable[]): MetricTable {
  const columns: string[] = [];
  const offsets: number[] = [];
  for (const table of tables) {
    offsets.push(columns.length);
    for (const key of table.columns) columns.push(prefixedSeriesKey(table.metric, key));
  }

  const byTimestamp = new Map<number, (number | null)[]>();
  tables.forEach((table, t) => {
    for (const row of table.rows) {
      const values =
        byTimestamp.get(row.timestamp) ?? new Array<number | null>(columns.length).fill(null);
      byTimestamp.set(row.timestamp, values);
      for (let i = 0; i < row.values.length; i++) values[offsets[t] + i] = row.values[i];
    }
  });

  const rows = [...byTimestamp.keys()]
    .sort((a, b) => a - b)
    .map((timestamp) => ({ timestamp, values: byTimestamp.get(timestamp) ?? [] }));

  return { metric: COMBINED_TABLE_NAME, columns, rows };
}
