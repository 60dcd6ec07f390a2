/**
 * Column-oriented in-memory frame: a Date index plus one array per series.
 */

import type { MetricFrame, MetricTable } from "@metrics-extractor/shared";

export function toFrame(table: MetricTable): MetricFrame {
  const columns: MetricFrame["columns"] = {};
  table.columns.forEach((column, i) => {
    columns[column] = table.rows.map((row) => row.values[i]);
  });
  return { index: table.rows.map((row) => new Date(row.timestamp)), columns };
}
