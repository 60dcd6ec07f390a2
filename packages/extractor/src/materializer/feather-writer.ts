/**
 * Columnar file (Feather v2 = Arrow IPC file format).
 */

import { writeFile } from "node:fs/promises";
import {
  Float64,
  Table,
  TimestampMillisecond,
  tableToIPC,
  vectorFromArray,
  type Vector,
} from "apache-arrow";
import type { MetricTable, TableWriter } from "@metrics-extractor/shared";
import { ensureParentDir } from "./fs.js";

export function toArrowTable(table: MetricTable): Table {
  const vectors: Record<string, Vector> = {
    timestamp: vectorFromArray(
      table.rows.map((row) => row.timestamp),
      new TimestampMillisecond(),
    ),
  };
  table.columns.forEach((column, i) => {
    vectors[column] = vectorFromArray(
      table.rows.map((row) => row.values[i]),
      new Float64(),
    );
  });
  return new Table(vectors);
}

export const featherWriter: TableWriter = {
  extension: ".feather",
  async write(table, destination) {
    await ensureParentDir(destination);
    await writeFile(destination, tableToIPC(toArrowTable(table), "file"));
  },
};
