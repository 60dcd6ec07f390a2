/**
 * Structured text: an array of records, one per timestamp.
 */

import { writeFile } from "node:fs/promises";
import type { MetricTable, TableWriter } from "@metrics-extractor/shared";
import { ensureParentDir } from "./fs.js";

export type JsonRecord = Record<string, string | number | null>;

/** JSON has no NaN or Infinity; those are written as strings */
function jsonValue(value: number | null): number | string | null {
  if (value === null || Number.isFinite(value)) return value;
  return String(value);
}

export function toRecords(table: MetricTable): JsonRecord[] {
  return table.rows.map((row) => {
    const record: JsonRecord = { timestamp: new Date(row.timestamp).toISOString() };
    table.columns.forEach((column, i) => {
      record[column] = jsonValue(row.values[i]);
    });
    return record;
  });
}

export const jsonWriter: TableWriter = {
  extension: ".json",
  async write(table, destination) {
    await ensureParentDir(destination);
    await writeFile(destination, `${JSON.stringify(toRecords(table), null, 2)}\n`, "utf8");
  },
};
