/**
 * Delimited text (RFC 4180). One row per timestamp, ISO-8601 timestamps,
 * an empty cell where a series has no observation.
 */

import { writeFile } from "node:fs/promises";
import type { MetricTable, TableWriter } from "@metrics-extractor/shared";
import { ensureParentDir } from "./fs.js";

const NEEDS_QUOTING_RE = /[",\r\n]/;

export function csvField(value: string): string {
  return NEEDS_QUOTING_RE.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** `NaN`, `Infinity` and `-Infinity` are spelled out */
function csvValue(value: number | null): string {
  return value === null ? "" : String(value);
}

export function toCsv(table: MetricTable): string {
  const lines = [["timestamp", ...table.columns].map(csvField).join(",")];
  for (const row of table.rows) {
    lines.push([new Date(row.timestamp).toISOString(), ...row.values.map(csvValue)].join(","));
  }
  return `${lines.join("\n")}\n`;
}

export const csvWriter: TableWriter = {
  extension: ".csv",
  async write(table, destination) {
    await ensureParentDir(destination);
    await writeFile(destination, toCsv(table), "utf8");
  },
};
