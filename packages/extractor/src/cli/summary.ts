/**
 * Per-metric status table printed to stdout when the run ends.
 */

import type { ExtractionResult, MetricOutcome } from "@metrics-extractor/shared";
import type { Materialized } from "../materializer/index.js";
import { COMBINED_TABLE_NAME } from "../normalizer/index.js";

const HEADERS = ["metric", "status", "series", "rows", "file"] as const;

function statusText(outcome: MetricOutcome): string {
  switch (outcome.status.state) {
    case "ok":
      return "ok";
    case "not_found":
      return "not_found";
    case "failed":
      return `failed(${outcome.status.reason})`;
  }
}

function fileOf(
  outcome: MetricOutcome,
  result: ExtractionResult,
  outputs: ReadonlyMap<string, Materialized>,
): string {
  if (outcome.status.state !== "ok") return "-";
  const key = result.mode === "combined" ? COMBINED_TABLE_NAME : outcome.metric;
  const output = outputs.get(key);
  return output?.kind === "file" ? output.path : "-";
}

export function summaryRows(
  result: ExtractionResult,
  outputs: ReadonlyMap<string, Materialized>,
): string[][] {
  return result.outcomes.map((outcome) => [
    outcome.metric,
    statusText(outcome),
    String(outcome.table.columns.length),
    String(outcome.table.rows.length),
    fileOf(outcome, result, outputs),
  ]);
}

/** Plain-text table, columns padded to their widest cell */
export function formatSummary(
  result: ExtractionResult,
  outputs: ReadonlyMap<string, Materialized>,
): string {
  const rows = [[...HEADERS], ...summaryRows(result, outputs)];
  const widths = HEADERS.map((_, col) => Math.max(...rows.map((row) => row[col].length)));
  const lines = rows.map((row) =>
    row
      .map((cell, col) => (col === row.length - 1 ? cell : cell.padEnd(widths[col])))
      .join("  "),
  );
  lines.splice(1, 0, widths.map((w) => "-".repeat(w)).join("  "));

  const counts = { ok: 0, not_found: 0, failed: 0 };
  for (const outcome of result.outcomes) counts[outcome.status.state]++;
  let footer = `${counts.ok} ok, ${counts.not_found} not found, ${counts.failed} failed`;
  if (result.cancelled) footer += " (cancelled)";

  return `${lines.join("\n")}\n\n${footer}\n`;
}
