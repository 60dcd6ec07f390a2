import { describe, it, expect } from "vitest";
import type { ExtractionResult, MetricOutcome, MetricStatus } from "@metrics-extractor/shared";
import type { Materialized } from "../materializer/index.js";
import { ExitCode, exitCodeFor } from "./exit-codes.js";
import { formatSummary } from "./summary.js";

const T0 = Date.parse("2023-01-01T00:00:00Z");

function outcome(metric: string, status: MetricStatus, columns: number, rows: number): MetricOutcome {
  return {
    metric,
    status,
    chunks: rows > 0 ? 1 : 0,
    table: {
      metric,
      columns: Array.from({ length: columns }, (_, i) => `{i="${i}"}`),
      rows: Array.from({ length: rows }, (_, i) => ({ timestamp: T0 + i, values: Array.from({ length: columns }, () => 1) })),
    },
  };
}

function separateResult(outcomes: MetricOutcome[], cancelled = false): ExtractionResult {
  return {
    mode: "separate",
    window: { start: T0, end: T0 + 60_000 },
    outcomes,
    cancelled,
    tables: new Map(outcomes.filter((o) => o.status.state === "ok").map((o): [string, typeof o.table] => [o.metric, o.table])),
  };
}

describe("formatSummary", () => {
  it("prints an aligned status table with counts", () => {
    const result = separateResult([
      outcome("up", { state: "ok" }, 2, 3),
      outcome("gone", { state: "not_found", message: 'Metric "gone" does not exist at the source' }, 0, 0),
      outcome("slow", { state: "failed", reason: "timeout" }, 1, 1),
    ]);
    const outputs = new Map<string, Materialized>([["up", { kind: "file", format: "csv", path: "out_up.csv" }]]);

    expect(formatSummary(result, outputs)).toBe(
      [
        "metric  status           series  rows  file",
        "------  ---------------  ------  ----  ----------",
        "up      ok               2       3     out_up.csv",
        "gone    not_found        0       0     -",
        "slow    failed(timeout)  1       1     -",
        "",
        "1 ok, 1 not found, 1 failed",
        "",
      ].join("\n"),
    );
  });

  it("marks a cancelled run", () => {
    const result = separateResult([outcome("up", { state: "failed", reason: "cancelled" }, 1, 5)], true);
    expect(formatSummary(result, new Map()).endsWith("\n0 ok, 0 not found, 1 failed (cancelled)\n")).toBe(true);
  });

  it("points every metric of a combined run at the combined file", () => {
    const outcomes = [outcome("a", { state: "ok" }, 1, 1), outcome("b", { state: "ok" }, 1, 1)];
    const result: ExtractionResult = {
      mode: "combined",
      window: { start: T0, end: T0 + 60_000 },
      outcomes,
      cancelled: false,
      table: { metric: "combined", columns: [], rows: [] },
    };
    const outputs = new Map<string, Materialized>([["combined", { kind: "file", format: "json", path: "all.json" }]]);

    const lines = formatSummary(result, outputs).split("\n");
    expect(lines[2]).toBe("a       ok      1       1     all.json");
    expect(lines[3]).toBe("b       ok      1       1     all.json");
  });
});

describe("exitCodeFor", () => {
  it("distinguishes complete, partial and failed runs", () => {
    expect(exitCodeFor(separateResult([outcome("a", { state: "ok" }, 1, 1)]))).toBe(ExitCode.OK);
    expect(
      exitCodeFor(separateResult([outcome("a", { state: "ok" }, 1, 1), outcome("b", { state: "failed", reason: "x" }, 0, 0)])),
    ).toBe(ExitCode.PARTIAL);
    expect(exitCodeFor(separateResult([outcome("b", { state: "not_found", message: "gone" }, 0, 0)]))).toBe(
      ExitCode.FAILED,
    );
  });

  it("never reports a cancelled run as complete", () => {
    expect(exitCodeFor(separateResult([outcome("a", { state: "ok" }, 1, 1)], true))).toBe(ExitCode.PARTIAL);
  });
});
