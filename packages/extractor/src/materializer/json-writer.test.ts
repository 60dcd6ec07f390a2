import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import type { MetricTable } from "@metrics-extractor/shared";
import { jsonWriter, toRecords } from "./json-writer.js";

const T0 = Date.parse("2023-01-01T00:00:00Z");

const table: MetricTable = {
  metric: "node_load1",
  columns: ['{instance="a"}', '{instance="b"}'],
  rows: [
    { timestamp: T0, values: [0.5, null] },
    { timestamp: T0 + 15_000, values: [Number.POSITIVE_INFINITY, 1] },
  ],
};

describe("toRecords", () => {
  it("keys each record by series", () => {
    expect(toRecords(table)).toEqual([
      { timestamp: "2023-01-01T00:00:00.000Z", '{instance="a"}': 0.5, '{instance="b"}': null },
      { timestamp: "2023-01-01T00:00:15.000Z", '{instance="a"}': "Infinity", '{instance="b"}': 1 },
    ]);
  });
});

describe("jsonWriter", () => {
  it("writes parseable records", async () => {
    const dir = await mkdtemp(join(tmpdir(), "json-writer-"));
    try {
      const destination = join(dir, "out.json");
      await jsonWriter.write(table, destination);
      expect(JSON.parse(await readFile(destination, "utf8"))).toEqual(toRecords(table));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
