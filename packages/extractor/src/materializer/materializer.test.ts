import { describe, it, expect, vi, afterEach } from "vitest";
import type { MetricTable, TableWriter } from "@metrics-extractor/shared";
import { ConfigError } from "../errors.js";
import {
  FORMAT_TAGS,
  getWriter,
  materializeInMemory,
  parseOutputFormat,
  registerWriter,
  writeTable,
} from "./index.js";
import { csvWriter } from "./csv-writer.js";
import { toArrowTable } from "./feather-writer.js";
import { toFrame } from "./frame.js";
import { seriesColumnName } from "./parquet-writer.js";

const T0 = Date.parse("2023-01-01T00:00:00Z");

const table: MetricTable = {
  metric: "up",
  columns: ['{job="a"}', '{job="b"}'],
  rows: [
    { timestamp: T0, values: [1, null] },
    { timestamp: T0 + 15_000, values: [0, 1] },
  ],
};

describe("parseOutputFormat", () => {
  it("accepts file and in-memory formats case-insensitively", () => {
    expect(parseOutputFormat("Parquet")).toBe("parquet");
    expect(parseOutputFormat(" csv ")).toBe("csv");
    expect(parseOutputFormat("pandas")).toBe("pandas");
  });

  it("rejects an unknown format", () => {
    expect(() => parseOutputFormat("xlsx")).toThrow(ConfigError);
    expect(() => parseOutputFormat("xlsx")).toThrow('Unknown output format "xlsx"');
  });
});

describe("writer registry", () => {
  afterEach(() => {
    registerWriter("csv", csvWriter);
  });

  it("dispatches by tag", async () => {
    const write = vi.fn<TableWriter["write"]>(async () => undefined);
    registerWriter("csv", { extension: ".txt", write });

    await writeTable(table, "csv", "out.txt");

    expect(getWriter("csv").extension).toBe(".txt");
    expect(write).toHaveBeenCalledWith(table, "out.txt");
  });

  it("knows every default extension", () => {
    expect(FORMAT_TAGS.map((tag) => getWriter(tag).extension)).toEqual([
      ".parquet",
      ".h5",
      ".csv",
      ".json",
      ".feather",
    ]);
  });
});

describe("in-memory outputs", () => {
  it("builds a column-oriented frame", () => {
    expect(toFrame(table)).toEqual({
      index: [new Date(T0), new Date(T0 + 15_000)],
      columns: { '{job="a"}': [1, 0], '{job="b"}': [null, 1] },
    });
  });

  it("returns the table itself for native output", () => {
    expect(materializeInMemory(table, "native")).toEqual({ kind: "native", table });
    expect(materializeInMemory(table, "pandas")).toEqual({ kind: "frame", frame: toFrame(table) });
  });
});

describe("columnar writers", () => {
  it("builds an Arrow table with a timestamp column and nullable series", () => {
    const arrow = toArrowTable(table);
    expect(arrow.numRows).toBe(2);
    expect(arrow.schema.fields.map((f) => f.name)).toEqual(["timestamp", '{job="a"}', '{job="b"}']);
    expect(arrow.getChild('{job="b"}')?.get(0)).toBeNull();
    expect(arrow.getChild('{job="b"}')?.get(1)).toBe(1);
  });

  it("names Parquet columns by position", () => {
    expect(table.columns.map((_, i) => seriesColumnName(i))).toEqual(["series_0", "series_1"]);
  });
});
