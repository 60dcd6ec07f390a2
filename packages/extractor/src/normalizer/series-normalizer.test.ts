import { describe, it, expect, vi } from "vitest";
import type { Logger } from "pino";
import type { RawSample } from "@metrics-extractor/shared";
import { silentLogger } from "../logger.js";
import { seriesKey } from "./series-key.js";
import { SeriesNormalizer, emptyTable, mergeSamples } from "./series-normalizer.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function sample(timestamp: number, value: number, labels: Record<string, string> = {}): RawSample {
  return { timestamp, value, labels };
}

const A = { instance: "a" };
const B = { instance: "b" };

describe("seriesKey", () => {
  it("is independent of label order", () => {
    expect(seriesKey({ job: "node", instance: "a" })).toBe('{instance="a",job="node"}');
    expect(seriesKey({ instance: "a", job: "node" })).toBe('{instance="a",job="node"}');
  });

  it("escapes quotes, backslashes and newlines", () => {
    expect(seriesKey({ path: 'C:\\tmp\\"x"\n' })).toBe('{path="C:\\\\tmp\\\\\\"x\\"\\n"}');
  });

  it("renders an empty label set as {}", () => {
    expect(seriesKey({})).toBe("{}");
  });
});

describe("SeriesNormalizer", () => {
  it("builds one column per distinct label set", () => {
    const normalizer = new SeriesNormalizer("up");
    normalizer.merge([sample(1000, 1, A), sample(1000, 0, B), sample(2000, 1, A)]);

    expect(normalizer.toTable()).toEqual({
      metric: "up",
      columns: ['{instance="a"}', '{instance="b"}'],
      rows: [
        { timestamp: 1000, values: [1, 0] },
        { timestamp: 2000, values: [1, null] },
      ],
    });
  });

  it("backfills nulls when a series appears mid-extraction", () => {
    const normalizer = new SeriesNormalizer("up");
    normalizer.merge([sample(1000, 1, A), sample(2000, 1, A)]);
    const stats = normalizer.merge([sample(3000, 5, B)]);

    expect(stats).toEqual({ samples: 1, newSeries: 1, overwrites: 0 });
    expect(normalizer.toTable().rows).toEqual([
      { timestamp: 1000, values: [1, null] },
      { timestamp: 2000, values: [1, null] },
      { timestamp: 3000, values: [null, 5] },
    ]);
  });

  it("sorts rows from out-of-order chunks", () => {
    const normalizer = new SeriesNormalizer("up");
    normalizer.merge([sample(3000, 3, A)]);
    normalizer.merge([sample(1000, 1, A)]);
    normalizer.merge([sample(2000, 2, A)]);

    expect(normalizer.toTable().rows.map((r) => r.timestamp)).toEqual([1000, 2000, 3000]);
  });

  it("keeps the later value on a duplicate timestamp and warns", () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");
    const normalizer = new SeriesNormalizer("up", { logger });

    normalizer.merge([sample(1000, 1, A)]);
    const stats = normalizer.merge([sample(1000, 2, A)]);

    expect(stats.overwrites).toBe(1);
    expect(normalizer.toTable().rows).toEqual([{ timestamp: 1000, values: [2] }]);
    expect(warn).toHaveBeenCalledWith(
      { metric: "up", timestamp: 1000, seriesKey: '{instance="a"}' },
      "Duplicate sample at timestamp; later value overwrites earlier one",
    );
  });

  it("keeps NaN and infinities as values", () => {
    const normalizer = new SeriesNormalizer("m");
    normalizer.merge([sample(1, Number.NaN), sample(2, Number.POSITIVE_INFINITY)]);
    const [first, second] = normalizer.toTable().rows;
    expect(first.values[0]).toBeNaN();
    expect(second.values[0]).toBe(Number.POSITIVE_INFINITY);
  });

  it("resumes from an existing table", () => {
    const normalizer = SeriesNormalizer.from({
      metric: "up",
      columns: ['{instance="a"}'],
      rows: [{ timestamp: 1000, values: [1] }],
    });
    normalizer.merge([sample(2000, 1, B)]);

    expect(normalizer.seriesCount).toBe(2);
    expect(normalizer.rowCount).toBe(2);
    expect(normalizer.toTable().rows[0]).toEqual({ timestamp: 1000, values: [1, null] });
  });
});

describe("mergeSamples", () => {
  const chunk1 = [sample(1000, 1, A), sample(2000, 2, A)];
  const chunk2 = [sample(3000, 3, B), sample(4000, 4, A)];

  it("returns the existing table for an empty chunk", () => {
    const existing = emptyTable("up");
    expect(mergeSamples(existing, [])).toBe(existing);
  });

  it("is split-invariant", () => {
    const whole = mergeSamples(emptyTable("up"), [...chunk1, ...chunk2]);
    const halves = mergeSamples(mergeSamples(emptyTable("up"), chunk1), chunk2);
    expect(halves).toEqual(whole);
  });

  it("gives the same rows whichever chunk arrives first", () => {
    const forward = mergeSamples(mergeSamples(emptyTable("up"), chunk1), chunk2);
    const backward = mergeSamples(mergeSamples(emptyTable("up"), chunk2), chunk1);

    // Column order follows first sight; the data per series is identical
    const byColumn = (table: typeof forward) =>
      Object.fromEntries(
        table.columns.map((column, i) => [column, table.rows.map((r) => [r.timestamp, r.values[i]])]),
      );
    expect(byColumn(backward)).toEqual(byColumn(forward));
    expect(backward.rows.map((r) => r.timestamp)).toEqual([1000, 2000, 3000, 4000]);
  });

  it("does not mutate the input table", () => {
    const existing = mergeSamples(emptyTable("up"), chunk1);
    const snapshot = structuredClone(existing);
    mergeSamples(existing, chunk2);
    expect(existing).toEqual(snapshot);
  });

  it("passes the logger to the normalizer", () => {
    const logger: Logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");
    mergeSamples(mergeSamples(emptyTable("up"), chunk1), [sample(1000, 9, A)], { logger });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
