/**
 * Output materializer: writes a MetricTable to a file format or returns
 * it in memory.
 *
 * The orchestrator treats formats as opaque sinks keyed by tag; new formats
 * are added with {@link registerWriter}.
 */

import type {
  FormatTag,
  InMemoryFormat,
  MetricFrame,
  MetricTable,
  OutputFormat,
  TableWriter,
} from "@metrics-extractor/shared";
import { ConfigError } from "../errors.js";
import { csvWriter } from "./csv-writer.js";
import { featherWriter } from "./feather-writer.js";
import { toFrame } from "./frame.js";
import { hdf5Writer } from "./hdf5-writer.js";
import { jsonWriter } from "./json-writer.js";
import { parquetWriter } from "./parquet-writer.js";

export const FORMAT_TAGS: readonly FormatTag[] = ["parquet", "hdf5", "csv", "json", "feather"];
export const IN_MEMORY_FORMATS: readonly InMemoryFormat[] = ["native", "frame", "pandas"];

const writers = new Map<FormatTag, TableWriter>([
  ["parquet", parquetWriter],
  ["hdf5", hdf5Writer],
  ["csv", csvWriter],
  ["json", jsonWriter],
  ["feather", featherWriter],
]);

export function isFormatTag(value: string): value is FormatTag {
  return FORMAT_TAGS.some((tag) => tag === value);
}

export function isInMemoryFormat(value: string): value is InMemoryFormat {
  return IN_MEMORY_FORMATS.some((format) => format === value);
}

export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (isFormatTag(normalized) || isInMemoryFormat(normalized)) return normalized;
  throw new ConfigError(
    `Unknown output format "${value}"`,
    [`expected one of ${[...FORMAT_TAGS, ...IN_MEMORY_FORMATS].join(", ")}`],
  );
}

/** Replace the writer for a tag (e.g. a different Parquet implementation) */
export function registerWriter(tag: FormatTag, writer: TableWriter): void {
  writers.set(tag, writer);
}

export function getWriter(tag: FormatTag): TableWriter {
  const writer = writers.get(tag);
  if (!writer) throw new ConfigError(`No writer registered for format "${tag}"`);
  return writer;
}

export async function writeTable(table: MetricTable, format: FormatTag, destination: string): Promise<void> {
  await getWriter(format).write(table, destination);
}

/** What one table turned into */
export type Materialized =
  | { kind: "native"; table: MetricTable }
  | { kind: "frame"; frame: MetricFrame }
  | { kind: "file"; format: FormatTag; path: string };

export function materializeInMemory(table: MetricTable, format: InMemoryFormat): Materialized {
  return format === "native" ? { kind: "native", table } : { kind: "frame", frame: toFrame(table) };
}

export { csvWriter, toCsv, csvField } from "./csv-writer.js";
export { jsonWriter, toRecords } from "./json-writer.js";
export type { JsonRecord } from "./json-writer.js";
export { parquetWriter } from "./parquet-writer.js";
export { featherWriter, toArrowTable } from "./feather-writer.js";
export { hdf5Writer } from "./hdf5-writer.js";
export { toFrame } from "./frame.js";
