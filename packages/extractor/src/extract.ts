/**
 * Programmatic entry point: extract metrics and materialize the tables in
 * one call.
 *
 * @example
 *   const source = new PrometheusSource({ url: "http://localhost:9090" });
 *   const { outputs } = await extract(source, ["up"], "2023-01-01T00:00:00Z", "2023-01-02T00:00:00Z");
 */

import type { ExtractionResult, OutputFormat, SourceAdapter } from "@metrics-extractor/shared";
import { loadConfig, type ConfigOverrides } from "./config.js";
import { ConfigError, ExtractionFailedError } from "./errors.js";
import { MetricsExtractor } from "./extractor/metrics-extractor.js";
import { deriveOutputPaths, withExtension } from "./extractor/output-naming.js";
import type { Logger } from "./logger.js";
import { COMBINED_TABLE_NAME } from "./normalizer/index.js";
import {
  getWriter,
  isFormatTag,
  materializeInMemory,
  writeTable,
  type Materialized,
} from "./materializer/index.js";
import type { TimeInput } from "./time-window.js";

export interface ExtractOptions {
  /** Base path for file formats; required unless the format is in-memory */
  outputFile?: string;
  config?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  signal?: AbortSignal;
  /** Clock read once at the start (injectable for tests) */
  now?: () => number;
}

export interface ExtractOutput {
  result: ExtractionResult;
  /** Keyed by metric in separate mode, by "combined" otherwise */
  outputs: Map<string, Materialized>;
}

/**
 * Extract `metrics` (every metric the source lists when null) over
 * `[from, to)` and materialize the result.
 *
 * Omitting `from` extracts all history; omitting `to` ends at now. Throws
 * ExtractionFailedError when every metric failed and the run was not
 * cancelled; ConfigError on invalid input before any request is made.
 */
export async function extract(
  source: SourceAdapter,
  metrics: readonly string[] | null,
  from?: TimeInput,
  to?: TimeInput,
  outputFormat: OutputFormat = "frame",
  separateMetrics = true,
  options: ExtractOptions = {},
): Promise<ExtractOutput> {
  const config = loadConfig(options.config, options.env);
  const fileFormat = isFormatTag(outputFormat) ? outputFormat : null;
  if (fileFormat && !options.outputFile) {
    throw new ConfigError(`Output format "${outputFormat}" requires an output file`);
  }

  const names = metrics ?? (await source.listMetrics());
  if (names.length === 0) throw new ConfigError("No metrics to extract");

  // Derive file names up front so collisions fail before any query
  const extension = fileFormat ? getWriter(fileFormat).extension : "";
  const outputFile = options.outputFile ?? "";
  const separatePaths =
    fileFormat && separateMetrics ? deriveOutputPaths(outputFile, names, extension) : null;

  const extractor = MetricsExtractor.fromConfig(config, { logger: options.logger, now: options.now });
  const result = await extractor.extract({
    source,
    metrics: names,
    from,
    to,
    mode: separateMetrics ? "separate" : "combined",
    signal: options.signal,
  });

  if (!result.cancelled && result.outcomes.every((o) => o.status.state !== "ok")) {
    throw new ExtractionFailedError(result);
  }

  const outputs = new Map<string, Materialized>();
  if (result.mode === "separate") {
    for (const [metric, table] of result.tables) {
      const path = separatePaths?.get(metric);
      if (fileFormat && path) {
        await writeTable(table, fileFormat, path);
        outputs.set(metric, { kind: "file", format: fileFormat, path });
        options.logger?.info({ metric, path }, "Output written");
      } else if (!fileFormat) {
        outputs.set(metric, materializeInMemory(table, outputFormat === "native" ? "native" : "frame"));
      }
    }
  } else if (fileFormat) {
    const path = withExtension(outputFile, extension);
    await writeTable(result.table, fileFormat, path);
    outputs.set(COMBINED_TABLE_NAME, { kind: "file", format: fileFormat, path });
    options.logger?.info({ path }, "Combined output written");
  } else {
    outputs.set(
      COMBINED_TABLE_NAME,
      materializeInMemory(result.table, outputFormat === "native" ? "native" : "frame"),
    );
  }

  return { result, outputs };
}
