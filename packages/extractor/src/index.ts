export { extract } from "./extract.js";
export type { ExtractOptions, ExtractOutput } from "./extract.js";

export { MetricsExtractor, DEFAULT_HINTS, RateLimiter, deriveOutputPaths, sanitizeMetricName } from "./extractor/index.js";
export type { ExtractionHints, ExtractRequest, IncrementalRequest, MetricsExtractorOptions } from "./extractor/index.js";

export {
  PrometheusSource,
  InfluxDBSource,
  createSource,
  isFunctionQuery,
  SOURCE_KINDS,
} from "./sources/index.js";
export type {
  PrometheusSourceOptions,
  InfluxDBSourceOptions,
  FluxQueryRunner,
  FluxRow,
  SourceConnection,
  SourceKind,
} from "./sources/index.js";

export { SeriesNormalizer, seriesKey, mergeSamples, emptyTable, combineTables } from "./normalizer/index.js";

export {
  FORMAT_TAGS,
  registerWriter,
  getWriter,
  writeTable,
  materializeInMemory,
  parseOutputFormat,
  toFrame,
} from "./materializer/index.js";
export type { Materialized } from "./materializer/index.js";

export { loadConfig, parseDuration } from "./config.js";
export type { ExtractorConfig, ConfigOverrides, RetryPolicy } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export * from "./errors.js";

export { EARLIEST, parseTimestamp, splitWindow } from "./time-window.js";
export type { TimeInput } from "./time-window.js";

export type * from "@metrics-extractor/shared";
