export type { EarliestSentinel, TimeWindow, WindowRequest } from "./types/window.js";
export type { Labels, RawSample, SeriesKey } from "./types/sample.js";
export type { MetricRow, MetricTable } from "./types/table.js";
export type {
  OutputMode,
  MetricStatus,
  MetricState,
  MetricOutcome,
  SeparateExtractionResult,
  CombinedExtractionResult,
  ExtractionResult,
} from "./types/extraction.js";
export type { RequestLimiter, RequestOptions, QueryHints, SourceAdapter } from "./types/source.js";
export type { FormatTag, InMemoryFormat, OutputFormat, MetricFrame, TableWriter } from "./types/output.js";
