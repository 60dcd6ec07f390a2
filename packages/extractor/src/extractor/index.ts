export { MetricsExtractor, DEFAULT_HINTS } from "./metrics-extractor.js";
export type {
  ExtractionHints,
  ExtractRequest,
  IncrementalRequest,
  MetricsExtractorOptions,
} from "./metrics-extractor.js";
export { RateLimiter } from "./rate-limiter.js";
export type { RateLimiterOptions } from "./rate-limiter.js";
export { mapWithConcurrency } from "./worker-pool.js";
export { deriveOutputPaths, sanitizeMetricName, withExtension } from "./output-naming.js";
