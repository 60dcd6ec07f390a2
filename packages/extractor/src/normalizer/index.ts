export { seriesKey, prefixedSeriesKey } from "./series-key.js";
export { SeriesNormalizer, emptyTable, mergeSamples } from "./series-normalizer.js";
export type { SeriesNormalizerOptions, MergeStats } from "./series-normalizer.js";
export { combineTables, COMBINED_TABLE_NAME } from "./combine.js";
