/**
 * The common sample shape every source adapter normalizes into.
 */

/** Label (Prometheus) or tag (InfluxDB) set identifying one series */
export type Labels = Record<string, string>;

/** One raw point as stored by the backend */
export interface RawSample {
  /** Epoch milliseconds */
  timestamp: number;
  /** float64; may be NaN or ±Infinity */
  value: number;
  labels: Labels;
}

/**
 * Canonical, order-independent string form of a label set,
 * e.g. `{instance="a",job="b"}`. `{}` for an empty set.
 */
export type SeriesKey = string;
