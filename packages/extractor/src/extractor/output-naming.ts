/**
 * Per-metric output file names.
 *
 * `metrics.parquet` + `http_requests_total` → `metrics_http_requests_total.parquet`
 */

import { extname } from "node:path";
import { NamingCollisionError } from "../errors.js";

const UNSAFE_RUN_RE = /[^A-Za-z0-9_.-]+/g;

/** File-name-safe form of a metric name (may be empty) */
export function sanitizeMetricName(metric: string): string {
  return metric.replace(UNSAFE_RUN_RE, "_").replace(/^_+|_+$/g, "");
}

/** Append the default extension when the base path has none */
export function withExtension(path: string, defaultExtension: string): string {
  return extname(path) === "" ? `${path}${defaultExtension}` : path;
}

/**
 * Derive one output path per metric from a base path.
 *
 * Throws NamingCollisionError when two metrics map to the same file (names
 * compared case-insensitively) or a metric sanitizes to nothing.
 */
export function deriveOutputPaths(
  basePath: string,
  metrics: readonly string[],
  defaultExtension: string,
): Map<string, string> {
  const path = withExtension(basePath, defaultExtension);
  const ext = extname(path);
  const stem = path.slice(0, path.length - ext.length);

  const paths = new Map<string, string>();
  const owners = new Map<string, string>();

  for (const metric of metrics) {
    const safe = sanitizeMetricName(metric);
    const file = `${stem}_${safe}${ext}`;
    if (safe === "") throw new NamingCollisionError(file, [metric]);

    const folded = file.toLowerCase();
    const owner = owners.get(folded);
    if (owner !== undefined && owner !== metric) {
      throw new NamingCollisionError(file, [owner, metric]);
    }
    owners.set(folded, metric);
    paths.set(metric, file);
  }
  return paths;
}
