/**
 * Canonical series keys.
 *
 * Keys are sorted by code point and values escaped the way Prometheus
 * prints label sets, so `{job="b",instance="a"}` and
 * `{instance="a",job="b"}` collapse to the same column.
 */

import type { Labels, SeriesKey } from "@metrics-extractor/shared";

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

export function seriesKey(labels: Labels): SeriesKey {
  const pairs = Object.keys(labels)
    .sort()
    .map((name) => `${name}="${escapeLabelValue(labels[name])}"`);
  return `{${pairs.join(",")}}`;
}

/** Column name of a series in a combined table, e.g. `cpu{mode="idle"}` */
export function prefixedSeriesKey(metric: string, key: SeriesKey): string {
  return `${metric}${key}`;
}
