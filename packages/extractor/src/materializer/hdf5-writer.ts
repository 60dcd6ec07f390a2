/**
 * Hierarchical file (HDF5).
 *
 * Layout:
 *   /timestamp            float64, epoch ms
 *   /series/series_<i>    float64 per series (NaN where no observation)
 *                         with a `series_key` attribute
 *   metric                root attribute
 */

import type { MetricTable, TableWriter } from "@metrics-extractor/shared";
import { ensureParentDir } from "./fs.js";

export const hdf5Writer: TableWriter = {
  extension: ".h5",
  async write(table: MetricTable, destination: string) {
    // The WASM module is only loaded when HDF5 output is requested
    const h5wasm = await import("h5wasm/node");
    await h5wasm.ready;
    await ensureParentDir(destination);

    const file = new h5wasm.File(destination, "w");
    try {
      file.create_attribute("metric", table.metric);
      file.create_dataset({
        name: "timestamp",
        data: Float64Array.from(table.rows, (row) => row.timestamp),
      });
      const series = file.create_group("series");
      table.columns.forEach((key, i) => {
        const dataset = series.create_dataset({
          name: `series_${i}`,
          data: Float64Array.from(table.rows, (row) => row.values[i] ?? Number.NaN),
        });
        dataset.create_attribute("series_key", key);
      });
    } finally {
      file.close();
    }
  },
};
