/**
 * Columnar file (Parquet).
 *
 * Series keys contain characters Parquet column paths cannot carry, so
 * columns are named `series_<i>` and the keys are stored, in column order,
 * as JSON in the `series_keys` key-value metadata.
 */

import { ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import type { MetricTable, TableWriter } from "@metrics-extractor/shared";
import { ensureParentDir } from "./fs.js";

type ColumnDefinition = { type: "TIMESTAMP_MILLIS" | "DOUBLE"; optional?: boolean };

export function seriesColumnName(index: number): string {
  return `series_${index}`;
}

export const parquetWriter: TableWriter = {
  extension: ".parquet",
  async write(table: MetricTable, destination: string) {
    const fields: Record<string, ColumnDefinition> = { timestamp: { type: "TIMESTAMP_MILLIS" } };
    table.columns.forEach((_, i) => {
      fields[seriesColumnName(i)] = { type: "DOUBLE", optional: true };
    });

    await ensureParentDir(destination);
    const writer = await ParquetWriter.openFile(new ParquetSchema(fields), destination);
    writer.setMetadata("metric", table.metric);
    writer.setMetadata("series_keys", JSON.stringify(table.columns));
    try {
      for (const row of table.rows) {
        const record: Record<string, Date | number> = { timestamp: new Date(row.timestamp) };
        row.values.forEach((value, i) => {
          // Missing keys are nulls in optional columns
          if (value !== null) record[seriesColumnName(i)] = value;
        });
        await writer.appendRow(record);
      }
    } finally {
      await writer.close();
    }
  },
};
