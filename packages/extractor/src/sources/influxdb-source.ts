/**
 * InfluxDB 2.x source adapter (Flux).
 *
 * A "metric" is a field key. Every row of a Flux result is one stored
 * point; tags become labels, and `_measurement` is kept as a label so the
 * same field name in two measurements stays two series.
 */

import {
  HttpError,
  InfluxDB,
  RequestTimedOutError,
  fluxDateTime,
  fluxString,
} from "@influxdata/influxdb-client";
import type { Logger } from "pino";
import type {
  Labels,
  QueryHints,
  RawSample,
  RequestOptions,
  SourceAdapter,
  TimeWindow,
} from "@metrics-extractor/shared";
import type { RetryPolicy } from "../config.js";
import {
  BackendError,
  ConfigError,
  NotFoundError,
  RateLimitedError,
  TimeoutError,
  errorMessage,
} from "../errors.js";
import { assertWindow, splitWindow, subWindowSpan } from "../time-window.js";
import { fetchChunks } from "./chunks.js";
import { assertMetricName } from "./prometheus-source.js";
import { DEFAULT_RETRY_POLICY, withRetry } from "./retry.js";

/** One Flux result row, columns keyed by name */
export type FluxRow = Record<string, unknown>;

/** Runs a Flux query and collects its rows. Tests replace it. */
export type FluxQueryRunner = (query: string) => Promise<FluxRow[]>;

export interface InfluxDBSourceOptions {
  url: string;
  token: string;
  org: string;
  bucket: string;
  /** Restrict every query to one measurement */
  measurement?: string;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  retry?: RetryPolicy;
  logger?: Logger;
  /** Override the query transport (defaults to the official client) */
  runner?: FluxQueryRunner;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const EPOCH = "1970-01-01T00:00:00Z";

/** Result-level columns that are not tags */
const NON_TAG_COLUMNS = new Set(["result", "table"]);

function fluxTime(ms: number): string {
  return fluxDateTime(new Date(ms).toISOString()).toString();
}

/** Retry-After of a 429; the client reports it in ms, 0 when absent */
function retryAfterMs(err: HttpError): number | undefined {
  const delay = err.retryAfter();
  return delay > 0 ? delay : undefined;
}

/** Map client errors onto the extraction taxonomy */
export function mapInfluxError(err: unknown, timeoutMs = DEFAULT_TIMEOUT_MS): Error {
  if (err instanceof HttpError) {
    if (err.statusCode === 429) {
      return new RateLimitedError(`InfluxDB rate limited: ${err.message}`, retryAfterMs(err));
    }
    if (err.statusCode === 401 || err.statusCode === 403) {
      return new BackendError(`InfluxDB authentication failed (${err.statusCode})`, {
        statusCode: err.statusCode,
        cause: err,
      });
    }
    return new BackendError(`InfluxDB returned ${err.statusCode}: ${err.message}`, {
      statusCode: err.statusCode,
      retryable: err.statusCode >= 500,
      cause: err,
    });
  }
  if (err instanceof RequestTimedOutError) {
    return new TimeoutError(`InfluxDB query timed out after ${timeoutMs}ms`, timeoutMs, { cause: err });
  }
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    // ECONNREFUSED, ECONNRESET
    return new BackendError(`InfluxDB request failed: ${err.message}`, { retryable: true, cause: err });
  }
  return err instanceof Error ? err : new BackendError(errorMessage(err));
}

/** Point value → float64; booleans become 1/0, strings are skipped */
function toNumber(value: unknown): number | null {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  return null;
}

function toTimestamp(value: unknown): number | null {
  if (typeof value === "string") {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
  }
  if (value instanceof Date) return value.getTime();
  return null;
}

export class InfluxDBSource implements SourceAdapter {
  readonly kind = "influxdb";

  private bucket: string;
  private measurement: string | null;
  private retry: RetryPolicy;
  private timeoutMs: number;
  private logger: Logger | null;
  private runner: FluxQueryRunner;

  constructor(options: InfluxDBSourceOptions) {
    const missing = (["url", "token", "org", "bucket"] as const).filter((key) => !options[key]);
    if (missing.length > 0) {
      throw new ConfigError("InfluxDB connection is incomplete", missing.map((key) => `${key} is required`));
    }
    this.bucket = options.bucket;
    this.measurement = options.measurement ?? null;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger?.child({ component: "influxdb" }) ?? null;

    if (options.runner) {
      this.runner = options.runner;
    } else {
      const queryApi = new InfluxDB({
        url: options.url,
        token: options.token,
        timeout: this.timeoutMs,
      }).getQueryApi(options.org);
      this.runner = (query) =>
        queryApi.collectRows<FluxRow>(query, (values, tableMeta) => tableMeta.toObject(values));
    }
  }

  async listMetrics(): Promise<string[]> {
    return this.fieldKeys();
  }

  async earliestTimestamp(metric: string, options?: RequestOptions): Promise<number> {
    assertMetricName(metric);
    const rows = await this.query(
      [
        this.selectField(metric, `range(start: ${EPOCH})`),
        "  |> first()",
        "  |> group()",
        '  |> sort(columns: ["_time"])',
        "  |> limit(n: 1)",
      ].join("\n"),
      options,
    );
    const first = rows.length > 0 ? toTimestamp(rows[0]._time) : null;
    if (first === null) throw new NotFoundError(metric);
    return first;
  }

  async *queryRange(
    metric: string,
    window: TimeWindow,
    hints: QueryHints,
  ): AsyncGenerator<RawSample[]> {
    assertMetricName(metric);
    assertWindow(window);

    const known = await this.fieldKeys(hints);
    if (!known.includes(metric)) throw new NotFoundError(metric);

    const windows = splitWindow(window, subWindowSpan(hints));
    this.logger?.debug({ metric, subWindows: windows.length }, "Querying field");

    yield* fetchChunks(windows, (w) => this.fetchWindow(metric, w, hints), {
      concurrency: hints.chunkConcurrency,
      signal: hints.signal,
    });
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async fieldKeys(options?: RequestOptions): Promise<string[]> {
    const predicate = this.measurement
      ? `(r) => r._measurement == ${fluxString(this.measurement).toString()}`
      : "(r) => true";
    const rows = await this.query(
      [
        'import "influxdata/influxdb/schema"',
        "",
        `schema.fieldKeys(bucket: ${fluxString(this.bucket).toString()}, predicate: ${predicate}, start: ${EPOCH})`,
      ].join("\n"),
      options,
    );
    const names = rows.map((row) => row._value).filter((v): v is string => typeof v === "string");
    return [...new Set(names)].sort();
  }

  private async fetchWindow(metric: string, window: TimeWindow, hints: QueryHints): Promise<RawSample[]> {
    // range() is half-open, matching [start, end)
    const rows = await this.query(
      this.selectField(metric, `range(start: ${fluxTime(window.start)}, stop: ${fluxTime(window.end)})`),
      hints,
    );

    const samples: RawSample[] = [];
    for (const row of rows) {
      const timestamp = toTimestamp(row._time);
      const value = toNumber(row._value);
      if (timestamp === null || value === null) {
        this.logger?.debug({ metric, time: row._time, value: row._value }, "Skipping non-numeric point");
        continue;
      }
      samples.push({ timestamp, value, labels: this.labelsOf(row) });
    }
    return samples;
  }

  /** `from |> range |> filter(field) [|> filter(measurement)]` */
  private selectField(metric: string, range: string): string {
    const lines = [
      `from(bucket: ${fluxString(this.bucket).toString()})`,
      `  |> ${range}`,
      `  |> filter(fn: (r) => r._field == ${fluxString(metric).toString()})`,
    ];
    if (this.measurement) {
      lines.push(`  |> filter(fn: (r) => r._measurement == ${fluxString(this.measurement).toString()})`);
    }
    return lines.join("\n");
  }

  private labelsOf(row: FluxRow): Labels {
    const labels: Labels = {};
    for (const [key, value] of Object.entries(row)) {
      if (NON_TAG_COLUMNS.has(key)) continue;
      if (key.startsWith("_") && key !== "_measurement") continue;
      if (value === undefined || value === null || value === "") continue;
      labels[key] = String(value);
    }
    return labels;
  }

  private async query(flux: string, options?: RequestOptions): Promise<FluxRow[]> {
    const rows = await withRetry(
      async () => {
        await options?.limiter?.acquire(options.signal);
        try {
          return await this.runner(flux);
        } catch (err) {
          throw mapInfluxError(err, this.timeoutMs);
        }
      },
      {
        policy: this.retry,
        operation: "Flux query",
        signal: options?.signal,
        logger: this.logger ?? undefined,
      },
    );
    this.logger?.trace({ rows: rows.length }, "Flux query completed");
    return rows;
  }
}
