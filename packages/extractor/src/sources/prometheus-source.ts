/**
 * Prometheus source adapter.
 *
 * Plain series selectors are read at native resolution: each sub-window
 * `[a, b)` is one instant query of the range selector `sel[<b-a>ms]`
 * evaluated at `b - 1ms`, which returns the stored samples rather than a
 * step-evaluated grid. Expressions containing functions (e.g.
 * `rate(x[5m])`) have no stored samples and go through `query_range` at
 * `expressionStepMs` (1s unless hinted otherwise).
 */

import { Type } from "@sinclair/typebox";
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
import { ConfigError, NotFoundError } from "../errors.js";
import { assertWindow, splitWindow, subWindowSpan } from "../time-window.js";
import { fetchChunks } from "./chunks.js";
import { decode, getJson } from "./http.js";
import { DEFAULT_RETRY_POLICY, withRetry } from "./retry.js";

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const ApiResponse = Type.Object({
  status: Type.Literal("success"),
  data: Type.Unknown(),
  warnings: Type.Optional(Type.Array(Type.String())),
});

const LabelValues = Type.Array(Type.String());

const SeriesList = Type.Array(Type.Record(Type.String(), Type.String()));

/** `[<unix seconds>, "<value>"]` */
const SamplePair = Type.Tuple([Type.Number(), Type.String()]);

const MatrixData = Type.Object({
  resultType: Type.Literal("matrix"),
  result: Type.Array(
    Type.Object({
      metric: Type.Record(Type.String(), Type.String()),
      values: Type.Array(SamplePair),
    }),
  ),
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FUNCTION_CALL_RE = /[a-zA-Z_:][a-zA-Z0-9_:]*\s*\(/;
const QUOTED_RE = /"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'|`[^`]*`/g;

/** Whether a query is an expression (function call) rather than a selector */
export function isFunctionQuery(query: string): boolean {
  return FUNCTION_CALL_RE.test(query.replace(QUOTED_RE, '""'));
}

/** Prometheus sample values are strings; "+Inf", "-Inf" and "NaN" included */
export function parseSampleValue(value: string): number {
  switch (value) {
    case "+Inf":
      return Number.POSITIVE_INFINITY;
    case "-Inf":
      return Number.NEGATIVE_INFINITY;
    case "NaN":
      return Number.NaN;
    default:
      return Number(value);
  }
}

/** Epoch ms → the seconds string Prometheus accepts, millisecond precision */
function toPromTime(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function expressionStep(hints: QueryHints): number {
  return hints.expressionStepMs ?? DEFAULT_EXPRESSION_STEP_MS;
}

function withoutName(metric: Labels): Labels {
  const { __name__: _name, ...labels } = metric;
  return labels;
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export interface PrometheusSourceOptions {
  /** Base URL, e.g. http://prometheus:9090 */
  url: string;
  headers?: Record<string, string>;
  basicAuth?: { username: string; password: string };
  bearerToken?: string;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  retry?: RetryPolicy;
  /** Precision of the earliest-sample search in ms (default: 1h) */
  probeResolutionMs?: number;
  logger?: Logger;
  /** Clock used as the upper bound of the earliest-sample search */
  now?: () => number;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_PROBE_RESOLUTION_MS = 60 * 60 * 1000;
export const DEFAULT_EXPRESSION_STEP_MS = 1000;

export class PrometheusSource implements SourceAdapter {
  readonly kind = "prometheus";

  private baseUrl: string;
  private headers: Record<string, string>;
  private timeoutMs: number;
  private retry: RetryPolicy;
  private probeResolutionMs: number;
  private logger: Logger | null;
  private now: () => number;

  constructor(options: PrometheusSourceOptions) {
    if (!options.url) throw new ConfigError("Prometheus URL is required");
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.headers = { ...options.headers };
    if (options.basicAuth) {
      const { username, password } = options.basicAuth;
      this.headers.Authorization = `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
    } else if (options.bearerToken) {
      this.headers.Authorization = `Bearer ${options.bearerToken}`;
    }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.probeResolutionMs = options.probeResolutionMs ?? DEFAULT_PROBE_RESOLUTION_MS;
    this.logger = options.logger?.child({ component: "prometheus" }) ?? null;
    this.now = options.now ?? Date.now;
  }

  async listMetrics(): Promise<string[]> {
    const data = await this.request("/api/v1/label/__name__/values", {});
    const names = decode(LabelValues, data, "label values");
    return [...new Set(names)].sort();
  }

  /**
   * Lower bound of the metric's first sample, found by bisecting the
   * series API down to `probeResolutionMs`. Never later than the first
   * sample, so a query starting here loses nothing.
   */
  async earliestTimestamp(metric: string, options?: RequestOptions): Promise<number> {
    assertMetricName(metric);
    if (isFunctionQuery(metric)) {
      throw new ConfigError(
        `Cannot discover the earliest sample of expression "${metric}"; pass an explicit start time`,
      );
    }
    if (!(await this.seriesExist(metric, undefined, options))) throw new NotFoundError(metric);

    let lo = 0;
    let hi = this.now();
    while (hi - lo > this.probeResolutionMs) {
      const mid = Math.floor((lo + hi) / 2);
      if (await this.seriesExist(metric, { start: lo, end: mid }, options)) {
        hi = mid;
      } else {
        lo = mid;
      }
    }
    this.logger?.debug({ metric, earliest: new Date(lo).toISOString() }, "Earliest sample located");
    return lo;
  }

  async *queryRange(
    metric: string,
    window: TimeWindow,
    hints: QueryHints,
  ): AsyncGenerator<RawSample[]> {
    assertMetricName(metric);
    assertWindow(window);

    const expression = isFunctionQuery(metric);
    if (!expression && !(await this.seriesExist(metric, undefined, hints))) {
      throw new NotFoundError(metric);
    }

    // Expressions are sized and aligned on their own evaluation grid
    const spanHints = expression ? { ...hints, stepMs: expressionStep(hints) } : hints;
    const windows = splitWindow(window, subWindowSpan(spanHints, expression));
    this.logger?.debug(
      { metric, subWindows: windows.length, mode: expression ? "query_range" : "range_selector" },
      "Querying metric",
    );

    yield* fetchChunks(
      windows,
      (w) => (expression ? this.fetchExpression(metric, w, hints) : this.fetchRaw(metric, w, hints)),
      { concurrency: hints.chunkConcurrency, signal: hints.signal },
    );
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Raw samples of a selector in `[a, b)` */
  private async fetchRaw(selector: string, window: TimeWindow, hints: QueryHints): Promise<RawSample[]> {
    const data = await this.request(
      "/api/v1/query",
      {
        query: `${selector}[${window.end - window.start}ms]`,
        time: toPromTime(window.end - 1),
      },
      hints,
    );
    return this.toSamples(decode(MatrixData, data, "range selector"), window);
  }

  /** Step-evaluated expression results in `[a, b)` */
  private async fetchExpression(
    expression: string,
    window: TimeWindow,
    hints: QueryHints,
  ): Promise<RawSample[]> {
    const data = await this.request(
      "/api/v1/query_range",
      {
        query: expression,
        start: toPromTime(window.start),
        end: toPromTime(window.end - 1),
        step: `${expressionStep(hints)}ms`,
      },
      hints,
    );
    return this.toSamples(decode(MatrixData, data, "query_range"), window);
  }

  private toSamples(
    matrix: { result: { metric: Labels; values: [number, string][] }[] },
    window: TimeWindow,
  ): RawSample[] {
    const samples: RawSample[] = [];
    for (const series of matrix.result) {
      const labels = withoutName(series.metric);
      for (const [seconds, value] of series.values) {
        const timestamp = Math.round(seconds * 1000);
        // Range selectors may be closed on the left depending on the server version
        if (timestamp < window.start || timestamp >= window.end) continue;
        samples.push({ timestamp, value: parseSampleValue(value), labels });
      }
    }
    return samples;
  }

  private async seriesExist(
    selector: string,
    range?: TimeWindow,
    options?: RequestOptions,
  ): Promise<boolean> {
    const params: Record<string, string> = { "match[]": selector, limit: "1" };
    if (range) {
      params.start = toPromTime(range.start);
      params.end = toPromTime(range.end);
    }
    const data = await this.request("/api/v1/series", params, options);
    return decode(SeriesList, data, "series").length > 0;
  }

  /** GET an API path through the limiter and retry policy; returns `data` */
  private async request(
    path: string,
    params: Record<string, string>,
    options?: RequestOptions,
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);

    const body = await withRetry(
      async () => {
        await options?.limiter?.acquire(options.signal);
        return getJson(url, { headers: this.headers, timeoutMs: this.timeoutMs });
      },
      { policy: this.retry, operation: `GET ${path}`, signal: options?.signal, logger: this.logger ?? undefined },
    );

    const response = decode(ApiResponse, body, path);
    for (const warning of response.warnings ?? []) {
      this.logger?.warn({ path, warning }, "Prometheus returned a warning");
    }
    return response.data;
  }
}

export function assertMetricName(metric: string): void {
  if (metric.trim() === "") throw new ConfigError("Metric name must be non-empty");
}
