/**
 * Extraction orchestrator.
 *
 * Drives a SourceAdapter across the window for every requested metric and
 * folds the chunks into one table per metric. Each metric is an independent
 * unit of work; units run concurrently up to `concurrency` and share one
 * rate limiter, the only state they have in common.
 *
 * IMPORTANT: the orchestrator never branches on the backend type. Anything
 * backend-specific belongs in the adapter.
 */

import type { Logger } from "pino";
import type {
  ExtractionResult,
  MetricOutcome,
  MetricStatus,
  MetricTable,
  OutputMode,
  QueryHints,
  RequestLimiter,
  RequestOptions,
  SourceAdapter,
  TimeWindow,
  WindowRequest,
} from "@metrics-extractor/shared";
import type { ExtractorConfig } from "../config.js";
import { CancelledError, ConfigError, NotFoundError, errorMessage } from "../errors.js";
import { silentLogger } from "../logger.js";
import { SeriesNormalizer, combineTables } from "../normalizer/index.js";
import { EARLIEST, formatWindow, resolveWindowRequest, type TimeInput } from "../time-window.js";
import { RateLimiter } from "./rate-limiter.js";
import { mapWithConcurrency } from "./worker-pool.js";

/** Query hints the orchestrator owns; signal and limiter are added per run */
export type ExtractionHints = Omit<QueryHints, "signal" | "limiter">;

export interface MetricsExtractorOptions {
  logger?: Logger;
  /** Metrics extracted at once (default: 1) */
  concurrency?: number;
  /** Requests per second across all metrics; unlimited when absent */
  rateLimit?: number;
  hints?: Partial<ExtractionHints>;
  /** Clock read once per extraction (injectable for tests) */
  now?: () => number;
}

export interface ExtractRequest {
  source: SourceAdapter;
  metrics: readonly string[];
  /** Omitted: all history, starting at each metric's earliest sample */
  from?: TimeInput;
  /** Omitted: now */
  to?: TimeInput;
  mode?: OutputMode;
  signal?: AbortSignal;
}

export interface IncrementalRequest extends Omit<ExtractRequest, "mode"> {
  /** Slice length in ms (default: one day) */
  chunkMs?: number;
}

export const DEFAULT_HINTS: ExtractionHints = {
  maxPointsPerRequest: 11_000,
  stepMs: 15_000,
  expressionStepMs: 1000,
  maxWindowMs: 24 * 60 * 60 * 1000,
  chunkConcurrency: 1,
};

const ONE_DAY_MS = 24 * 60 * 60 * 1000;
const CANCELLED_REASON = "cancelled";

export class MetricsExtractor {
  private logger: Logger;
  private concurrency: number;
  private rateLimit: number | undefined;
  private hints: ExtractionHints;
  private now: () => number;

  constructor(options?: MetricsExtractorOptions) {
    this.logger = options?.logger ?? silentLogger();
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
    this.rateLimit = options?.rateLimit;
    this.hints = { ...DEFAULT_HINTS, ...options?.hints };
    this.now = options?.now ?? Date.now;
  }

  static fromConfig(
    config: ExtractorConfig,
    options?: Pick<MetricsExtractorOptions, "logger" | "now">,
  ): MetricsExtractor {
    return new MetricsExtractor({
      logger: options?.logger,
      now: options?.now,
      concurrency: config.concurrency,
      rateLimit: config.rateLimit,
      hints: {
        maxPointsPerRequest: config.maxPointsPerRequest,
        stepMs: config.stepMs,
        expressionStepMs: config.expressionStepMs,
        maxWindowMs: config.maxWindowMs,
        chunkConcurrency: config.chunkConcurrency,
      },
    });
  }

  async extract(request: ExtractRequest): Promise<ExtractionResult> {
    const metrics = this.validateMetrics(request.metrics);
    const window = resolveWindowRequest(request.from, request.to, this.now());
    return this.run(request.source, metrics, window, request.mode ?? "separate", {
      signal: request.signal,
      limiter: this.createLimiter(),
    });
  }

  /**
   * Extract consecutive `[t, t + chunkMs)` slices of the window, yielding a
   * separate-mode result per slice. An unbounded start is resolved once,
   * to the earliest sample of any requested metric. Stops after the slice
   * in progress when the signal fires.
   */
  async *extractIncremental(request: IncrementalRequest): AsyncGenerator<ExtractionResult> {
    const metrics = this.validateMetrics(request.metrics);
    const chunkMs = request.chunkMs ?? ONE_DAY_MS;
    if (!(chunkMs > 0)) throw new ConfigError(`Slice length must be positive, got ${chunkMs}`);

    const window = resolveWindowRequest(request.from, request.to, this.now());
    // One limiter paces the start lookup and every slice
    const requestOptions: RequestOptions = { signal: request.signal, limiter: this.createLimiter() };
    let start: number | null = typeof window.start === "number" ? window.start : null;
    if (window.start === EARLIEST) {
      try {
        start = await this.earliestOfAny(request.source, metrics, requestOptions);
      } catch (err) {
        if (err instanceof CancelledError) return;
        throw err;
      }
    }
    if (start === null) {
      this.logger.info({ metrics }, "No requested metric exists at the source");
      return;
    }

    for (let sliceStart = start; sliceStart < window.end; sliceStart += chunkMs) {
      if (request.signal?.aborted) return;
      const slice = { start: sliceStart, end: Math.min(sliceStart + chunkMs, window.end) };
      this.logger.info({ window: formatWindow(slice) }, "Extracting slice");
      yield await this.run(request.source, metrics, slice, "separate", requestOptions);
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private createLimiter(): RequestLimiter | undefined {
    return this.rateLimit ? new RateLimiter({ requestsPerSecond: this.rateLimit }) : undefined;
  }

  private validateMetrics(metrics: readonly string[]): string[] {
    if (metrics.length === 0) throw new ConfigError("At least one metric is required");
    const blank = metrics.filter((m) => m.trim() === "");
    if (blank.length > 0) throw new ConfigError("Metric names must be non-empty");

    const unique = [...new Set(metrics)];
    if (unique.length < metrics.length) {
      this.logger.warn({ requested: metrics.length, unique: unique.length }, "Ignoring duplicate metric names");
    }
    return unique;
  }

  private async run(
    source: SourceAdapter,
    metrics: string[],
    window: WindowRequest,
    mode: OutputMode,
    requestOptions: RequestOptions,
  ): Promise<ExtractionResult> {
    const { signal } = requestOptions;
    const hints: QueryHints = { ...this.hints, ...requestOptions };
    const startedAt = Date.now();

    this.logger.info(
      { source: source.kind, metrics: metrics.length, window: formatWindow(window), mode },
      "Extraction started",
    );

    const outcomes = await mapWithConcurrency(metrics, this.concurrency, (metric) =>
      this.extractMetric(source, metric, window, hints),
    );

    const counts = { ok: 0, not_found: 0, failed: 0 };
    for (const outcome of outcomes) counts[outcome.status.state]++;
    this.logger.info({ ...counts, durationMs: Date.now() - startedAt }, "Extraction finished");

    const cancelled = signal?.aborted ?? false;
    const ok = outcomes.filter((o) => o.status.state === "ok");
    if (mode === "combined") {
      return { mode, window, outcomes, cancelled, table: combineTables(ok.map((o) => o.table)) };
    }
    const tables = new Map(ok.map((o): [string, MetricTable] => [o.metric, o.table]));
    return { mode, window, outcomes, cancelled, tables };
  }

  /** One metric, start to finish. Never throws: failures become the status. */
  private async extractMetric(
    source: SourceAdapter,
    metric: string,
    window: WindowRequest,
    hints: QueryHints,
  ): Promise<MetricOutcome> {
    const logger = this.logger.child({ metric });
    const normalizer = new SeriesNormalizer(metric, { logger });
    let chunks = 0;
    const outcome = (status: MetricStatus): MetricOutcome => ({
      metric,
      status,
      table: normalizer.toTable(),
      chunks,
    });

    try {
      if (hints.signal?.aborted) throw new CancelledError();

      const bounded = await this.resolveStart(source, metric, window, hints);
      if (bounded === null) {
        logger.info("First sample is after the end of the window; nothing to extract");
        return outcome({ state: "ok" });
      }

      for await (const chunk of source.queryRange(metric, bounded, hints)) {
        const stats = normalizer.merge(chunk);
        chunks++;
        logger.debug({ chunk: chunks, ...stats, series: normalizer.seriesCount }, "Chunk merged");
      }

      logger.info({ series: normalizer.seriesCount, rows: normalizer.rowCount, chunks }, "Metric extracted");
      return outcome({ state: "ok" });
    } catch (err) {
      if (err instanceof NotFoundError) {
        logger.warn(err.message);
        return outcome({ state: "not_found", message: err.message });
      }
      if (err instanceof CancelledError || hints.signal?.aborted) {
        logger.warn({ rows: normalizer.rowCount }, "Metric extraction cancelled");
        return outcome({ state: "failed", reason: CANCELLED_REASON });
      }
      logger.error({ err }, "Metric extraction failed");
      return outcome({ state: "failed", reason: errorMessage(err) });
    }
  }

  /** Bounded window for one metric, or null when the metric starts after `end` */
  private async resolveStart(
    source: SourceAdapter,
    metric: string,
    window: WindowRequest,
    options: RequestOptions,
  ): Promise<TimeWindow | null> {
    if (window.start !== EARLIEST) return { start: window.start, end: window.end };
    const start = await source.earliestTimestamp(metric, { signal: options.signal, limiter: options.limiter });
    this.logger.debug({ metric, earliest: new Date(start).toISOString() }, "Resolved unbounded start");
    return start < window.end ? { start, end: window.end } : null;
  }

  private async earliestOfAny(
    source: SourceAdapter,
    metrics: string[],
    options: RequestOptions,
  ): Promise<number | null> {
    let earliest: number | null = null;
    for (const metric of metrics) {
      try {
        const start = await source.earliestTimestamp(metric, options);
        earliest = earliest === null ? start : Math.min(earliest, start);
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        this.logger.warn(err.message);
      }
    }
    return earliest;
  }
}
