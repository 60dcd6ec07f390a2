/**
 * `metrics-extractor extract`: validate flags, run the extraction, write
 * the files and print the summary. Returns the process exit code.
 */

import { extname } from "node:path";
import type { FormatTag, SourceAdapter } from "@metrics-extractor/shared";
import { loadConfig, parseDuration, type ConfigOverrides, type ExtractorConfig } from "../config.js";
import { ConfigError, ExtractionFailedError, errorMessage } from "../errors.js";
import { extract } from "../extract.js";
import { createLogger, type Logger } from "../logger.js";
import { isFormatTag } from "../materializer/index.js";
import { createSource, isSourceKind, SOURCE_KINDS, type SourceConnection } from "../sources/index.js";
import { ExitCode, exitCodeFor } from "./exit-codes.js";
import { formatSummary } from "./summary.js";

/** Flags as commander hands them over */
export interface ExtractCommandOptions {
  source?: string;
  url?: string;
  metrics?: string;
  allMetrics?: boolean;
  from?: string;
  to?: string;
  format: string;
  outputFile?: string;
  combinedOutput?: boolean;
  token?: string;
  org?: string;
  bucket?: string;
  measurement?: string;
  username?: string;
  password?: string;
  bearerToken?: string;
  parallel?: boolean;
  maxWorkers?: string;
  step?: string;
  expressionStep?: string;
  maxPoints?: string;
  timeout?: string;
  retries?: string;
  rateLimit?: string;
  verbose?: boolean;
}

export interface ExtractCommandDeps {
  stdout?: { write(chunk: string): unknown };
  stderr?: { write(chunk: string): unknown };
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  now?: () => number;
  createSource?: (
    connection: SourceConnection,
    config: ExtractorConfig,
    logger: Logger,
  ) => SourceAdapter;
}

/** Metric count used by --parallel without --max-workers */
export const DEFAULT_PARALLEL_WORKERS = 4;

const EXTENSION_FORMATS: Record<string, FormatTag> = {
  ".csv": "csv",
  ".json": "json",
  ".parquet": "parquet",
  ".h5": "hdf5",
  ".hdf5": "hdf5",
  ".feather": "feather",
};

/**
 * Split a comma-separated metric list. Commas inside braces, parentheses
 * or quotes belong to the expression, e.g. `sum by (job, instance) (up)`.
 */
export function splitMetricList(list: string): string[] {
  const metrics: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let current = "";

  for (let i = 0; i < list.length; i++) {
    const ch = list[i];
    if (quote) {
      if (ch === "\\" && i + 1 < list.length) {
        current += ch + list[++i];
        continue;
      }
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "{" || ch === "(" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === ")" || ch === "]") {
      depth = Math.max(0, depth - 1);
    } else if (ch === "," && depth === 0) {
      metrics.push(current.trim());
      current = "";
      continue;
    }
    current += ch;
  }
  metrics.push(current.trim());
  return metrics.filter((m) => m !== "");
}

/**
 * File format for a `--format` value. "pandas" and "frame" pick the format
 * from the output file's extension (CSV when it has none or is unknown).
 */
export function resolveFileFormat(format: string, outputFile: string): FormatTag {
  const normalized = format.trim().toLowerCase();
  if (isFormatTag(normalized)) return normalized;
  if (normalized === "pandas" || normalized === "frame") {
    return EXTENSION_FORMATS[extname(outputFile).toLowerCase()] ?? "csv";
  }
  throw new ConfigError(`Unknown format "${format}"`, [
    "expected one of parquet, hdf5, csv, json, feather, pandas",
  ]);
}

function parseCount(value: string, flag: string, min: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`${flag} must be an integer >= ${min}, got "${value}"`);
  }
  return n;
}

function parseRate(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new ConfigError(`--rate-limit must be a positive number, got "${value}"`);
  }
  return n;
}

export function toConfigOverrides(options: ExtractCommandOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.maxWorkers !== undefined) {
    overrides.concurrency = parseCount(options.maxWorkers, "--max-workers", 1);
  } else if (options.parallel) {
    overrides.concurrency = DEFAULT_PARALLEL_WORKERS;
  }
  if (options.step !== undefined) overrides.stepMs = parseDuration(options.step);
  if (options.expressionStep !== undefined) {
    overrides.expressionStepMs = parseDuration(options.expressionStep);
  }
  if (options.maxPoints !== undefined) {
    overrides.maxPointsPerRequest = parseCount(options.maxPoints, "--max-points", 1);
  }
  if (options.timeout !== undefined) overrides.timeoutMs = parseDuration(options.timeout);
  if (options.retries !== undefined) {
    overrides.retry = { attempts: parseCount(options.retries, "--retries", 0) + 1 };
  }
  if (options.rateLimit !== undefined) overrides.rateLimit = parseRate(options.rateLimit);
  if (options.verbose) overrides.logLevel = "debug";
  return overrides;
}

function toConnection(options: ExtractCommandOptions): SourceConnection {
  const kind = options.source ?? "";
  if (!isSourceKind(kind)) {
    throw new ConfigError(`--source must be one of ${SOURCE_KINDS.join(", ")}`);
  }
  if (!options.url) throw new ConfigError("--url is required");
  if (kind === "influxdb") {
    const missing = (["token", "org", "bucket"] as const).filter((key) => !options[key]);
    if (missing.length > 0) {
      throw new ConfigError(
        `${missing.map((key) => `--${key}`).join(", ")} required for InfluxDB`,
      );
    }
  }
  return {
    kind,
    url: options.url,
    username: options.username,
    password: options.password,
    bearerToken: options.bearerToken,
    token: options.token,
    org: options.org,
    bucket: options.bucket,
    measurement: options.measurement,
  };
}

function toMetricList(options: ExtractCommandOptions): string[] | null {
  if (options.metrics !== undefined && options.allMetrics) {
    throw new ConfigError("Use either --metrics or --all-metrics, not both");
  }
  if (options.allMetrics) return null;
  const metrics = splitMetricList(options.metrics ?? "");
  if (metrics.length === 0) throw new ConfigError("Either --metrics or --all-metrics must be specified");
  return metrics;
}

export async function runExtract(
  options: ExtractCommandOptions,
  deps: ExtractCommandDeps = {},
): Promise<ExitCode> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const env = deps.env ?? process.env;
  let logger = deps.logger;

  try {
    // Everything below up to extract() is offline validation
    const connection = toConnection(options);
    const metrics = toMetricList(options);
    if (!options.outputFile) throw new ConfigError("--output-file is required");
    const format = resolveFileFormat(options.format, options.outputFile);
    const overrides = toConfigOverrides(options);
    const config = loadConfig(overrides, env);

    logger ??= createLogger({ level: config.logLevel });
    const source = (deps.createSource ?? createSource)(connection, config, logger);

    logger.debug({ source: connection.kind, url: connection.url, format, metrics }, "Starting extraction");
    const { result, outputs } = await extract(
      source,
      metrics,
      options.from,
      options.to,
      format,
      !options.combinedOutput,
      { outputFile: options.outputFile, config: overrides, env, logger, signal: deps.signal, now: deps.now },
    );

    stdout.write(formatSummary(result, outputs));
    return exitCodeFor(result);
  } catch (err) {
    if (err instanceof ExtractionFailedError) {
      stdout.write(formatSummary(err.result, new Map()));
      return ExitCode.FAILED;
    }
    if (err instanceof ConfigError) {
      stderr.write(`Error: ${err.message}\n`);
      return ExitCode.CONFIG;
    }
    if (logger) {
      logger.error({ err }, "Extraction aborted by an unexpected error");
    } else {
      stderr.write(`Error: ${errorMessage(err)}\n`);
    }
    return ExitCode.UNEXPECTED;
  }
}
