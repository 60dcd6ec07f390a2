/**
 * Extraction settings.
 *
 * Sources, in increasing priority: schema defaults, METRICS_EXTRACTOR_*
 * environment variables, explicit overrides (CLI flags or API options).
 * The merged result is validated against the Typebox schema.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const LogLevel = Type.Union([
  Type.Literal("fatal"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
  Type.Literal("trace"),
  Type.Literal("silent"),
]);

export type LogLevel = Static<typeof LogLevel>;

export const RetryPolicy = Type.Object(
  {
    /** Total attempts including the first one */
    attempts: Type.Integer({ minimum: 1, default: 4 }),
    baseDelayMs: Type.Integer({ minimum: 0, default: 500 }),
    maxDelayMs: Type.Integer({ minimum: 0, default: 15_000 }),
  },
  { default: {} },
);

export type RetryPolicy = Static<typeof RetryPolicy>;

export const ExtractorConfig = Type.Object({
  /** Metrics extracted at once */
  concurrency: Type.Integer({ minimum: 1, default: 1 }),
  maxPointsPerRequest: Type.Integer({ minimum: 1, default: 11_000 }),
  /** Native scrape interval; sizes range-selector sub-windows */
  stepMs: Type.Integer({ minimum: 1, default: 15_000 }),
  /** query_range step for expressions */
  expressionStepMs: Type.Integer({ minimum: 1, default: 1000 }),
  maxWindowMs: Type.Integer({ minimum: 1, default: 24 * 60 * 60 * 1000 }),
  /** Sub-window requests in flight per metric */
  chunkConcurrency: Type.Integer({ minimum: 1, default: 1 }),
  timeoutMs: Type.Integer({ minimum: 1, default: 30_000 }),
  /** Precision of the earliest-sample search */
  probeResolutionMs: Type.Integer({ minimum: 1, default: 60 * 60 * 1000 }),
  /** Requests per second shared by all metrics (unlimited when absent) */
  rateLimit: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  retry: RetryPolicy,
  logLevel: Type.Union(LogLevel.anyOf, { default: "info" }),
});

export type ExtractorConfig = Static<typeof ExtractorConfig>;

export type ConfigOverrides = Partial<Omit<ExtractorConfig, "retry">> & {
  retry?: Partial<RetryPolicy>;
};

// ---------------------------------------------------------------------------
// Durations
// ---------------------------------------------------------------------------

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

const DURATION_RE = /^(\d+(?:\.\d+)?)(ms|s|m|h|d|w)?$/;

/**
 * Parse "250ms", "15s", "5m", "1h", "7d", "2w" or a bare number of
 * milliseconds.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === "number") {
    if (!Number.isFinite(input) || input < 0) {
      throw new ConfigError(`Invalid duration: ${input}`);
    }
    return input;
  }
  const match = DURATION_RE.exec(input.trim());
  if (!match) throw new ConfigError(`Invalid duration: "${input}"`);
  return Math.round(parseFloat(match[1]) * UNIT_MS[match[2] ?? "ms"]);
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Environment variable → config key (durations are parsed, the rest converted) */
const ENV_KEYS = {
  METRICS_EXTRACTOR_CONCURRENCY: "concurrency",
  METRICS_EXTRACTOR_MAX_POINTS: "maxPointsPerRequest",
  METRICS_EXTRACTOR_CHUNK_CONCURRENCY: "chunkConcurrency",
  METRICS_EXTRACTOR_RATE_LIMIT: "rateLimit",
  LOG_LEVEL: "logLevel",
} as const;

const ENV_DURATIONS = {
  METRICS_EXTRACTOR_STEP: "stepMs",
  METRICS_EXTRACTOR_EXPRESSION_STEP: "expressionStepMs",
  METRICS_EXTRACTOR_MAX_WINDOW: "maxWindowMs",
  METRICS_EXTRACTOR_TIMEOUT: "timeoutMs",
  METRICS_EXTRACTOR_PROBE_RESOLUTION: "probeResolutionMs",
} as const;

function fromEnv(env: NodeJS.ProcessEnv): {
  config: Record<string, unknown>;
  retry: Record<string, unknown>;
} {
  const config: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") config[key] = value;
  }
  for (const [name, key] of Object.entries(ENV_DURATIONS)) {
    const value = env[name];
    if (value !== undefined && value !== "") config[key] = parseDuration(value);
  }
  // Retries after the first attempt
  const retries = env.METRICS_EXTRACTOR_RETRIES;
  const retry: Record<string, unknown> =
    retries !== undefined && retries !== "" ? { attempts: Number(retries) + 1 } : {};
  return { config, retry };
}

/** Drop keys whose value is undefined so they don't shadow lower layers */
function defined(obj: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}

/**
 * Build a validated config from defaults, the environment and overrides.
 * Throws ConfigError listing every invalid field.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ExtractorConfig {
  const fromEnvironment = fromEnv(env);
  const { retry: retryOverrides, ...rest } = overrides;

  const merged: Record<string, unknown> = {
    ...fromEnvironment.config,
    ...defined(rest),
    retry: { ...fromEnvironment.retry, ...defined(retryOverrides ?? {}) },
  };

  const converted = Value.Convert(ExtractorConfig, Value.Default(ExtractorConfig, merged));
  if (Value.Check(ExtractorConfig, converted)) return converted;

  const details = [...Value.Errors(ExtractorConfig, converted)].map(
    (e) => `${e.path || "/"} ${e.message}`,
  );
  throw new ConfigError("Invalid configuration", details);
}
