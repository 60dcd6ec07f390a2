import type { Logger } from "pino";
import type { SourceAdapter } from "@metrics-extractor/shared";
import type { ExtractorConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { InfluxDBSource } from "./influxdb-source.js";
import { PrometheusSource } from "./prometheus-source.js";

export const SOURCE_KINDS = ["prometheus", "influxdb"] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export function isSourceKind(value: string): value is SourceKind {
  return SOURCE_KINDS.some((kind) => kind === value);
}

/** Connection settings as collected from the command line */
export interface SourceConnection {
  kind: SourceKind;
  url: string;
  /** Prometheus basic auth */
  username?: string;
  password?: string;
  bearerToken?: string;
  /** InfluxDB */
  token?: string;
  org?: string;
  bucket?: string;
  measurement?: string;
}

/** Build the adapter for a connection. Throws ConfigError on missing settings. */
export function createSource(
  connection: SourceConnection,
  config: Pick<ExtractorConfig, "timeoutMs" | "retry" | "probeResolutionMs">,
  logger?: Logger,
): SourceAdapter {
  switch (connection.kind) {
    case "prometheus": {
      if (connection.username !== undefined && connection.password === undefined) {
        throw new ConfigError("--password is required with --username");
      }
      return new PrometheusSource({
        url: connection.url,
        basicAuth:
          connection.username !== undefined && connection.password !== undefined
            ? { username: connection.username, password: connection.password }
            : undefined,
        bearerToken: connection.bearerToken,
        timeoutMs: config.timeoutMs,
        retry: config.retry,
        probeResolutionMs: config.probeResolutionMs,
        logger,
      });
    }
    case "influxdb":
      return new InfluxDBSource({
        url: connection.url,
        token: connection.token ?? "",
        org: connection.org ?? "",
        bucket: connection.bucket ?? "",
        measurement: connection.measurement,
        timeoutMs: config.timeoutMs,
        retry: config.retry,
        logger,
      });
  }
}

export { PrometheusSource, isFunctionQuery, parseSampleValue, assertMetricName } from "./prometheus-source.js";
export type { PrometheusSourceOptions } from "./prometheus-source.js";
export { InfluxDBSource, mapInfluxError } from "./influxdb-source.js";
export type { InfluxDBSourceOptions, FluxQueryRunner, FluxRow } from "./influxdb-source.js";
export { withRetry, backoffDelay, abortableSleep, DEFAULT_RETRY_POLICY } from "./retry.js";
export type { RetryOptions } from "./retry.js";
export { fetchChunks } from "./chunks.js";
export { getJson, parseRetryAfter } from "./http.js";
