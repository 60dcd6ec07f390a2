/**
 * JSON over HTTP with a per-request timeout and status → error mapping.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { BackendError, RateLimitedError, TimeoutError, errorMessage } from "../errors.js";

export interface GetJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
}

/** Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/** Best-effort `error` / `errorType` from a JSON error body */
async function describeErrorBody(res: Response): Promise<string> {
  const text = await res.text().catch(() => "");
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === "object" && body !== null && "error" in body) {
      const type = "errorType" in body ? `${String(body.errorType)}: ` : "";
      return `${type}${String(body.error)}`;
    }
  } catch {
    // Not JSON, fall through to the raw text
  }
  return text.slice(0, 200) || res.statusText;
}

/**
 * GET `url` and parse the JSON body.
 *
 * - 429 → RateLimitedError (with Retry-After)
 * - 401/403 → BackendError (not retried)
 * - 5xx, network failures → retryable BackendError
 * - timeout → TimeoutError
 */
export async function getJson(url: URL, options: GetJsonOptions): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, {
      headers: { Accept: "application/json", ...options.headers },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
      throw new TimeoutError(
        `Request to ${url.origin}${url.pathname} timed out after ${options.timeoutMs}ms`,
        options.timeoutMs,
        { cause: err },
      );
    }
    throw new BackendError(`Request to ${url.origin}${url.pathname} failed: ${errorMessage(err)}`, {
      retryable: true,
      cause: err,
    });
  }

  if (res.status === 429) {
    throw new RateLimitedError(
      `Rate limited by ${url.origin}`,
      parseRetryAfter(res.headers.get("retry-after")),
    );
  }
  if (res.status === 401 || res.status === 403) {
    throw new BackendError(`Authentication failed (${res.status}) for ${url.origin}`, {
      statusCode: res.status,
    });
  }
  if (!res.ok) {
    const detail = await describeErrorBody(res);
    throw new BackendError(`${url.pathname} returned ${res.status}: ${detail}`, {
      statusCode: res.status,
      retryable: res.status >= 500,
    });
  }

  try {
    return await res.json();
  } catch (err) {
    throw new BackendError(`Malformed JSON from ${url.pathname}`, { cause: err });
  }
}

/** Validate a decoded body against a schema at the adapter boundary */
export function decode<T extends TSchema>(schema: T, value: unknown, what: string): Static<T> {
  if (Value.Check(schema, value)) return value;
  const first = Value.Errors(schema, value).First();
  const where = first ? ` at ${first.path || "/"}: ${first.message}` : "";
  throw new BackendError(`Unexpected ${what} response shape${where}`);
}
