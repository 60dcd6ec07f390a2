/**
 * Time window helpers: parsing, validation, resolution and splitting.
 */

import type { QueryHints, TimeWindow, WindowRequest } from "@metrics-extractor/shared";
import { ConfigError } from "./errors.js";

export const EARLIEST = "earliest";

export type TimeInput = Date | number | string;

/** Epoch ms from a Date, epoch ms number or ISO-8601 string */
export function parseTimestamp(input: TimeInput, label = "timestamp"): number {
  const ms =
    input instanceof Date ? input.getTime() : typeof input === "number" ? input : Date.parse(input);
  if (!Number.isFinite(ms)) {
    throw new ConfigError(`Invalid ${label}: ${String(input)} (expected ISO-8601, e.g. 2023-01-01T00:00:00Z)`);
  }
  return ms;
}

export function assertWindow(window: TimeWindow): void {
  if (!Number.isFinite(window.start) || !Number.isFinite(window.end)) {
    throw new ConfigError("Time window bounds must be finite");
  }
  if (window.start >= window.end) {
    throw new ConfigError(
      `Time window start (${new Date(window.start).toISOString()}) must be before end (${new Date(window.end).toISOString()})`,
    );
  }
}

/**
 * Turn optional caller bounds into a window request, using `now` (captured
 * once by the caller) for a missing end. A missing start means all history.
 */
export function resolveWindowRequest(
  from: TimeInput | undefined,
  to: TimeInput | undefined,
  now: number,
): WindowRequest {
  const end = to === undefined ? now : parseTimestamp(to, "end time");
  if (from === undefined || from === EARLIEST) return { start: EARLIEST, end };
  const start = parseTimestamp(from, "start time");
  assertWindow({ start, end });
  return { start, end };
}

/**
 * Split `[start, end)` into abutting `[a, b)` sub-windows of at most
 * `spanMs`. The pieces cover the window exactly and never overlap.
 */
export function splitWindow(window: TimeWindow, spanMs: number): TimeWindow[] {
  assertWindow(window);
  const span = Math.max(1, Math.floor(spanMs));
  const windows: TimeWindow[] = [];
  for (let start = window.start; start < window.end; start += span) {
    windows.push({ start, end: Math.min(start + span, window.end) });
  }
  return windows;
}

/**
 * Largest sub-window the hints allow: `maxPointsPerRequest` steps, capped
 * by `maxWindowMs`. With `aligned`, rounded down to a whole number of
 * steps so step-aligned evaluation grids continue across sub-windows.
 */
export function subWindowSpan(hints: QueryHints, aligned = false): number {
  const byPoints = hints.maxPointsPerRequest * hints.stepMs;
  const span = Math.min(byPoints, hints.maxWindowMs ?? Number.POSITIVE_INFINITY);
  if (!aligned) return Math.max(1, span);
  return Math.max(hints.stepMs, Math.floor(span / hints.stepMs) * hints.stepMs);
}

export function formatWindow(window: WindowRequest | TimeWindow): string {
  const start = typeof window.start === "number" ? new Date(window.start).toISOString() : window.start;
  return `[${start}, ${new Date(window.end).toISOString()})`;
}
