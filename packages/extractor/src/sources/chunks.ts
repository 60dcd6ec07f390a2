/**
 * Sub-window fetching shared by the source adapters.
 */

import type { TimeWindow } from "@metrics-extractor/shared";
import { CancelledError } from "../errors.js";

export interface FetchChunksOptions {
  /** Requests allowed in flight at once (default 1) */
  concurrency?: number;
  /** Stops new requests when aborted; in-flight ones are awaited */
  signal?: AbortSignal;
}

type Settled<T> = { id: number; ok: true; value: T } | { id: number; ok: false; error: unknown };

/**
 * Fetch every window and yield each result as soon as it lands.
 *
 * With concurrency 1 results come back in window order; otherwise in
 * completion order. After an abort, results of requests already in flight
 * are still yielded, then CancelledError is thrown if windows remain.
 */
export async function* fetchChunks<T>(
  windows: readonly TimeWindow[],
  fetchOne: (window: TimeWindow) => Promise<T>,
  options?: FetchChunksOptions,
): AsyncGenerator<T> {
  const concurrency = Math.max(1, options?.concurrency ?? 1);
  const signal = options?.signal;
  const inFlight = new Map<number, Promise<Settled<T>>>();
  let next = 0;

  while (next < windows.length || inFlight.size > 0) {
    while (inFlight.size < concurrency && next < windows.length && !signal?.aborted) {
      const id = next++;
      inFlight.set(
        id,
        fetchOne(windows[id]).then(
          (value): Settled<T> => ({ id, ok: true, value }),
          (error: unknown): Settled<T> => ({ id, ok: false, error }),
        ),
      );
    }
    if (inFlight.size === 0) break;

    const settled = await Promise.race(inFlight.values());
    inFlight.delete(settled.id);
    if (!settled.ok) throw settled.error;
    yield settled.value;
  }

  if (next < windows.length) throw new CancelledError();
}
