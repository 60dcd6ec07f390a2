/**
 * Token bucket shared by every concurrent extraction unit, so the request
 * rate against the backend holds no matter how many metrics run at once.
 */

import type { RequestLimiter } from "@metrics-extractor/shared";
import { abortableSleep } from "../sources/retry.js";

export interface RateLimiterOptions {
  requestsPerSecond: number;
  /** Requests allowed back-to-back after an idle period (default: 1) */
  burst?: number;
  /** Clock in ms (injectable for tests) */
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class RateLimiter implements RequestLimiter {
  private intervalMs: number;
  private burst: number;
  private tokens: number;
  private updatedAt: number;
  private now: () => number;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RateLimiterOptions) {
    if (!(options.requestsPerSecond > 0)) {
      throw new RangeError("requestsPerSecond must be positive");
    }
    this.intervalMs = 1000 / options.requestsPerSecond;
    this.burst = Math.max(1, options.burst ?? 1);
    this.tokens = this.burst;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
    this.updatedAt = this.now();
  }

  /**
   * Wait for a token. Each caller reserves its token before sleeping, so
   * concurrent callers queue up one interval apart.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    this.refill();
    this.tokens -= 1;
    if (this.tokens >= 0) return;
    try {
      await this.sleep(-this.tokens * this.intervalMs, signal);
    } catch (err) {
      // A cancelled caller never uses its reservation
      this.tokens += 1;
      throw err;
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.updatedAt;
    this.updatedAt = now;
    this.tokens = Math.min(this.burst, this.tokens + elapsed / this.intervalMs);
  }
}
