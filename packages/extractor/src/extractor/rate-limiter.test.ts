import { describe, it, expect } from "vitest";
import { CancelledError } from "../errors.js";
import { RateLimiter } from "./rate-limiter.js";

/** Manual clock; sleeping advances it */
function fakeClock() {
  let now = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("RateLimiter", () => {
  it("spaces requests by the interval", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({ requestsPerSecond: 4, now: clock.now, sleep: clock.sleep });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([250, 250]);
  });

  it("lets a burst through after an idle period", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({ requestsPerSecond: 2, burst: 3, now: clock.now, sleep: clock.sleep });

    for (let i = 0; i < 3; i++) await limiter.acquire();
    expect(clock.sleeps).toEqual([]);

    await limiter.acquire();
    expect(clock.sleeps).toEqual([500]);
  });

  it("refills while idle", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter({ requestsPerSecond: 1, now: clock.now, sleep: clock.sleep });

    await limiter.acquire();
    clock.advance(1000);
    await limiter.acquire();
    expect(clock.sleeps).toEqual([]);
  });

  it("queues concurrent callers one interval apart", async () => {
    const clock = fakeClock();
    const waits: number[] = [];
    const limiter = new RateLimiter({
      requestsPerSecond: 10,
      now: clock.now,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);
    expect(waits).toEqual([100, 200]);
  });

  it("stops waiting when cancelled", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 0.001 });
    await limiter.acquire();
    await expect(limiter.acquire(AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
  });

  it("returns the reservation of a cancelled caller", async () => {
    const clock = fakeClock();
    const controller = new AbortController();
    const limiter = new RateLimiter({
      requestsPerSecond: 4,
      now: clock.now,
      sleep: async (ms, signal) => {
        if (signal?.aborted) throw new CancelledError();
        await clock.sleep(ms);
      },
    });

    await limiter.acquire();
    controller.abort();
    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);

    // Only the first acquire holds a slot, so the next caller waits one interval
    await limiter.acquire();
    expect(clock.sleeps).toEqual([250]);
  });

  it("rejects a non-positive rate", () => {
    expect(() => new RateLimiter({ requestsPerSecond: 0 })).toThrow(RangeError);
  });
});
