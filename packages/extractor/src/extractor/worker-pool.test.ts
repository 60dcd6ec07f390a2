import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "./worker-pool.js";

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("mapWithConcurrency", () => {
  it("keeps input order", async () => {
    const results = await mapWithConcurrency([30, 1, 10], 3, async (ms) => {
      await tick(ms);
      return ms;
    });
    expect(results).toEqual([30, 1, 10]);
  });

  it("never exceeds the limit", async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick(2);
      active--;
    });
    expect(peak).toBe(2);
  });

  it("handles an empty list", async () => {
    expect(await mapWithConcurrency([], 4, async (x: number) => x)).toEqual([]);
  });

  it("rejects with the first failure", async () => {
    await expect(
      mapWithConcurrency([1, 2], 1, async (x) => {
        if (x === 2) throw new Error("boom");
        return x;
      }),
    ).rejects.toThrow("boom");
  });
});
