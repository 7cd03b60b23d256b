import { describe, it, expect } from "vitest";
import { chunk, mapWithConcurrency } from "../../../src/utils/concurrency.js";

describe("chunk", () => {
  it("splits into consecutive chunks", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("returns no chunks for an empty list", () => {
    expect(chunk([], 20)).toEqual([]);
  });
});

describe("mapWithConcurrency", () => {
  it("keeps input order even when later items finish first", async () => {
    const delays = [30, 5, 15, 1];
    const results = await mapWithConcurrency(delays, 4, async (ms, index) => {
      await new Promise((r) => setTimeout(r, ms));
      return index;
    });
    expect(results).toEqual([0, 1, 2, 3]);
  });

  it("never runs more than the limit at once", async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((r) => setTimeout(r, 2));
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it("handles an empty list", async () => {
    await expect(mapWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });
});
