import { describe, it, expect } from "vitest";
import { TimeoutError, delay, mapWithConcurrency, withTimeout } from "./async";

describe("withTimeout", () => {
  it("passes through a value that settles in time", async () => {
    await expect(withTimeout(Promise.resolve(7), 50)).resolves.toBe(7);
  });

  it("rejects with TimeoutError when the promise hangs", async () => {
    const pending = withTimeout(new Promise<number>(() => {}), 10, "insights");
    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow("insights timed out after 10ms");
  });

  it("keeps the original rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 50)).rejects.toThrow("boom");
  });
});

describe("mapWithConcurrency", () => {
  it("keeps input order and respects the limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const out = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(ms);
      inFlight--;
      return `${i}:${ms}`;
    });

    expect(out).toEqual(["0:30", "1:5", "2:20", "3:1", "4:10"]);
    expect(peak).toBe(2);
  });

  it("handles an empty list", async () => {
    await expect(mapWithConcurrency([], 4, async (x: number) => x)).resolves.toEqual([]);
  });

  it("rejects when any call fails", async () => {
    await expect(
      mapWithConcurrency([1, 2, 3], 3, async (x) => {
        if (x === 2) throw new Error("bad item");
        return x;
      }),
    ).rejects.toThrow("bad item");
  });
});
