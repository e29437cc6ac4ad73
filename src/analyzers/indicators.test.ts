import { describe, it, expect } from "vitest";
import { rollingAtr, rollingMean, rollingStd, simpleReturns, trueRange, trueRanges } from "./indicators";

describe("rollingMean", () => {
  it("is null until the window fills", () => {
    expect(rollingMean([1, 2, 3, 4], 2)).toEqual([null, 1.5, 2.5, 3.5]);
  });

  it("returns the input for a window of 1", () => {
    expect(rollingMean([5, 6, 7], 1)).toEqual([5, 6, 7]);
  });

  it("fills only the last index when the window equals the length", () => {
    expect(rollingMean([1, 2, 3, 4], 4)).toEqual([null, null, null, 2.5]);
  });

  it("is all null when the window is longer than the input or not positive", () => {
    expect(rollingMean([1, 2], 3)).toEqual([null, null]);
    expect(rollingMean([1, 2], 0)).toEqual([null, null]);
  });
});

describe("rollingStd", () => {
  it("uses the population standard deviation", () => {
    const out = rollingStd([2, 4, 4, 4, 5, 5, 7, 9], 8);
    expect(out.slice(0, 7).every((v) => v === null)).toBe(true);
    expect(out[7]).toBeCloseTo(2, 10);
  });

  it("is zero over a flat window", () => {
    expect(rollingStd([3, 3, 3], 2)).toEqual([null, 0, 0]);
  });
});

describe("true range", () => {
  it("takes the widest of the three spans", () => {
    expect(trueRange(10, 8, 11)).toBe(3);
    expect(trueRange(12, 9, 10)).toBe(3);
  });

  it("is 0 on day 0 without a range and close-to-close later", () => {
    expect(trueRanges([null, null], [null, null], [10, 12])).toEqual([0, 2]);
  });

  it("uses high and low when present", () => {
    expect(trueRanges([11, 12], [9, 9], [10, 11])).toEqual([2, 3]);
  });

  it("averages the true range into ATR", () => {
    expect(rollingAtr([null, null, null], [null, null, null], [10, 12, 11], 2)).toEqual([null, 1, 1.5]);
  });
});

describe("simpleReturns", () => {
  it("is one element shorter than the input", () => {
    const r = simpleReturns([100, 110, 99]);
    expect(r).toHaveLength(2);
    expect(r[0]).toBeCloseTo(0.1, 12);
    expect(r[1]).toBeCloseTo(-0.1, 12);
  });

  it("is empty for fewer than two prices", () => {
    expect(simpleReturns([100])).toEqual([]);
  });
});
