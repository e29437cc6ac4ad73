import { describe, it, expect } from "vitest";
import { computeBaselineStates, computeSignals, rawWeightFor } from "./signals";
import type { AlignedSeries, StrategyParams } from "./types";

const params: StrategyParams = {
  maShort: 3,
  maLong: 7,
  stopLookback: 14,
  atrMult: 3,
  volMult: 2.5,
  minSignals: 2,
  shortAlts: false,
};

const calendarOf = (n: number): string[] =>
  Array.from({ length: n }, (_, i) => `2024-03-${String(i + 1).padStart(2, "0")}`);

function aligned(name: string, close: number[]): AlignedSeries {
  return { name, close, high: close.map(() => null), low: close.map(() => null) };
}

describe("rawWeightFor", () => {
  const base = { minSignals: 2, shortAlts: false };

  it("gives full weight to 3/3", () => {
    expect(rawWeightFor(3, true, false, base)).toBe(1);
  });

  it("gives half weight to a partial signal with bullish RS", () => {
    expect(rawWeightFor(2, true, false, base)).toBe(0.5);
    expect(rawWeightFor(2, false, false, base)).toBe(0);
    expect(rawWeightFor(2, true, false, { ...base, minSignals: 3 })).toBe(0);
  });

  it("shorts a full bear only when enabled", () => {
    expect(rawWeightFor(0, false, true, { ...base, shortAlts: true })).toBe(-1);
    expect(rawWeightFor(0, false, true, base)).toBe(0);
  });

  it("keeps weights below minSignals in {0, -1}", () => {
    for (const shortAlts of [false, true]) {
      for (const fullBear of [false, true]) {
        const w = rawWeightFor(1, true, fullBear, { minSignals: 2, shortAlts });
        expect([0, -1]).toContain(w);
      }
    }
  });
});

describe("computeSignals", () => {
  const n = 20;
  const calendar = calendarOf(n);
  const rising = aligned("UP", Array.from({ length: n }, (_, i) => 10 + i));
  const flatBaseline = Array.from({ length: n }, () => 100);
  const signals = computeSignals(calendar, rising, flatBaseline, params);

  it("emits one signal per calendar day", () => {
    expect(signals).toHaveLength(n);
    expect(signals[0].date).toBe("2024-03-01");
    expect(signals[0].rs).toBeCloseTo(0.1, 12);
  });

  it("scores nothing until the long MA fills", () => {
    expect(signals[5].maLong).toBeNull();
    expect(signals[5].score).toBe(0);
    expect(signals[5].rawWeight).toBe(0);
  });

  it("reaches 3/3 on a steady uptrend", () => {
    const day6 = signals[6];
    expect(day6.maLong).toBeCloseTo(13, 12);
    expect(day6.maShort).toBeCloseTo(15, 12);
    expect(day6.trendBull && day6.momBull && day6.rsBull).toBe(true);
    expect(day6.score).toBe(3);
    expect(day6.rawWeight).toBe(1);
  });

  it("places the stop three ATRs below the close once ATR is known", () => {
    expect(signals[12].stopLevel).toBeNull();
    // day 0 contributes a zero true range to the first full window
    expect(signals[13].stopLevel).toBeCloseTo(23 - (3 * 13) / 14, 10);
    expect(signals[19].stopLevel).toBeCloseTo(26, 10);
  });

  it("rejects series that do not match the calendar", () => {
    expect(() => computeSignals(calendar.slice(1), rising, flatBaseline, params)).toThrow(
      "UP: series length does not match the aligned calendar",
    );
  });

  it("marks a steady decline as full bear and shorts it when enabled", () => {
    const falling = aligned("DOWN", Array.from({ length: n }, (_, i) => 50 - i));
    const out = computeSignals(calendar, falling, flatBaseline, { ...params, shortAlts: true });
    expect(out[10].score).toBe(0);
    expect(out[10].rawWeight).toBe(-1);
  });
});

describe("computeBaselineStates", () => {
  it("flags bear days once both MAs are available", () => {
    const close = Array.from({ length: 10 }, (_, i) => 100 - i);
    const states = computeBaselineStates(calendarOf(10), close, 3, 7);

    expect(states[5].bear).toBe(false);
    expect(states[6].maLong).toBeCloseTo(97, 12);
    expect(states[6].maShort).toBeCloseTo(95, 12);
    expect(states[6].bear).toBe(true);
    expect(states[9].close).toBe(91);
  });
});

describe("volatility fallback stop", () => {
  const fallbackParams: StrategyParams = { ...params, stopLookback: 2, volMult: 2 };
  const close = [100, 100, 100, 110, 100, 100];

  it("uses close × (1 − volMult × σ) while the ATR is zero", () => {
    const signals = computeSignals(calendarOf(6), aligned("X", close), close.map(() => 1), fallbackParams);
    expect(signals.map((s) => s.stopLevel)).toEqual([null, null, 100, 95, 70, 85]);
  });

  it("reads σ one index back on the return series", () => {
    // returns [0, 0, 0.1, ...]: σ at index 1 is 0, at index 2 it is 0.05 (which would give 90)
    const signals = computeSignals(calendarOf(6), aligned("X", close), close.map(() => 1), fallbackParams);
    expect(signals[2].stopLevel).toBe(100);
  });
});
