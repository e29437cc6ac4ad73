import { describe, it, expect } from "vitest";
import { simulatePortfolio } from "./portfolio";
import type { BaselineState, DailySignal, RawWeight } from "./types";

const calendar = ["2024-05-01", "2024-05-02", "2024-05-03"];

function sig(date: string, price: number, rawWeight: RawWeight, stopLevel: number | null = null): DailySignal {
  return {
    date,
    price,
    maShort: null,
    maLong: null,
    rs: 1,
    rsMaShort: null,
    rsMaLong: null,
    trendBull: false,
    momBull: false,
    rsBull: false,
    score: 0,
    rawWeight,
    stopLevel,
  };
}

function baseline(closes: number[], bear: boolean[] = closes.map(() => false)): BaselineState[] {
  return closes.map((close, i) => ({ date: calendar[i], close, maShort: null, maLong: null, bear: bear[i] }));
}

describe("simulatePortfolio", () => {
  it("starts at equity 1 with no positions", () => {
    const states = simulatePortfolio(calendar, new Map(), baseline([1, 1, 1]), 0);
    expect(states[0]).toMatchObject({ equity: 1, dailyReturn: 0, activePositionCount: 0 });
    expect(states.map((s) => s.equity)).toEqual([1, 1, 1]);
  });

  it("trades yesterday's weights normalized across longs", () => {
    const signals = new Map([
      ["A", [sig(calendar[0], 100, 1), sig(calendar[1], 110, 1), sig(calendar[2], 121, 1)]],
      ["B", [sig(calendar[0], 50, 0.5), sig(calendar[1], 50, 0), sig(calendar[2], 45, 0)]],
    ]);
    const states = simulatePortfolio(calendar, signals, baseline([1, 1, 1]), 0);

    expect(states[1].weights.A).toBeCloseTo(2 / 3, 12);
    expect(states[1].weights.B).toBeCloseTo(1 / 3, 12);
    expect(states[1].activePositionCount).toBe(2);
    expect(states[1].dailyReturn).toBeCloseTo(0.1 * (2 / 3), 12);

    expect(states[2].weights).toEqual({ A: 1 });
    expect(states[2].dailyReturn).toBeCloseTo(0.1, 12);
    expect(states[2].equity).toBeCloseTo((1 + 0.2 / 3) * 1.1, 12);
  });

  it("drops an asset whose prior stop is broken", () => {
    const signals = new Map([["A", [sig(calendar[0], 100, 1, 95), sig(calendar[1], 90, 1), sig(calendar[2], 90, 0)]]]);
    const states = simulatePortfolio(calendar, signals, baseline([1, 1, 1]), 0);
    expect(states[1].activePositionCount).toBe(0);
    expect(states[1].dailyReturn).toBe(0);
    expect(states[1].equity).toBe(1);
  });

  it("never holds shorts", () => {
    const signals = new Map([["A", [sig(calendar[0], 100, -1), sig(calendar[1], 80, -1), sig(calendar[2], 60, -1)]]]);
    const states = simulatePortfolio(calendar, signals, baseline([1, 1, 1]), 0);
    expect(states.map((s) => s.equity)).toEqual([1, 1, 1]);
  });

  it("shorts the baseline after a bear day when hedging", () => {
    const states = simulatePortfolio(calendar, new Map(), baseline([100, 90, 90], [true, false, false]), 0.3);
    expect(states[1].hedgeReturn).toBeCloseTo(0.03, 12);
    expect(states[1].equity).toBeCloseTo(1.03, 12);
    expect(states[2].hedgeReturn).toBe(0);
    expect(states[2].baselineClose).toBe(90);
  });

  it("does not compound losses on non-negative days", () => {
    const signals = new Map([["A", [sig(calendar[0], 100, 1), sig(calendar[1], 100, 1), sig(calendar[2], 105, 1)]]]);
    const equity = simulatePortfolio(calendar, signals, baseline([1, 1, 1]), 0).map((s) => s.equity);
    for (let i = 1; i < equity.length; i++) expect(equity[i]).toBeGreaterThanOrEqual(equity[i - 1]);
  });

  it("rejects mismatched inputs", () => {
    expect(simulatePortfolio([], new Map(), [], 0)).toEqual([]);
    expect(() => simulatePortfolio(calendar, new Map(), baseline([1, 1]), 0)).toThrow(
      "baseline states do not match the aligned calendar",
    );
    expect(() => simulatePortfolio(calendar, new Map([["A", [sig(calendar[0], 1, 0)]]]), baseline([1, 1, 1]), 0)).toThrow(
      "A: 1 signals for a 3-day calendar",
    );
  });
});
