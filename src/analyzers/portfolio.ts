import type { BaselineState, DailySignal, PortfolioState } from "./types";

/**
 * Close-to-close portfolio simulation.
 *
 * Day i trades on day i − 1's signal: yesterday's raw weight is the position,
 * today's close-to-close move is the P&L. A prior-day stop that today's close
 * breaks zeroes that asset for the day. Longs are normalized by raw weight to
 * sum to 1; shorts (raw −1) are never held. When yesterday's baseline state was
 * bear and hedgeWeight > 0, a short baseline position of that size is added.
 */
export function simulatePortfolio(
  calendar: readonly string[],
  perAssetSignals: ReadonlyMap<string, readonly DailySignal[]>,
  baselineStates: readonly BaselineState[],
  hedgeWeight: number,
): PortfolioState[] {
  if (calendar.length === 0) return [];
  if (baselineStates.length !== calendar.length) {
    throw new Error("baseline states do not match the aligned calendar");
  }
  for (const [name, sigs] of perAssetSignals) {
    if (sigs.length !== calendar.length) {
      throw new Error(`${name}: ${sigs.length} signals for a ${calendar.length}-day calendar`);
    }
  }

  const states: PortfolioState[] = [
    {
      date: calendar[0],
      equity: 1.0,
      dailyReturn: 0,
      hedgeReturn: 0,
      activePositionCount: 0,
      weights: {},
      baselineClose: baselineStates[0].close,
    },
  ];

  for (let i = 1; i < calendar.length; i++) {
    // ── 1–2. Yesterday's weights, minus stop-outs ──────────────────────────
    const longs: [string, number][] = [];
    for (const [name, sigs] of perAssetSignals) {
      const prev = sigs[i - 1];
      const stopped = prev.stopLevel !== null && sigs[i].price < prev.stopLevel;
      const w = stopped ? 0 : Math.max(prev.rawWeight, 0);
      if (w > 0) longs.push([name, w]);
    }

    // ── 3. Normalize across longs only ─────────────────────────────────────
    const longSum = longs.reduce((acc, [, w]) => acc + w, 0);
    const weights: Record<string, number> = {};
    if (longSum > 0) {
      for (const [name, w] of longs) weights[name] = w / longSum;
    }

    // ── 4. Baseline hedge ──────────────────────────────────────────────────
    let hedgeReturn = 0;
    if (hedgeWeight > 0 && baselineStates[i - 1].bear) {
      const prevClose = baselineStates[i - 1].close;
      const baselineReturn = (baselineStates[i].close - prevClose) / prevClose;
      hedgeReturn = -hedgeWeight * baselineReturn;
    }

    // ── 5. Portfolio return + compounding ──────────────────────────────────
    let dailyReturn = hedgeReturn;
    for (const [name, w] of Object.entries(weights)) {
      const sigs = perAssetSignals.get(name);
      if (!sigs) continue;
      const r = (sigs[i].price - sigs[i - 1].price) / sigs[i - 1].price;
      dailyReturn += w * r;
    }

    states.push({
      date: calendar[i],
      equity: states[i - 1].equity * (1 + dailyReturn),
      dailyReturn,
      hedgeReturn,
      activePositionCount: Object.keys(weights).length,
      weights,
      baselineClose: baselineStates[i].close,
    });
  }

  return states;
}
