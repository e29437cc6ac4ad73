import { rollingAtr, rollingMean, rollingStd, simpleReturns } from "./indicators";
import type {
  AlignedSeries,
  BaselineState,
  DailySignal,
  RawWeight,
  SignalScore,
  StrategyParams,
} from "./types";

// ── Signal Engine ────────────────────────────────────────────────────────────
//
//   Trend     close      > MA_long
//   Momentum  MA_short   > MA_long
//   RS        RS_MA_short > RS_MA_long     (RS = asset close / baseline close)
//
//   3/3                        → 1.0 raw weight
//   ≥ minSignals AND RS bull   → 0.5
//   3/3 bearish (shortAlts)    → -1.0
//   otherwise                  → 0

function greater(a: number | null, b: number | null): boolean {
  return a !== null && b !== null && a > b;
}

function less(a: number | null, b: number | null): boolean {
  return a !== null && b !== null && a < b;
}

function toScore(flags: readonly boolean[]): SignalScore {
  const n = flags.filter(Boolean).length;
  return n >= 3 ? 3 : n === 2 ? 2 : n === 1 ? 1 : 0;
}

export function rawWeightFor(
  score: SignalScore,
  rsBull: boolean,
  fullBear: boolean,
  params: Pick<StrategyParams, "minSignals" | "shortAlts">,
): RawWeight {
  if (score === 3) return 1;
  if (score >= params.minSignals && rsBull) return 0.5;
  if (params.shortAlts && fullBear) return -1;
  return 0;
}

/**
 * Per-day signals for one asset over the aligned calendar.
 *
 * Stop level is close − atrMult × ATR when ATR is known and positive. Otherwise
 * it falls back to close × (1 − volMult × σ) with σ read at index i − 1 of the
 * rolling return std; that index covers returns up to and including day i.
 */
export function computeSignals(
  calendar: readonly string[],
  asset: AlignedSeries,
  baselineClose: readonly number[],
  params: StrategyParams,
): DailySignal[] {
  const { close } = asset;
  if (close.length !== calendar.length || baselineClose.length !== calendar.length) {
    throw new Error(`${asset.name}: series length does not match the aligned calendar`);
  }

  const maShort = rollingMean(close, params.maShort);
  const maLong = rollingMean(close, params.maLong);

  const rs = close.map((c, i) => c / baselineClose[i]);
  const rsMaShort = rollingMean(rs, params.maShort);
  const rsMaLong = rollingMean(rs, params.maLong);

  const atr = rollingAtr(asset.high, asset.low, close, params.stopLookback);
  const retStd = rollingStd(simpleReturns(close), params.stopLookback);

  return calendar.map((date, i): DailySignal => {
    const trendBull = greater(close[i], maLong[i]);
    const momBull = greater(maShort[i], maLong[i]);
    const rsBull = greater(rsMaShort[i], rsMaLong[i]);
    const score = toScore([trendBull, momBull, rsBull]);

    const fullBear =
      less(close[i], maLong[i]) && less(maShort[i], maLong[i]) && less(rsMaShort[i], rsMaLong[i]);

    let stopLevel: number | null = null;
    const atrNow = atr[i];
    if (atrNow !== null && atrNow > 0) {
      stopLevel = close[i] - params.atrMult * atrNow;
    } else if (i > 0) {
      const sd = retStd[i - 1] ?? null;
      if (sd !== null) stopLevel = close[i] * (1 - params.volMult * sd);
    }

    return {
      date,
      price: close[i],
      maShort: maShort[i],
      maLong: maLong[i],
      rs: rs[i],
      rsMaShort: rsMaShort[i],
      rsMaLong: rsMaLong[i],
      trendBull,
      momBull,
      rsBull,
      score,
      rawWeight: rawWeightFor(score, rsBull, fullBear, params),
      stopLevel,
    };
  });
}

/** Baseline market regime per day; "bear" drives the optional hedge. */
export function computeBaselineStates(
  calendar: readonly string[],
  baselineClose: readonly number[],
  maShortWindow: number,
  maLongWindow: number,
): BaselineState[] {
  const maShort = rollingMean(baselineClose, maShortWindow);
  const maLong = rollingMean(baselineClose, maLongWindow);

  return calendar.map((date, i) => ({
    date,
    close: baselineClose[i],
    maShort: maShort[i],
    maLong: maLong[i],
    bear: less(baselineClose[i], maLong[i]) && less(maShort[i], maLong[i]),
  }));
}
