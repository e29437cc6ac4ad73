// ── Rolling indicators ───────────────────────────────────────────────────────
// Every function here is a pure pass over a fixed array. Index i is null until
// the trailing window has filled (i + 1 >= w); null is never folded into 0.

export function rollingMean(x: readonly number[], w: number): (number | null)[] {
  const out: (number | null)[] = new Array<number | null>(x.length).fill(null);
  if (w <= 0) return out;

  let sum = 0;
  for (let i = 0; i < x.length; i++) {
    sum += x[i];
    if (i >= w) sum -= x[i - w];
    if (i + 1 >= w) out[i] = sum / w;
  }
  return out;
}

/** Population standard deviation over the trailing window. */
export function rollingStd(x: readonly number[], w: number): (number | null)[] {
  const out: (number | null)[] = new Array<number | null>(x.length).fill(null);
  if (w <= 0) return out;

  for (let i = w - 1; i < x.length; i++) {
    const window = x.slice(i + 1 - w, i + 1);
    const mean = window.reduce((a, b) => a + b, 0) / w;
    const variance = window.reduce((acc, v) => acc + (v - mean) ** 2, 0) / w;
    out[i] = Math.sqrt(variance);
  }
  return out;
}

export function trueRange(high: number, low: number, prevClose: number): number {
  return Math.max(Math.abs(high - low), Math.abs(high - prevClose), Math.abs(low - prevClose));
}

/**
 * True range per day. Day 0 has no previous close, so it is |high - low| (0 when
 * the bar has no range data); later days without high/low fall back to the
 * close-to-close move.
 */
export function trueRanges(
  high: readonly (number | null)[],
  low: readonly (number | null)[],
  close: readonly number[],
): number[] {
  return close.map((c, i) => {
    const h = high[i] ?? null;
    const l = low[i] ?? null;
    if (i === 0) return h !== null && l !== null ? Math.abs(h - l) : 0;
    if (h !== null && l !== null) return trueRange(h, l, close[i - 1]);
    return Math.abs(c - close[i - 1]);
  });
}

export function rollingAtr(
  high: readonly (number | null)[],
  low: readonly (number | null)[],
  close: readonly number[],
  w: number,
): (number | null)[] {
  return rollingMean(trueRanges(high, low, close), w);
}

/** r[k] = (c[k+1] - c[k]) / c[k]; one element shorter than the input. */
export function simpleReturns(close: readonly number[]): number[] {
  const out: number[] = [];
  for (let k = 0; k + 1 < close.length; k++) {
    out.push((close[k + 1] - close[k]) / close[k]);
  }
  return out;
}
