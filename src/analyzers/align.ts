import { InsufficientHistoryError } from "../utils/errors";
import type { AlignedSeries, PriceSeries } from "./types";

export interface ExcludedSeries {
  name: string;
  rows: number;
  required: number;
}

export interface AlignmentResult {
  calendar: string[];
  /** asset series that took part in the intersection (baseline not included) */
  included: PriceSeries[];
  excluded: ExcludedSeries[];
}

/** Minimum history: the long MA needs to fill plus a short tail of usable days. */
export function minRequiredDays(maLong: number): number {
  return maLong + 10;
}

/** Sorted dates present in every series. */
export function intersectDates(series: readonly PriceSeries[]): string[] {
  if (series.length === 0) return [];

  let common = new Set(series[0].bars.map((b) => b.date));
  for (const s of series.slice(1)) {
    const dates = new Set(s.bars.map((b) => b.date));
    common = new Set([...common].filter((d) => dates.has(d)));
  }
  return [...common].sort();
}

/**
 * Build the shared trading calendar for the baseline plus every asset.
 *
 * Assets with fewer than maLong + 10 raw rows are dropped before intersecting.
 * Throws InsufficientHistoryError when the intersection itself is too short.
 */
export function alignSeries(
  series: ReadonlyMap<string, PriceSeries>,
  baselineName: string,
  maLong: number,
): AlignmentResult {
  const required = minRequiredDays(maLong);
  const baseline = series.get(baselineName);
  if (!baseline) {
    throw new InsufficientHistoryError(required, 0, null, null, [baselineName]);
  }

  const included: PriceSeries[] = [];
  const excluded: ExcludedSeries[] = [];
  for (const [name, s] of series) {
    if (name === baselineName) continue;
    if (s.bars.length >= required) included.push(s);
    else excluded.push({ name, rows: s.bars.length, required });
  }

  const calendar = intersectDates([baseline, ...included]);
  if (calendar.length < required) {
    throw new InsufficientHistoryError(
      required,
      calendar.length,
      calendar[0] ?? null,
      calendar[calendar.length - 1] ?? null,
      [baselineName, ...included.map((s) => s.name)],
    );
  }

  return { calendar, included, excluded };
}

/** Project a series onto the calendar. Every calendar date must exist in the series. */
export function projectSeries(series: PriceSeries, calendar: readonly string[]): AlignedSeries {
  const byDate = new Map(series.bars.map((b) => [b.date, b]));
  const close: number[] = [];
  const high: (number | null)[] = [];
  const low: (number | null)[] = [];

  for (const date of calendar) {
    const bar = byDate.get(date);
    if (!bar) throw new Error(`${series.name} has no bar on calendar date ${date}`);
    close.push(bar.close);
    high.push(bar.high ?? null);
    low.push(bar.low ?? null);
  }
  return { name: series.name, close, high, low };
}
