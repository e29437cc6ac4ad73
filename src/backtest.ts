/**
 * Relative-strength momentum backtest
 * ─────────────────────────────────────────────────────────────────────────────
 * Pure pipeline over in-memory series:
 *   align → per-asset signals → baseline regime → portfolio simulation → metrics
 *
 * The strategy command wraps this with CSV reading and writing; tests call it
 * directly.
 */

import { alignSeries, projectSeries, type ExcludedSeries } from "./analyzers/align";
import { computeEquityMetrics } from "./analyzers/performance";
import { simulatePortfolio } from "./analyzers/portfolio";
import { computeBaselineStates, computeSignals } from "./analyzers/signals";
import type {
  BaselineState,
  DailySignal,
  EquityMetrics,
  PortfolioState,
  PriceSeries,
  StrategyParams,
} from "./analyzers/types";

export interface BacktestOptions {
  params: StrategyParams;
  baselineName: string;
  /** short-baseline weight applied on baseline bear days; 0 disables */
  hedgeWeight: number;
}

export interface BacktestResult {
  calendar: string[];
  excluded: ExcludedSeries[];
  signals: Map<string, DailySignal[]>;
  baselineStates: BaselineState[];
  states: PortfolioState[];
  metrics: EquityMetrics;
}

/** Throws InsufficientHistoryError when the aligned calendar is too short. */
export function runBacktest(series: ReadonlyMap<string, PriceSeries>, opts: BacktestOptions): BacktestResult {
  const { params, baselineName, hedgeWeight } = opts;

  const { calendar, included, excluded } = alignSeries(series, baselineName, params.maLong);

  const baseline = series.get(baselineName);
  if (!baseline) throw new Error(`baseline ${baselineName} missing after alignment`);
  const baselineClose = projectSeries(baseline, calendar).close;

  const signals = new Map<string, DailySignal[]>();
  for (const s of included) {
    signals.set(s.name, computeSignals(calendar, projectSeries(s, calendar), baselineClose, params));
  }

  const baselineStates = computeBaselineStates(calendar, baselineClose, params.maShort, params.maLong);
  const states = simulatePortfolio(calendar, signals, baselineStates, hedgeWeight);

  return {
    calendar,
    excluded,
    signals,
    baselineStates,
    states,
    metrics: computeEquityMetrics(states),
  };
}
