import type { DailySignal, EquityMetrics, PortfolioState, StrategyStatistics } from "./types";

const TRADING_EPSILON = 1e-6;
const DAYS_PER_YEAR = 365.25;

// ── Return helpers ───────────────────────────────────────────────────────────

export interface ReturnSummary {
  winRate: number;
  avgWin: number;
  avgLoss: number;
  /** +Infinity when there are no losing returns */
  profitFactor: number;
  /** mean / sample stdev; 0 when fewer than 2 returns or zero variance */
  sharpeRatio: number;
}

const mean = (xs: readonly number[]): number =>
  xs.length === 0 ? 0 : xs.reduce((a, b) => a + b, 0) / xs.length;

function sampleStd(xs: readonly number[]): number {
  if (xs.length <= 1) return 0;
  const m = mean(xs);
  return Math.sqrt(xs.reduce((acc, x) => acc + (x - m) ** 2, 0) / (xs.length - 1));
}

export function summarizeReturns(returns: readonly number[]): ReturnSummary {
  const wins = returns.filter((r) => r > 0);
  const losses = returns.filter((r) => r < 0);

  const totalWins = wins.reduce((a, b) => a + b, 0);
  const totalLosses = Math.abs(losses.reduce((a, b) => a + b, 0));
  const sd = sampleStd(returns);

  return {
    winRate: returns.length === 0 ? 0 : wins.length / returns.length,
    avgWin: mean(wins),
    avgLoss: mean(losses),
    profitFactor: totalLosses === 0 ? Infinity : totalWins / totalLosses,
    sharpeRatio: sd === 0 ? 0 : mean(returns) / sd,
  };
}

/** Largest peak-to-trough fractional decline along the path (running max). */
export function maxDrawdown(path: readonly number[]): number {
  let peak = -Infinity;
  let mdd = 0;
  for (const v of path) {
    if (v > peak) peak = v;
    const dd = (peak - v) / peak;
    if (dd > mdd) mdd = dd;
  }
  return mdd;
}

// ── Per-asset strategy statistics ────────────────────────────────────────────

/**
 * Score one asset's signal history. Only days with a non-zero raw weight count;
 * each such day's return is measured against the series' first price and
 * compounded into the cumulative path.
 */
export function analyzeSignals(asset: string, signals: readonly DailySignal[]): StrategyStatistics {
  const base = signals.length > 0 ? signals[0].price : 0;
  const returns: number[] = [];
  const path: number[] = [1.0];
  let cumulative = 1.0;

  for (const s of signals) {
    if (Math.abs(s.rawWeight) <= TRADING_EPSILON || base === 0) continue;
    const r = (s.rawWeight * (s.price - base)) / base;
    cumulative *= 1 + r;
    returns.push(r);
    path.push(cumulative);
  }

  const summary = summarizeReturns(returns);

  return {
    asset,
    totalDays: signals.length,
    tradingDays: returns.length,
    totalReturn: cumulative - 1,
    maxReturn: returns.reduce((acc, r) => Math.max(acc, r), 0),
    minReturn: returns.reduce((acc, r) => Math.min(acc, r), 0),
    winRate: summary.winRate,
    avgWin: summary.avgWin,
    avgLoss: summary.avgLoss,
    profitFactor: summary.profitFactor,
    maxDrawdown: maxDrawdown(path),
    sharpeRatio: summary.sharpeRatio,
  };
}

export function isProfitable(s: StrategyStatistics): boolean {
  return s.totalReturn > 0 && s.winRate > 0.5 && s.profitFactor > 1.0;
}

// ── Ranking ──────────────────────────────────────────────────────────────────

export interface StrategyRanking {
  total: number;
  profitable: StrategyStatistics[];
  byReturn: StrategyStatistics[];
  bySharpe: StrategyStatistics[];
  avgReturn: number;
  avgWinRate: number;
  avgSharpe: number;
}

/** Profitable strategies, sorted (stable) by total return and by Sharpe. */
export function rankStrategies(all: readonly StrategyStatistics[]): StrategyRanking {
  const profitable = all.filter(isProfitable);
  return {
    total: all.length,
    profitable,
    byReturn: [...profitable].sort((a, b) => b.totalReturn - a.totalReturn),
    bySharpe: [...profitable].sort((a, b) => b.sharpeRatio - a.sharpeRatio),
    avgReturn: mean(profitable.map((s) => s.totalReturn)),
    avgWinRate: mean(profitable.map((s) => s.winRate)),
    avgSharpe: mean(profitable.map((s) => s.sharpeRatio)),
  };
}

// ── Portfolio equity metrics ─────────────────────────────────────────────────

export function computeEquityMetrics(states: readonly PortfolioState[]): EquityMetrics {
  const days = Math.max(states.length, 1);
  const finalEquity = states.length > 0 ? states[states.length - 1].equity : 1;
  const years = days / DAYS_PER_YEAR;

  // flat (all-cash) days are not counted
  const rets = states.map((s) => s.dailyReturn).filter((r) => Number.isFinite(r) && r !== 0);
  const sd = sampleStd(rets);

  return {
    days,
    totalReturn: finalEquity - 1,
    cagr: years > 0 ? finalEquity ** (1 / years) - 1 : 0,
    sharpeAnnualized: sd > 0 ? (mean(rets) / sd) * Math.sqrt(DAYS_PER_YEAR) : 0,
    maxDrawdown: maxDrawdown(states.map((s) => s.equity)),
    winRate: rets.length > 0 ? rets.filter((r) => r > 0).length / rets.length : 0,
  };
}
