import { calculatePositionSize, DEFAULT_PORTFOLIO_VALUE, STOP_ATR_MULT } from "../utils/finance";
import type { DailySignal, StrategyParams, StrategyStatistics } from "./types";

// ── Constants ────────────────────────────────────────────────────────────────

const ATR_PERIOD = 14;
const VOL_PERIOD = 14;
const TRADING_DAYS_PER_YEAR = 252;

const BASE_RISK_CAP = 0.010;
const MIN_RISK_CAP = 0.002;
const MAX_RISK_CAP = 0.025;
const INITIAL_RISK_CAP = 0.01;

// ── Types ────────────────────────────────────────────────────────────────────

/** Latest-bar view of an asset used for sizing and the risk-cap factors. */
export interface MarketSnapshot {
  currentPrice: number;
  maLong: number;
  maShort: number;
  rsMaShort: number;
  rsMaLong: number;
  /** close-to-close average true range */
  atr14: number;
  /** annualized, as a fraction (0.45 = 45%) */
  volatility: number;
}

export interface Conviction {
  high: number;   // 3/3 signals
  medium: number; // partial signals
  rationale: string;
}

export interface ExecutionMode {
  signalAtClose: boolean;
  pullbackToMa: boolean;
  extendedThreshold: number;
  limitOrderDurationHours: 24 | 48 | 72;
  confidence: number;
}

export interface ComputedValues extends MarketSnapshot {
  trendSignal: boolean;
  momentumSignal: boolean;
  rsSignal: boolean;
  allSignals: boolean;
  partialSignals: boolean;
  signalStrength: 0 | 0.5 | 1;

  stopPrice: number;
  riskPerShare: number;
  maxSharesByRisk: number;
  maxSharesByPosition: number;
  recommendedShares: number;
  positionValue: number;
  positionPercent: number;

  profitTarget: number;
  profitTargetPercent: number;
  scaleOutShares: number;
  remainingShares: number;
  scaleOutValue: number;

  initialStop: number;
  stopLossPercent: number;
  trailingStop: number;
  stopDistanceAtr: number;

  portfolioRisk: number;
  riskRewardRatio: number;
  maxLoss: number;
  maxGain: number;

  isExtended: boolean;
  pullbackPrice: number;
  extendedPercent: number;
}

export interface TradePlan {
  readonly asset: string;
  readonly rank: number;
  readonly entryRules: {
    primary: string;
    alternative: string;
    signalConditions: {
      trend: string;
      momentum: string;
      rs: string;
      fullWeight: string;
      halfWeight: string;
    };
  };
  readonly exitRules: {
    profitTaking: string;
    stopLoss: string;
    trailingStop: string;
    hardExit: string;
  };
  readonly positionSizing: {
    fullWeight: 1;
    halfWeight: 0.5;
    /** percent of equity, e.g. 1.1 */
    riskCapPercent: number;
    riskCalculation: string;
  };
  readonly conviction: Conviction;
  readonly backtestStats: {
    totalReturnPercent: number;
    sharpeRatio: number;
    winRatePercent: number;
    maxDrawdownPercent: number;
    tradingDays: number;
    expectedReturn: string;
  };
  readonly executionMode: ExecutionMode;
  readonly computedValues: ComputedValues;
  readonly notes: string;
}

export interface TradePlanInput {
  asset: string;
  signals: readonly DailySignal[];
  stats: StrategyStatistics;
  strategy: Pick<StrategyParams, "maShort" | "maLong" | "minSignals" | "atrMult" | "volMult" | "stopLookback">;
  portfolioValue?: number;
  rank: number;
}

// ── Market snapshot ──────────────────────────────────────────────────────────

/** Mean of the last `period` close-to-close ranges (all of them when fewer). */
export function closeToCloseAtr(signals: readonly DailySignal[], period = ATR_PERIOD): number {
  if (signals.length < 2) return 0;
  const ranges: number[] = [];
  for (let i = 1; i < signals.length; i++) {
    ranges.push(Math.abs(signals[i].price - signals[i - 1].price));
  }
  const recent = ranges.slice(-period);
  return recent.reduce((a, b) => a + b, 0) / recent.length;
}

/** Annualized (√252) population std of the last `period` log returns; 0 below `period`. */
export function annualizedVolatility(signals: readonly DailySignal[], period = VOL_PERIOD): number {
  if (signals.length < 2) return 0;
  const logReturns: number[] = [];
  for (let i = 1; i < signals.length; i++) {
    logReturns.push(Math.log(signals[i].price / signals[i - 1].price));
  }
  if (logReturns.length < period) return 0;

  const recent = logReturns.slice(-period);
  const mean = recent.reduce((a, b) => a + b, 0) / period;
  const variance = recent.reduce((acc, r) => acc + (r - mean) ** 2, 0) / period;
  return Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

export function marketSnapshot(signals: readonly DailySignal[]): MarketSnapshot | null {
  if (signals.length === 0) return null;
  const latest = signals[signals.length - 1];
  const price = latest.price;

  return {
    currentPrice: price,
    maLong: latest.maLong ?? price,
    maShort: latest.maShort ?? price,
    rsMaShort: latest.rsMaShort ?? 1.0,
    rsMaLong: latest.rsMaLong ?? 1.0,
    atr14: closeToCloseAtr(signals),
    volatility: annualizedVolatility(signals),
  };
}

// ── Risk cap (10 factors, geometric mean) ────────────────────────────────────

type Tier = readonly [threshold: number, multiplier: number];

/** First tier whose threshold the value reaches (≥) wins. */
function tierAtLeast(value: number, tiers: readonly Tier[], fallback: number): number {
  for (const [threshold, mult] of tiers) if (value >= threshold) return mult;
  return fallback;
}

/** First tier whose threshold the value stays within (≤) wins. */
function tierAtMost(value: number, tiers: readonly Tier[], fallback: number): number {
  for (const [threshold, mult] of tiers) if (value <= threshold) return mult;
  return fallback;
}

export function riskCapFactors(stats: StrategyStatistics, snap: MarketSnapshot): number[] {
  const rsSpread = Math.abs(snap.rsMaShort - snap.rsMaLong);
  const extension = snap.maLong > 0 ? snap.currentPrice / snap.maLong : 1;
  const atrRisk = snap.currentPrice > 0 ? snap.atr14 / snap.currentPrice : 0;

  return [
    tierAtLeast(stats.sharpeRatio, [[3, 1.5], [2, 1.3], [1.5, 1.1], [1, 1.0], [0.5, 0.8]], 0.6),
    tierAtMost(stats.maxDrawdown, [[0.02, 1.2], [0.05, 1.0], [0.10, 0.8], [0.20, 0.6]], 0.4),
    tierAtLeast(stats.winRate, [[0.80, 1.2], [0.70, 1.1], [0.60, 1.0], [0.50, 0.9]], 0.7),
    tierAtMost(snap.volatility * 100, [[20, 1.1], [40, 1.0], [60, 0.9], [80, 0.8]], 0.6),
    tierAtMost(stats.totalReturn * 100, [[10, 1.1], [50, 1.0], [200, 0.9], [1000, 0.8]], 0.6),
    tierAtLeast(stats.tradingDays, [[20, 1.1], [15, 1.0], [10, 0.9], [5, 0.8]], 0.7),
    tierAtLeast(stats.profitFactor, [[5, 1.2], [3, 1.1], [2, 1.0], [1.5, 0.9], [1, 0.8]], 0.6),
    tierAtLeast(rsSpread, [[0.1, 1.1], [0.05, 1.0], [0.02, 0.9]], 0.8),
    tierAtMost(extension, [[1.05, 1.1], [1.10, 1.0], [1.20, 0.9], [1.30, 0.8]], 0.6),
    tierAtMost(atrRisk, [[0.02, 1.1], [0.05, 1.0], [0.10, 0.9], [0.15, 0.8]], 0.6),
  ];
}

/** Fraction of equity to risk on one name, in [0.002, 0.025] at 0.1% steps. */
export function determineRiskCap(stats: StrategyStatistics, snap: MarketSnapshot): number {
  const factors = riskCapFactors(stats, snap);
  const geoMean = Math.exp(factors.reduce((acc, f) => acc + Math.log(f), 0) / factors.length);
  const cap = Math.min(MAX_RISK_CAP, Math.max(MIN_RISK_CAP, BASE_RISK_CAP * geoMean));
  return Math.round(cap * 1000) / 1000;
}

// ── Conviction & execution ───────────────────────────────────────────────────

export function determineConviction(stats: StrategyStatistics): Conviction {
  const { sharpeRatio: sharpe, winRate: win, maxDrawdown: dd } = stats;

  if (sharpe >= 4 && win >= 0.95 && dd <= 0.01) {
    return { high: 0.95, medium: 0.80, rationale: "Very high conviction: exceptional Sharpe with a clean equity path" };
  }
  if (sharpe >= 2 && win >= 0.90 && dd <= 0.05) {
    return { high: 0.90, medium: 0.75, rationale: "High conviction: strong risk-adjusted returns" };
  }
  if (sharpe >= 1.5 && win >= 0.85 && dd <= 0.10) {
    return { high: 0.85, medium: 0.70, rationale: "High conviction: good returns with contained drawdown" };
  }
  if (sharpe >= 1 && win >= 0.80) {
    return { high: 0.80, medium: 0.65, rationale: "Medium-high conviction: acceptable risk profile" };
  }
  if (sharpe >= 0.5 && win >= 0.70) {
    return { high: 0.75, medium: 0.60, rationale: "Medium conviction: moderate risk" };
  }
  return { high: 0.70, medium: 0.55, rationale: "Lower conviction: weak risk-adjusted history" };
}

export function determineExecutionMode(stats: StrategyStatistics): ExecutionMode {
  const factors = [
    stats.sharpeRatio >= 2 ? 1.0 : 0.5,
    tierAtLeast(stats.winRate, [[0.8, 1.0], [0.6, 0.8]], 0.4),
    tierAtMost(stats.maxDrawdown, [[0.05, 1.0], [0.15, 0.7]], 0.3),
    tierAtLeast(stats.tradingDays, [[15, 1.0], [10, 0.8]], 0.5),
    tierAtLeast(stats.profitFactor, [[3, 1.0], [2, 0.8]], 0.5),
  ];
  const confidence = factors.reduce((a, b) => a + b, 0) / factors.length;

  let extendedThreshold = 0.05;
  if (stats.maxDrawdown <= 0.05 && stats.sharpeRatio >= 1.5) extendedThreshold = 0.15;
  else if (stats.maxDrawdown <= 0.10 && stats.sharpeRatio >= 1) extendedThreshold = 0.10;

  return {
    signalAtClose: true,
    pullbackToMa: confidence >= 0.7,
    extendedThreshold,
    limitOrderDurationHours: confidence >= 0.8 ? 72 : confidence >= 0.6 ? 48 : 24,
    confidence,
  };
}

// ── Computed values ──────────────────────────────────────────────────────────

function computeValues(
  snap: MarketSnapshot,
  mode: ExecutionMode,
  riskCap: number,
  portfolioValue: number,
  minSignals: number,
): ComputedValues {
  const { currentPrice, maLong, maShort, rsMaShort, rsMaLong, atr14 } = snap;

  const trendSignal = currentPrice > maLong;
  const momentumSignal = maShort > maLong;
  const rsSignal = rsMaShort > rsMaLong;
  const score = [trendSignal, momentumSignal, rsSignal].filter(Boolean).length;
  const allSignals = score === 3;
  const partialSignals = rsSignal && score >= minSignals && score < 3;

  const size = calculatePositionSize(currentPrice, atr14, riskCap, portfolioValue);
  const isExtended = currentPrice > maLong * (1 + mode.extendedThreshold);

  return {
    ...snap,
    trendSignal,
    momentumSignal,
    rsSignal,
    allSignals,
    partialSignals,
    signalStrength: allSignals ? 1 : partialSignals ? 0.5 : 0,

    stopPrice: size.stopPrice,
    riskPerShare: size.riskPerShare,
    maxSharesByRisk: size.maxSharesByRisk,
    maxSharesByPosition: size.maxSharesByPosition,
    recommendedShares: size.recommendedShares,
    positionValue: size.positionValue,
    positionPercent: size.positionPercent,

    profitTarget: size.profitTarget,
    profitTargetPercent: size.profitTargetPercent,
    scaleOutShares: size.scaleOutShares,
    remainingShares: size.remainingShares,
    scaleOutValue: size.scaleOutValue,

    initialStop: size.stopPrice,
    stopLossPercent: size.stopLossPercent,
    trailingStop: size.stopPrice,
    stopDistanceAtr: STOP_ATR_MULT,

    portfolioRisk: size.portfolioRisk,
    riskRewardRatio: size.riskRewardRatio,
    maxLoss: size.maxLoss,
    maxGain: size.maxGain,

    isExtended,
    pullbackPrice: maLong,
    extendedPercent: isExtended && maLong > 0 ? (currentPrice / maLong - 1) * 100 : 0,
  };
}

// ── Notes ────────────────────────────────────────────────────────────────────

/** Rule-based notes used when no narrative provider is configured. */
export function assetNotes(stats: StrategyStatistics): string {
  const notes: string[] = [];
  if (stats.totalReturn > 10) notes.push("High-momentum outlier; widen slippage buffer and enforce risk caps");
  if (stats.sharpeRatio > 4) notes.push("Best risk-adjusted name in the strategy set");
  if (stats.maxDrawdown > 0.05) notes.push("Higher volatility; consider earlier partials to reduce giveback");
  return notes.length > 0 ? notes.join("; ") : "Standard execution with risk management";
}

// ── Trade plan ───────────────────────────────────────────────────────────────

const pct = (x: number, digits = 2): string => (x * 100).toFixed(digits);

/**
 * Build the playbook for one analyzed asset. Sizing runs twice: once at a 1%
 * cap to get the snapshot-derived values, then at the cap those values imply.
 * Returns null for an empty signal history.
 */
export function buildTradePlan(input: TradePlanInput): TradePlan | null {
  const { asset, signals, stats, strategy, rank } = input;
  const portfolioValue = input.portfolioValue ?? DEFAULT_PORTFOLIO_VALUE;

  const snap = marketSnapshot(signals);
  if (!snap) return null;

  const conviction = determineConviction(stats);
  const mode = determineExecutionMode(stats);

  const initial = computeValues(snap, mode, INITIAL_RISK_CAP, portfolioValue, strategy.minSignals);
  const riskCap = determineRiskCap(stats, initial);
  const cv = computeValues(snap, mode, riskCap, portfolioValue, strategy.minSignals);

  const maS = `MA${strategy.maShort}`;
  const maL = `MA${strategy.maLong}`;
  const stopText =
    `Initial stop: close − ${strategy.atrMult.toFixed(1)} × ATR${strategy.stopLookback} ` +
    `(fallback: close × (1 − ${strategy.volMult} × rolling_std${strategy.stopLookback}))`;

  return {
    asset,
    rank,
    entryRules: {
      primary:
        "Go long EOD when 3/3 signals (trend + momentum + RS). " +
        (mode.pullbackToMa
          ? `Alt entry: limit buy at ${maL} if price is extended (>${pct(mode.extendedThreshold, 0)}% above ${maL}) on signal day.`
          : "Use signal-at-close execution only."),
      alternative: mode.pullbackToMa
        ? `Staggered entry: 50% at signal close, 50% at ${maL} limit if extended.`
        : "Market-on-close entry preferred.",
      signalConditions: {
        trend: `close > ${maL}`,
        momentum: `${maS} > ${maL}`,
        rs: `RS_${maS} > RS_${maL}`,
        fullWeight: "3/3 signals = 1.00 raw weight",
        halfWeight: `≥${strategy.minSignals}/3 AND RS bullish = 0.50 raw weight`,
      },
    },
    exitRules: {
      profitTaking: "Scale 50% at +2R (R = initial risk from entry to stop), then trail the rest",
      stopLoss: stopText,
      trailingStop: `Ratchet stop to max(prior stop, close − ${strategy.atrMult.toFixed(1)} × ATR${strategy.stopLookback}) each day`,
      hardExit: `Hard exit if close < ${maL} or RS flips bearish (RS_${maS} < RS_${maL})`,
    },
    positionSizing: {
      fullWeight: 1,
      halfWeight: 0.5,
      riskCapPercent: parseFloat((riskCap * 100).toFixed(1)),
      riskCalculation:
        `R = entry − stop; units = min(position cap / entry, (${pct(riskCap, 1)}% × portfolio) / R). ` +
        `Risk per share: $${cv.riskPerShare.toFixed(2)}, max by risk: ${cv.maxSharesByRisk.toFixed(0)}, ` +
        `max by position: ${cv.maxSharesByPosition.toFixed(0)}, recommended: ${cv.recommendedShares}`,
    },
    conviction,
    backtestStats: {
      totalReturnPercent: stats.totalReturn * 100,
      sharpeRatio: stats.sharpeRatio,
      winRatePercent: stats.winRate * 100,
      maxDrawdownPercent: stats.maxDrawdown * 100,
      tradingDays: stats.tradingDays,
      expectedReturn:
        `${stats.totalReturn >= 0 ? "+" : ""}${pct(stats.totalReturn)}%, Sharpe ${stats.sharpeRatio.toFixed(2)}, ` +
        `Win ${pct(stats.winRate, 1)}%, MaxDD ${pct(stats.maxDrawdown)}%, ${stats.tradingDays} days`,
    },
    executionMode: mode,
    computedValues: cv,
    notes: assetNotes(stats),
  };
}

/** Human-readable bullet lines for one plan. */
export function formatTradePlan(plan: TradePlan): string[] {
  return [
    `Rank: ${plan.rank}`,
    `Entry (primary): ${plan.entryRules.primary}`,
    `Alt entry: ${plan.entryRules.alternative}`,
    `Exit: ${plan.exitRules.profitTaking}`,
    `Stop: ${plan.exitRules.stopLoss}`,
    `Size: Full (3/3) or Half (partial + RS). Cap single-name risk at ${plan.positionSizing.riskCapPercent.toFixed(1)}% of equity.`,
    `Conviction: High (${pct(plan.conviction.high, 0)}%) on 3/3; Medium (${pct(plan.conviction.medium, 0)}%) on partial.`,
    `Expected: ${plan.backtestStats.expectedReturn}`,
    `Notes: ${plan.notes}`,
  ];
}

// ── Portfolio playbook ───────────────────────────────────────────────────────

export interface PortfolioPosition {
  rank: number;
  asset: string;
  currentPrice: number;
  maLong: number;
  maShort: number;
  rsMaShort: number;
  rsMaLong: number;
  atr14: number;
  signalStrength: number;
  position: { shares: number; value: number; percentOfPortfolio: number };
  riskManagement: { stopPrice: number; riskPerShare: number; totalRisk: number; riskPercent: number };
  profitTaking: { targetPrice: number; targetPercent: number; scaleOutShares: number; remainingShares: number };
  execution: { isExtended: boolean; pullbackPrice: number; extendedPercent: number };
}

export interface PortfolioPlaybook {
  timestamp: string;
  portfolioValue: number;
  riskCapPercent: number;
  activePositions: number;
  totalPositionValue: number;
  totalRisk: number;
  portfolioUtilization: number;
  totalRiskPercent: number;
  positions: PortfolioPosition[];
}

/**
 * Size every plan with all three signals active at a flat portfolio-level
 * risk cap (percent). Position value is pv × cap / (R / price).
 */
export function buildPortfolioPlaybook(
  plans: readonly TradePlan[],
  portfolioValue: number,
  riskCapPercent: number,
  now: Date = new Date(),
): PortfolioPlaybook {
  const active = plans.filter((p) => p.computedValues.allSignals);
  let totalPositionValue = 0;
  let totalRisk = 0;

  const positions = active.map((plan, i): PortfolioPosition => {
    const cv = plan.computedValues;
    const stopFraction = cv.currentPrice > 0 ? cv.riskPerShare / cv.currentPrice : 0;
    const targetValue = stopFraction > 0 ? (portfolioValue * riskCapPercent) / 100 / stopFraction : 0;
    const shares = cv.currentPrice > 0 ? Math.floor(targetValue / cv.currentPrice) : 0;
    const value = shares * cv.currentPrice;
    const risk = shares * cv.riskPerShare;

    totalPositionValue += value;
    totalRisk += risk;

    return {
      rank: i + 1,
      asset: plan.asset,
      currentPrice: cv.currentPrice,
      maLong: cv.maLong,
      maShort: cv.maShort,
      rsMaShort: cv.rsMaShort,
      rsMaLong: cv.rsMaLong,
      atr14: cv.atr14,
      signalStrength: cv.signalStrength,
      position: { shares, value, percentOfPortfolio: (value / portfolioValue) * 100 },
      riskManagement: {
        stopPrice: cv.stopPrice,
        riskPerShare: cv.riskPerShare,
        totalRisk: risk,
        riskPercent: (risk / portfolioValue) * 100,
      },
      profitTaking: {
        targetPrice: cv.profitTarget,
        targetPercent: cv.profitTargetPercent,
        scaleOutShares: cv.scaleOutShares,
        remainingShares: cv.remainingShares,
      },
      execution: {
        isExtended: cv.isExtended,
        pullbackPrice: cv.pullbackPrice,
        extendedPercent: cv.extendedPercent,
      },
    };
  });

  return {
    timestamp: now.toISOString(),
    portfolioValue,
    riskCapPercent,
    activePositions: positions.length,
    totalPositionValue,
    totalRisk,
    portfolioUtilization: (totalPositionValue / portfolioValue) * 100,
    totalRiskPercent: (totalRisk / portfolioValue) * 100,
    positions,
  };
}
