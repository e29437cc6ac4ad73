/**
 * Risk-capped position sizing.
 *
 * Model: ATR stop + fixed-fractional risk. The stop sits STOP_ATR_MULT × ATR14
 * below entry; the share count is the smaller of what the risk cap allows at
 * that stop and what the position cap allows at that price.
 *
 *   stop        = price − 3 × ATR14            e.g. $100 − 3 × $2 = $94
 *   R           = price − stop                 → $6
 *   by risk     = portfolio × cap / R          → $100k × 1% / $6 ≈ 166.7
 *   by position = portfolio × min(1, cap / max(1%, R/price)) / price
 *                                              → $100k × min(1, 1% / 6%) / $100 ≈ 166.7
 *   shares      = floor(min(by risk, by position)) → 166
 */

export const DEFAULT_PORTFOLIO_VALUE = 100_000;
export const STOP_ATR_MULT = 3.0;
export const PROFIT_TARGET_R = 2.0;   // "2R" target
export const SCALE_OUT_FRACTION = 0.5; // sell half at the target, trail the rest
const MIN_STOP_FRACTION = 0.01;

export interface PositionSize {
  stopPrice: number;
  riskPerShare: number;
  maxSharesByRisk: number;
  maxSharesByPosition: number;
  recommendedShares: number;
  positionValue: number;
  positionPercent: number;     // fraction of portfolio (0–1)
  profitTarget: number;
  profitTargetPercent: number; // % gain to the target
  scaleOutShares: number;
  remainingShares: number;
  scaleOutValue: number;
  stopLossPercent: number;     // % loss to the stop
  portfolioRisk: number;       // fraction of portfolio lost at the stop
  riskRewardRatio: number;
  maxLoss: number;
  maxGain: number;
}

const ZERO_POSITION: PositionSize = {
  stopPrice: 0,
  riskPerShare: 0,
  maxSharesByRisk: 0,
  maxSharesByPosition: 0,
  recommendedShares: 0,
  positionValue: 0,
  positionPercent: 0,
  profitTarget: 0,
  profitTargetPercent: 0,
  scaleOutShares: 0,
  remainingShares: 0,
  scaleOutValue: 0,
  stopLossPercent: 0,
  portfolioRisk: 0,
  riskRewardRatio: 0,
  maxLoss: 0,
  maxGain: 0,
};

/**
 * @param currentPrice   latest close (a non-positive price yields an empty position)
 * @param atr14          14-day average true range in price units
 * @param riskCap        fraction of the portfolio risked on this name (e.g. 0.01)
 * @param portfolioValue assumed account size
 */
export function calculatePositionSize(
  currentPrice: number,
  atr14: number,
  riskCap: number,
  portfolioValue = DEFAULT_PORTFOLIO_VALUE,
): PositionSize {
  if (currentPrice <= 0 || portfolioValue <= 0) {
    return { ...ZERO_POSITION };
  }

  const stopPrice = currentPrice - STOP_ATR_MULT * atr14;
  const riskPerShare = currentPrice - stopPrice;

  // R = 0 (flat history) leaves the position cap as the only limit
  const maxSharesByRisk = riskPerShare > 0 ? (portfolioValue * riskCap) / riskPerShare : Infinity;
  const maxPositionFraction = riskCap / Math.max(MIN_STOP_FRACTION, riskPerShare / currentPrice);
  const maxSharesByPosition = (portfolioValue * Math.min(1, maxPositionFraction)) / currentPrice;
  const recommendedShares = Math.max(0, Math.floor(Math.min(maxSharesByRisk, maxSharesByPosition)));

  const positionValue = recommendedShares * currentPrice;
  const profitTarget = currentPrice + PROFIT_TARGET_R * riskPerShare;
  const scaleOutShares = Math.floor(recommendedShares * SCALE_OUT_FRACTION);
  const remainingShares = recommendedShares - scaleOutShares;

  return {
    stopPrice,
    riskPerShare,
    maxSharesByRisk,
    maxSharesByPosition,
    recommendedShares,
    positionValue,
    positionPercent: positionValue / portfolioValue,
    profitTarget,
    profitTargetPercent: (profitTarget / currentPrice - 1) * 100,
    scaleOutShares,
    remainingShares,
    scaleOutValue: scaleOutShares * profitTarget,
    stopLossPercent: (1 - stopPrice / currentPrice) * 100,
    portfolioRisk: (recommendedShares * riskPerShare) / portfolioValue,
    riskRewardRatio: riskPerShare > 0 ? (profitTarget - currentPrice) / riskPerShare : 0,
    maxLoss: recommendedShares * riskPerShare,
    maxGain: recommendedShares * (profitTarget - currentPrice),
  };
}
