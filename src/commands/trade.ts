import path from "path";
import logger from "../utils/logger";
import type { TradeConfig } from "../utils/config";
import { writeJson } from "../storage/reports";
import { analyzeDirectory } from "./analyze";
import { rankStrategies } from "../analyzers/performance";
import { buildTradePlan, formatTradePlan, type TradePlan, type TradePlanInput } from "../analyzers/playbook";
import { summarizeWithFallback, type AssetMetrics, type TextInsightProvider } from "../analyzers/insights";
import type { StrategyStatistics } from "../analyzers/types";

export const DEFAULT_PLAYBOOKS_FILE = path.join("out", "playbooks.json");

export interface PlaybookEntry extends TradePlan {
  summary: string[];
}

export function assetMetricsFor(
  plan: TradePlan,
  stats: StrategyStatistics,
  strategy: TradePlanInput["strategy"],
): AssetMetrics {
  const cv = plan.computedValues;
  return {
    asset: plan.asset,
    totalReturnPercent: stats.totalReturn * 100,
    sharpeRatio: stats.sharpeRatio,
    winRatePercent: stats.winRate * 100,
    maxDrawdownPercent: stats.maxDrawdown * 100,
    tradingDays: stats.tradingDays,
    profitFactor: stats.profitFactor,
    currentPrice: cv.currentPrice,
    maLong: cv.maLong,
    maShort: cv.maShort,
    rsMaShort: cv.rsMaShort,
    rsMaLong: cv.rsMaLong,
    atr14: cv.atr14,
    volatilityPercent: cv.volatility * 100,
    maShortWindow: strategy.maShort,
    maLongWindow: strategy.maLong,
  };
}

/**
 * Plans for the top profitable strategies by total return, with the notes
 * replaced by the provider's narrative. Narratives are requested one at a time.
 */
export async function buildPlaybooks(
  config: TradeConfig,
  provider: TextInsightProvider,
  timeoutMs: number,
): Promise<TradePlan[]> {
  const analyzed = analyzeDirectory(config.signalsDir);
  const ranking = rankStrategies(analyzed.map((a) => a.stats));
  const strategy: TradePlanInput["strategy"] = {
    maShort: config.maShort,
    maLong: config.maLong,
    minSignals: config.minSignals,
    atrMult: config.atrMult,
    volMult: config.volMult,
    stopLookback: config.stopLookback,
  };

  const plans: TradePlan[] = [];
  for (const [i, stats] of ranking.byReturn.slice(0, config.top).entries()) {
    const entry = analyzed.find((a) => a.stats.asset === stats.asset);
    if (!entry) continue;

    const plan = buildTradePlan({
      asset: stats.asset,
      signals: entry.signals,
      stats,
      strategy,
      portfolioValue: config.portfolioValue,
      rank: i + 1,
    });
    if (!plan) continue;

    const notes = await summarizeWithFallback(provider, assetMetricsFor(plan, stats, strategy), timeoutMs);
    plans.push({ ...plan, notes });
  }
  return plans;
}

export async function runTrade(
  config: TradeConfig,
  provider: TextInsightProvider,
  timeoutMs: number,
): Promise<PlaybookEntry[]> {
  const plans = await buildPlaybooks(config, provider, timeoutMs);
  if (plans.length === 0) {
    logger.info("No profitable strategies; no playbooks generated.");
  }

  const entries = plans.map((plan): PlaybookEntry => {
    const summary = formatTradePlan(plan);
    logger.info(`\n${plan.asset}\n${summary.map((l) => `  - ${l}`).join("\n")}`);
    return { ...plan, summary };
  });

  const file = config.outputJson ?? DEFAULT_PLAYBOOKS_FILE;
  writeJson(file, entries);
  logger.info(`Wrote ${entries.length} playbooks → ${file}`);
  return entries;
}
