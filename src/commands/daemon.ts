import path from "path";
import logger from "../utils/logger";
import { delay } from "../utils/async";
import { errorMessage } from "../utils/errors";
import {
  OhlcConfigSchema,
  StrategyConfigSchema,
  TradeConfigSchema,
  type DaemonConfig,
  type Env,
} from "../utils/config";
import { writeFileAtomic } from "../storage/csv";
import { formatPortfolioSummary, writeJson } from "../storage/reports";
import { buildPortfolioPlaybook } from "../analyzers/playbook";
import { summarizePortfolioWithFallback, type PortfolioOverview, type TextInsightProvider } from "../analyzers/insights";
import type { StrategyRanking } from "../analyzers/performance";
import { createOhlcSource, runOhlc } from "./ohlc";
import { runStrategy } from "./strategy";
import { runAnalyze } from "./analyze";
import { runTrade } from "./trade";

/** One daemon cycle, step by step. Tests swap these for stubs. */
export interface DaemonSteps {
  fetch(): Promise<void>;
  strategy(): Promise<void>;
  analyze(): Promise<StrategyRanking>;
  playbooks(): Promise<void>;
  summary(ranking: StrategyRanking): Promise<void>;
}

export interface DaemonReport {
  cycles: number;
  completed: number;
  failed: number;
}

export function portfolioOverview(r: StrategyRanking): PortfolioOverview {
  return {
    totalStrategies: r.total,
    profitableStrategies: r.profitable.length,
    avgReturnPercent: r.avgReturn * 100,
    avgSharpe: r.avgSharpe,
    avgWinRatePercent: r.avgWinRate * 100,
    topPerformers: r.byReturn.slice(0, 5).map((s) => ({ asset: s.asset, returnPercent: s.totalReturn * 100 })),
  };
}

async function step<T>(label: string, fn: () => Promise<T>): Promise<T> {
  logger.info(label);
  try {
    return await fn();
  } catch (err) {
    logger.error(`${label} failed: ${errorMessage(err)}`);
    throw err;
  }
}

async function runCycle(steps: DaemonSteps): Promise<void> {
  await step("1. Fetching latest OHLC data", () => steps.fetch());
  await step("2. Generating strategy signals", () => steps.strategy());
  const ranking = await step("3. Analyzing profitable strategies", () => steps.analyze());
  await step("4. Generating trading playbooks", () => steps.playbooks());
  await step("5. Generating portfolio summary", () => steps.summary(ranking));
}

/**
 * Run cycles until done. A single run rethrows the first failed step; in
 * continuous mode a failure skips the rest of that cycle and the loop sleeps
 * until the next one.
 */
export async function runDaemon(
  config: DaemonConfig,
  steps: DaemonSteps,
  sleep: (ms: number) => Promise<void> = delay,
): Promise<DaemonReport> {
  logger.info(
    `Starting daemon: portfolio $${config.portfolioValue.toFixed(0)}, risk cap ${config.riskCapPercent.toFixed(1)}%, ` +
      `every ${config.checkIntervalMinutes} min, continuous=${config.continuous}`,
  );

  const report: DaemonReport = { cycles: 0, completed: 0, failed: 0 };
  const intervalMs = config.checkIntervalMinutes * 60_000;

  for (;;) {
    report.cycles++;
    const started = Date.now();
    logger.info(`=== DAEMON CYCLE #${report.cycles} - ${new Date(started).toISOString()} ===`);

    try {
      await runCycle(steps);
      report.completed++;
      logger.info(`Cycle completed in ${((Date.now() - started) / 1000).toFixed(1)}s`);
    } catch (err) {
      if (!config.continuous) throw err;
      report.failed++;
      logger.warn(`Skipping this cycle, will retry in ${config.checkIntervalMinutes} minutes`);
    }

    if (!config.continuous) break;
    if (config.maxCycles !== undefined && report.cycles >= config.maxCycles) break;

    logger.info(`Next run at ${new Date(started + intervalMs).toISOString()}`);
    await sleep(intervalMs);
  }

  return report;
}

// ── Production steps ─────────────────────────────────────────────────────────

export function defaultDaemonSteps(config: DaemonConfig, env: Env, provider: TextInsightProvider): DaemonSteps {
  const signalsDir = path.join(config.outDir, "signals");
  const timeoutMs = env.INSIGHTS_TIMEOUT_MS;

  return {
    async fetch() {
      const ohlc = OhlcConfigSchema.parse({ outDir: config.outDir, resume: true });
      await runOhlc(ohlc, createOhlcSource(ohlc, env));
    },

    async strategy() {
      runStrategy(StrategyConfigSchema.parse({ dataDir: config.outDir, outDir: signalsDir, btcHedge: 0 }));
    },

    async analyze() {
      return runAnalyze(signalsDir);
    },

    async playbooks() {
      const plans = await runTrade(
        TradeConfigSchema.parse({
          signalsDir,
          outputJson: path.join(config.outDir, "current_playbooks.json"),
          portfolioValue: config.portfolioValue,
        }),
        provider,
        timeoutMs,
      );

      const playbook = buildPortfolioPlaybook(plans, config.portfolioValue, config.riskCapPercent);
      if (playbook.activePositions === 0) {
        logger.warn("No assets with active signals found");
        return;
      }
      writeJson(path.join(config.outDir, "portfolio_playbook.json"), playbook);
      logger.info(
        `Portfolio: ${playbook.activePositions} positions, ` +
          `$${playbook.totalPositionValue.toFixed(0)} (${playbook.portfolioUtilization.toFixed(1)}% of portfolio), ` +
          `risk $${playbook.totalRisk.toFixed(0)} (${playbook.totalRiskPercent.toFixed(1)}%)`,
      );
    },

    async summary(ranking) {
      const narrative = await summarizePortfolioWithFallback(provider, portfolioOverview(ranking), timeoutMs);
      const file = path.join(config.outDir, "portfolio_summary.txt");
      writeFileAtomic(file, formatPortfolioSummary(config.portfolioValue, config.riskCapPercent, new Date(), narrative));
      logger.info(`Portfolio summary saved to ${file}`);
    },
  };
}
