import { describe, it, expect, vi } from "vitest";
import { portfolioOverview, runDaemon, type DaemonSteps } from "./daemon";
import { DaemonConfigSchema } from "../utils/config";
import type { StrategyRanking } from "../analyzers/performance";
import type { StrategyStatistics } from "../analyzers/types";

function stats(asset: string, totalReturn: number): StrategyStatistics {
  return {
    asset,
    totalDays: 30,
    tradingDays: 20,
    totalReturn,
    maxReturn: 0.1,
    minReturn: -0.05,
    winRate: 0.6,
    avgWin: 0.03,
    avgLoss: -0.02,
    profitFactor: 2,
    maxDrawdown: 0.1,
    sharpeRatio: 1.5,
  };
}

const ranking: StrategyRanking = {
  total: 4,
  profitable: [stats("SOL", 0.5), stats("ETH", 0.2)],
  byReturn: [stats("SOL", 0.5), stats("ETH", 0.2)],
  bySharpe: [stats("SOL", 0.5), stats("ETH", 0.2)],
  avgReturn: 0.35,
  avgWinRate: 0.6,
  avgSharpe: 1.5,
};

function stubSteps() {
  return {
    fetch: vi.fn<DaemonSteps["fetch"]>(async () => {}),
    strategy: vi.fn<DaemonSteps["strategy"]>(async () => {}),
    analyze: vi.fn<DaemonSteps["analyze"]>(async () => ranking),
    playbooks: vi.fn<DaemonSteps["playbooks"]>(async () => {}),
    summary: vi.fn<DaemonSteps["summary"]>(async () => {}),
  };
}

describe("runDaemon", () => {
  it("runs every step once in single mode", async () => {
    const steps = stubSteps();
    const sleep = vi.fn(async () => {});

    await expect(runDaemon(DaemonConfigSchema.parse({}), steps, sleep)).resolves.toEqual({
      cycles: 1,
      completed: 1,
      failed: 0,
    });
    expect(steps.summary).toHaveBeenCalledWith(ranking);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("rethrows the first failed step in single mode", async () => {
    const steps = stubSteps();
    steps.strategy.mockRejectedValueOnce(new Error("no baseline"));

    await expect(runDaemon(DaemonConfigSchema.parse({}), steps, async () => {})).rejects.toThrow("no baseline");
    expect(steps.analyze).not.toHaveBeenCalled();
  });

  it("keeps cycling after a failure in continuous mode", async () => {
    const steps = stubSteps();
    steps.fetch.mockResolvedValueOnce(undefined).mockRejectedValueOnce(new Error("rate limited"));
    const sleep = vi.fn(async () => {});
    const config = DaemonConfigSchema.parse({ continuous: true, maxCycles: 3, checkIntervalMinutes: 15 });

    await expect(runDaemon(config, steps, sleep)).resolves.toEqual({ cycles: 3, completed: 2, failed: 1 });
    expect(steps.summary).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(15 * 60_000);
  });
});

describe("portfolioOverview", () => {
  it("converts ratios to percentages", () => {
    expect(portfolioOverview(ranking)).toEqual({
      totalStrategies: 4,
      profitableStrategies: 2,
      avgReturnPercent: 35,
      avgSharpe: 1.5,
      avgWinRatePercent: 60,
      topPerformers: [
        { asset: "SOL", returnPercent: 50 },
        { asset: "ETH", returnPercent: 20 },
      ],
    });
  });
});
