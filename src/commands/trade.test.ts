import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { runTrade } from "./trade";
import { runStrategy } from "./strategy";
import { writePriceCsv } from "../storage/csv";
import { StrategyConfigSchema, TradeConfigSchema, addDays } from "../utils/config";
import type { TextInsightProvider } from "../analyzers/insights";

let dir: string;

function writeCloses(file: string, closes: number[]): void {
  writePriceCsv(
    path.join(dir, file),
    closes.map((close, i) => ({ date: addDays("2024-01-01", i), close })),
  );
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "rs-trade-"));
  writeCloses("BTC.csv", Array.from({ length: 40 }, () => 100));
  writeCloses("UP_up.csv", Array.from({ length: 40 }, (_, i) => 10 + i));
  writeCloses("DOWN_down.csv", Array.from({ length: 40 }, (_, i) => 100 - i));
  runStrategy(StrategyConfigSchema.parse({ dataDir: dir, outDir: path.join(dir, "signals"), btcHedge: 0 }));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("runTrade", () => {
  it("writes one playbook per profitable strategy with the provider's notes", async () => {
    const provider: TextInsightProvider = {
      name: "stub",
      summarize: vi.fn(async () => "Trend intact"),
      summarizePortfolio: vi.fn(async () => "unused"),
    };
    const outputJson = path.join(dir, "playbooks.json");

    const entries = await runTrade(
      TradeConfigSchema.parse({ signalsDir: path.join(dir, "signals"), outputJson }),
      provider,
      1000,
    );

    expect(entries.map((e) => [e.asset, e.rank, e.notes])).toEqual([["UP_up", 1, "Trend intact"]]);
    expect(entries[0].summary.length).toBeGreaterThan(0);
    expect(provider.summarize).toHaveBeenCalledWith(
      expect.objectContaining({ asset: "UP_up", tradingDays: 34, winRatePercent: 100, maShortWindow: 3, maLongWindow: 7 }),
    );

    const written: unknown = JSON.parse(fs.readFileSync(outputJson, "utf-8"));
    expect(written).toMatchObject([{ asset: "UP_up", rank: 1, notes: "Trend intact" }]);
  });

  it("writes an empty list when nothing is profitable", async () => {
    fs.rmSync(path.join(dir, "signals", "signals_UP_up.csv"));
    const outputJson = path.join(dir, "none.json");
    const provider: TextInsightProvider = {
      name: "stub",
      summarize: vi.fn(async () => "unused"),
      summarizePortfolio: vi.fn(async () => "unused"),
    };

    await expect(
      runTrade(TradeConfigSchema.parse({ signalsDir: path.join(dir, "signals"), outputJson }), provider, 1000),
    ).resolves.toEqual([]);
    expect(fs.readFileSync(outputJson, "utf-8")).toBe("[]\n");
    expect(provider.summarize).not.toHaveBeenCalled();
  });
});
