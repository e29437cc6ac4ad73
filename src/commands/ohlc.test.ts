import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { acquireLock, msUntilNextLocal, runDaily, runOhlc, updateAssetCsv } from "./ohlc";
import { readPriceSeries, writePriceCsv } from "../storage/csv";
import { OhlcConfigSchema } from "../utils/config";
import { BTC_ASSET, type AssetRef, type DateRange, type OhlcSource } from "../fetchers/types";
import type { PriceBar } from "../analyzers/types";

const SOL: AssetRef = { id: "solana", symbol: "SOL", name: "Solana", marketCapRank: 5 };
const BAD: AssetRef = { id: "badcoin", symbol: "BAD", name: "Bad", marketCapRank: 9 };

function barsFor(range: DateRange, close = 10): PriceBar[] {
  const out: PriceBar[] = [];
  for (let d = range.start; d <= range.end; ) {
    out.push({ date: d, close });
    const next = new Date(`${d}T00:00:00Z`);
    next.setUTCDate(next.getUTCDate() + 1);
    d = next.toISOString().split("T")[0];
  }
  return out;
}

function stubSource(top: AssetRef[]): OhlcSource {
  return {
    name: "stub",
    listTopAssets: vi.fn(async () => top),
    fetchDailyBars: vi.fn(async (asset: AssetRef, range: DateRange) => {
      if (asset.id === BAD.id) throw new Error("boom");
      return barsFor(range);
    }),
  };
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "rs-ohlc-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("updateAssetCsv", () => {
  it("appends only dates after the last stored row", async () => {
    const file = path.join(dir, "SOL_solana.csv");
    writePriceCsv(file, [
      { date: "2024-01-01", close: 1 },
      { date: "2024-01-02", close: 2 },
    ]);
    const source = stubSource([]);

    const rows = await updateAssetCsv(source, SOL, file, { start: "2024-01-01", end: "2024-01-04" }, true);

    expect(rows).toBe(2);
    expect(source.fetchDailyBars).toHaveBeenCalledWith(SOL, { start: "2024-01-03", end: "2024-01-04" });
    expect(readPriceSeries(file).bars.map((b) => b.date)).toEqual([
      "2024-01-01",
      "2024-01-02",
      "2024-01-03",
      "2024-01-04",
    ]);
  });

  it("skips the fetch when the file is current", async () => {
    const file = path.join(dir, "SOL_solana.csv");
    writePriceCsv(file, [{ date: "2024-01-02", close: 2 }]);
    const source = stubSource([]);

    await expect(updateAssetCsv(source, SOL, file, { start: "2024-01-01", end: "2024-01-02" }, true)).resolves.toBe(0);
    expect(source.fetchDailyBars).not.toHaveBeenCalled();
  });

  it("rewrites the whole range without resume", async () => {
    const file = path.join(dir, "SOL_solana.csv");
    writePriceCsv(file, [{ date: "2023-12-01", close: 2 }]);

    await updateAssetCsv(stubSource([]), SOL, file, { start: "2024-01-01", end: "2024-01-02" }, false);
    expect(readPriceSeries(file).bars.map((b) => b.date)).toEqual(["2024-01-01", "2024-01-02"]);
  });
});

describe("runOhlc", () => {
  it("fetches the baseline first and collects per-asset failures", async () => {
    const config = OhlcConfigSchema.parse({ outDir: dir, start: "2024-01-01", end: "2024-01-03", concurrency: 2 });
    const result = await runOhlc(config, stubSource([BTC_ASSET, SOL, BAD]));

    expect(result.written).toEqual(["BTC", "SOL"]);
    expect(result.failed).toEqual([{ symbol: "BAD", error: "boom" }]);
    expect(readPriceSeries(path.join(dir, "BTC.csv")).bars).toHaveLength(3);
    expect(fs.existsSync(path.join(dir, "SOL_solana.csv"))).toBe(true);

    const manifest: unknown = JSON.parse(fs.readFileSync(path.join(dir, "manifest.json"), "utf-8"));
    expect(manifest).toEqual([BTC_ASSET, SOL, BAD]);
  });

  it("fails the run when the baseline cannot be fetched", async () => {
    const source = stubSource([]);
    source.fetchDailyBars = async () => {
      throw new Error("baseline down");
    };
    const config = OhlcConfigSchema.parse({ outDir: dir, start: "2024-01-01", end: "2024-01-01" });
    await expect(runOhlc(config, source)).rejects.toThrow("baseline down");
  });
});

describe("scheduling and locking", () => {
  it("computes the wait until the next local time", () => {
    const now = new Date(2024, 0, 10, 5, 0, 0);
    expect(msUntilNextLocal("06:30", now)).toBe(90 * 60_000);
    expect(msUntilNextLocal("05:00", now)).toBe(24 * 60 * 60_000);
  });

  it("keeps the daily schedule going after a failed run", async () => {
    const run = vi.fn(async () => {}).mockRejectedValueOnce(new Error("baseline down"));
    const sleep = vi.fn(async () => {});

    await expect(runDaily("06:30", run, sleep, 3)).resolves.toEqual({ runs: 3, failed: 1 });
    expect(run).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it("refuses a second holder until released", () => {
    const lock = path.join(dir, "locks", "ohlc.lock");
    const release = acquireLock(lock);
    expect(fs.readFileSync(lock, "utf-8")).toBe(String(process.pid));
    expect(() => acquireLock(lock)).toThrow(`another run holds ${lock}`);

    release();
    expect(fs.existsSync(lock)).toBe(false);
    acquireLock(lock)();
  });
});
