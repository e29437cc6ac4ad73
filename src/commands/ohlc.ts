import fs from "fs";
import path from "path";
import logger from "../utils/logger";
import { delay, mapWithConcurrency } from "../utils/async";
import { addDays, type Env, type OhlcConfig } from "../utils/config";
import { errorMessage } from "../utils/errors";
import { appendPriceCsv, readLastCsvDate, writePriceCsv } from "../storage/csv";
import { writeJson } from "../storage/reports";
import { CoinGeckoSource } from "../fetchers/coingecko";
import { YahooSource } from "../fetchers/yahoo";
import { BTC_ASSET, csvFileName, type AssetRef, type DateRange, type OhlcSource } from "../fetchers/types";

export interface OhlcRunResult {
  written: string[];
  upToDate: string[];
  failed: { symbol: string; error: string }[];
}

// ── Lock & schedule ──────────────────────────────────────────────────────────

/** Exclusive-create a lock file; the returned function releases it. */
export function acquireLock(lockFile: string): () => void {
  fs.mkdirSync(path.dirname(lockFile), { recursive: true });
  let fd: number;
  try {
    fd = fs.openSync(lockFile, "wx");
  } catch (err) {
    throw new Error(`another run holds ${lockFile}: ${errorMessage(err)}`);
  }
  fs.writeSync(fd, String(process.pid));
  return () => {
    fs.closeSync(fd);
    fs.rmSync(lockFile, { force: true });
  };
}

/** Milliseconds until the next local HH:MM strictly after `now`. */
export function msUntilNextLocal(hhmm: string, now: Date = new Date()): number {
  const [h, m] = hhmm.split(":").map((p) => Number.parseInt(p, 10));
  const next = new Date(now);
  next.setHours(h, m, 0, 0);
  if (next.getTime() <= now.getTime()) next.setDate(next.getDate() + 1);
  return next.getTime() - now.getTime();
}

// ── Per-asset update ─────────────────────────────────────────────────────────

/**
 * Fetch and persist one asset's bars. With `resume`, only dates after the
 * file's last date are fetched and appended. Returns the number of new rows.
 */
export async function updateAssetCsv(
  source: OhlcSource,
  asset: AssetRef,
  file: string,
  range: DateRange,
  resume: boolean,
): Promise<number> {
  const lastDate = resume ? readLastCsvDate(file) : null;
  const start = lastDate ? addDays(lastDate, 1) : range.start;
  if (start > range.end) {
    logger.info(`${asset.symbol} up to date through ${lastDate ?? range.end}; skipping`);
    return 0;
  }

  let bars = await source.fetchDailyBars(asset, { start, end: range.end });
  if (lastDate) bars = bars.filter((b) => b.date > lastDate);
  if (bars.length === 0) {
    logger.info(`${asset.symbol}: no new rows`);
    return 0;
  }

  if (resume && fs.existsSync(file)) appendPriceCsv(file, bars);
  else writePriceCsv(file, bars);
  logger.info(`${asset.symbol}: wrote ${bars.length} rows → ${file}`);
  return bars.length;
}

// ── Run ──────────────────────────────────────────────────────────────────────

export async function runOhlc(config: OhlcConfig, source: OhlcSource): Promise<OhlcRunResult> {
  const range: DateRange = { start: config.start, end: config.end };
  logger.info(`OHLC run via ${source.name} (resume=${config.resume}, ${range.start} → ${range.end})`);
  fs.mkdirSync(config.outDir, { recursive: true });

  const assets: AssetRef[] = config.skipBtc ? [] : [BTC_ASSET];
  const top = await source.listTopAssets(config.topN);
  for (const a of top) {
    if (!assets.some((x) => x.id === a.id)) assets.push(a);
  }
  if (config.writeManifest) writeJson(path.join(config.outDir, "manifest.json"), assets);

  const result: OhlcRunResult = { written: [], upToDate: [], failed: [] };
  const record = (asset: AssetRef, rows: number): void => {
    (rows > 0 ? result.written : result.upToDate).push(asset.symbol);
  };

  // baseline first; a failure here is fatal
  if (!config.skipBtc) {
    record(BTC_ASSET, await updateAssetCsv(source, BTC_ASSET, path.join(config.outDir, "BTC.csv"), range, config.resume));
  }

  const others = assets.filter((a) => a.id !== BTC_ASSET.id);
  await mapWithConcurrency(others, config.concurrency, async (asset) => {
    try {
      record(asset, await updateAssetCsv(source, asset, path.join(config.outDir, csvFileName(asset)), range, config.resume));
    } catch (err) {
      logger.error(`failed ${asset.symbol} (${asset.id}): ${errorMessage(err)}`);
      result.failed.push({ symbol: asset.symbol, error: errorMessage(err) });
    }
  });

  logger.info(
    `OHLC run complete: ${result.written.length} updated, ${result.upToDate.length} unchanged, ${result.failed.length} failed`,
  );
  return result;
}

export function createOhlcSource(config: OhlcConfig, env: Env): OhlcSource {
  if (config.source === "yahoo") return new YahooSource();
  if (!env.CG_PRO_API_KEY) throw new Error("CG_PRO_API_KEY is not set");
  return new CoinGeckoSource({ apiKey: env.CG_PRO_API_KEY, vs: config.vs, requestDelayMs: config.requestDelayMs });
}

export interface DailyReport {
  runs: number;
  failed: number;
}

/**
 * Run `run` every day at local `dailyAt`. A failed run is logged and the
 * schedule carries on; `maxRuns` bounds the loop.
 */
export async function runDaily(
  dailyAt: string,
  run: () => Promise<unknown>,
  sleep: (ms: number) => Promise<void> = delay,
  maxRuns = Infinity,
): Promise<DailyReport> {
  const report: DailyReport = { runs: 0, failed: 0 };
  while (report.runs < maxRuns) {
    const wait = msUntilNextLocal(dailyAt);
    logger.info(`sleeping ${Math.round(wait / 1000)}s until the next daily run at ${dailyAt}`);
    await sleep(wait);

    report.runs++;
    try {
      await run();
    } catch (err) {
      report.failed++;
      logger.error(`daily OHLC run failed: ${errorMessage(err)}; retrying at ${dailyAt} tomorrow`);
    }
  }
  return report;
}

/** CLI entry: optional lock, one run, then optionally once a day at `dailyAt`. */
export async function ohlcCommand(config: OhlcConfig, env: Env): Promise<void> {
  const source = createOhlcSource(config, env);
  const release = config.lockFile ? acquireLock(config.lockFile) : null;

  try {
    await runOhlc(config, source);
    if (!config.dailyAt) return;
    await runDaily(config.dailyAt, () => runOhlc(config, source));
  } finally {
    release?.();
  }
}
