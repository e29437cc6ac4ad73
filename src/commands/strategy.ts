import fs from "fs";
import path from "path";
import logger from "../utils/logger";
import { runBacktest, type BacktestResult } from "../backtest";
import { strategyParams, type StrategyConfig } from "../utils/config";
import { MalformedSeriesError, errorMessage } from "../utils/errors";
import {
  assetNameFromPath,
  listCsvFiles,
  readPriceSeries,
  signalsFileName,
  writeEquityCurveCsv,
  writeSignalsCsv,
} from "../storage/csv";
import { formatMetrics, writeMetrics } from "../storage/reports";
import type { PriceSeries } from "../analyzers/types";

/**
 * Read the baseline and asset CSVs. A bad baseline file is fatal; a bad asset
 * file is logged and left out of the run.
 */
export function loadUniverse(config: StrategyConfig): Map<string, PriceSeries> {
  const baselineFile = path.join(config.dataDir, `${config.baseline}.csv`);
  if (!fs.existsSync(baselineFile)) {
    throw new Error(`baseline file not found: ${baselineFile}`);
  }

  const series = new Map<string, PriceSeries>();
  series.set(config.baseline, readPriceSeries(baselineFile, config.baseline));

  const files =
    config.assets.length > 0
      ? config.assets
      : listCsvFiles(config.dataDir).filter((f) => {
          const name = assetNameFromPath(f);
          return (
            name !== config.baseline &&
            !name.startsWith(`${config.baseline}_`) &&
            !path.basename(f).startsWith("signals_") &&
            name !== "equity_curve"
          );
        });

  for (const file of files) {
    const name = assetNameFromPath(file);
    try {
      series.set(name, readPriceSeries(file, name));
    } catch (err) {
      if (!(err instanceof MalformedSeriesError)) throw err;
      logger.warn(`Skipping ${name}: ${errorMessage(err)}`);
    }
  }
  return series;
}

/** Backtest the universe and write signals_*.csv, equity_curve.csv and metrics.txt. */
export function runStrategy(config: StrategyConfig): BacktestResult {
  const series = loadUniverse(config);
  logger.info(`Loaded ${series.size - 1} assets against ${config.baseline}`);

  const result = runBacktest(series, {
    params: strategyParams(config),
    baselineName: config.baseline,
    hedgeWeight: config.btcHedge,
  });

  for (const ex of result.excluded) {
    logger.warn(`Excluding ${ex.name}: only ${ex.rows} rows (need ≥ ${ex.required})`);
  }
  logger.info(
    `Aligned ${result.calendar.length} days (${result.calendar[0]} → ${result.calendar[result.calendar.length - 1]}), ` +
      `${result.signals.size} assets`,
  );

  for (const [asset, signals] of result.signals) {
    writeSignalsCsv(path.join(config.outDir, signalsFileName(asset)), signals);
  }
  writeEquityCurveCsv(path.join(config.outDir, "equity_curve.csv"), result.states);
  writeMetrics(path.join(config.outDir, "metrics.txt"), result.metrics);

  logger.info(`Wrote outputs to ${config.outDir}\n${formatMetrics(result.metrics).trimEnd()}`);
  return result;
}
