import logger from "../utils/logger";
import { MalformedSeriesError, errorMessage } from "../utils/errors";
import { assetNameFromPath, listCsvFiles, readSignalsCsv } from "../storage/csv";
import { formatRanking, formatStatistics } from "../storage/reports";
import { analyzeSignals, rankStrategies, type StrategyRanking } from "../analyzers/performance";
import type { DailySignal, StrategyStatistics } from "../analyzers/types";

export interface AnalyzedAsset {
  stats: StrategyStatistics;
  signals: DailySignal[];
}

/** Analyze every signals_*.csv in `dir`. Unreadable files are logged and skipped. */
export function analyzeDirectory(dir: string): AnalyzedAsset[] {
  const out: AnalyzedAsset[] = [];
  for (const file of listCsvFiles(dir, "signals_")) {
    try {
      const signals = readSignalsCsv(file);
      if (signals.length === 0) continue;
      out.push({ stats: analyzeSignals(assetNameFromPath(file), signals), signals });
    } catch (err) {
      if (!(err instanceof MalformedSeriesError)) throw err;
      logger.warn(`Skipping ${file}: ${errorMessage(err)}`);
    }
  }
  return out;
}

export function runAnalyze(dir: string, detailedAsset?: string): StrategyRanking {
  const analyzed = analyzeDirectory(dir);
  logger.info(`Analyzing ${analyzed.length} strategy files in ${dir}`);

  const ranking = rankStrategies(analyzed.map((a) => a.stats));
  logger.info(formatRanking(ranking).join("\n"));

  if (detailedAsset) {
    const match = analyzed.find((a) => a.stats.asset === detailedAsset);
    if (match) logger.info(formatStatistics(match.stats).join("\n"));
    else logger.warn(`No signals file for ${detailedAsset} in ${dir}`);
  }
  return ranking;
}
