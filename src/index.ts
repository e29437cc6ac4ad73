import "dotenv/config";
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import logger from "./utils/logger";
import {
  DaemonConfigSchema,
  OhlcConfigSchema,
  StrategyConfigSchema,
  TradeConfigSchema,
  loadEnv,
} from "./utils/config";
import { createInsightProvider } from "./analyzers/insights";
import { createOhlcSource, ohlcCommand, runOhlc } from "./commands/ohlc";
import { runStrategy } from "./commands/strategy";
import { runAnalyze } from "./commands/analyze";
import { DEFAULT_PLAYBOOKS_FILE, runTrade } from "./commands/trade";
import { defaultDaemonSteps, runDaemon } from "./commands/daemon";
import { writeCronFile, writeDockerCompose, writeSystemdUnit, type DeployOptions } from "./commands/deploy";

// ── Shared options ───────────────────────────────────────────────────────────

const strategyOptions = {
  "ma-short": { type: "number", describe: "Short moving-average window (default 3)" },
  "ma-long": { type: "number", describe: "Long moving-average window (default 7)" },
  "min-signals": { type: "number", describe: "Signals (of 3) required for a half-weight entry (default 2)" },
  "stop-lookback": { type: "number", describe: "ATR / volatility lookback for stops (default 14)" },
  "atr-mult": { type: "number", describe: "ATR multiple for the trailing stop (default 3.0)" },
  "vol-mult": { type: "number", describe: "Volatility multiple for the fallback stop (default 2.5)" },
} as const;

const deployOptions = {
  "portfolio-value": { type: "number", default: 100_000, describe: "Portfolio value in USD" },
  "risk-cap-percent": { type: "number", default: 1.0, describe: "Risk cap per position (% of equity)" },
  "check-interval": { type: "number", default: 60, describe: "Minutes between daemon cycles" },
} as const;

function deployConfig(argv: { portfolioValue: number; riskCapPercent: number; checkInterval: number }): DeployOptions {
  const c = DaemonConfigSchema.parse({
    portfolioValue: argv.portfolioValue,
    riskCapPercent: argv.riskCapPercent,
    checkIntervalMinutes: argv.checkInterval,
  });
  return { portfolioValue: c.portfolioValue, riskCapPercent: c.riskCapPercent, checkIntervalMinutes: c.checkIntervalMinutes };
}

// ── CLI ──────────────────────────────────────────────────────────────────────

async function main() {
  const env = loadEnv();

  await yargs(hideBin(process.argv))
    .scriptName("rs-momentum")
    .usage("Usage: $0 [command] [options]")
    .command(
      "$0",
      "Run ohlc → strategy → analyze → trade with default settings",
      () => {},
      async () => {
        logger.info("Running with default arguments...");
        const ohlc = OhlcConfigSchema.parse({});
        await runOhlc(ohlc, createOhlcSource(ohlc, env));
        runStrategy(StrategyConfigSchema.parse({}));
        runAnalyze(path.join("out", "signals"));
        await runTrade(TradeConfigSchema.parse({}), createInsightProvider(env), env.INSIGHTS_TIMEOUT_MS);
      },
    )
    .command(
      "ohlc",
      "Fetch daily OHLC for the top assets by market cap",
      (y) =>
        y
          .option("source", { choices: ["coingecko", "yahoo"] as const, describe: "OHLC provider (default coingecko)" })
          .option("out", { type: "string", describe: "Output directory (default ./out)" })
          .option("top-n", { type: "number", describe: "Number of assets by market cap (default 100)" })
          .option("vs", { type: "string", describe: "Quote currency (default usd)" })
          .option("start", { type: "string", describe: "Start date YYYY-MM-DD (default 30 days before end)" })
          .option("end", { type: "string", describe: "End date YYYY-MM-DD (default yesterday, UTC)" })
          .option("concurrency", { type: "number", describe: "Parallel asset downloads (default 6)" })
          .option("request-delay-ms", { type: "number", describe: "Pause between chunk requests (default 250)" })
          .option("skip-btc", { type: "boolean", describe: "Do not fetch the BTC baseline" })
          .option("resume", { type: "boolean", describe: "Append only dates after each file's last row" })
          .option("write-manifest", { type: "boolean", describe: "Write manifest.json (default true)" })
          .option("lock-file", { type: "string", describe: "Refuse to run while this file exists" })
          .option("daily-at", { type: "string", describe: "Repeat every day at local HH:MM" }),
      async (argv) => {
        const config = OhlcConfigSchema.parse({
          source: argv.source,
          outDir: argv.out,
          topN: argv.topN,
          vs: argv.vs,
          start: argv.start,
          end: argv.end,
          concurrency: argv.concurrency,
          requestDelayMs: argv.requestDelayMs,
          skipBtc: argv.skipBtc,
          resume: argv.resume,
          writeManifest: argv.writeManifest,
          lockFile: argv.lockFile,
          dailyAt: argv.dailyAt,
        });
        await ohlcCommand(config, env);
      },
    )
    .command(
      "strategy",
      "Backtest the relative-strength strategy and write signals",
      (y) =>
        y
          .option("data-dir", { type: "string", describe: "Directory of price CSVs (default ./out)" })
          .option("baseline", { type: "string", describe: "Baseline asset name (default BTC)" })
          .option("assets", { type: "string", array: true, describe: "Explicit asset CSV files" })
          .option("out", { type: "string", describe: "Signals output directory (default ./out/signals)" })
          .options(strategyOptions)
          .option("short-alts", { type: "boolean", describe: "Short assets whose RS is bearish" })
          .option("btc-hedge", { type: "number", describe: "Short-baseline weight on bear days (default 0.3)" }),
      (argv) => {
        runStrategy(
          StrategyConfigSchema.parse({
            dataDir: argv.dataDir,
            baseline: argv.baseline,
            assets: argv.assets,
            outDir: argv.out,
            maShort: argv.maShort,
            maLong: argv.maLong,
            minSignals: argv.minSignals,
            stopLookback: argv.stopLookback,
            atrMult: argv.atrMult,
            volMult: argv.volMult,
            shortAlts: argv.shortAlts,
            btcHedge: argv.btcHedge,
          }),
        );
      },
    )
    .command(
      "analyze",
      "Rank the profitable strategies in a signals directory",
      (y) =>
        y
          .option("signals-dir", { type: "string", default: path.join("out", "signals"), describe: "Signals directory" })
          .option("asset", { type: "string", describe: "Print detailed statistics for one asset" }),
      (argv) => {
        runAnalyze(argv.signalsDir, argv.asset);
      },
    )
    .command(
      "trade",
      "Generate trading playbooks for the top strategies",
      (y) =>
        y
          .option("signals-dir", { type: "string", describe: "Signals directory (default ./out/signals)" })
          .option("output-json", { type: "string", describe: `Playbook JSON path (default ${DEFAULT_PLAYBOOKS_FILE})` })
          .option("portfolio-value", { type: "number", describe: "Portfolio value in USD (default 100000)" })
          .option("top", { type: "number", describe: "Number of playbooks (default 10)" })
          .options(strategyOptions),
      async (argv) => {
        const config = TradeConfigSchema.parse({
          signalsDir: argv.signalsDir,
          outputJson: argv.outputJson,
          portfolioValue: argv.portfolioValue,
          top: argv.top,
          maShort: argv.maShort,
          maLong: argv.maLong,
          minSignals: argv.minSignals,
          stopLookback: argv.stopLookback,
          atrMult: argv.atrMult,
          volMult: argv.volMult,
        });
        await runTrade(config, createInsightProvider(env), env.INSIGHTS_TIMEOUT_MS);
      },
    )
    .command(
      "daemon",
      "Fetch, backtest and regenerate playbooks on a schedule",
      (y) =>
        y
          .option("continuous", { type: "boolean", default: false, describe: "Keep running every check interval" })
          .options(deployOptions)
          .option("out", { type: "string", default: "out", describe: "Working directory for data and outputs" })
          .option("max-cycles", { type: "number", describe: "Stop after this many cycles" }),
      async (argv) => {
        const config = DaemonConfigSchema.parse({
          continuous: argv.continuous,
          portfolioValue: argv.portfolioValue,
          riskCapPercent: argv.riskCapPercent,
          checkIntervalMinutes: argv.checkInterval,
          outDir: argv.out,
          maxCycles: argv.maxCycles,
        });
        const report = await runDaemon(config, defaultDaemonSteps(config, env, createInsightProvider(env)));
        logger.info(`Daemon finished: ${report.completed}/${report.cycles} cycles completed`);
      },
    )
    .command(
      "deploy-systemd",
      "Write a systemd unit for the daemon",
      (y) => y.options(deployOptions),
      (argv) => {
        writeSystemdUnit(deployConfig(argv));
      },
    )
    .command(
      "deploy-cron",
      "Write a cron file that runs the daemon once per interval",
      (y) => y.options(deployOptions),
      (argv) => {
        writeCronFile(deployConfig(argv));
      },
    )
    .command(
      "deploy-docker",
      "Write a docker-compose file for the daemon",
      (y) => y.options(deployOptions),
      (argv) => {
        writeDockerCompose(deployConfig(argv));
      },
    )
    .strict()
    .help()
    .parseAsync();
}

main().catch((err) => {
  logger.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
