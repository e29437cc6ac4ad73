import type { EquityMetrics, StrategyStatistics } from "../analyzers/types";
import type { StrategyRanking } from "../analyzers/performance";
import { writeFileAtomic } from "./csv";

export function formatMetrics(m: EquityMetrics): string {
  return (
    `Days: ${m.days}\n` +
    `Total Return: ${(m.totalReturn * 100).toFixed(2)}%\n` +
    `CAGR: ${(m.cagr * 100).toFixed(2)}%\n` +
    `Sharpe (ann.): ${m.sharpeAnnualized.toFixed(2)}\n` +
    `Max Drawdown: ${(m.maxDrawdown * 100).toFixed(2)}%\n` +
    `Win Rate: ${(m.winRate * 100).toFixed(2)}%\n`
  );
}

export function writeMetrics(file: string, m: EquityMetrics): void {
  writeFileAtomic(file, formatMetrics(m));
}

/** Pretty JSON; non-finite numbers (an unbounded profit factor) serialize as null. */
export function writeJson(file: string, data: unknown): void {
  writeFileAtomic(file, JSON.stringify(data, null, 2) + "\n");
}

// ── Strategy tables ──────────────────────────────────────────────────────────

const col = (v: string | number, width: number): string => String(v).padEnd(width);

function tableRow(cells: (string | number)[]): string {
  const widths = [14, 12, 12, 14, 10, 10, 12];
  return cells.map((c, i) => col(c, widths[i] ?? 10)).join(" ").trimEnd();
}

const fmtPf = (pf: number): string => (Number.isFinite(pf) ? pf.toFixed(2) : "inf");

export function formatRanking(r: StrategyRanking): string[] {
  if (r.profitable.length === 0) return ["No profitable strategies found."];

  const lines: string[] = [
    `Found ${r.profitable.length} profitable strategies out of ${r.total} total`,
    "",
    "TOP PERFORMING STRATEGIES (by Total Return)",
    tableRow(["Asset", "Total Ret%", "Win Rate%", "Profit Factor", "Sharpe", "Max DD%", "Trading Days"]),
    "-".repeat(90),
  ];
  for (const s of r.byReturn) {
    lines.push(
      tableRow([
        s.asset,
        (s.totalReturn * 100).toFixed(2),
        (s.winRate * 100).toFixed(1),
        fmtPf(s.profitFactor),
        s.sharpeRatio.toFixed(2),
        (s.maxDrawdown * 100).toFixed(2),
        s.tradingDays,
      ]),
    );
  }

  lines.push(
    "",
    "TOP RISK-ADJUSTED STRATEGIES (by Sharpe Ratio)",
    tableRow(["Asset", "Sharpe", "Total Ret%", "Win Rate%", "Profit Factor", "Max DD%", "Trading Days"]),
    "-".repeat(90),
  );
  for (const s of r.bySharpe) {
    lines.push(
      tableRow([
        s.asset,
        s.sharpeRatio.toFixed(2),
        (s.totalReturn * 100).toFixed(2),
        (s.winRate * 100).toFixed(1),
        fmtPf(s.profitFactor),
        (s.maxDrawdown * 100).toFixed(2),
        s.tradingDays,
      ]),
    );
  }

  lines.push(
    "",
    "OVERALL STATISTICS",
    `  Total Strategies Analyzed: ${r.total}`,
    `  Profitable Strategies: ${r.profitable.length} (${((r.profitable.length / r.total) * 100).toFixed(1)}%)`,
    `  Average Return (Profitable): ${(r.avgReturn * 100).toFixed(2)}%`,
    `  Average Win Rate (Profitable): ${(r.avgWinRate * 100).toFixed(1)}%`,
    `  Average Sharpe (Profitable): ${r.avgSharpe.toFixed(2)}`,
  );
  return lines;
}

export function formatStatistics(s: StrategyStatistics): string[] {
  return [
    `${s.asset} Analysis`,
    `  Total Days: ${s.totalDays}`,
    `  Trading Days: ${s.tradingDays}`,
    `  Total Return: ${(s.totalReturn * 100).toFixed(2)}%`,
    `  Max Return: ${(s.maxReturn * 100).toFixed(2)}%`,
    `  Min Return: ${(s.minReturn * 100).toFixed(2)}%`,
    `  Win Rate: ${(s.winRate * 100).toFixed(1)}%`,
    `  Avg Win: ${(s.avgWin * 100).toFixed(2)}%`,
    `  Avg Loss: ${(s.avgLoss * 100).toFixed(2)}%`,
    `  Profit Factor: ${fmtPf(s.profitFactor)}`,
    `  Max Drawdown: ${(s.maxDrawdown * 100).toFixed(2)}%`,
    `  Sharpe Ratio: ${s.sharpeRatio.toFixed(2)}`,
  ];
}

// ── Daemon summary ───────────────────────────────────────────────────────────

export function formatPortfolioSummary(
  portfolioValue: number,
  riskCapPercent: number,
  now: Date,
  narrative?: string,
): string {
  const stamp = now.toISOString().replace("T", " ").slice(0, 19) + " UTC";
  const lines = [
    `=== PORTFOLIO SUMMARY - ${stamp} ===`,
    `Portfolio Value: $${portfolioValue.toFixed(0)}`,
    `Risk Cap per Position: ${riskCapPercent.toFixed(1)}%`,
    `Generated: ${stamp}`,
    "",
  ];
  if (narrative) lines.push(narrative, "");
  lines.push(
    "Run 'npm run daemon -- --help' for options",
    "Run 'npm run trade' to see detailed playbooks",
    "Run 'npm run analyze' to see strategy analysis",
    "",
  );
  return lines.join("\n");
}
