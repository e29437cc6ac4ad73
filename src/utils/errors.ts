/**
 * Error taxonomy for a backtest run.
 *
 *   InsufficientHistoryError  aligned calendar too short; fatal to the run
 *   MalformedSeriesError      unparsable input row; only that asset is dropped
 *
 * Zero-variance / zero-loss statistics are not errors: they resolve by policy
 * (Sharpe → 0, profit factor → +Infinity) inside the analyzer.
 */

export class BacktestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BacktestError";
  }
}

export class InsufficientHistoryError extends BacktestError {
  constructor(
    public readonly required: number,
    public readonly actual: number,
    public readonly firstDate: string | null,
    public readonly lastDate: string | null,
    public readonly series: readonly string[],
  ) {
    const range = firstDate && lastDate ? `${firstDate} → ${lastDate}` : "no overlapping dates";
    super(
      `Not enough overlapping data after alignment: ${actual} days (${range}), need ≥ ${required} ` +
        `across [${series.join(", ")}]`,
    );
    this.name = "InsufficientHistoryError";
  }
}

export class MalformedSeriesError extends BacktestError {
  constructor(
    public readonly asset: string,
    public readonly file: string,
    public readonly row: number | null,
    reason: string,
  ) {
    super(`Malformed series ${asset} (${file}${row !== null ? `, row ${row}` : ""}): ${reason}`);
    this.name = "MalformedSeriesError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
