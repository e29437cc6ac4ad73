import YahooFinance from "yahoo-finance2";
import type { PriceBar } from "../analyzers/types";
import type { AssetRef, DateRange, OhlcSource } from "./types";

// Yahoo has no market-cap ranking endpoint for crypto; the universe is a fixed list.
export const DEFAULT_YAHOO_SYMBOLS = [
  "BTC", "ETH", "SOL", "XRP", "BNB", "ADA", "DOGE", "TRX", "AVAX", "LINK",
  "DOT", "LTC", "BCH", "XLM", "ATOM", "NEAR", "ETC", "FIL", "HBAR", "ALGO",
];

export interface YahooRow {
  date: Date;
  open: number;
  high: number;
  low: number;
  close: number;
}

/** Daily rows for `ticker` from `period1` (inclusive) to `period2` (exclusive). */
export type HistoricalFetcher = (ticker: string, period1: string, period2: Date) => Promise<YahooRow[]>;

function yahooFetcher(): HistoricalFetcher {
  const yf = new YahooFinance({ suppressNotices: ["ripHistorical", "yahooSurvey"] });
  return async (ticker, period1, period2) => {
    const results = await yf.historical(ticker, { period1, period2 });
    return results.map((row: YahooRow) => ({
      date: row.date,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
    }));
  };
}

export function yahooTicker(asset: AssetRef): string {
  return `${asset.symbol}-USD`;
}

export interface YahooOptions {
  symbols?: readonly string[];
  /** swapped out in tests */
  historical?: HistoricalFetcher;
}

export class YahooSource implements OhlcSource {
  readonly name = "yahoo";
  private readonly symbols: readonly string[];
  private readonly historical: HistoricalFetcher;

  constructor(opts: YahooOptions = {}) {
    this.symbols = opts.symbols ?? DEFAULT_YAHOO_SYMBOLS;
    this.historical = opts.historical ?? yahooFetcher();
  }

  async listTopAssets(n: number): Promise<AssetRef[]> {
    return this.symbols.slice(0, n).map((symbol, i) => ({
      id: symbol === "BTC" ? "bitcoin" : symbol.toLowerCase(),
      symbol,
      name: symbol,
      marketCapRank: i + 1,
    }));
  }

  async fetchDailyBars(asset: AssetRef, range: DateRange): Promise<PriceBar[]> {
    const period2 = new Date(`${range.end}T00:00:00Z`);
    period2.setUTCDate(period2.getUTCDate() + 1); // period2 is exclusive

    const rows = await this.historical(yahooTicker(asset), range.start, period2);

    return rows
      .map((row) => ({
        date: row.date.toISOString().split("T")[0],
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
      }))
      .filter((b) => b.close > 0)
      .sort((a, b) => a.date.localeCompare(b.date));
  }
}
