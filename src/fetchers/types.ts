import type { PriceBar } from "../analyzers/types";

export interface AssetRef {
  id: string;
  /** upper-case ticker, e.g. "SOL" */
  symbol: string;
  name: string;
  marketCapRank: number | null;
}

/** Inclusive YYYY-MM-DD bounds, UTC. */
export interface DateRange {
  start: string;
  end: string;
}

export interface OhlcSource {
  readonly name: string;
  listTopAssets(n: number): Promise<AssetRef[]>;
  fetchDailyBars(asset: AssetRef, range: DateRange): Promise<PriceBar[]>;
}

export const BTC_ASSET: AssetRef = { id: "bitcoin", symbol: "BTC", name: "Bitcoin", marketCapRank: 1 };

/** "BTC.csv" for the baseline, "<SYMBOL>_<id>.csv" for everything else. */
export function csvFileName(asset: AssetRef): string {
  return asset.id === BTC_ASSET.id ? "BTC.csv" : `${asset.symbol}_${asset.id}.csv`;
}
