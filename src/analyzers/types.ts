// ── Price input ──────────────────────────────────────────────────────────────

export interface PriceBar {
  date: string; // YYYY-MM-DD
  close: number;
  open?: number;
  high?: number;
  low?: number;
}

/** One asset's daily history. Dates strictly increasing, no duplicates. */
export interface PriceSeries {
  name: string;
  bars: readonly PriceBar[];
}

/** A series projected onto the aligned calendar (index i ↔ calendar[i]). */
export interface AlignedSeries {
  name: string;
  close: readonly number[];
  high: readonly (number | null)[];
  low: readonly (number | null)[];
}

// ── Strategy parameters (defaults filled in config.ts) ─────────────────────────

export interface StrategyParams {
  maShort: number;
  maLong: number;
  stopLookback: number;
  atrMult: number;
  volMult: number;
  minSignals: number;
  shortAlts: boolean;
}

// ── Signals ──────────────────────────────────────────────────────────────────

export type SignalScore = 0 | 1 | 2 | 3;
export type RawWeight = -1 | 0 | 0.5 | 1;

export interface DailySignal {
  readonly date: string;
  readonly price: number;
  readonly maShort: number | null;
  readonly maLong: number | null;
  /** asset close / baseline close on the same date */
  readonly rs: number;
  readonly rsMaShort: number | null;
  readonly rsMaLong: number | null;
  readonly trendBull: boolean;
  readonly momBull: boolean;
  readonly rsBull: boolean;
  readonly score: SignalScore;
  readonly rawWeight: RawWeight;
  readonly stopLevel: number | null;
}

export interface BaselineState {
  readonly date: string;
  readonly close: number;
  readonly maShort: number | null;
  readonly maLong: number | null;
  /** close < MA_long AND MA_short < MA_long */
  readonly bear: boolean;
}

// ── Portfolio ────────────────────────────────────────────────────────────────

export interface PortfolioState {
  readonly date: string;
  readonly equity: number;
  readonly dailyReturn: number;
  readonly hedgeReturn: number;
  readonly activePositionCount: number;
  /** normalized long weights held that day (sum to 1 when any) */
  readonly weights: Readonly<Record<string, number>>;
  readonly baselineClose: number;
}

// ── Statistics ───────────────────────────────────────────────────────────────

export interface StrategyStatistics {
  readonly asset: string;
  readonly totalDays: number;
  readonly tradingDays: number;
  readonly totalReturn: number;
  readonly maxReturn: number;
  readonly minReturn: number;
  readonly winRate: number;
  readonly avgWin: number;
  readonly avgLoss: number;
  readonly profitFactor: number;
  readonly maxDrawdown: number;
  readonly sharpeRatio: number;
}

export interface EquityMetrics {
  days: number;
  totalReturn: number;
  cagr: number;
  sharpeAnnualized: number;
  maxDrawdown: number;
  winRate: number;
}
