import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import type { DailySignal, PortfolioState, PriceBar, PriceSeries } from "../analyzers/types";
import { MalformedSeriesError, errorMessage } from "../utils/errors";

// ── Cell schemas ─────────────────────────────────────────────────────────────

const isoDate = z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD");
const finite = z.string().trim().min(1, "missing value").pipe(z.coerce.number().finite());
const positive = z.string().trim().min(1, "missing value").pipe(z.coerce.number().finite().positive());
const optionalFinite = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? null : Number(v)))
  .pipe(z.number().finite().nullable());
const bool = z.enum(["true", "false"]).transform((v) => v === "true");

const PriceRowSchema = z.object({
  date: isoDate,
  open: optionalFinite,
  high: optionalFinite,
  low: optionalFinite,
  close: positive,
});

const SignalRowSchema = z.object({
  date: isoDate,
  close: positive,
  ma_short: optionalFinite,
  ma_long: optionalFinite,
  rs: finite,
  rs_ma_short: optionalFinite,
  rs_ma_long: optionalFinite,
  trend_bull: bool,
  mom_bull: bool,
  rs_bull: bool,
  score: finite.pipe(z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)])),
  raw_weight: finite.pipe(z.union([z.literal(-1), z.literal(0), z.literal(0.5), z.literal(1)])),
  stop_level: optionalFinite,
});

const RecordsSchema = z.array(z.record(z.string()));

export const PRICE_COLUMNS = ["date", "open", "high", "low", "close"] as const;
export const SIGNAL_COLUMNS = [
  "date", "close", "ma_short", "ma_long", "rs", "rs_ma_short", "rs_ma_long",
  "trend_bull", "mom_bull", "rs_bull", "score", "raw_weight", "stop_level",
] as const;
export const EQUITY_COLUMNS = ["date", "equity", "port_ret", "num_positions", "btc_close"] as const;

// ── Helpers ──────────────────────────────────────────────────────────────────

const fmt8 = (v: number | null | undefined): string => (v === null || v === undefined ? "" : v.toFixed(8));

/** Asset name from a file path: "out/SOL.csv" → "SOL", "signals_SOL.csv" → "SOL". */
export function assetNameFromPath(file: string): string {
  return path.basename(file, ".csv").replace(/^signals_/, "");
}

/** Write through a temp file in the same directory, then rename over the target. */
export function writeFileAtomic(file: string, content: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, content, "utf-8");
  fs.renameSync(tmp, file);
}

function readRecords(file: string, asset: string): Record<string, string>[] {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (err) {
    throw new MalformedSeriesError(asset, file, null, `cannot read file: ${errorMessage(err)}`);
  }
  try {
    const records: unknown = parse(content, { columns: true, skip_empty_lines: true, trim: true });
    return RecordsSchema.parse(records);
  } catch (err) {
    throw new MalformedSeriesError(asset, file, null, errorMessage(err));
  }
}

function issueText(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "row"}: ${i.message}`).join("; ");
}

/** Sorted CSV files in `dir`, optionally restricted to a name prefix. Missing dir → []. */
export function listCsvFiles(dir: string, prefix = ""): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith(".csv") && f.startsWith(prefix))
    .sort()
    .map((f) => path.join(dir, f));
}

// ── Price files ──────────────────────────────────────────────────────────────

/**
 * Read a `date,open,high,low,close` file. Only date and close are required.
 * Throws MalformedSeriesError on an invalid row or on dates that are not
 * strictly increasing.
 */
export function readPriceSeries(file: string, name = assetNameFromPath(file)): PriceSeries {
  const records = readRecords(file, name);
  const bars: PriceBar[] = [];

  records.forEach((record, i) => {
    const row = i + 2; // header is line 1
    const result = PriceRowSchema.safeParse(record);
    if (!result.success) throw new MalformedSeriesError(name, file, row, issueText(result.error));

    const r = result.data;
    const prev = bars[bars.length - 1];
    if (prev && r.date <= prev.date) {
      throw new MalformedSeriesError(name, file, row, `date ${r.date} does not follow ${prev.date}`);
    }
    bars.push({
      date: r.date,
      close: r.close,
      ...(r.open !== null ? { open: r.open } : {}),
      ...(r.high !== null ? { high: r.high } : {}),
      ...(r.low !== null ? { low: r.low } : {}),
    });
  });

  return { name, bars };
}

function priceRows(bars: readonly PriceBar[]): string[][] {
  return bars.map((b) => [b.date, fmt8(b.open), fmt8(b.high), fmt8(b.low), fmt8(b.close)]);
}

export function writePriceCsv(file: string, bars: readonly PriceBar[]): void {
  writeFileAtomic(file, stringify(priceRows(bars), { header: true, columns: [...PRICE_COLUMNS] }));
}

/** Append rows without a header; creates the file (with header) when missing. */
export function appendPriceCsv(file: string, bars: readonly PriceBar[]): void {
  if (!fs.existsSync(file)) {
    writePriceCsv(file, bars);
    return;
  }
  fs.appendFileSync(file, stringify(priceRows(bars)), "utf-8");
}

/** Last parsable date in the first column, or null when the file is missing or empty. */
export function readLastCsvDate(file: string): string | null {
  if (!fs.existsSync(file)) return null;
  const rows: unknown = parse(fs.readFileSync(file, "utf-8"), {
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const parsed = z.array(z.array(z.string())).parse(rows);

  let last: string | null = null;
  for (const r of parsed) {
    if (r.length > 0 && isoDate.safeParse(r[0]).success) last = r[0].trim();
  }
  return last;
}

// ── Signal files ─────────────────────────────────────────────────────────────

export function signalsFileName(asset: string): string {
  return `signals_${asset}.csv`;
}

export function writeSignalsCsv(file: string, signals: readonly DailySignal[]): void {
  const rows = signals.map((s) => [
    s.date,
    fmt8(s.price),
    fmt8(s.maShort),
    fmt8(s.maLong),
    fmt8(s.rs),
    fmt8(s.rsMaShort),
    fmt8(s.rsMaLong),
    String(s.trendBull),
    String(s.momBull),
    String(s.rsBull),
    String(s.score),
    s.rawWeight.toFixed(4),
    fmt8(s.stopLevel),
  ]);
  writeFileAtomic(file, stringify(rows, { header: true, columns: [...SIGNAL_COLUMNS] }));
}

export function readSignalsCsv(file: string, asset = assetNameFromPath(file)): DailySignal[] {
  return readRecords(file, asset).map((record, i) => {
    const result = SignalRowSchema.safeParse(record);
    if (!result.success) throw new MalformedSeriesError(asset, file, i + 2, issueText(result.error));
    const r = result.data;
    return {
      date: r.date,
      price: r.close,
      maShort: r.ma_short,
      maLong: r.ma_long,
      rs: r.rs,
      rsMaShort: r.rs_ma_short,
      rsMaLong: r.rs_ma_long,
      trendBull: r.trend_bull,
      momBull: r.mom_bull,
      rsBull: r.rs_bull,
      score: r.score,
      rawWeight: r.raw_weight,
      stopLevel: r.stop_level,
    };
  });
}

// ── Equity curve ─────────────────────────────────────────────────────────────

export function writeEquityCurveCsv(file: string, states: readonly PortfolioState[]): void {
  const rows = states.map((s) => [
    s.date,
    fmt8(s.equity),
    fmt8(s.dailyReturn),
    String(s.activePositionCount),
    s.baselineClose.toFixed(2),
  ]);
  writeFileAtomic(file, stringify(rows, { header: true, columns: [...EQUITY_COLUMNS] }));
}
