import path from "path";
import { z } from "zod";
import type { StrategyParams } from "../analyzers/types";

// ── Environment ──────────────────────────────────────────────────────────────

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

export const EnvSchema = z.object({
  CG_PRO_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  INSIGHTS_MODEL: z.string().default("claude-sonnet-4-5-20250929"),
  INSIGHTS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}

// ── Dates ────────────────────────────────────────────────────────────────────

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");
const dailyAt = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");

export function toIsoDate(d: Date): string {
  return d.toISOString().split("T")[0];
}

export function addDays(isoDay: string, days: number): string {
  const d = new Date(`${isoDay}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return toIsoDate(d);
}

/** Default fetch window: the 30 days ending yesterday (UTC). */
export function defaultDateRange(now: Date = new Date()): { start: string; end: string } {
  const end = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() - 1));
  const start = new Date(end);
  start.setUTCDate(end.getUTCDate() - 30);
  return { start: toIsoDate(start), end: toIsoDate(end) };
}

// ── Strategy ─────────────────────────────────────────────────────────────────

export const StrategyConfigSchema = z
  .object({
    dataDir: z.string().default("out"),
    outDir: z.string().default(path.join("out", "signals")),
    baseline: z.string().default("BTC"),
    /** explicit asset CSVs; empty means every CSV in dataDir except the baseline */
    assets: z.array(z.string()).default([]),
    maShort: z.number().int().positive().default(3),
    maLong: z.number().int().positive().default(7),
    minSignals: z.number().int().min(1).max(3).default(2),
    shortAlts: z.boolean().default(false),
    btcHedge: z.number().min(0).max(1).default(0.3),
    stopLookback: z.number().int().positive().default(14),
    atrMult: z.number().positive().default(3.0),
    volMult: z.number().positive().default(2.5),
  })
  .refine((c) => c.maShort < c.maLong, { message: "maShort must be shorter than maLong", path: ["maShort"] });

export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;

export function strategyParams(c: StrategyConfig): StrategyParams {
  return {
    maShort: c.maShort,
    maLong: c.maLong,
    stopLookback: c.stopLookback,
    atrMult: c.atrMult,
    volMult: c.volMult,
    minSignals: c.minSignals,
    shortAlts: c.shortAlts,
  };
}

// ── OHLC ─────────────────────────────────────────────────────────────────────

export const OhlcConfigSchema = z
  .object({
    source: z.enum(["coingecko", "yahoo"]).default("coingecko"),
    outDir: z.string().default("out"),
    topN: z.number().int().positive().max(1000).default(100),
    vs: z.string().default("usd"),
    start: isoDate.optional(),
    end: isoDate.optional(),
    concurrency: z.number().int().positive().max(32).default(6),
    requestDelayMs: z.number().int().min(0).default(250),
    skipBtc: z.boolean().default(false),
    resume: z.boolean().default(false),
    writeManifest: z.boolean().default(true),
    lockFile: z.string().optional(),
    dailyAt: dailyAt.optional(),
  })
  .transform((c) => {
    const range = defaultDateRange();
    return { ...c, start: c.start ?? range.start, end: c.end ?? range.end };
  })
  .refine((c) => c.start <= c.end, { message: "start must not be after end", path: ["start"] });

export type OhlcConfig = z.infer<typeof OhlcConfigSchema>;

// ── Playbooks ────────────────────────────────────────────────────────────────

export const TradeConfigSchema = z.object({
  signalsDir: z.string().default(path.join("out", "signals")),
  outputJson: z.string().optional(),
  portfolioValue: z.number().positive().default(100_000),
  top: z.number().int().positive().default(10),
  maShort: z.number().int().positive().default(3),
  maLong: z.number().int().positive().default(7),
  minSignals: z.number().int().min(1).max(3).default(2),
  stopLookback: z.number().int().positive().default(14),
  atrMult: z.number().positive().default(3.0),
  volMult: z.number().positive().default(2.5),
});

export type TradeConfig = z.infer<typeof TradeConfigSchema>;

// ── Daemon ───────────────────────────────────────────────────────────────────

export const DaemonConfigSchema = z.object({
  continuous: z.boolean().default(false),
  portfolioValue: z.number().positive().default(100_000),
  riskCapPercent: z.number().positive().max(100).default(1.0),
  checkIntervalMinutes: z.number().int().positive().default(60),
  outDir: z.string().default("out"),
  /** stop after this many cycles in continuous mode */
  maxCycles: z.number().int().positive().optional(),
});

export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;
