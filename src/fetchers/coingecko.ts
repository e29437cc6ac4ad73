import axios from "axios";
import { z } from "zod";
import logger from "../utils/logger";
import { delay } from "../utils/async";
import type { PriceBar } from "../analyzers/types";
import type { AssetRef, DateRange, OhlcSource } from "./types";

// ── Config ───────────────────────────────────────────────────────────────────

const CG_BASE          = "https://pro-api.coingecko.com/api/v3";
const PAGE_SIZE        = 250;    // /coins/markets hard limit
const CHUNK_DAYS       = 180;    // /ohlc/range max span per request
const MAX_RETRIES      = 6;
const BACKOFF_STEP_MS  = 300;    // linear backoff when no Retry-After
const REQUEST_TIMEOUT  = 20_000;
const DAY_SECONDS      = 86_400;

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const MarketsSchema = z.array(
  z.object({
    id: z.string(),
    symbol: z.string(),
    name: z.string(),
    market_cap_rank: z.number().nullable().optional(),
  }),
);

const OhlcResponseSchema = z.array(z.array(z.number()));

// ── HTTP ─────────────────────────────────────────────────────────────────────

export interface JsonResponse {
  status: number;
  retryAfter: string | undefined;
  data: unknown;
}

export type JsonGetter = (url: string, params: Record<string, string | number>) => Promise<JsonResponse>;

function axiosGetter(apiKey: string): JsonGetter {
  return async (url, params) => {
    const resp = await axios.get<unknown>(url, {
      params,
      headers: { "x-cg-pro-api-key": apiKey, "User-Agent": "rs-momentum-backtester" },
      timeout: REQUEST_TIMEOUT,
      validateStatus: () => true,
    });
    const ra: unknown = resp.headers["retry-after"];
    return {
      status: resp.status,
      retryAfter: typeof ra === "string" ? ra : typeof ra === "number" ? String(ra) : undefined,
      data: resp.data,
    };
  };
}

/** Retry-After seconds when parsable, else 300ms × attempt. */
export function backoffMs(attempt: number, retryAfter: string | undefined): number {
  const secs = retryAfter !== undefined ? Number.parseInt(retryAfter, 10) : NaN;
  return Number.isFinite(secs) && secs >= 0 ? secs * 1000 : BACKOFF_STEP_MS * attempt;
}

// ── Normalization ────────────────────────────────────────────────────────────

/**
 * Collapse [timestampMs, open, high, low, close] candles to one bar per UTC
 * date, keeping the last candle of each day. Output is date-ascending.
 */
export function normalizeDailyBars(raw: readonly (readonly number[])[]): PriceBar[] {
  const candles = raw.filter((r) => r.length >= 5).slice().sort((a, b) => a[0] - b[0]);
  const byDate = new Map<string, PriceBar>();
  for (const [ts, open, high, low, close] of candles) {
    const date = new Date(ts).toISOString().split("T")[0];
    byDate.set(date, { date, open, high, low, close });
  }
  return [...byDate.values()];
}

/** [from, to] unix-second windows of at most 180 days covering the range. */
export function rangeChunks(range: DateRange): [number, number][] {
  const fromTs = Date.parse(`${range.start}T00:00:00Z`) / 1000;
  const toTs = Date.parse(`${range.end}T23:59:59Z`) / 1000;
  const chunks: [number, number][] = [];
  let cur = fromTs;
  while (cur < toTs) {
    const end = Math.min(cur + CHUNK_DAYS * DAY_SECONDS, toTs);
    chunks.push([cur, end]);
    cur = end + 1;
  }
  return chunks;
}

// ── Source ───────────────────────────────────────────────────────────────────

export interface CoinGeckoOptions {
  apiKey: string;
  vs: string;
  requestDelayMs: number;
  /** swapped out in tests */
  get?: JsonGetter;
}

export class CoinGeckoSource implements OhlcSource {
  readonly name = "coingecko";
  private readonly get: JsonGetter;

  constructor(private readonly opts: CoinGeckoOptions) {
    this.get = opts.get ?? axiosGetter(opts.apiKey);
  }

  /** GET with up to 6 retries on any non-2xx status. */
  async getJson(url: string, params: Record<string, string | number>): Promise<unknown> {
    for (let attempt = 1; ; attempt++) {
      const resp = await this.get(url, params);
      if (resp.status >= 200 && resp.status < 300) return resp.data;

      if (attempt > MAX_RETRIES) {
        throw new Error(`HTTP ${resp.status} after ${MAX_RETRIES} retries: ${url}`);
      }
      const wait = backoffMs(attempt, resp.retryAfter);
      logger.info(`${resp.status} from ${url}; retrying in ${wait}ms`);
      await delay(wait);
    }
  }

  async listTopAssets(n: number): Promise<AssetRef[]> {
    const out: AssetRef[] = [];
    for (let page = 1; out.length < n; page++) {
      const data = await this.getJson(`${CG_BASE}/coins/markets`, {
        vs_currency: this.opts.vs,
        order: "market_cap_desc",
        per_page: Math.min(PAGE_SIZE, n - out.length),
        page,
        sparkline: "false",
      });
      const batch = MarketsSchema.parse(data).filter((c) => c.id.length > 0);
      if (batch.length === 0) break;
      for (const c of batch) {
        out.push({
          id: c.id,
          symbol: c.symbol.toUpperCase(),
          name: c.name,
          marketCapRank: c.market_cap_rank ?? null,
        });
      }
    }

    return out
      .sort((a, b) => (a.marketCapRank ?? Infinity) - (b.marketCapRank ?? Infinity))
      .slice(0, n);
  }

  async fetchDailyBars(asset: AssetRef, range: DateRange): Promise<PriceBar[]> {
    const raw: number[][] = [];
    for (const [from, to] of rangeChunks(range)) {
      const data = await this.getJson(`${CG_BASE}/coins/${asset.id}/ohlc/range`, {
        vs_currency: this.opts.vs,
        from,
        to,
        interval: "daily",
      });
      raw.push(...OhlcResponseSchema.parse(data));
      await delay(this.opts.requestDelayMs);
    }
    return normalizeDailyBars(raw);
  }
}
