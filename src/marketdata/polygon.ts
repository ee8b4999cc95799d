// src/marketdata/polygon.ts
import { z } from "zod";
import { dayKey } from "../engine/clock.js";
import { log } from "../logger.js";
import type { PriceBar } from "../types.js";
import { httpClient, toUpstreamError } from "../providers/http.js";
import { schedule } from "../providers/limits.js";

const BASE = "https://api.polygon.io";

const AggsSchema = z.object({
  results: z.array(z.record(z.string(), z.unknown())).optional(),
});

const ShortInterestSchema = z.object({
  results: z
    .array(
      z.object({
        ticker: z.string().optional(),
        short_interest: z.number(),
        settlement_date: z.string().optional(),
      })
    )
    .optional(),
});

const num = (v: unknown) => (typeof v === "number" ? v : Number.NaN);

/**
 * Normalize one aggregate row. Non-numeric fields come through as NaN and are
 * rejected by the engine's bar validation.
 */
export function mapAggRow(symbol: string, row: Record<string, unknown>): PriceBar {
  const t = num(row.t);
  return {
    symbol,
    date: Number.isFinite(t) ? dayKey(t) : "",
    open: num(row.o),
    high: num(row.h),
    low: num(row.l),
    close: num(row.c),
    volume: num(row.v),
  };
}

export class PolygonClient {
  constructor(private readonly apiKey: string) {}

  /** Daily bars, oldest first, `from`..`to` inclusive (YYYY-MM-DD). */
  async fetchDailyBars(symbol: string, from: string, to: string, signal?: AbortSignal): Promise<PriceBar[]> {
    const url = `${BASE}/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/1/day/${from}/${to}`;
    const data = await schedule("polygon", "bars", async () => {
      try {
        const res = await httpClient.get<unknown>(url, {
          params: { adjusted: "true", sort: "asc", limit: 120, apiKey: this.apiKey },
          signal,
        });
        return res.data;
      } catch (err) {
        throw toUpstreamError("bars", err);
      }
    });
    const rows = AggsSchema.parse(data).results ?? [];
    return rows.map((r) => mapAggRow(symbol, r));
  }

  /** Latest settled short interest (shares), or null if none reported. */
  async fetchShortInterestShares(symbol: string, signal?: AbortSignal): Promise<number | null> {
    const data = await schedule("polygon", "shorts", async () => {
      try {
        const res = await httpClient.get<unknown>(`${BASE}/stocks/v1/short-interest`, {
          params: { ticker: symbol, limit: 1, sort: "settlement_date.desc", apiKey: this.apiKey },
          signal,
        });
        return res.data;
      } catch (err) {
        throw toUpstreamError("shorts", err);
      }
    });
    const parsed = ShortInterestSchema.safeParse(data);
    if (!parsed.success) {
      log.warn("[POLYGON] unexpected short-interest payload", { symbol });
      return null;
    }
    return parsed.data.results?.[0]?.short_interest ?? null;
  }
}
