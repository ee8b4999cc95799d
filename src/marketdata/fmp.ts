// src/marketdata/fmp.ts
import { z } from "zod";
import { log } from "../logger.js";
import { httpClient, toUpstreamError } from "../providers/http.js";
import { schedule } from "../providers/limits.js";

const FloatSchema = z.array(
  z.object({
    symbol: z.string(),
    floatShares: z.number().nullable().optional(),
  })
);

export class FmpClient {
  constructor(private readonly apiKey: string) {}

  /** Float shares for one symbol, or null when FMP has no figure. */
  async fetchFloatShares(symbol: string, signal?: AbortSignal): Promise<number | null> {
    const data = await schedule("fmp", "shorts", async () => {
      try {
        const res = await httpClient.get<unknown>("https://financialmodelingprep.com/stable/shares-float", {
          params: { symbol, apikey: this.apiKey },
          signal,
        });
        return res.data;
      } catch (err) {
        throw toUpstreamError("shorts", err);
      }
    });
    const parsed = FloatSchema.safeParse(data);
    if (!parsed.success) {
      log.warn("[FMP] unexpected shares-float payload", { symbol });
      return null;
    }
    const float = parsed.data.find((r) => r.symbol.toUpperCase() === symbol)?.floatShares;
    return typeof float === "number" && float > 0 ? float : null;
  }
}
