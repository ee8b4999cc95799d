// src/marketdata/trading212.ts
import { z } from "zod";
import { httpClient, toUpstreamError } from "../providers/http.js";
import { schedule } from "../providers/limits.js";

const InstrumentsSchema = z.array(
  z
    .object({
      ticker: z.string(),
      shortName: z.string().optional(),
      type: z.string().optional(),
    })
    .passthrough()
);

/** Trading212 tickers look like "GME_US_EQ"; the short name is the plain symbol. */
export function symbolOf(instrument: { ticker: string; shortName?: string }): string {
  return (instrument.shortName ?? instrument.ticker.split("_")[0] ?? "").toUpperCase();
}

export class Trading212Client {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl = "https://live.trading212.com/api/v0"
  ) {}

  /**
   * Symbols listed as tradable stocks or ETFs. The public API has no explicit
   * short flag, so a listed equity instrument is taken as shortable (CFD side).
   */
  async fetchShortableSymbols(signal?: AbortSignal): Promise<Set<string>> {
    const data = await schedule("trading212", "shorts", async () => {
      try {
        const res = await httpClient.get<unknown>(`${this.baseUrl}/equity/metadata/instruments`, {
          headers: { Authorization: this.apiKey },
          signal,
        });
        return res.data;
      } catch (err) {
        throw toUpstreamError("shorts", err);
      }
    });
    const out = new Set<string>();
    for (const inst of InstrumentsSchema.parse(data)) {
      if (inst.type && inst.type !== "STOCK" && inst.type !== "ETF") continue;
      const sym = symbolOf(inst);
      if (sym) out.add(sym);
    }
    return out;
  }
}
