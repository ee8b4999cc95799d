import { FetchCache, cacheKey } from "../cache/FetchCache.js";
import type { Cfg } from "../config.js";
import type { Settings } from "../engine/settings.js";
import type { Upstream } from "../engine/upstream.js";
import { UpstreamAuthError } from "../errors.js";
import { log } from "../logger.js";
import { FmpClient } from "../marketdata/fmp.js";
import { PolygonClient } from "../marketdata/polygon.js";
import { Trading212Client } from "../marketdata/trading212.js";
import type { PriceBar, RawPost, ShortAvailability } from "../types.js";
import { RedditClient } from "./reddit.js";

/** Share of the per-fetch timeout after which a subreddit stops requesting comments. */
const COMMENT_BUDGET_SHARE = 0.8;

const warnedMissing = new Set<string>();
function warnOnce(key: string, message: string) {
  if (warnedMissing.has(key)) return;
  warnedMissing.add(key);
  log.warn(message);
}

/** A failed part of the short data is logged and left out; auth failures propagate. */
function partOf<T>(r: PromiseSettledResult<T>, part: string, symbol: string): T | null {
  if (r.status === "fulfilled") return r.value;
  if (r.reason instanceof UpstreamAuthError) throw r.reason;
  log.warn("[SHORTS] partial data", {
    symbol,
    missing: part,
    error: r.reason instanceof Error ? r.reason.message : String(r.reason),
  });
  return null;
}

/** % of float short, when both figures are known. */
export function shortInterestPct(shortShares: number | null, floatShares: number | null): number | null {
  if (shortShares === null || floatShares === null || !(floatShares > 0)) return null;
  return (shortShares / floatShares) * 100;
}

/** Wire the HTTP providers behind the engine's Upstream interface. */
export function createHttpUpstream(cfg: Cfg, settings: Settings): Upstream {
  const reddit =
    cfg.REDDIT_CLIENT_ID && cfg.REDDIT_CLIENT_SECRET && cfg.REDDIT_USERNAME && cfg.REDDIT_PASSWORD
      ? new RedditClient({
          clientId: cfg.REDDIT_CLIENT_ID,
          clientSecret: cfg.REDDIT_CLIENT_SECRET,
          username: cfg.REDDIT_USERNAME,
          password: cfg.REDDIT_PASSWORD,
        })
      : null;
  const polygon = cfg.POLYGON_API_KEY ? new PolygonClient(cfg.POLYGON_API_KEY) : null;
  const fmp = cfg.FMP_API_KEY ? new FmpClient(cfg.FMP_API_KEY) : null;
  const t212 = cfg.TRADING212_API_KEY ? new Trading212Client(cfg.TRADING212_API_KEY) : null;

  // one instrument list shared by every ticker
  const instruments = new FetchCache<Set<string>>({
    source: "shorts",
    backoffBaseMs: settings.backoff.baseMs,
    backoffMaxMs: settings.backoff.maxMs,
  });

  return {
    async fetchPosts(subreddit: string, signal: AbortSignal): Promise<RawPost[]> {
      if (!reddit) throw new UpstreamAuthError("posts", "REDDIT_* credentials missing");
      return reddit.fetchPosts(
        subreddit,
        {
          maxPosts: cfg.MAX_POSTS_PER_SUBREDDIT,
          maxComments: cfg.MAX_COMMENTS_PER_POST,
          maxTextLength: settings.maxTextLength,
          budgetMs: settings.fetchTimeoutMs * COMMENT_BUDGET_SHARE,
        },
        signal
      );
    },

    async fetchDailyBars(symbol: string, from: string, to: string, signal: AbortSignal): Promise<PriceBar[]> {
      if (!polygon) {
        warnOnce("polygon", "[POLYGON] POLYGON_API_KEY missing; no price bars");
        return [];
      }
      return polygon.fetchDailyBars(symbol, from, to, signal);
    },

    async fetchShortAvailability(symbol: string, signal: AbortSignal): Promise<ShortAvailability | null> {
      if (!t212 && !polygon) {
        warnOnce("shorts", "[SHORTS] no TRADING212_API_KEY or POLYGON_API_KEY; short data absent");
        return null;
      }
      const [listedR, shortR, floatR] = await Promise.allSettled([
        t212
          ? instruments.get(cacheKey("shorts", "*", "instruments"), settings.ttl.instrumentsMs, () =>
              t212.fetchShortableSymbols(signal)
            )
          : Promise.resolve(null),
        polygon ? polygon.fetchShortInterestShares(symbol, signal) : Promise.resolve(null),
        fmp ? fmp.fetchFloatShares(symbol, signal) : Promise.resolve(null),
      ]);
      // nothing came back at all: let the engine see the failure
      if (listedR.status === "rejected" && shortR.status === "rejected" && floatR.status === "rejected") {
        throw listedR.reason;
      }
      const listed = partOf(listedR, "shortable", symbol);
      const shortShares = partOf(shortR, "shortInterest", symbol);
      const floatShares = partOf(floatR, "floatShares", symbol);
      return {
        shortable: listed?.has(symbol) ?? false,
        shortInterestPct: shortInterestPct(shortShares, floatShares),
      };
    },

    invalidate() {
      instruments.invalidate("*");
    },
  };
}
