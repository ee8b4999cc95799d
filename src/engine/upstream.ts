import type { PriceBar, RawPost, ShortAvailability } from "../types.js";

/**
 * Everything the engine pulls from the outside world. Implementations do the
 * transport; the engine adds caching, timeouts, validation and back-off.
 * Errors should be mapped to the Upstream* classes in errors.ts.
 */
export interface Upstream {
  fetchPosts(subreddit: string, signal: AbortSignal): Promise<RawPost[]>;
  /** Daily bars for `from`..`to` inclusive, YYYY-MM-DD. */
  fetchDailyBars(symbol: string, from: string, to: string, signal: AbortSignal): Promise<PriceBar[]>;
  /** null when the source knows nothing about the symbol */
  fetchShortAvailability(symbol: string, signal: AbortSignal): Promise<ShortAvailability | null>;
  /** Drop whatever the transport caches on its own (e.g. instrument lists). */
  invalidate?(): void;
}
