import { type Clock, systemClock } from "../engine/clock.js";
import { CycleCancelledError, UpstreamAuthError, UpstreamRateLimited } from "../errors.js";
import { log, type Logger } from "../logger.js";
import type { SourceName } from "../types.js";

/** failures kept in the log */
const MAX_FAILURES = 100;

export type CacheEntry<T> = {
  key: string;
  value: T;
  fetchedAt: number;
  ttlMs: number;
};

export type FailureRecord = {
  key: string;
  at: number;
  error: string;
  servedStale: boolean;
};

export type FetchCacheOptions = {
  source: SourceName;
  clock?: Clock;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  logger?: Logger;
};

/** `source:ticker:period`, e.g. `bars:GME:2024-05-01`. */
export function cacheKey(source: SourceName, subject: string, period: string): string {
  return `${source}:${subject}:${period}`;
}

/**
 * TTL cache in front of one upstream source.
 *
 * - fresh hit → cached value, no fetch
 * - concurrent misses on a key share one in-flight fetch
 * - a failed fetch serves the last value if there is one and extends the
 *   source's cool-down (doubling per consecutive failure, reset on success)
 * - during cool-down nothing is fetched
 * - auth failures and cancellations always propagate, without back-off
 */
export class FetchCache<T> {
  readonly source: SourceName;
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inflight = new Map<string, Promise<T>>();
  private readonly clock: Clock;
  private readonly baseMs: number;
  private readonly maxMs: number;
  private readonly logger: Logger;
  private consecutiveFailures = 0;
  private coolDownUntil = 0;
  private failureLog: FailureRecord[] = [];
  private fetches = 0;
  private hits = 0;

  constructor(opts: FetchCacheOptions) {
    this.source = opts.source;
    this.clock = opts.clock ?? systemClock;
    this.baseMs = opts.backoffBaseMs ?? 30_000;
    this.maxMs = opts.backoffMaxMs ?? 30 * 60_000;
    this.logger = opts.logger ?? log;
  }

  async get(key: string, ttlMs: number, fetchFn: () => Promise<T>): Promise<T> {
    const now = this.clock.now();
    const entry = this.entries.get(key);
    if (entry && now - entry.fetchedAt < ttlMs) {
      this.hits++;
      return entry.value;
    }

    const pending = this.inflight.get(key);
    if (pending) return pending;

    if (now < this.coolDownUntil) {
      if (entry) {
        this.hits++;
        return entry.value;
      }
      throw new UpstreamRateLimited(
        this.source,
        `${this.source} cooling down for ${this.coolDownUntil - now}ms`,
        this.coolDownUntil - now
      );
    }

    const run = this.fetchAndStore(key, ttlMs, fetchFn).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, run);
    return run;
  }

  private async fetchAndStore(key: string, ttlMs: number, fetchFn: () => Promise<T>): Promise<T> {
    this.fetches++;
    try {
      const value = await fetchFn();
      this.entries.set(key, { key, value, fetchedAt: this.clock.now(), ttlMs });
      this.consecutiveFailures = 0;
      this.coolDownUntil = 0;
      return value;
    } catch (err) {
      if (err instanceof UpstreamAuthError || err instanceof CycleCancelledError) throw err;

      const stale = this.entries.get(key);
      this.registerFailure(key, err, stale !== undefined);
      if (stale) return stale.value;
      throw err;
    }
  }

  private registerFailure(key: string, err: unknown, servedStale: boolean): void {
    const now = this.clock.now();
    this.consecutiveFailures++;
    const backoff = Math.min(this.maxMs, this.baseMs * 2 ** (this.consecutiveFailures - 1));
    const retryAfter = err instanceof UpstreamRateLimited && err.retryAfterMs ? err.retryAfterMs : 0;
    this.coolDownUntil = now + Math.max(backoff, retryAfter);

    const message = err instanceof Error ? err.message : String(err);
    this.failureLog.push({ key, at: now, error: message, servedStale });
    if (this.failureLog.length > MAX_FAILURES) this.failureLog.shift();

    this.logger.warn("[CACHE] upstream failure", {
      source: this.source,
      key,
      error: message,
      servedStale,
      coolDownMs: this.coolDownUntil - now,
    });
  }

  /** Clear one key, or everything with "*". */
  invalidate(key: string | "*"): number {
    if (key === "*") {
      const n = this.entries.size;
      this.entries.clear();
      return n;
    }
    return this.entries.delete(key) ? 1 : 0;
  }

  /** Clear every key starting with `prefix`. */
  invalidatePrefix(prefix: string): number {
    let n = 0;
    for (const k of [...this.entries.keys()]) {
      if (k.startsWith(prefix)) {
        this.entries.delete(k);
        n++;
      }
    }
    return n;
  }

  isCoolingDown(): boolean {
    return this.clock.now() < this.coolDownUntil;
  }

  stats() {
    return {
      source: this.source,
      size: this.entries.size,
      inflight: this.inflight.size,
      fetches: this.fetches,
      hits: this.hits,
      consecutiveFailures: this.consecutiveFailures,
      coolDownUntil: this.coolDownUntil,
      recentFailures: this.failureLog.slice(-10),
    };
  }
}
