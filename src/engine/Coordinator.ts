// src/engine/Coordinator.ts
import EventEmitter from "events";
import { FetchCache, cacheKey } from "../cache/FetchCache.js";
import type { HistoryDB, PersistedState } from "../db/HistoryDB.js";
import {
  CycleCancelledError,
  DataParseError,
  UpstreamAuthError,
  UpstreamTimeout,
  isTransient,
} from "../errors.js";
import { log, type Logger } from "../logger.js";
import { nextStage } from "../pipeline/classify.js";
import { extractTickers, isValidSymbol } from "../pipeline/extract.js";
import { stepLikelihood } from "../pipeline/likelihood.js";
import { impactScore } from "../pipeline/score.js";
import { bucketOf, polarity } from "../pipeline/sentiment.js";
import { collectSubScores } from "../pipeline/signals.js";
import { loadBlacklist, loadLexicon, loadSymbolNames, type Lexicon } from "../resources.js";
import { HistoryStore } from "../store/HistoryStore.js";
import { TickerRegistry, toSnapshot } from "../store/TickerRegistry.js";
import type {
  CycleStatus,
  DailyAggregate,
  EngineSnapshot,
  MarketOverview,
  PriceBar,
  RawPost,
  ShortAvailability,
  SourceName,
  StageTransition,
  TickerSnapshot,
  Weights,
} from "../types.js";
import { type Clock, DAY_MS, addDays, dayDiff, dayKey, systemClock } from "./clock.js";
import { collectWithin, deadline, whenAborted } from "./pool.js";
import { BarSchema, PostSchema, ShortAvailabilitySchema } from "./schemas.js";
import { type Settings, type SettingsInput, parseSettings, parseWeights } from "./settings.js";
import type { Upstream } from "./upstream.js";

/** Seen post ids are kept this many days; hot listings rotate well within it. */
const SEEN_RETENTION_DAYS = 3;
const TRENDING_MIN_MENTIONS = 2;
const TRENDING_LIMIT = 15;
const TOP_TICKERS = 3;

export type DegradedNotice = {
  source: SourceName;
  key: string;
  error: string;
};

type CoordinatorEvents = {
  cycle: [EngineSnapshot];
  transition: [StageTransition];
  "auth-error": [UpstreamAuthError];
  degraded: [DegradedNotice];
};

export type CoordinatorOptions = {
  upstream: Upstream;
  settings?: Settings;
  clock?: Clock;
  logger?: Logger;
  db?: HistoryDB;
  symbolNames?: ReadonlyMap<string, string>;
  blacklist?: ReadonlySet<string>;
  lexicon?: Lexicon;
};

type Draft = {
  store: HistoryStore;
  registry: TickerRegistry;
  seen: Map<string, string>;
};

type Tally = {
  postsProcessed: number;
  skippedItems: number;
  subreddits: string[];
  degraded: Set<SourceName>;
  polarities: number[];
  timedOut: boolean;
};

type MarketJob = { kind: "bars" | "shorts"; symbol: string };

type MarketValue = { kind: "bars"; bars: PriceBar[] } | { kind: "shorts"; short: ShortAvailability | null };

/** Per ticker; null where the fetch failed or was not ready by the deadline. */
type MarketResult = {
  bars: PriceBar[] | null;
  short: { value: ShortAvailability | null } | null;
};

const emptyOverview = (): MarketOverview =>
  Object.freeze({
    totalMentions: 0,
    averageSentiment: 0,
    sentimentDistribution: { positive: 0, neutral: 0, negative: 0 },
    trending: [],
    topTickers: [],
    postsProcessed: 0,
    subredditsProcessed: [],
    skippedItems: 0,
    degradedSources: [],
    status: "idle",
    lastUpdated: null,
  });

function itemIdOf(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") return raw.id;
  return null;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run `fn` with its own abort signal, cut off after `ms`. Cancelling `parent`
 * aborts it too and surfaces as CycleCancelledError.
 */
export async function withTimeout<T>(
  source: SourceName,
  ms: number,
  parent: AbortSignal,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (parent.aborted) throw new CycleCancelledError();
  const ac = new AbortController();
  const onAbort = () => ac.abort();
  parent.addEventListener("abort", onAbort, { once: true });
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      ac.abort();
      reject(new UpstreamTimeout(source, ms));
    }, ms);
  });
  try {
    return await Promise.race([fn(ac.signal), timeout]);
  } catch (err) {
    if (parent.aborted) throw new CycleCancelledError();
    throw err;
  } finally {
    clearTimeout(timer);
    parent.removeEventListener("abort", onAbort);
  }
}

/**
 * Owns the engine state and runs poll cycles: fetch → extract → aggregate →
 * score → classify → evict → commit. Each cycle works on a draft copy of the
 * store and registry; readers only ever see the last committed snapshot.
 */
export class Coordinator extends EventEmitter {
  private settings: Settings;
  private readonly upstream: Upstream;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly db: HistoryDB | null;
  private readonly names: ReadonlyMap<string, string>;
  private readonly known: ReadonlySet<string>;
  private readonly blacklist: ReadonlySet<string>;
  private readonly lexicon: Lexicon;

  private caches: {
    posts: FetchCache<RawPost[]>;
    bars: FetchCache<PriceBar[]>;
    shorts: FetchCache<ShortAvailability | null>;
  };

  private store = new HistoryStore();
  private registry = new TickerRegistry();
  private seenPosts = new Map<string, string>();
  private readonly suspended = new Set<SourceName>();
  private snapshot: EngineSnapshot = Object.freeze({ tickers: [], overview: emptyOverview() });

  private queue: Promise<unknown> = Promise.resolve();
  private current: AbortController | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  override on<K extends keyof CoordinatorEvents>(
    eventName: K,
    listener: (...args: CoordinatorEvents[K]) => void
  ): this {
    return super.on(eventName, listener);
  }

  constructor(opts: CoordinatorOptions) {
    super();
    this.upstream = opts.upstream;
    this.settings = opts.settings ?? parseSettings({});
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? log;
    this.db = opts.db ?? null;
    this.names = opts.symbolNames ?? loadSymbolNames();
    this.known = new Set(this.names.keys());
    this.blacklist = opts.blacklist ?? loadBlacklist();
    this.lexicon = opts.lexicon ?? loadLexicon();
    this.caches = this.buildCaches();
    if (this.db) this.restore(this.db.load());
  }

  private buildCaches() {
    const common = {
      clock: this.clock,
      logger: this.logger,
      backoffBaseMs: this.settings.backoff.baseMs,
      backoffMaxMs: this.settings.backoff.maxMs,
    };
    return {
      posts: new FetchCache<RawPost[]>({ source: "posts", ...common }),
      bars: new FetchCache<PriceBar[]>({ source: "bars", ...common }),
      shorts: new FetchCache<ShortAvailability | null>({ source: "shorts", ...common }),
    };
  }

  private restore(state: PersistedState): void {
    this.store.restore(state.aggregates, state.bars);
    for (const r of state.records) this.registry.set(r);
    for (const p of state.seen) this.seenPosts.set(p.id, p.day);
    const today = dayKey(this.clock.now());
    this.snapshot = Object.freeze({
      tickers: this.buildTickerSnapshots(this.registry, this.store, today),
      overview: emptyOverview(),
    });
    this.logger.info("[DB] restored", {
      tickers: this.registry.size,
      aggregates: state.aggregates.length,
      bars: state.bars.length,
    });
  }

  /* ---------------- scheduling ---------------- */

  /** Run a cycle now and then every `updateIntervalMs`. */
  start(): void {
    if (this.timer) return;
    const tick = () => {
      this.refreshNow().catch((err: unknown) => {
        if (err instanceof CycleCancelledError) this.logger.warn("[CYCLE] cancelled");
        else this.logger.error("[CYCLE] failed:", err);
      });
    };
    tick();
    this.timer = setInterval(tick, this.settings.updateIntervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.cancel();
  }

  /**
   * Queue an immediate cycle behind any running one. With a symbol, only that
   * ticker's market data is refreshed (its cache entries are dropped first)
   * and only it is re-scored.
   */
  refreshNow(symbol?: string): Promise<EngineSnapshot> {
    const only = symbol === undefined ? null : symbol.trim().toUpperCase();
    const run = this.queue.then(() => {
      if (only !== null) {
        this.caches.bars.invalidatePrefix(cacheKey("bars", only, ""));
        this.caches.shorts.invalidatePrefix(cacheKey("shorts", only, ""));
      }
      return this.runCycle(only);
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Abort the in-flight cycle; its draft is dropped. */
  cancel(): boolean {
    if (!this.current) return false;
    this.current.abort();
    return true;
  }

  /* ---------------- operations ---------------- */

  getSnapshot(): EngineSnapshot {
    return this.snapshot;
  }

  getSettings(): Settings {
    return this.settings;
  }

  /** Validate and replace the weights. Takes effect from the next cycle. */
  setWeighting(input: unknown): Weights {
    const weights = parseWeights(input);
    this.settings = { ...this.settings, weights };
    this.logger.info("[CONFIG] weights set", weights);
    return weights;
  }

  /** Drop every cached upstream value; the next cycle refetches. */
  forceUpdateCache(): number {
    const dropped =
      this.caches.posts.invalidate("*") + this.caches.bars.invalidate("*") + this.caches.shorts.invalidate("*");
    this.upstream.invalidate?.();
    this.logger.info("[CACHE] invalidated", { entries: dropped });
    return dropped;
  }

  /** Purge history, tracked tickers, seen posts and the persisted copy. */
  clearHistoricalData(): void {
    this.cancel();
    this.store = new HistoryStore();
    this.registry = new TickerRegistry();
    this.seenPosts = new Map();
    this.db?.clear();
    this.snapshot = Object.freeze({ tickers: [], overview: emptyOverview() });
    this.logger.info("[STORE] historical data cleared");
  }

  /**
   * Replace the settings (validated first; an invalid input changes nothing),
   * cancel the running cycle and resume sources suspended by auth failures.
   */
  reconfigure(input: SettingsInput): Settings {
    const next = parseSettings(input);
    this.cancel();
    const backoffChanged =
      next.backoff.baseMs !== this.settings.backoff.baseMs || next.backoff.maxMs !== this.settings.backoff.maxMs;
    this.settings = next;
    if (backoffChanged) this.caches = this.buildCaches();
    this.suspended.clear();
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.start();
    }
    this.logger.info("[CONFIG] reconfigured", { subreddits: next.subreddits, weights: next.weights });
    return next;
  }

  isSuspended(source: SourceName): boolean {
    return this.suspended.has(source);
  }

  cacheStats() {
    return {
      posts: this.caches.posts.stats(),
      bars: this.caches.bars.stats(),
      shorts: this.caches.shorts.stats(),
    };
  }

  /* ---------------- the cycle ---------------- */

  private async runCycle(only: string | null): Promise<EngineSnapshot> {
    const controller = new AbortController();
    this.current = controller;
    const { signal } = controller;
    const settings = this.settings;
    const started = this.clock.now();
    const current = this.store.currentDay;
    const today = dayKey(started);
    // a clock stepping back across midnight keeps writing to the newer day
    const day = current && today < current ? current : today;

    const draft: Draft = {
      store: this.store.clone(),
      registry: this.registry.clone(),
      seen: new Map(this.seenPosts),
    };
    draft.store.beginDay(day);

    const tally: Tally = {
      postsProcessed: 0,
      skippedItems: 0,
      subreddits: [],
      degraded: new Set(),
      polarities: [],
      timedOut: false,
    };
    const limit = deadline(settings.cycleTimeoutMs);
    const stop = Promise.race([limit.promise, whenAborted(signal)]);

    this.logger.info("[CYCLE] start", { day, only: only ?? "all" });
    try {
      if (only === null) {
        await this.ingestPosts(draft, day, settings, signal, stop, tally);
        this.throwIfCancelled(signal);
        this.registerCandidates(draft, day, started, settings);
      }

      const targets = only === null ? draft.registry.symbols() : draft.registry.has(only) ? [only] : [];
      const market = await this.fetchMarket(targets, day, settings, signal, stop, tally);
      this.throwIfCancelled(signal);

      const transitions = this.scoreTickers(draft, targets, market, started, day, settings, tally);
      if (only === null) this.evict(draft, day, settings);
      draft.store.prune(day, settings.historyDays);
      const seenCutoff = addDays(day, -SEEN_RETENTION_DAYS);
      for (const [id, seenDay] of draft.seen) if (seenDay <= seenCutoff) draft.seen.delete(id);

      this.throwIfCancelled(signal);
      return this.commit(draft, day, only, tally, transitions);
    } catch (err) {
      if (err instanceof CycleCancelledError) {
        this.logger.warn("[CYCLE] cancelled; draft discarded", { day });
      }
      throw err;
    } finally {
      limit.clear();
      if (this.current === controller) this.current = null;
      this.logger.info("[CYCLE] end", { tookMs: this.clock.now() - started });
    }
  }

  private throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) throw new CycleCancelledError();
  }

  private fetchThrough<T>(
    source: SourceName,
    cache: FetchCache<T>,
    key: string,
    ttlMs: number,
    signal: AbortSignal,
    fn: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    if (this.suspended.has(source)) {
      return Promise.reject(new UpstreamAuthError(source, `${source} suspended after an auth failure`));
    }
    return cache.get(key, ttlMs, () => withTimeout(source, this.settings.fetchTimeoutMs, signal, fn));
  }

  private handleFetchError(source: SourceName, key: string, err: unknown, tally: Tally): void {
    if (err instanceof CycleCancelledError) return;
    tally.degraded.add(source);
    if (err instanceof UpstreamAuthError) {
      if (!this.suspended.has(source)) {
        this.suspended.add(source);
        this.logger.error("[AUTH] source suspended until reconfigured", { source, error: err.message });
        this.fire("auth-error", err);
      }
      return;
    }
    if (!isTransient(err)) this.logger.error("[FETCH] unexpected failure", { source, key, err });
    this.fire("degraded", { source, key, error: errorText(err) });
  }

  private async ingestPosts(
    draft: Draft,
    day: string,
    settings: Settings,
    signal: AbortSignal,
    stop: Promise<unknown>,
    tally: Tally
  ): Promise<void> {
    const subs = settings.subreddits;
    const keyOf = (sub: string) => cacheKey("posts", sub, "hot");
    const { results, complete } = await collectWithin(
      subs,
      (sub) =>
        this.fetchThrough("posts", this.caches.posts, keyOf(sub), settings.ttl.postsMs, signal, (s) =>
          this.upstream.fetchPosts(sub, s)
        ),
      { concurrency: settings.concurrency, stop, logger: this.logger }
    );
    if (!complete) tally.timedOut = true;

    for (const sub of subs) {
      const r = results.get(sub);
      if (!r) {
        tally.degraded.add("posts");
        continue;
      }
      if (r.status === "rejected") {
        this.handleFetchError("posts", keyOf(sub), r.reason, tally);
        continue;
      }
      tally.subreddits.push(sub);
      for (const raw of r.value) this.ingestPost(raw, draft, day, settings, tally);
    }
    this.logger.info("[POSTS] ingested", {
      processed: tally.postsProcessed,
      subreddits: tally.subreddits.length,
      skipped: tally.skippedItems,
    });
  }

  private ingestPost(raw: unknown, draft: Draft, day: string, settings: Settings, tally: Tally): void {
    const parsed = PostSchema.safeParse(raw);
    if (!parsed.success) {
      tally.skippedItems++;
      const err = new DataParseError(parsed.error.issues[0]?.message ?? "malformed post", itemIdOf(raw));
      this.logger.warn("[POSTS] skipped malformed item", { id: err.itemId, error: err.message });
      return;
    }
    const post = parsed.data;
    if (post.score < settings.minKarma) return;
    if (draft.seen.has(post.id)) return;
    draft.seen.set(post.id, day);
    tally.postsProcessed++;

    const tickers = extractTickers(post.text, {
      known: this.known,
      blacklist: this.blacklist,
      maxTextLength: settings.maxTextLength,
    });
    if (!tickers.length) return;
    const p = polarity(post.text.slice(0, settings.maxTextLength), this.lexicon);
    if (p !== null) tally.polarities.push(p);
    for (const t of tickers) draft.store.recordMention(t, p);
  }

  private registerCandidates(draft: Draft, day: string, now: number, settings: Settings): void {
    for (const symbol of draft.store.symbols()) {
      if (draft.registry.has(symbol) || !isValidSymbol(symbol)) continue;
      const mentions = draft.store.aggregate(symbol, day)?.mentionCount ?? 0;
      if (mentions < settings.minPosts) continue;
      draft.registry.create(symbol, now, settings.prior, this.names.get(symbol));
      this.logger.info("[TRACK] new ticker", { symbol, mentions });
    }
  }

  private async fetchMarket(
    targets: string[],
    day: string,
    settings: Settings,
    signal: AbortSignal,
    stop: Promise<unknown>,
    tally: Tally
  ): Promise<Map<string, MarketResult>> {
    const from = addDays(day, -settings.barLookbackDays);
    const keyOf = (job: MarketJob) =>
      job.kind === "bars" ? cacheKey("bars", job.symbol, day) : cacheKey("shorts", job.symbol, "latest");
    // bars and shorts are separate items so one can land without the other
    const jobs = targets.flatMap((symbol): MarketJob[] => [
      { kind: "bars", symbol },
      { kind: "shorts", symbol },
    ]);
    const { results, complete } = await collectWithin(
      jobs,
      async (job): Promise<MarketValue> =>
        job.kind === "bars"
          ? {
              kind: "bars",
              bars: await this.fetchThrough("bars", this.caches.bars, keyOf(job), settings.ttl.barsMs, signal, (s) =>
                this.upstream.fetchDailyBars(job.symbol, from, day, s)
              ),
            }
          : {
              kind: "shorts",
              short: await this.fetchThrough("shorts", this.caches.shorts, keyOf(job), settings.ttl.shortsMs, signal, (s) =>
                this.upstream.fetchShortAvailability(job.symbol, s)
              ),
            },
      { concurrency: settings.concurrency, stop, logger: this.logger }
    );
    if (!complete) tally.timedOut = true;

    const out = new Map<string, MarketResult>();
    for (const job of jobs) {
      const entry: MarketResult = out.get(job.symbol) ?? { bars: null, short: null };
      out.set(job.symbol, entry);
      const r = results.get(job);
      if (!r) {
        tally.degraded.add(job.kind);
        continue;
      }
      if (r.status === "rejected") {
        this.handleFetchError(job.kind, keyOf(job), r.reason, tally);
        continue;
      }
      if (r.value.kind === "bars") entry.bars = r.value.bars;
      else entry.short = { value: r.value.short };
    }
    return out;
  }

  private applyBars(store: HistoryStore, symbol: string, incoming: unknown[], tally: Tally): void {
    const good: PriceBar[] = [];
    for (const raw of incoming) {
      const parsed = BarSchema.safeParse(raw);
      if (parsed.success) good.push({ ...parsed.data, symbol });
      else {
        tally.skippedItems++;
        this.logger.warn("[BARS] skipped malformed bar", { symbol, error: parsed.error.issues[0]?.message });
      }
    }
    store.recordBars(symbol, good);
    const latest = store.priceSeries(symbol).at(-1);
    if (latest) store.recordMarket(symbol, { closingPrice: latest.close, volume: latest.volume });
  }

  private scoreTickers(
    draft: Draft,
    targets: string[],
    market: Map<string, MarketResult>,
    now: number,
    day: string,
    settings: Settings,
    tally: Tally
  ): StageTransition[] {
    const transitions: StageTransition[] = [];
    for (const symbol of targets) {
      const rec = draft.registry.get(symbol);
      if (!rec) continue;
      const m = market.get(symbol);

      if (m?.bars) this.applyBars(draft.store, symbol, m.bars, tally);

      // a failed short fetch keeps the last figure
      let shortPct = rec.subScores.shortInterest.raw;
      if (m?.short) {
        const parsed = ShortAvailabilitySchema.safeParse(m.short.value);
        if (parsed.success) {
          rec.shortable = parsed.data?.shortable ?? false;
          shortPct = parsed.data?.shortInterestPct ?? null;
          if (shortPct !== null) draft.store.recordMarket(symbol, { shortInterestPct: shortPct });
        } else {
          tally.skippedItems++;
          this.logger.warn("[SHORTS] skipped malformed payload", { symbol });
        }
      }

      const subs = collectSubScores(draft.store, symbol, day, shortPct, {
        windowDays: settings.volumeWindowDays,
        minHistoryDays: settings.minHistoryDays,
      });
      const impact = impactScore(subs, settings.weights);
      const step = stepLikelihood(rec.memeLikelihood, subs, rec.baseline, settings.weights, {
        sensitivity: settings.likelihoodSensitivity,
        decay: settings.baselineDecay,
      });
      const mentions = draft.store.aggregate(symbol, day)?.mentionCount ?? 0;
      const stage = nextStage(
        rec.stageState,
        rec.declineFlag,
        { impactScore: impact, memeLikelihood: step.posterior, mentionCount: mentions, subScores: subs, now },
        { minPosts: settings.minPosts, thresholds: settings.thresholds }
      );

      rec.subScores = subs;
      rec.impactScore = impact;
      rec.memeLikelihood = step.posterior;
      rec.baseline = step.baseline;
      rec.stageState = stage.state;
      rec.declineFlag = stage.declineFlag;
      rec.daysActive = Math.max(0, Math.floor((now - rec.firstSeen) / DAY_MS));
      if (mentions > 0) rec.lastSeen = now;
      if (mentions >= settings.minPosts) rec.lastQualifyingDay = day;

      if (stage.from !== null) {
        transitions.push({
          symbol,
          from: stage.from,
          to: stage.state.stage,
          at: now,
          snapshot: toSnapshot(rec, mentions),
        });
      }
    }
    return transitions;
  }

  /**
   * Remove tickers with `evictionWindowDays` completed days since the last
   * qualifying one; the day in progress does not count yet.
   */
  private evict(draft: Draft, day: string, settings: Settings): void {
    for (const rec of draft.registry.values()) {
      const idle = dayDiff(rec.lastQualifyingDay, day);
      if (idle <= settings.evictionWindowDays) continue;
      draft.registry.remove(rec.symbol);
      draft.store.remove(rec.symbol);
      this.logger.info("[TRACK] evicted", { symbol: rec.symbol, idleDays: idle, stage: rec.stageState.stage });
    }
  }

  private buildTickerSnapshots(registry: TickerRegistry, store: HistoryStore, day: string): TickerSnapshot[] {
    return registry
      .values()
      .map((r) => toSnapshot(r, store.aggregate(r.symbol, day)?.mentionCount ?? 0))
      .sort((a, b) => b.impactScore - a.impactScore || a.symbol.localeCompare(b.symbol));
  }

  private buildOverview(draft: Draft, day: string, only: string | null, tally: Tally): MarketOverview {
    const prev = this.snapshot.overview;
    const todays = draft.store
      .symbols()
      .map((symbol) => draft.store.aggregate(symbol, day))
      .filter((a): a is DailyAggregate => a !== undefined);

    let totalMentions = 0;
    let sentimentSum = 0;
    let sentimentCount = 0;
    for (const a of todays) {
      totalMentions += a.mentionCount;
      sentimentSum += a.sentimentSum;
      sentimentCount += a.sentimentCount;
    }

    const trending = todays
      .filter((a) => a.mentionCount >= TRENDING_MIN_MENTIONS)
      .sort((a, b) => b.mentionCount - a.mentionCount || a.symbol.localeCompare(b.symbol))
      .slice(0, TRENDING_LIMIT)
      .map((a) => Object.freeze({ symbol: a.symbol, mentions: a.mentionCount }));

    const topTickers = draft.registry
      .values()
      .sort((a, b) => b.impactScore - a.impactScore || a.symbol.localeCompare(b.symbol))
      .slice(0, TOP_TICKERS)
      .map((r) => r.symbol);

    // a single-ticker refresh reads no posts; keep the last post figures
    const fullCycle = only === null;
    const distribution = { positive: 0, neutral: 0, negative: 0 };
    for (const p of tally.polarities) distribution[bucketOf(p)]++;

    const status: CycleStatus = tally.timedOut || tally.degraded.size > 0 ? "partial" : "success";

    return Object.freeze({
      totalMentions,
      averageSentiment: sentimentCount ? sentimentSum / sentimentCount : 0,
      sentimentDistribution: Object.freeze(fullCycle ? distribution : { ...prev.sentimentDistribution }),
      trending: Object.freeze(trending),
      topTickers: Object.freeze(topTickers),
      postsProcessed: fullCycle ? tally.postsProcessed : prev.postsProcessed,
      subredditsProcessed: Object.freeze(fullCycle ? tally.subreddits : [...prev.subredditsProcessed]),
      skippedItems: tally.skippedItems,
      degradedSources: Object.freeze([...tally.degraded].sort()),
      status,
      lastUpdated: new Date(this.clock.now()).toISOString(),
    });
  }

  private commit(
    draft: Draft,
    day: string,
    only: string | null,
    tally: Tally,
    transitions: StageTransition[]
  ): EngineSnapshot {
    const snapshot: EngineSnapshot = Object.freeze({
      tickers: Object.freeze(this.buildTickerSnapshots(draft.registry, draft.store, day)),
      overview: this.buildOverview(draft, day, only, tally),
    });

    this.store = draft.store;
    this.registry = draft.registry;
    this.seenPosts = draft.seen;
    this.snapshot = snapshot;

    if (this.db) {
      try {
        this.db.save({
          aggregates: this.store.allAggregates(),
          bars: this.store.allBars(),
          records: this.registry.values(),
          seen: [...this.seenPosts].map(([id, seenDay]) => ({ id, day: seenDay })),
        });
      } catch (err) {
        this.logger.error("[DB] persist failed; in-memory state kept", err);
      }
    }

    if (tally.timedOut) this.logger.warn("[CYCLE] deadline hit; committed what was ready");
    this.logger.info("[CYCLE] committed", {
      tickers: snapshot.tickers.length,
      status: snapshot.overview.status,
      degraded: snapshot.overview.degradedSources,
      transitions: transitions.length,
    });

    for (const t of transitions) this.fire("transition", t);
    this.fire("cycle", snapshot);
    return snapshot;
  }

  /** Listener exceptions are logged; they never fail a committed cycle. */
  private fire<K extends keyof CoordinatorEvents>(event: K, ...args: CoordinatorEvents[K]): void {
    try {
      this.emit(event, ...args);
    } catch (err) {
      this.logger.error(`[EVENT] ${event} listener threw`, err);
    }
  }
}
