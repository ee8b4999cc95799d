/**
 * Shared types across the engine
 */

/** A post or comment as delivered by a post source. */
export type RawPost = {
  /** Provider-unique ID (comments carry their own) */
  id: string;
  subreddit: string;
  text: string;
  /** Karma / upvote score */
  score: number;
  createdAt: string; // ISO
};

/** One daily OHLCV bar. `date` is the trading day, YYYY-MM-DD. */
export type PriceBar = {
  symbol: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type ShortAvailability = {
  shortable: boolean;
  /** % of float sold short; null when the provider has no figure */
  shortInterestPct: number | null;
};

/** Keyed by (symbol, day). Past days are immutable once the day rolls over. */
export type DailyAggregate = {
  symbol: string;
  day: string; // YYYY-MM-DD (UTC)
  mentionCount: number;
  sentimentSum: number;
  sentimentCount: number;
  closingPrice: number | null;
  volume: number | null;
  shortInterestPct: number | null;
};

export type Stage =
  | "Start"
  | "RisingInterest"
  | "StockRising"
  | "WithinEstimatedPeak"
  | "DoNotBuy"
  | "Dropping";

export type StageState = {
  stage: Stage;
  /** ms epoch of the last transition (or creation) */
  since: number;
  cyclesInStage: number;
  /** consecutive cycles with a positive impact trend */
  risingStreak: number;
  /** consecutive cycles with impact below the low threshold */
  lowStreak: number;
  previousImpact: number | null;
};

export type SignalName = "volume" | "sentiment" | "momentum" | "shortInterest";

export type Weights = Record<SignalName, number>;

/** A collector output on the common 0..100 scale. */
export type SubScore = {
  value: number;
  /** false when the value is the neutral stand-in for missing data */
  available: boolean;
  /** un-normalized value (z-score, mean polarity, % change, % of float) */
  raw: number | null;
};

export type SubScores = Record<SignalName, SubScore>;

export type TickerRecord = {
  symbol: string;
  name?: string;
  firstSeen: number;
  lastSeen: number;
  /** last day whose mention count reached minPosts */
  lastQualifyingDay: string;
  impactScore: number;
  memeLikelihood: number;
  shortable: boolean;
  declineFlag: boolean;
  daysActive: number;
  subScores: SubScores;
  /** decayed per-signal baselines for the likelihood estimator */
  baseline: Record<Exclude<SignalName, "shortInterest">, number>;
  stageState: StageState;
};

/** Immutable view handed to the presentation layer. */
export type TickerSnapshot = Readonly<{
  symbol: string;
  name: string | null;
  impactScore: number;
  memeLikelihood: number;
  stage: Stage;
  shortable: boolean;
  declineFlag: boolean;
  daysActive: number;
  volumeScore: number;
  sentimentScore: number;
  momentumScore: number;
  shortInterest: number | null;
  mentionCount: number;
}>;

export type SourceName = "posts" | "bars" | "shorts";

export type SentimentDistribution = {
  positive: number;
  neutral: number;
  negative: number;
};

export type CycleStatus = "success" | "partial" | "cancelled" | "idle";

export type MarketOverview = Readonly<{
  totalMentions: number;
  averageSentiment: number;
  sentimentDistribution: SentimentDistribution;
  trending: ReadonlyArray<{ symbol: string; mentions: number }>;
  topTickers: ReadonlyArray<string>;
  postsProcessed: number;
  subredditsProcessed: ReadonlyArray<string>;
  skippedItems: number;
  degradedSources: ReadonlyArray<SourceName>;
  status: CycleStatus;
  lastUpdated: string | null;
}>;

export type EngineSnapshot = Readonly<{
  tickers: ReadonlyArray<TickerSnapshot>;
  overview: MarketOverview;
}>;

export type StageTransition = {
  symbol: string;
  from: Stage;
  to: Stage;
  at: number;
  snapshot: TickerSnapshot;
};
