import { z, type ZodError } from "zod";
import type { Cfg } from "../config.js";
import { ConfigValidationError } from "../errors.js";
import type { Weights } from "../types.js";

export const DEFAULT_WEIGHTS: Weights = {
  volume: 40,
  sentiment: 30,
  momentum: 20,
  shortInterest: 10,
};

const weight = z.number().finite().min(0);

/**
 * Composite weights. They are NOT required to sum to 100: the scorer divides by
 * the sum of the weights whose signal is available, so only their ratios matter.
 * Keeping them on a sensible scale is the caller's responsibility.
 */
export const WeightsSchema = z
  .object({
    volume: weight,
    sentiment: weight,
    momentum: weight,
    shortInterest: weight,
  })
  .strict()
  .refine(
    (w) => w.volume + w.sentiment + w.momentum + w.shortInterest > 0,
    "at least one weight must be positive"
  );

const ThresholdsSchema = z
  .object({
    /** impact below this for 2 cycles → Dropping */
    low: z.number().min(0).max(100).default(20),
    /** RisingInterest → StockRising; also the "still elevated" bar for DoNotBuy */
    momentum: z.number().min(0).max(100).default(50),
    /** StockRising → WithinEstimatedPeak */
    high: z.number().min(0).max(100).default(70),
    likelihood: z.number().min(0).max(1).default(0.7),
    /** sentiment sub-score at or below this counts as sharply negative */
    sharpNegativeSentiment: z.number().min(0).max(100).default(30),
  })
  .refine((t) => t.low < t.momentum && t.momentum <= t.high, {
    message: "thresholds must satisfy low < momentum <= high",
  });

const TtlSchema = z.object({
  postsMs: z.number().int().positive().default(4 * 60_000),
  barsMs: z.number().int().positive().default(15 * 60_000),
  shortsMs: z.number().int().positive().default(12 * 3_600_000),
  /** shortable-instrument list */
  instrumentsMs: z.number().int().positive().default(72 * 3_600_000),
});

const BackoffSchema = z
  .object({
    baseMs: z.number().int().positive().default(30_000),
    maxMs: z.number().int().positive().default(30 * 60_000),
  })
  .refine((b) => b.baseMs <= b.maxMs, { message: "backoff.baseMs must not exceed backoff.maxMs" });

export const SettingsSchema = z
  .object({
    subreddits: z.array(z.string().min(1)).min(1).default(["wallstreetbets", "stocks", "SecurityAnalysis", "investing"]),
    updateIntervalMs: z.number().int().min(30_000).default(5 * 60_000),
    minPosts: z.number().int().min(1).default(5),
    minKarma: z.number().int().min(0).default(100),
    weights: WeightsSchema.default(DEFAULT_WEIGHTS),
    evictionWindowDays: z.number().int().min(1).max(90).default(7),
    /** aggregates older than this are pruned from the store */
    historyDays: z.number().int().min(31).max(365).default(45),
    volumeWindowDays: z.number().int().min(2).max(30).default(30),
    minHistoryDays: z.number().int().min(1).default(7),
    prior: z.number().min(0.01).max(0.99).default(0.5),
    likelihoodSensitivity: z.number().positive().default(1.5),
    baselineDecay: z.number().gt(0).max(1).default(0.2),
    thresholds: ThresholdsSchema.default({}),
    ttl: TtlSchema.default({}),
    backoff: BackoffSchema.default({}),
    fetchTimeoutMs: z.number().int().positive().default(15_000),
    cycleTimeoutMs: z.number().int().positive().default(90_000),
    concurrency: z.number().int().min(1).max(32).default(4),
    maxTextLength: z.number().int().min(16).default(2000),
    barLookbackDays: z.number().int().min(5).default(10),
  })
  .refine((s) => s.minHistoryDays <= s.volumeWindowDays, {
    message: "minHistoryDays must not exceed volumeWindowDays",
    path: ["minHistoryDays"],
  })
  .refine((s) => s.fetchTimeoutMs <= s.cycleTimeoutMs, {
    message: "fetchTimeoutMs must not exceed cycleTimeoutMs",
    path: ["fetchTimeoutMs"],
  });

export type Settings = z.output<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type Thresholds = Settings["thresholds"];

function issuesOf(err: ZodError): string[] {
  return err.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/** Parse and default engine settings; any violation is a ConfigValidationError. */
export function parseSettings(input: unknown = {}): Settings {
  const parsed = SettingsSchema.safeParse(input);
  if (!parsed.success) throw new ConfigValidationError(issuesOf(parsed.error));
  return parsed.data;
}

export function parseWeights(input: unknown): Weights {
  const parsed = WeightsSchema.safeParse(input);
  if (!parsed.success) throw new ConfigValidationError(issuesOf(parsed.error));
  return parsed.data;
}

/** Map the validated environment onto engine settings. */
export function settingsFromEnv(cfg: Cfg): Settings {
  return parseSettings({
    subreddits: cfg.SUBREDDITS,
    updateIntervalMs: cfg.UPDATE_INTERVAL_SECONDS * 1000,
    minPosts: cfg.MIN_POSTS,
    minKarma: cfg.MIN_KARMA,
    evictionWindowDays: cfg.EVICTION_WINDOW_DAYS,
    weights: {
      volume: cfg.WEIGHT_VOLUME,
      sentiment: cfg.WEIGHT_SENTIMENT,
      momentum: cfg.WEIGHT_MOMENTUM,
      shortInterest: cfg.WEIGHT_SHORT_INTEREST,
    },
    concurrency: cfg.CONCURRENCY,
    cycleTimeoutMs: cfg.CYCLE_TIMEOUT_SECONDS * 1000,
  });
}
