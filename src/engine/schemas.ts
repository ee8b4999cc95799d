import { z } from "zod";

const day = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

/** Inbound items are checked once at the engine boundary. */
export const PostSchema = z.object({
  id: z.string().min(1),
  subreddit: z.string(),
  text: z.string(),
  score: z.number().finite(),
  createdAt: z.string(),
});

export const BarSchema = z
  .object({
    symbol: z.string().min(1),
    date: day,
    open: z.number().finite().nonnegative(),
    high: z.number().finite().nonnegative(),
    low: z.number().finite().nonnegative(),
    close: z.number().finite().positive(),
    volume: z.number().finite().nonnegative(),
  })
  .refine((b) => b.low <= b.high, { message: "low above high" });

export const ShortAvailabilitySchema = z
  .object({
    shortable: z.boolean(),
    shortInterestPct: z.number().finite().nonnegative().nullable(),
  })
  .nullable();

/* ---------- persisted rows ---------- */

export const AggregateSchema = z.object({
  symbol: z.string(),
  day,
  mentionCount: z.number().int().nonnegative(),
  sentimentSum: z.number(),
  sentimentCount: z.number().int().nonnegative(),
  closingPrice: z.number().nullable(),
  volume: z.number().nullable(),
  shortInterestPct: z.number().nullable(),
});

const SubScoreSchema = z.object({
  value: z.number(),
  available: z.boolean(),
  raw: z.number().nullable(),
});

const StageSchema = z.enum([
  "Start",
  "RisingInterest",
  "StockRising",
  "WithinEstimatedPeak",
  "DoNotBuy",
  "Dropping",
]);

export const TickerRecordSchema = z.object({
  symbol: z.string(),
  name: z.string().optional(),
  firstSeen: z.number(),
  lastSeen: z.number(),
  lastQualifyingDay: day,
  impactScore: z.number().min(0).max(100),
  memeLikelihood: z.number().min(0.01).max(0.99),
  shortable: z.boolean(),
  declineFlag: z.boolean(),
  daysActive: z.number().int().nonnegative(),
  subScores: z.object({
    volume: SubScoreSchema,
    sentiment: SubScoreSchema,
    momentum: SubScoreSchema,
    shortInterest: SubScoreSchema,
  }),
  baseline: z.object({
    volume: z.number(),
    sentiment: z.number(),
    momentum: z.number(),
  }),
  stageState: z.object({
    stage: StageSchema,
    since: z.number(),
    cyclesInStage: z.number().int().nonnegative(),
    risingStreak: z.number().int().nonnegative(),
    lowStreak: z.number().int().nonnegative(),
    previousImpact: z.number().nullable(),
  }),
});
