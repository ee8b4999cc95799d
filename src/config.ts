import "dotenv/config";
import { z } from "zod";

const csv = z
  .string()
  .transform((s) =>
    s
      .split(",")
      .map((x) => x.trim())
      .filter(Boolean)
  );

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  REDDIT_CLIENT_ID: z.string().optional(),
  REDDIT_CLIENT_SECRET: z.string().optional(),
  REDDIT_USERNAME: z.string().optional(),
  REDDIT_PASSWORD: z.string().optional(),
  POLYGON_API_KEY: z.string().optional(),
  FMP_API_KEY: z.string().optional(),
  TRADING212_API_KEY: z.string().optional(),
  DISCORD_BOT_TOKEN: z.string().optional(),
  DISCORD_CHANNEL_ID: z.string().optional(),
  DB_PATH: z.string().default("./data/history.db"),
  SUBREDDITS: csv.default("wallstreetbets,stocks,SecurityAnalysis,investing"),
  UPDATE_INTERVAL_SECONDS: z.coerce.number().default(300),
  MIN_POSTS: z.coerce.number().default(5),
  MIN_KARMA: z.coerce.number().default(100),
  EVICTION_WINDOW_DAYS: z.coerce.number().default(7),
  WEIGHT_VOLUME: z.coerce.number().default(40),
  WEIGHT_SENTIMENT: z.coerce.number().default(30),
  WEIGHT_MOMENTUM: z.coerce.number().default(20),
  WEIGHT_SHORT_INTEREST: z.coerce.number().default(10),
  MAX_POSTS_PER_SUBREDDIT: z.coerce.number().default(30),
  MAX_COMMENTS_PER_POST: z.coerce.number().default(10),
  CONCURRENCY: z.coerce.number().default(4),
  CYCLE_TIMEOUT_SECONDS: z.coerce.number().default(90),
  NOTIFY_TRANSITIONS: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),
});

const env = EnvSchema.parse(process.env);

export const cfg = {
  ...env,
};

export type Cfg = typeof cfg;
