import Bottleneck from "bottleneck";
import { UpstreamRateLimited } from "../errors.js";
import { log } from "../logger.js";
import type { SourceName } from "../types.js";

export type RateLimitConfig = {
  minTime: number; // ms between requests
  maxConcurrent: number;
  /** requests per day; omit for unlimited */
  dailyQuota?: number;
};

// Provider-specific safe limits (daily quotas follow the free tiers)
export const RATE_LIMITS = {
  reddit: { minTime: 1_000, maxConcurrent: 2 },
  polygon: { minTime: 250, maxConcurrent: 2, dailyQuota: 5_000 },
  fmp: { minTime: 250, maxConcurrent: 2, dailyQuota: 250 },
  trading212: { minTime: 5_000, maxConcurrent: 1 },
} satisfies Record<string, RateLimitConfig>;

export type ProviderName = keyof typeof RATE_LIMITS;

const DAY_MS = 86_400_000;
const limiters = new Map<ProviderName, Bottleneck>();

export function getRateLimiter(provider: ProviderName): Bottleneck {
  let limiter = limiters.get(provider);
  if (!limiter) {
    const config: RateLimitConfig = RATE_LIMITS[provider];
    limiter = new Bottleneck({
      minTime: config.minTime,
      maxConcurrent: config.maxConcurrent,
      reservoir: config.dailyQuota ?? null,
      reservoirRefreshAmount: config.dailyQuota ?? null,
      reservoirRefreshInterval: config.dailyQuota ? DAY_MS : null,
    });
    limiter.on("depleted", () => {
      log.warn(`[LIMITER] ${provider} daily quota depleted`);
    });
    limiters.set(provider, limiter);
  }
  return limiter;
}

/**
 * Schedule a request on the provider's limiter. An exhausted daily quota is
 * reported as a rate limit right away instead of parking the job for hours.
 */
export async function schedule<T>(provider: ProviderName, source: SourceName, fn: () => Promise<T>): Promise<T> {
  const limiter = getRateLimiter(provider);
  const remaining = await limiter.currentReservoir();
  if (remaining !== null && remaining <= 0) {
    throw new UpstreamRateLimited(source, `${provider} daily quota exhausted`);
  }
  return limiter.schedule(fn);
}
