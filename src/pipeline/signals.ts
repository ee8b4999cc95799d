// src/pipeline/signals.ts
import { addDays, dayDiff } from "../engine/clock.js";
import type { HistoryStore } from "../store/HistoryStore.js";
import type { DailyAggregate, SubScore, SubScores } from "../types.js";

export const NEUTRAL = 50;
const Z_CLIP = 3;
/** ±10% over three sessions spans the whole momentum scale */
const MOMENTUM_CLIP_PCT = 10;
/** 40% of float short maps to the top of the scale */
const SHORT_INTEREST_CEILING_PCT = 40;

const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

const neutral = (): SubScore => ({ value: NEUTRAL, available: false, raw: null });

/** Daily mean polarity → 0..100. No scored mentions = neutral, not an error. */
export function sentimentSubScore(agg: DailyAggregate | undefined): SubScore {
  if (!agg || agg.sentimentCount === 0) return { value: NEUTRAL, available: false, raw: 0 };
  const mean = clamp(agg.sentimentSum / agg.sentimentCount, -1, 1);
  return { value: (mean + 1) * 50, available: true, raw: mean };
}

export type VolumeOptions = {
  windowDays: number;
  minHistoryDays: number;
};

/**
 * z-score of today's mention count against the trailing window (today
 * excluded). Days inside the window with no aggregate count as zero mentions,
 * back to the ticker's first recorded day. A flat baseline has no spread; any
 * move off it is treated as the full ±3σ.
 */
export function volumeZScore(history: DailyAggregate[], today: string, opts: VolumeOptions): number | null {
  const counts = new Map(history.map((a) => [a.day, a.mentionCount]));
  const current = counts.get(today) ?? 0;
  const first = history.reduce((min, a) => (a.day < min ? a.day : min), today);
  const span = Math.min(opts.windowDays, dayDiff(first, today));
  const baseline: number[] = [];
  for (let age = 1; age <= span; age++) baseline.push(counts.get(addDays(today, -age)) ?? 0);
  if (baseline.length < opts.minHistoryDays) return null;

  const mean = baseline.reduce((s, x) => s + x, 0) / baseline.length;
  const variance = baseline.reduce((s, x) => s + (x - mean) ** 2, 0) / baseline.length;
  const sd = Math.sqrt(variance);
  if (sd === 0) return current > mean ? Z_CLIP : current < mean ? -Z_CLIP : 0;
  return (current - mean) / sd;
}

export function volumeSubScore(history: DailyAggregate[], today: string, opts: VolumeOptions): SubScore {
  const z = volumeZScore(history, today, opts);
  if (z === null) return neutral();
  const clipped = clamp(z, -Z_CLIP, Z_CLIP);
  return { value: ((clipped + Z_CLIP) / (2 * Z_CLIP)) * 100, available: true, raw: z };
}

/** % change across the last three closes. */
export function momentumSubScore(closes: number[]): SubScore {
  if (closes.length < 3) return neutral();
  const window = closes.slice(-3);
  const first = window[0];
  const last = window[window.length - 1];
  if (!(first > 0) || !Number.isFinite(last)) return neutral();
  const pct = ((last - first) / first) * 100;
  const clipped = clamp(pct, -MOMENTUM_CLIP_PCT, MOMENTUM_CLIP_PCT);
  return {
    value: ((clipped + MOMENTUM_CLIP_PCT) / (2 * MOMENTUM_CLIP_PCT)) * 100,
    available: true,
    raw: pct,
  };
}

/** Missing short data contributes zero; it is still "available". */
export function shortInterestSubScore(pct: number | null | undefined): SubScore {
  if (pct == null || !Number.isFinite(pct)) return { value: 0, available: true, raw: null };
  const clipped = clamp(pct, 0, SHORT_INTEREST_CEILING_PCT);
  return { value: (clipped / SHORT_INTEREST_CEILING_PCT) * 100, available: true, raw: pct };
}

export function collectSubScores(
  store: HistoryStore,
  symbol: string,
  today: string,
  shortInterestPct: number | null,
  opts: VolumeOptions
): SubScores {
  const history = store.history(symbol);
  return {
    volume: volumeSubScore(history, today, opts),
    sentiment: sentimentSubScore(history.find((a) => a.day === today)),
    momentum: momentumSubScore(store.closes(symbol)),
    shortInterest: shortInterestSubScore(shortInterestPct),
  };
}
