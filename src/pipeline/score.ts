// src/pipeline/score.ts
import type { SignalName, SubScores, Weights } from "../types.js";

export const SIGNALS: readonly SignalName[] = ["volume", "sentiment", "momentum", "shortInterest"];

/**
 * Impact score in [0, 100]: weighted mean of the available sub-scores.
 * Dividing by the weight of what is actually available keeps a ticker with
 * no price history from being dragged down by a neutral stand-in.
 */
export function impactScore(subs: SubScores, weights: Weights): number {
  let num = 0;
  let den = 0;
  for (const name of SIGNALS) {
    const s = subs[name];
    const w = weights[name];
    if (!s.available || !(w > 0) || !Number.isFinite(s.value)) continue;
    num += w * s.value;
    den += w;
  }
  if (den === 0) return 0;
  return Math.max(0, Math.min(100, num / den));
}
