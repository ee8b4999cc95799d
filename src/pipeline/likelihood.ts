// src/pipeline/likelihood.ts
import type { SignalName, SubScores, Weights } from "../types.js";
import { NEUTRAL } from "./signals.js";

export const POSTERIOR_MIN = 0.01;
export const POSTERIOR_MAX = 0.99;

type Deviating = Exclude<SignalName, "shortInterest">;
const DEVIATING: readonly Deviating[] = ["volume", "sentiment", "momentum"];

export type Baseline = Record<Deviating, number>;

export const neutralBaseline = (): Baseline => ({
  volume: NEUTRAL,
  sentiment: NEUTRAL,
  momentum: NEUTRAL,
});

/** NaN has no direction; it falls back to even odds. */
const clipPosterior = (p: number) => (Number.isNaN(p) ? 0.5 : Math.max(POSTERIOR_MIN, Math.min(POSTERIOR_MAX, p)));

/**
 * Weighted mean of (sub − baseline) / 50 over the available signals, in [-2, 2].
 * Non-decreasing in every sub-score.
 */
export function compositeDeviation(subs: SubScores, baseline: Baseline, weights: Weights): number {
  let num = 0;
  let den = 0;
  for (const name of DEVIATING) {
    const s = subs[name];
    const w = weights[name];
    if (!s.available || !(w > 0)) continue;
    num += (w * (s.value - baseline[name])) / NEUTRAL;
    den += w;
  }
  return den === 0 ? 0 : num / den;
}

/** Odds-form Bayes update with LR = exp(sensitivity · deviation). */
export function updatePosterior(prior: number, deviation: number, sensitivity: number): number {
  if (!Number.isFinite(prior) || !Number.isFinite(deviation)) return clipPosterior(prior);
  const p = clipPosterior(prior);
  const odds = (p / (1 - p)) * Math.exp(sensitivity * deviation);
  return clipPosterior(odds / (1 + odds));
}

/** Exponentially decayed baseline; unavailable signals keep their old value. */
export function decayBaseline(baseline: Baseline, subs: SubScores, decay: number): Baseline {
  const next = { ...baseline };
  for (const name of DEVIATING) {
    const s = subs[name];
    if (!s.available) continue;
    next[name] = baseline[name] + decay * (s.value - baseline[name]);
  }
  return next;
}

export type LikelihoodStep = {
  posterior: number;
  deviation: number;
  baseline: Baseline;
};

/** One cycle: deviation against the pre-update baseline, then decay it. */
export function stepLikelihood(
  prior: number,
  subs: SubScores,
  baseline: Baseline,
  weights: Weights,
  opts: { sensitivity: number; decay: number }
): LikelihoodStep {
  const deviation = compositeDeviation(subs, baseline, weights);
  return {
    posterior: updatePosterior(prior, deviation, opts.sensitivity),
    deviation,
    baseline: decayBaseline(baseline, subs, opts.decay),
  };
}
