import { describe, it, expect } from "vitest";
import { DEFAULT_WEIGHTS } from "../../engine/settings.js";
import type { SubScores } from "../../types.js";
import {
  POSTERIOR_MAX,
  POSTERIOR_MIN,
  compositeDeviation,
  decayBaseline,
  neutralBaseline,
  stepLikelihood,
  updatePosterior,
} from "../likelihood.js";

function subs(volume: number, sentiment = 50, momentum: number | null = null): SubScores {
  return {
    volume: { value: volume, available: true, raw: null },
    sentiment: { value: sentiment, available: true, raw: null },
    momentum: momentum === null ? { value: 50, available: false, raw: null } : { value: momentum, available: true, raw: null },
    shortInterest: { value: 0, available: true, raw: null },
  };
}

describe("updatePosterior", () => {
  it("leaves the prior alone at zero deviation", () => {
    expect(updatePosterior(0.5, 0, 1.5)).toBeCloseTo(0.5, 12);
  });

  it("moves with the sign of the deviation", () => {
    expect(updatePosterior(0.5, 0.5, 1.5)).toBeGreaterThan(0.5);
    expect(updatePosterior(0.5, -0.5, 1.5)).toBeLessThan(0.5);
  });

  it("clips to [0.01, 0.99]", () => {
    expect(updatePosterior(0.99, 2, 10)).toBe(POSTERIOR_MAX);
    expect(updatePosterior(0.5, -2, 10)).toBe(POSTERIOR_MIN);
  });

  it("holds on non-finite input", () => {
    expect(updatePosterior(0.3, Number.NaN, 1.5)).toBe(0.3);
    expect(updatePosterior(Number.NaN, 1, 1.5)).toBe(0.5);
  });
});

describe("compositeDeviation", () => {
  it("averages (sub - baseline) / 50 over available weighted signals", () => {
    // (40 * 1 + 30 * 0) / 70
    expect(compositeDeviation(subs(100), neutralBaseline(), DEFAULT_WEIGHTS)).toBeCloseTo(40 / 70, 12);
  });

  it("is non-decreasing in every sub-score", () => {
    const base = neutralBaseline();
    const lo = compositeDeviation(subs(60, 40, 55), base, DEFAULT_WEIGHTS);
    expect(compositeDeviation(subs(70, 40, 55), base, DEFAULT_WEIGHTS)).toBeGreaterThan(lo);
    expect(compositeDeviation(subs(60, 50, 55), base, DEFAULT_WEIGHTS)).toBeGreaterThan(lo);
    expect(compositeDeviation(subs(60, 40, 65), base, DEFAULT_WEIGHTS)).toBeGreaterThan(lo);
  });
});

describe("decayBaseline", () => {
  it("moves available signals toward the observation", () => {
    const next = decayBaseline(neutralBaseline(), subs(100), 0.2);
    expect(next).toEqual({ volume: 60, sentiment: 50, momentum: 50 });
  });
});

describe("stepLikelihood", () => {
  it("scores against the pre-update baseline and stays in bounds over many cycles", () => {
    const opts = { sensitivity: 1.5, decay: 0.2 };
    let prior = 0.5;
    let baseline = neutralBaseline();
    const first = stepLikelihood(prior, subs(100), baseline, DEFAULT_WEIGHTS, opts);
    expect(first.deviation).toBeCloseTo(40 / 70, 12);
    expect(first.baseline.volume).toBe(60);

    for (let i = 0; i < 50; i++) {
      const s = stepLikelihood(prior, subs(100, 100, 100), baseline, DEFAULT_WEIGHTS, opts);
      prior = s.posterior;
      baseline = s.baseline;
      expect(prior).toBeGreaterThanOrEqual(POSTERIOR_MIN);
      expect(prior).toBeLessThanOrEqual(POSTERIOR_MAX);
    }
    expect(prior).toBe(POSTERIOR_MAX);
  });
});
