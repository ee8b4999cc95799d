// src/pipeline/classify.ts
import type { Thresholds } from "../engine/settings.js";
import type { Stage, StageState, SubScores } from "../types.js";
import { NEUTRAL } from "./signals.js";

/** Allowed edges. Dropping is reachable from everywhere except itself. */
export const STAGE_GRAPH: Readonly<Record<Stage, readonly Stage[]>> = {
  Start: ["RisingInterest", "Dropping"],
  RisingInterest: ["StockRising", "Dropping"],
  StockRising: ["WithinEstimatedPeak", "Dropping"],
  WithinEstimatedPeak: ["DoNotBuy", "Dropping"],
  DoNotBuy: ["Dropping"],
  Dropping: [],
};

/** Cycles below the low threshold before Dropping (hysteresis). */
const LOW_CYCLES = 2;
/** Cycles of rising impact before Start → RisingInterest. */
const RISING_CYCLES = 2;

export type StageInput = {
  impactScore: number;
  memeLikelihood: number;
  /** today's mentions */
  mentionCount: number;
  subScores: SubScores;
  now: number;
};

export type StageConfig = {
  minPosts: number;
  thresholds: Thresholds;
};

export type StageResult = {
  state: StageState;
  declineFlag: boolean;
  /** previous stage when a transition happened, else null */
  from: Stage | null;
};

export function initialStageState(now: number): StageState {
  return {
    stage: "Start",
    since: now,
    cyclesInStage: 0,
    risingStreak: 0,
    lowStreak: 0,
    previousImpact: null,
  };
}

function isUsable(input: StageInput): boolean {
  return (
    Number.isFinite(input.impactScore) &&
    Number.isFinite(input.memeLikelihood) &&
    Number.isInteger(input.mentionCount) &&
    input.mentionCount >= 0
  );
}

function target(stage: Stage, input: StageInput, lowStreak: number, risingStreak: number, cfg: StageConfig): Stage | null {
  const t = cfg.thresholds;
  const { impactScore: impact, subScores: subs } = input;

  if (stage !== "Dropping" && lowStreak >= LOW_CYCLES) return "Dropping";

  switch (stage) {
    case "Start":
      return input.mentionCount >= cfg.minPosts && risingStreak >= RISING_CYCLES ? "RisingInterest" : null;
    case "RisingInterest":
      return impact >= t.momentum && subs.momentum.available && subs.momentum.value > NEUTRAL
        ? "StockRising"
        : null;
    case "StockRising":
      return impact >= t.high && input.memeLikelihood >= t.likelihood ? "WithinEstimatedPeak" : null;
    case "WithinEstimatedPeak":
      return subs.sentiment.available && subs.sentiment.value <= t.sharpNegativeSentiment && impact >= t.momentum
        ? "DoNotBuy"
        : null;
    case "DoNotBuy":
    case "Dropping":
      return null;
  }
}

/**
 * Evaluate one cycle. At most one transition, always along STAGE_GRAPH.
 * Unusable input holds the stage and every counter.
 */
export function nextStage(state: StageState, declineFlag: boolean, input: StageInput, cfg: StageConfig): StageResult {
  if (!isUsable(input)) return { state, declineFlag, from: null };

  const impact = input.impactScore;
  const trend = state.previousImpact === null ? null : impact - state.previousImpact;
  const risingStreak = trend !== null && trend > 0 ? state.risingStreak + 1 : 0;
  const lowStreak = impact < cfg.thresholds.low ? state.lowStreak + 1 : 0;

  const to = target(state.stage, input, lowStreak, risingStreak, cfg);
  const moved = to !== null && STAGE_GRAPH[state.stage].includes(to);

  if (!moved) {
    return {
      state: {
        ...state,
        cyclesInStage: state.cyclesInStage + 1,
        risingStreak,
        lowStreak,
        previousImpact: impact,
      },
      declineFlag,
      from: null,
    };
  }

  let flag = declineFlag;
  if (to === "DoNotBuy" || to === "Dropping") flag = true;
  else if (to === "RisingInterest" || to === "StockRising") flag = false;

  return {
    state: {
      stage: to,
      since: input.now,
      cyclesInStage: 1,
      risingStreak,
      lowStreak,
      previousImpact: impact,
    },
    declineFlag: flag,
    from: state.stage,
  };
}
