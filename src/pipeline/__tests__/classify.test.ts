import { describe, it, expect } from "vitest";
import { parseSettings } from "../../engine/settings.js";
import type { Stage, StageState, SubScores } from "../../types.js";
import { STAGE_GRAPH, initialStageState, nextStage, type StageInput } from "../classify.js";

const cfg = { minPosts: 5, thresholds: parseSettings({}).thresholds };

function subs(sentiment = 60, momentum = 60): SubScores {
  return {
    volume: { value: 60, available: true, raw: null },
    sentiment: { value: sentiment, available: true, raw: null },
    momentum: { value: momentum, available: true, raw: null },
    shortInterest: { value: 0, available: true, raw: null },
  };
}

function input(impactScore: number, over: Partial<StageInput> = {}): StageInput {
  return { impactScore, memeLikelihood: 0.8, mentionCount: 10, subScores: subs(), now: 1_000, ...over };
}

function stateAt(stage: Stage, over: Partial<StageState> = {}): StageState {
  return { ...initialStageState(0), stage, previousImpact: 60, ...over };
}

/** Feed impacts through the classifier; returns the stage after each cycle. */
function run(impacts: number[], start: StageState = initialStageState(0), flag = false, over: Partial<StageInput> = {}) {
  let state = start;
  let declineFlag = flag;
  const stages: Stage[] = [];
  const edges: Array<[Stage, Stage]> = [];
  for (const impact of impacts) {
    const r = nextStage(state, declineFlag, input(impact, over), cfg);
    if (r.from !== null) edges.push([r.from, r.state.stage]);
    state = r.state;
    declineFlag = r.declineFlag;
    stages.push(state.stage);
  }
  return { stages, edges, state, declineFlag };
}

describe("nextStage", () => {
  it("climbs one stage at a time on an impact ramp 10 → 90", () => {
    const { stages, edges } = run([10, 26, 42, 58, 74, 90]);
    expect(stages).toEqual([
      "Start",
      "Start",
      "RisingInterest",
      "StockRising",
      "WithinEstimatedPeak",
      "WithinEstimatedPeak",
    ]);
    for (const [from, to] of edges) expect(STAGE_GRAPH[from]).toContain(to);
  });

  it("never leaves Start below minPosts", () => {
    const { stages } = run([10, 30, 50, 70], initialStageState(0), false, { mentionCount: 4 });
    expect(stages).toEqual(["Start", "Start", "Start", "Start"]);
  });

  it("needs momentum above neutral to reach StockRising", () => {
    const { stages } = run([60, 65], stateAt("RisingInterest"), false, { subScores: subs(60, 50) });
    expect(stages).toEqual(["RisingInterest", "RisingInterest"]);
  });

  it("needs the likelihood threshold to reach WithinEstimatedPeak", () => {
    const { stages } = run([80, 85], stateAt("StockRising"), false, { memeLikelihood: 0.6 });
    expect(stages).toEqual(["StockRising", "StockRising"]);
  });

  it("drops only after two consecutive low cycles", () => {
    const { stages, declineFlag } = run([15, 30, 15, 15], stateAt("StockRising"));
    expect(stages).toEqual(["StockRising", "StockRising", "StockRising", "Dropping"]);
    expect(declineFlag).toBe(true);
  });

  it("flags DoNotBuy on sharply negative sentiment near the peak", () => {
    const peak = stateAt("WithinEstimatedPeak");
    const { stages, declineFlag } = run([60, 60], peak, false, { subScores: subs(20) });
    expect(stages).toEqual(["DoNotBuy", "DoNotBuy"]);
    expect(declineFlag).toBe(true);
  });

  it("lets DoNotBuy move on only to Dropping", () => {
    const { stages } = run([90, 10, 10], stateAt("DoNotBuy"), true);
    expect(stages).toEqual(["DoNotBuy", "DoNotBuy", "Dropping"]);
  });

  it("keeps Dropping terminal", () => {
    const { stages, declineFlag } = run([90, 90, 90], stateAt("Dropping"), true);
    expect(stages).toEqual(["Dropping", "Dropping", "Dropping"]);
    expect(declineFlag).toBe(true);
  });

  it("clears the decline flag on RisingInterest", () => {
    const start = stateAt("Start", { risingStreak: 1, previousImpact: 30 });
    const r = nextStage(start, true, input(40), cfg);
    expect(r.from).toBe("Start");
    expect(r.state.stage).toBe("RisingInterest");
    expect(r.declineFlag).toBe(false);
    expect(r.state.cyclesInStage).toBe(1);
    expect(r.state.since).toBe(1_000);
  });

  it("holds stage and counters on unusable input", () => {
    const s = stateAt("StockRising", { lowStreak: 1, cyclesInStage: 3 });
    expect(nextStage(s, false, input(Number.NaN), cfg)).toEqual({ state: s, declineFlag: false, from: null });
    expect(nextStage(s, false, input(50, { memeLikelihood: Number.POSITIVE_INFINITY }), cfg).state).toBe(s);
    expect(nextStage(s, false, input(50, { mentionCount: -1 }), cfg).state).toBe(s);
  });

  it("has no edge that skips a stage", () => {
    expect(STAGE_GRAPH.Start).not.toContain("StockRising");
    expect(STAGE_GRAPH.Start).not.toContain("WithinEstimatedPeak");
    expect(STAGE_GRAPH.RisingInterest).not.toContain("WithinEstimatedPeak");
    expect(STAGE_GRAPH.Dropping).toEqual([]);
  });
});
