export { Coordinator, withTimeout } from "./engine/Coordinator.js";
export type { CoordinatorOptions, DegradedNotice } from "./engine/Coordinator.js";
export type { Upstream } from "./engine/upstream.js";
export { type Clock, systemClock, dayKey } from "./engine/clock.js";
export {
  DEFAULT_WEIGHTS,
  parseSettings,
  parseWeights,
  settingsFromEnv,
  type Settings,
  type SettingsInput,
  type Thresholds,
} from "./engine/settings.js";
export { FetchCache, cacheKey } from "./cache/FetchCache.js";
export { HistoryStore } from "./store/HistoryStore.js";
export { TickerRegistry, toSnapshot } from "./store/TickerRegistry.js";
export { HistoryDB, type PersistedState } from "./db/HistoryDB.js";
export { extractTickers, isValidSymbol } from "./pipeline/extract.js";
export { polarity, bucketOf } from "./pipeline/sentiment.js";
export {
  collectSubScores,
  momentumSubScore,
  sentimentSubScore,
  shortInterestSubScore,
  volumeSubScore,
  volumeZScore,
} from "./pipeline/signals.js";
export { impactScore } from "./pipeline/score.js";
export { stepLikelihood, updatePosterior, POSTERIOR_MIN, POSTERIOR_MAX } from "./pipeline/likelihood.js";
export { nextStage, initialStageState, STAGE_GRAPH } from "./pipeline/classify.js";
export { createHttpUpstream } from "./providers/index.js";
export * from "./errors.js";
export type * from "./types.js";
