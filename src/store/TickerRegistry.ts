import { dayKey } from "../engine/clock.js";
import { neutralBaseline } from "../pipeline/likelihood.js";
import { initialStageState } from "../pipeline/classify.js";
import { NEUTRAL } from "../pipeline/signals.js";
import type { SubScores, TickerRecord, TickerSnapshot } from "../types.js";

const emptySubScores = (): SubScores => ({
  volume: { value: NEUTRAL, available: false, raw: null },
  sentiment: { value: NEUTRAL, available: false, raw: 0 },
  momentum: { value: NEUTRAL, available: false, raw: null },
  shortInterest: { value: 0, available: true, raw: null },
});

export function newTickerRecord(symbol: string, now: number, prior: number, name?: string): TickerRecord {
  return {
    symbol,
    ...(name ? { name } : {}),
    firstSeen: now,
    lastSeen: now,
    lastQualifyingDay: dayKey(now),
    impactScore: 0,
    memeLikelihood: prior,
    shortable: false,
    declineFlag: false,
    daysActive: 0,
    subScores: emptySubScores(),
    baseline: neutralBaseline(),
    stageState: initialStageState(now),
  };
}

function copyRecord(r: TickerRecord): TickerRecord {
  return {
    ...r,
    subScores: {
      volume: { ...r.subScores.volume },
      sentiment: { ...r.subScores.sentiment },
      momentum: { ...r.subScores.momentum },
      shortInterest: { ...r.subScores.shortInterest },
    },
    baseline: { ...r.baseline },
    stageState: { ...r.stageState },
  };
}

const round = (x: number, digits: number) => {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
};

export function toSnapshot(r: TickerRecord, mentionCount: number): TickerSnapshot {
  return Object.freeze({
    symbol: r.symbol,
    name: r.name ?? null,
    impactScore: round(r.impactScore, 2),
    memeLikelihood: round(r.memeLikelihood, 4),
    stage: r.stageState.stage,
    shortable: r.shortable,
    declineFlag: r.declineFlag,
    daysActive: r.daysActive,
    volumeScore: round(r.subScores.volume.value, 2),
    sentimentScore: round(r.subScores.sentiment.value, 2),
    momentumScore: round(r.subScores.momentum.value, 2),
    shortInterest: r.subScores.shortInterest.raw === null ? null : round(r.subScores.shortInterest.raw, 2),
    mentionCount,
  });
}

/** Tracked tickers keyed by symbol. Records are only mutated on a clone. */
export class TickerRegistry {
  private records = new Map<string, TickerRecord>();

  get size(): number {
    return this.records.size;
  }

  has(symbol: string): boolean {
    return this.records.has(symbol);
  }

  get(symbol: string): TickerRecord | undefined {
    return this.records.get(symbol);
  }

  /** A re-created symbol starts over from the prior. */
  create(symbol: string, now: number, prior: number, name?: string): TickerRecord {
    const rec = newTickerRecord(symbol, now, prior, name);
    this.records.set(symbol, rec);
    return rec;
  }

  set(record: TickerRecord): void {
    this.records.set(record.symbol, record);
  }

  remove(symbol: string): boolean {
    return this.records.delete(symbol);
  }

  clear(): void {
    this.records.clear();
  }

  symbols(): string[] {
    return [...this.records.keys()];
  }

  values(): TickerRecord[] {
    return [...this.records.values()];
  }

  clone(): TickerRegistry {
    const copy = new TickerRegistry();
    for (const [k, v] of this.records) copy.records.set(k, copyRecord(v));
    return copy;
  }
}
