import { describe, it, expect } from "vitest";
import { DEFAULT_WEIGHTS } from "../../engine/settings.js";
import { addDays } from "../../engine/clock.js";
import type { DailyAggregate } from "../../types.js";
import { impactScore } from "../score.js";
import {
  collectSubScores,
  momentumSubScore,
  sentimentSubScore,
  shortInterestSubScore,
  volumeSubScore,
  volumeZScore,
} from "../signals.js";
import { HistoryStore } from "../../store/HistoryStore.js";

function agg(day: string, mentionCount: number, sentimentSum = 0, sentimentCount = 0): DailyAggregate {
  return {
    symbol: "GME",
    day,
    mentionCount,
    sentimentSum,
    sentimentCount,
    closingPrice: null,
    volume: null,
    shortInterestPct: null,
  };
}

/** counts[i] lands i days after `start`; returns the history and the last day. */
function series(start: string, counts: number[]) {
  const history = counts.map((c, i) => agg(addDays(start, i), c));
  return { history, last: addDays(start, counts.length - 1) };
}

const volumeOpts = { windowDays: 30, minHistoryDays: 7 };

describe("sentimentSubScore", () => {
  it("is neutral 50 when nothing was scored", () => {
    expect(sentimentSubScore(undefined)).toEqual({ value: 50, available: false, raw: 0 });
    expect(sentimentSubScore(agg("2024-05-01", 4, 0, 0)).value).toBe(50);
  });

  it("maps mean polarity onto 0..100", () => {
    expect(sentimentSubScore(agg("2024-05-01", 2, 1, 2))).toEqual({ value: 75, available: true, raw: 0.5 });
    expect(sentimentSubScore(agg("2024-05-01", 1, -1, 1)).value).toBe(0);
  });
});

describe("volumeZScore", () => {
  it("spikes on [5]x29 + [50]", () => {
    const { history, last } = series("2024-04-01", [...Array<number>(29).fill(5), 50]);
    expect(volumeZScore(history, last, volumeOpts)).toBe(3);
    expect(volumeSubScore(history, last, volumeOpts).value).toBe(100);
  });

  it("uses the population standard deviation of the trailing window", () => {
    const { history, last } = series("2024-04-01", [4, 6, 4, 6, 4, 6, 4, 6, 4, 6, 7]);
    expect(volumeZScore(history, last, volumeOpts)).toBeCloseTo(2, 10);
    expect(volumeSubScore(history, last, volumeOpts).value).toBeCloseTo(83.333, 3);
  });

  it("needs minHistoryDays of baseline", () => {
    const { history, last } = series("2024-04-01", [5, 5, 5, 50]);
    expect(volumeZScore(history, last, volumeOpts)).toBeNull();
    expect(volumeSubScore(history, last, volumeOpts)).toEqual({ value: 50, available: false, raw: null });
  });

  it("ignores days outside the window", () => {
    const { history, last } = series("2024-03-01", [1000, ...Array<number>(38).fill(5)]);
    expect(last).toBe("2024-04-08");
    expect(volumeZScore(history, last, volumeOpts)).toBe(0);
  });

  it("counts missing days inside the window as zero mentions", () => {
    const history = [agg("2024-05-01", 10), agg("2024-05-07", 10)];
    const opts = { windowDays: 30, minHistoryDays: 6 };
    expect(volumeZScore(history, "2024-05-07", opts)).toBeCloseTo(Math.sqrt(5), 10);
    expect(volumeSubScore(history, "2024-05-07", opts).value).toBeCloseTo(87.27, 2);
  });

  it("gives the same score whether or not quiet days carry an aggregate", () => {
    const sparse = [agg("2024-05-01", 10), agg("2024-05-07", 10)];
    const dense = series("2024-05-01", [10, 0, 0, 0, 0, 0, 10]).history;
    const opts = { windowDays: 30, minHistoryDays: 6 };
    expect(volumeSubScore(sparse, "2024-05-07", opts)).toEqual(volumeSubScore(dense, "2024-05-07", opts));
  });

  it("does not reach back before the first recorded day", () => {
    const history = [agg("2024-05-05", 3), agg("2024-05-07", 9)];
    expect(volumeZScore(history, "2024-05-07", { windowDays: 30, minHistoryDays: 3 })).toBeNull();
  });
});

describe("impact on a volume spike", () => {
  it("rises from day 29 to day 30", () => {
    const counts = [...Array<number>(29).fill(5), 50];
    const day29 = series("2024-04-01", counts.slice(0, 29));
    const day30 = series("2024-04-01", counts);
    const score = (h: DailyAggregate[], d: string) =>
      impactScore(
        {
          volume: volumeSubScore(h, d, volumeOpts),
          sentiment: sentimentSubScore(h.find((a) => a.day === d)),
          momentum: momentumSubScore([]),
          shortInterest: shortInterestSubScore(null),
        },
        DEFAULT_WEIGHTS
      );
    const before = score(day29.history, day29.last);
    const after = score(day30.history, day30.last);
    // only volume (40) and short interest (10, scored 0) are available
    expect(before).toBeCloseTo(40, 10);
    expect(after).toBeCloseTo(80, 10);
    expect(after).toBeGreaterThan(before);
  });
});

describe("momentumSubScore", () => {
  it("maps the 3-close % change onto 0..100, clipped at ±10%", () => {
    const up = momentumSubScore([10, 10.5, 11]);
    expect(up.available).toBe(true);
    expect(up.value).toBeCloseTo(100, 10);
    expect(up.raw).toBeCloseTo(10, 10);
    expect(momentumSubScore([10, 10, 9.5]).value).toBeCloseTo(25, 10);
    expect(momentumSubScore([10, 20, 40]).value).toBe(100);
  });

  it("only looks at the last three closes", () => {
    expect(momentumSubScore([100, 10, 10, 10]).value).toBe(50);
  });

  it("is unavailable with fewer than three closes", () => {
    expect(momentumSubScore([1, 2])).toEqual({ value: 50, available: false, raw: null });
  });
});

describe("shortInterestSubScore", () => {
  it("contributes zero when absent but stays available", () => {
    expect(shortInterestSubScore(null)).toEqual({ value: 0, available: true, raw: null });
  });

  it("scales to a 40% ceiling", () => {
    expect(shortInterestSubScore(20)).toEqual({ value: 50, available: true, raw: 20 });
    expect(shortInterestSubScore(80)).toEqual({ value: 100, available: true, raw: 80 });
  });
});

describe("collectSubScores", () => {
  it("reads today's aggregate and the price series from the store", () => {
    const store = new HistoryStore();
    store.beginDay("2024-05-01");
    store.recordMention("GME", 1);
    store.recordMention("GME", 0);
    store.recordBars("GME", [
      { symbol: "GME", date: "2024-04-28", open: 10, high: 10, low: 10, close: 10, volume: 1 },
      { symbol: "GME", date: "2024-04-29", open: 10, high: 10, low: 10, close: 10, volume: 1 },
      { symbol: "GME", date: "2024-04-30", open: 10, high: 11, low: 10, close: 11, volume: 1 },
    ]);
    const subs = collectSubScores(store, "GME", "2024-05-01", 10, volumeOpts);
    expect(subs.sentiment.value).toBe(75);
    expect(subs.momentum.value).toBe(100);
    expect(subs.volume.available).toBe(false);
    expect(subs.shortInterest.value).toBe(25);
  });

  it("scores volume from mentions alone, whether or not bars arrived", () => {
    const counts = [10, 0, 0, 0, 0, 0, 10];
    const build = (withBars: boolean) => {
      const store = new HistoryStore();
      for (const [i, mentions] of counts.entries()) {
        store.beginDay(addDays("2024-05-01", i));
        for (let n = 0; n < mentions; n++) store.recordMention("GME", null);
        if (withBars) store.recordMarket("GME", { closingPrice: 10, volume: 1_000 });
      }
      return collectSubScores(store, "GME", "2024-05-07", null, { windowDays: 30, minHistoryDays: 6 }).volume;
    };
    expect(build(false)).toEqual(build(true));
    expect(build(false).value).toBeCloseTo(87.27, 2);
  });
});
