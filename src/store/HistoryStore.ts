import { addDays } from "../engine/clock.js";
import type { DailyAggregate, PriceBar } from "../types.js";

export type MarketFields = Pick<DailyAggregate, "closingPrice" | "volume" | "shortInterestPct">;

function emptyAggregate(symbol: string, day: string): DailyAggregate {
  return {
    symbol,
    day,
    mentionCount: 0,
    sentimentSum: 0,
    sentimentCount: 0,
    closingPrice: null,
    volume: null,
    shortInterestPct: null,
  };
}

/**
 * Bounded per-ticker time series: daily mention aggregates plus the trading-day
 * price series. Only the current day is writable; earlier days are history.
 * Single writer (the coordinator); readers get copies.
 */
export class HistoryStore {
  private aggregates = new Map<string, DailyAggregate[]>();
  private bars = new Map<string, PriceBar[]>();
  private today: string | null = null;

  get currentDay(): string | null {
    return this.today;
  }

  /** Roll the writable day forward. Going backwards is refused. */
  beginDay(day: string): void {
    if (this.today && day < this.today) {
      throw new Error(`cannot rewind store from ${this.today} to ${day}`);
    }
    this.today = day;
  }

  private todayOrThrow(): string {
    if (!this.today) throw new Error("beginDay() must be called before writing");
    return this.today;
  }

  private todayAggregate(symbol: string): DailyAggregate {
    const day = this.todayOrThrow();
    let series = this.aggregates.get(symbol);
    if (!series) {
      series = [];
      this.aggregates.set(symbol, series);
    }
    const last = series[series.length - 1];
    if (last && last.day === day) return last;
    const fresh = emptyAggregate(symbol, day);
    series.push(fresh);
    return fresh;
  }

  /** Additive same-day merge. `polarity` null = a mention without opinion words. */
  recordMention(symbol: string, polarity: number | null): void {
    const agg = this.todayAggregate(symbol);
    agg.mentionCount += 1;
    if (polarity !== null) {
      agg.sentimentSum += polarity;
      agg.sentimentCount += 1;
    }
  }

  /** Market fields replace rather than add; a null leaves the field as is. */
  recordMarket(symbol: string, fields: Partial<MarketFields>): void {
    const agg = this.todayAggregate(symbol);
    if (fields.closingPrice != null) agg.closingPrice = fields.closingPrice;
    if (fields.volume != null) agg.volume = fields.volume;
    if (fields.shortInterestPct != null) agg.shortInterestPct = fields.shortInterestPct;
  }

  /** Upsert daily bars by date; the series stays sorted ascending. */
  recordBars(symbol: string, incoming: PriceBar[]): void {
    if (!incoming.length) return;
    const byDate = new Map((this.bars.get(symbol) ?? []).map((b) => [b.date, b]));
    for (const b of incoming) byDate.set(b.date, { ...b, symbol });
    const merged = [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
    this.bars.set(symbol, merged);
  }

  /** Load persisted rows, bypassing the current-day rule. */
  restore(aggregates: DailyAggregate[], bars: PriceBar[] = []): void {
    for (const a of aggregates) {
      const series = this.aggregates.get(a.symbol) ?? [];
      const i = series.findIndex((x) => x.day === a.day);
      if (i >= 0) series[i] = { ...a };
      else series.push({ ...a });
      series.sort((x, y) => x.day.localeCompare(y.day));
      this.aggregates.set(a.symbol, series);
    }
    const grouped = new Map<string, PriceBar[]>();
    for (const b of bars) {
      const list = grouped.get(b.symbol) ?? [];
      list.push(b);
      grouped.set(b.symbol, list);
    }
    for (const [symbol, list] of grouped) this.recordBars(symbol, list);
  }

  aggregate(symbol: string, day: string): DailyAggregate | undefined {
    const found = this.aggregates.get(symbol)?.find((a) => a.day === day);
    return found ? { ...found } : undefined;
  }

  history(symbol: string): DailyAggregate[] {
    return (this.aggregates.get(symbol) ?? []).map((a) => ({ ...a }));
  }

  priceSeries(symbol: string): PriceBar[] {
    return (this.bars.get(symbol) ?? []).map((b) => ({ ...b }));
  }

  closes(symbol: string): number[] {
    return (this.bars.get(symbol) ?? []).map((b) => b.close);
  }

  symbols(): string[] {
    return [...new Set([...this.aggregates.keys(), ...this.bars.keys()])];
  }

  /** Drop aggregates and bars `retentionDays` or more days before `today`. */
  prune(today: string, retentionDays: number): number {
    const cutoff = addDays(today, -retentionDays);
    let dropped = 0;
    for (const [symbol, series] of this.aggregates) {
      const kept = series.filter((a) => a.day > cutoff);
      dropped += series.length - kept.length;
      if (kept.length) this.aggregates.set(symbol, kept);
      else this.aggregates.delete(symbol);
    }
    for (const [symbol, series] of this.bars) {
      const kept = series.filter((b) => b.date > cutoff);
      dropped += series.length - kept.length;
      if (kept.length) this.bars.set(symbol, kept);
      else this.bars.delete(symbol);
    }
    return dropped;
  }

  remove(symbol: string): void {
    this.aggregates.delete(symbol);
    this.bars.delete(symbol);
  }

  clear(): void {
    this.aggregates.clear();
    this.bars.clear();
  }

  /** Deep copy; the coordinator mutates a clone and swaps it in on commit. */
  clone(): HistoryStore {
    const copy = new HistoryStore();
    copy.today = this.today;
    for (const [k, v] of this.aggregates) copy.aggregates.set(k, v.map((a) => ({ ...a })));
    for (const [k, v] of this.bars) copy.bars.set(k, v.map((b) => ({ ...b })));
    return copy;
  }

  allAggregates(): DailyAggregate[] {
    return [...this.aggregates.values()].flat().map((a) => ({ ...a }));
  }

  allBars(): PriceBar[] {
    return [...this.bars.values()].flat().map((b) => ({ ...b }));
  }
}
