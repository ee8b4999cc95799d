import Database from "better-sqlite3";
import { AggregateSchema, BarSchema, TickerRecordSchema } from "../engine/schemas.js";
import { log } from "../logger.js";
import type { DailyAggregate, PriceBar, TickerRecord } from "../types.js";

export type SeenPost = { id: string; day: string };

/** Everything a commit leaves behind; enough to resume after a restart. */
export type PersistedState = {
  aggregates: DailyAggregate[];
  bars: PriceBar[];
  records: TickerRecord[];
  seen: SeenPost[];
};

type AggregateRow = {
  symbol: string;
  day: string;
  mention_count: number;
  sentiment_sum: number;
  sentiment_count: number;
  closing_price: number | null;
  volume: number | null;
  short_interest_pct: number | null;
};

type BarRow = {
  symbol: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

/** SQLite persistence for committed cycles */
export class HistoryDB {
  private db: Database.Database;
  private qInsertAggregate: Database.Statement;
  private qInsertBar: Database.Statement;
  private qInsertTicker: Database.Statement;
  private qInsertSeen: Database.Statement;

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`CREATE TABLE IF NOT EXISTS aggregates (
      symbol TEXT NOT NULL,
      day TEXT NOT NULL,
      mention_count INTEGER NOT NULL,
      sentiment_sum REAL NOT NULL,
      sentiment_count INTEGER NOT NULL,
      closing_price REAL,
      volume REAL,
      short_interest_pct REAL,
      PRIMARY KEY (symbol, day)
    );
    CREATE TABLE IF NOT EXISTS bars (
      symbol TEXT NOT NULL,
      date TEXT NOT NULL,
      open REAL NOT NULL,
      high REAL NOT NULL,
      low REAL NOT NULL,
      close REAL NOT NULL,
      volume REAL NOT NULL,
      PRIMARY KEY (symbol, date)
    );
    CREATE TABLE IF NOT EXISTS tickers (
      symbol TEXT PRIMARY KEY,
      state TEXT NOT NULL,
      updated_at TEXT DEFAULT (datetime('now'))
    );
    CREATE TABLE IF NOT EXISTS seen_posts (
      id TEXT PRIMARY KEY,
      day TEXT NOT NULL
    );`);
    this.qInsertAggregate = this.db.prepare(`INSERT INTO aggregates
      (symbol, day, mention_count, sentiment_sum, sentiment_count, closing_price, volume, short_interest_pct)
      VALUES (@symbol, @day, @mention_count, @sentiment_sum, @sentiment_count, @closing_price, @volume, @short_interest_pct)`);
    this.qInsertBar = this.db.prepare(`INSERT INTO bars
      (symbol, date, open, high, low, close, volume)
      VALUES (@symbol, @date, @open, @high, @low, @close, @volume)`);
    this.qInsertTicker = this.db.prepare("INSERT INTO tickers (symbol, state) VALUES (?, ?)");
    this.qInsertSeen = this.db.prepare("INSERT OR IGNORE INTO seen_posts (id, day) VALUES (?, ?)");
  }

  /** Replace the stored state with one committed cycle, atomically. */
  save(state: PersistedState): void {
    const tx = this.db.transaction((s: PersistedState) => {
      this.wipe();
      for (const a of s.aggregates) {
        const row: AggregateRow = {
          symbol: a.symbol,
          day: a.day,
          mention_count: a.mentionCount,
          sentiment_sum: a.sentimentSum,
          sentiment_count: a.sentimentCount,
          closing_price: a.closingPrice,
          volume: a.volume,
          short_interest_pct: a.shortInterestPct,
        };
        this.qInsertAggregate.run(row);
      }
      for (const b of s.bars) {
        const row: BarRow = { ...b };
        this.qInsertBar.run(row);
      }
      for (const r of s.records) this.qInsertTicker.run(r.symbol, JSON.stringify(r));
      for (const p of s.seen) this.qInsertSeen.run(p.id, p.day);
    });
    tx(state);
  }

  /** Rows that fail validation are logged and left out. */
  load(): PersistedState {
    const aggregates: DailyAggregate[] = [];
    for (const row of this.db.prepare("SELECT * FROM aggregates ORDER BY symbol, day").all()) {
      const parsed = AggregateSchema.safeParse(fromAggregateRow(row));
      if (parsed.success) aggregates.push(parsed.data);
      else log.warn("[DB] bad aggregate row skipped", parsed.error.issues[0]?.message);
    }

    const bars: PriceBar[] = [];
    for (const row of this.db.prepare("SELECT * FROM bars ORDER BY symbol, date").all()) {
      const parsed = BarSchema.safeParse(row);
      if (parsed.success) bars.push(parsed.data);
      else log.warn("[DB] bad bar row skipped", parsed.error.issues[0]?.message);
    }

    const records: TickerRecord[] = [];
    for (const row of this.db.prepare("SELECT symbol, state FROM tickers ORDER BY symbol").all()) {
      const parsed = TickerRecordSchema.safeParse(parseStateColumn(row));
      if (parsed.success) records.push(parsed.data);
      else log.warn("[DB] bad ticker row skipped", parsed.error.issues[0]?.message);
    }

    const seen: SeenPost[] = [];
    for (const row of this.db.prepare("SELECT id, day FROM seen_posts").all()) {
      if (isSeenRow(row)) seen.push({ id: row.id, day: row.day });
    }

    return { aggregates, bars, records, seen };
  }

  clear(): void {
    this.db.transaction(() => this.wipe())();
  }

  close(): void {
    this.db.close();
  }

  private wipe(): void {
    this.db.exec("DELETE FROM aggregates; DELETE FROM bars; DELETE FROM tickers; DELETE FROM seen_posts;");
  }
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function fromAggregateRow(row: unknown): unknown {
  if (!isRecord(row)) return row;
  return {
    symbol: row.symbol,
    day: row.day,
    mentionCount: row.mention_count,
    sentimentSum: row.sentiment_sum,
    sentimentCount: row.sentiment_count,
    closingPrice: row.closing_price,
    volume: row.volume,
    shortInterestPct: row.short_interest_pct,
  };
}

function parseStateColumn(row: unknown): unknown {
  if (!isRecord(row) || typeof row.state !== "string") return null;
  try {
    return JSON.parse(row.state);
  } catch {
    return null;
  }
}

function isSeenRow(row: unknown): row is SeenPost {
  return isRecord(row) && typeof row.id === "string" && typeof row.day === "string";
}
