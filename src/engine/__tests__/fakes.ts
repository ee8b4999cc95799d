import { vi } from "vitest";
import type { Lexicon } from "../../resources.js";
import type { PriceBar, RawPost, ShortAvailability } from "../../types.js";
import type { Upstream } from "../upstream.js";

export const quietLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() });

export class FakeClock {
  constructor(public t: number) {}
  now = () => this.t;
  advanceDays(n: number) {
    this.t += n * 86_400_000;
  }
}

export const testLexicon: Lexicon = {
  positive: new Map([
    ["moon", 1],
    ["calls", 1],
  ]),
  negative: new Map([
    ["crash", 1],
    ["puts", 1],
  ]),
  negators: new Set(["not"]),
};

export const testNames: ReadonlyMap<string, string> = new Map([
  ["GME", "GameStop Corp."],
  ["AMC", "AMC Entertainment Holdings"],
]);

export function post(id: string, text: string, score = 500, subreddit = "wsb"): RawPost {
  return { id, subreddit, text, score, createdAt: "2024-05-01T12:00:00.000Z" };
}

export function bar(symbol: string, date: string, close: number): PriceBar {
  return { symbol, date, open: close, high: close, low: close, close, volume: 1_000 };
}

/** Never settles unless the signal aborts. */
function hang(signal: AbortSignal, honourAbort: boolean): Promise<never> {
  return new Promise((_, reject) => {
    if (honourAbort) signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

/** In-process stand-in for the HTTP providers. */
export class FakeUpstream implements Upstream {
  posts = new Map<string, RawPost[]>();
  bars = new Map<string, PriceBar[]>();
  shorts = new Map<string, ShortAvailability | null>();
  calls = { posts: 0, bars: 0, shorts: 0, invalidate: 0 };
  postsError: unknown = null;
  barsError: unknown = null;
  /** hang the next posts fetches until aborted */
  hangPosts = false;
  /** symbols whose bars never arrive (abort ignored) */
  stuckBars = new Set<string>();

  async fetchPosts(subreddit: string, signal: AbortSignal): Promise<RawPost[]> {
    this.calls.posts++;
    if (this.postsError) throw this.postsError;
    if (this.hangPosts) return hang(signal, true);
    return this.posts.get(subreddit) ?? [];
  }

  async fetchDailyBars(symbol: string, _from: string, _to: string, signal: AbortSignal): Promise<PriceBar[]> {
    this.calls.bars++;
    if (this.barsError) throw this.barsError;
    if (this.stuckBars.has(symbol)) return hang(signal, false);
    return this.bars.get(symbol) ?? [];
  }

  async fetchShortAvailability(symbol: string): Promise<ShortAvailability | null> {
    this.calls.shorts++;
    return this.shorts.get(symbol) ?? null;
  }

  invalidate(): void {
    this.calls.invalidate++;
  }
}
