// src/providers/reddit.ts
import { z } from "zod";
import { UpstreamAuthError, UpstreamTimeout } from "../errors.js";
import { log } from "../logger.js";
import type { RawPost } from "../types.js";
import { httpClient, toUpstreamError } from "./http.js";
import { schedule } from "./limits.js";

export type RedditCredentials = {
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
};

export type RedditFetchParams = {
  /** hot posts per subreddit */
  maxPosts?: number;
  /** top-level comments pulled per post; 0 disables the extra requests */
  maxComments?: number;
  /** selftext is cut to this many characters, as are comments */
  maxTextLength?: number;
  /**
   * Time from the start of the call after which no more comment requests are
   * made; the in-flight one is aborted and the posts gathered so far returned.
   */
  budgetMs?: number;
};

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
const API_BASE = "https://oauth.reddit.com";

const TokenSchema = z.union([
  z.object({ access_token: z.string(), expires_in: z.number() }),
  z.object({ error: z.string() }),
]);

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ kind: z.string(), data: z.record(z.string(), z.unknown()) })),
  }),
});

const CommentsResponseSchema = z.tuple([ListingSchema, ListingSchema]).rest(z.unknown());

const str = (v: unknown) => (typeof v === "string" ? v : "");
const num = (v: unknown) => (typeof v === "number" ? v : Number.NaN);
const isoFromUnix = (v: unknown) => {
  const s = num(v);
  return Number.isFinite(s) ? new Date(s * 1000).toISOString() : "";
};

/**
 * Normalize a listing child into a RawPost. Fields are taken as-is; a row with
 * holes (no id, no score) is passed on and rejected by the engine's validation.
 */
export function mapRedditChild(child: { kind: string; data: Record<string, unknown> }, maxTextLength = 2000): RawPost | null {
  const d = child.data;
  if (child.kind === "t3") {
    if (d.stickied === true) return null;
    const text = `${str(d.title)} ${str(d.selftext).slice(0, maxTextLength)}`.trim();
    return {
      id: str(d.name) || str(d.id),
      subreddit: str(d.subreddit),
      text,
      score: num(d.score),
      createdAt: isoFromUnix(d.created_utc),
    };
  }
  if (child.kind === "t1") {
    const body = str(d.body);
    // long comment bodies are skipped, not cut
    if (!body || body.length > maxTextLength) return null;
    return {
      id: str(d.name) || str(d.id),
      subreddit: str(d.subreddit),
      text: body,
      score: num(d.score),
      createdAt: isoFromUnix(d.created_utc),
    };
  }
  return null;
}

/** Settles with `job`, or rejects once `signal` aborts while the job still waits on the limiter. */
function untilAborted<T>(job: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return job;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new UpstreamTimeout("posts", 0));
    signal.addEventListener("abort", onAbort, { once: true });
    job.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export class RedditClient {
  private token: { value: string; expiresAt: number } | null = null;

  constructor(private readonly creds: RedditCredentials) {}

  private get userAgent() {
    return `node:meme-radar:v0.1.0 (by /u/${this.creds.username})`;
  }

  private async accessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt - 60_000) return this.token.value;

    const body = new URLSearchParams({
      grant_type: "password",
      username: this.creds.username,
      password: this.creds.password,
    });
    try {
      const { data } = await httpClient.post(TOKEN_URL, body.toString(), {
        auth: { username: this.creds.clientId, password: this.creds.clientSecret },
        headers: { "Content-Type": "application/x-www-form-urlencoded", "User-Agent": this.userAgent },
        signal,
      });
      const parsed = TokenSchema.parse(data);
      // Reddit answers a bad password with 200 + { error }
      if ("error" in parsed) throw new UpstreamAuthError("posts", `reddit token: ${parsed.error}`);
      this.token = { value: parsed.access_token, expiresAt: Date.now() + parsed.expires_in * 1000 };
      log.info("[REDDIT] authenticated", { user: this.creds.username });
      return parsed.access_token;
    } catch (err) {
      throw toUpstreamError("posts", err);
    }
  }

  private async get(path: string, params: Record<string, string | number>, signal?: AbortSignal): Promise<unknown> {
    const token = await this.accessToken(signal);
    if (signal?.aborted) throw new UpstreamTimeout("posts", 0);
    const job = schedule("reddit", "posts", async () => {
      if (signal?.aborted) throw new UpstreamTimeout("posts", 0);
      try {
        const { data } = await httpClient.get<unknown>(`${API_BASE}${path}`, {
          params: { raw_json: 1, ...params },
          headers: { Authorization: `Bearer ${token}`, "User-Agent": this.userAgent },
          signal,
        });
        return data;
      } catch (err) {
        if (toUpstreamError("posts", err) instanceof UpstreamAuthError) this.token = null;
        throw toUpstreamError("posts", err);
      }
    });
    return untilAborted(job, signal);
  }

  /** Hot posts of one subreddit, plus a few top-level comments per post. */
  async fetchPosts(subreddit: string, params: RedditFetchParams = {}, signal?: AbortSignal): Promise<RawPost[]> {
    const { maxPosts = 30, maxComments = 10, maxTextLength = 2000, budgetMs = Number.POSITIVE_INFINITY } = params;
    const until = Date.now() + budgetMs;
    const listing = ListingSchema.parse(
      await this.get(`/r/${encodeURIComponent(subreddit)}/hot`, { limit: maxPosts }, signal)
    );

    const out: RawPost[] = [];
    for (const child of listing.data.children) {
      const post = mapRedditChild(child, maxTextLength);
      if (post) out.push(post);
    }

    if (maxComments > 0) {
      const ids = listing.data.children.filter((c) => c.kind === "t3").map((c) => str(c.data.id)).filter(Boolean);
      const comments = await this.fetchComments(subreddit, ids, { maxComments, maxTextLength, until }, signal);
      out.push(...comments);
    }

    log.info("[REDDIT] fetched", { subreddit, items: out.length });
    return out;
  }

  /**
   * Top comments of each post, one request at a time, until `until`. A spent
   * budget keeps what was fetched; an aborted caller signal throws.
   */
  private async fetchComments(
    subreddit: string,
    ids: string[],
    opts: { maxComments: number; maxTextLength: number; until: number },
    signal?: AbortSignal
  ): Promise<RawPost[]> {
    const out: RawPost[] = [];
    const budget = new AbortController();
    const onAbort = () => budget.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const remaining = opts.until - Date.now();
    const timer = Number.isFinite(remaining) ? setTimeout(() => budget.abort(), Math.max(0, remaining)) : undefined;

    let tried = 0;
    try {
      for (const id of ids) {
        if (budget.signal.aborted) break;
        tried++;
        try {
          const raw = await this.get(
            `/r/${encodeURIComponent(subreddit)}/comments/${encodeURIComponent(id)}`,
            { limit: opts.maxComments, depth: 1, sort: "top" },
            budget.signal
          );
          const [, comments] = CommentsResponseSchema.parse(raw);
          for (const c of comments.data.children.slice(0, opts.maxComments)) {
            const mapped = mapRedditChild(c, opts.maxTextLength);
            if (mapped) out.push(mapped);
          }
        } catch (err) {
          if (err instanceof UpstreamAuthError || signal?.aborted) throw err;
          if (budget.signal.aborted) break;
          log.warn("[REDDIT] comments skipped", { subreddit, id, error: err instanceof Error ? err.message : String(err) });
        }
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    if (signal?.aborted) throw new UpstreamTimeout("posts", 0);
    if (budget.signal.aborted) log.info("[REDDIT] comment budget spent", { subreddit, posts: tried, of: ids.length });
    return out;
  }
}
