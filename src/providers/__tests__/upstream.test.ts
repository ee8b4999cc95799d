import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import { cfg, type Cfg } from "../../config.js";
import { Coordinator } from "../../engine/Coordinator.js";
import { parseSettings } from "../../engine/settings.js";
import { quietLogger, testLexicon, testNames } from "../../engine/__tests__/fakes.js";
import { httpClient } from "../http.js";
import { createHttpUpstream } from "../index.js";

type Route = (url: string) => { status: number; data: unknown };

let route: Route = () => ({ status: 404, data: {} });

const stub: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
  const { status, data } = route(config.url ?? "");
  const response: AxiosResponse = { status, statusText: String(status), headers: {}, data, config };
  if (status >= 400) throw new AxiosError(`HTTP ${status}`, "ERR_BAD_RESPONSE", config, undefined, response);
  return response;
};

const noKeys: Cfg = {
  ...cfg,
  REDDIT_CLIENT_ID: undefined,
  REDDIT_CLIENT_SECRET: undefined,
  REDDIT_USERNAME: undefined,
  REDDIT_PASSWORD: undefined,
  POLYGON_API_KEY: undefined,
  FMP_API_KEY: undefined,
  TRADING212_API_KEY: undefined,
};

const listing = (children: { kind: string; data: Record<string, unknown> }[]) => ({ data: { children } });

function hotPosts(n: number) {
  const created = Math.floor(Date.now() / 1000);
  return listing(
    Array.from({ length: n }, (_, i) => ({
      kind: "t3",
      data: { id: `p${i}`, name: `t3_p${i}`, subreddit: "wsb", title: "GME moon", selftext: "", score: 500, created_utc: created },
    }))
  );
}

function commentsOf(url: string) {
  const id = url.split("/comments/")[1] ?? "x";
  const created = Math.floor(Date.now() / 1000);
  return [
    listing([]),
    listing([{ kind: "t1", data: { id: `c${id}`, name: `t1_c${id}`, subreddit: "wsb", body: "GME", score: 200, created_utc: created } }]),
  ];
}

describe("createHttpUpstream", () => {
  let original: typeof httpClient.defaults.adapter;

  beforeAll(() => {
    original = httpClient.defaults.adapter;
    httpClient.defaults.adapter = stub;
  });

  afterAll(() => {
    httpClient.defaults.adapter = original;
  });

  it(
    "finishes a default-settings reddit cycle inside fetchTimeoutMs",
    async () => {
      route = (url) => {
        if (url.includes("access_token")) return { status: 200, data: { access_token: "test-token", expires_in: 3600 } };
        if (url.endsWith("/hot")) return { status: 200, data: hotPosts(30) };
        if (url.includes("/comments/")) return { status: 200, data: commentsOf(url) };
        return { status: 404, data: {} };
      };
      const settings = parseSettings({});
      const engine = new Coordinator({
        upstream: createHttpUpstream(
          {
            ...noKeys,
            REDDIT_CLIENT_ID: "test-id",
            REDDIT_CLIENT_SECRET: "test-secret",
            REDDIT_USERNAME: "tester",
            REDDIT_PASSWORD: "test-secret",
          },
          settings
        ),
        settings,
        logger: quietLogger(),
        symbolNames: testNames,
        blacklist: new Set<string>(),
        lexicon: testLexicon,
      });

      const started = Date.now();
      const snap = await engine.refreshNow();

      expect(Date.now() - started).toBeLessThan(settings.fetchTimeoutMs);
      expect(snap.overview.degradedSources).toEqual([]);
      expect(snap.overview.postsProcessed).toBeGreaterThanOrEqual(30);
      expect(snap.tickers.map((t) => t.symbol)).toEqual(["GME"]);
    },
    30_000
  );

  describe("fetchShortAvailability", () => {
    const settings = parseSettings({});
    const keys: Cfg = { ...noKeys, POLYGON_API_KEY: "test-key", FMP_API_KEY: "test-key", TRADING212_API_KEY: "test-key" };

    it("keeps the shortable flag when the float lookup is rate limited", async () => {
      route = (url) => {
        if (url.includes("trading212")) return { status: 200, data: [{ ticker: "GME_US_EQ", shortName: "GME", type: "STOCK" }] };
        if (url.includes("short-interest")) return { status: 200, data: { results: [{ short_interest: 20_000_000 }] } };
        if (url.includes("financialmodelingprep")) return { status: 429, data: {} };
        return { status: 404, data: {} };
      };
      const upstream = createHttpUpstream(keys, settings);

      await expect(upstream.fetchShortAvailability("GME", new AbortController().signal)).resolves.toEqual({
        shortable: true,
        shortInterestPct: null,
      });
    });

    it("keeps the short interest when Trading212 is not configured", async () => {
      route = (url) => {
        if (url.includes("short-interest")) return { status: 200, data: { results: [{ short_interest: 20_000_000 }] } };
        if (url.includes("financialmodelingprep")) return { status: 200, data: [{ symbol: "GME", floatShares: 100_000_000 }] };
        return { status: 404, data: {} };
      };
      const upstream = createHttpUpstream({ ...keys, TRADING212_API_KEY: undefined }, settings);

      await expect(upstream.fetchShortAvailability("GME", new AbortController().signal)).resolves.toEqual({
        shortable: false,
        shortInterestPct: 20,
      });
    });

    it(
      "rejects when every short source fails",
      async () => {
        route = () => ({ status: 503, data: {} });
        const upstream = createHttpUpstream(keys, settings);

        await expect(upstream.fetchShortAvailability("GME", new AbortController().signal)).rejects.toThrow(
          "shorts unavailable: 503"
        );
      },
      20_000
    );
  });
});
