import { describe, it, expect, beforeEach, vi } from "vitest";
import { CycleCancelledError, UpstreamAuthError, UpstreamRateLimited } from "../../errors.js";
import { FetchCache, cacheKey } from "../FetchCache.js";

describe("FetchCache", () => {
  let t: number;
  const clock = { now: () => t };
  const mockLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  let cache: FetchCache<string>;

  beforeEach(() => {
    vi.clearAllMocks();
    t = 0;
    cache = new FetchCache<string>({
      source: "bars",
      clock,
      backoffBaseMs: 1_000,
      backoffMaxMs: 5_000,
      logger: mockLogger,
    });
  });

  it("builds source:subject:period keys", () => {
    expect(cacheKey("bars", "GME", "2024-05-01")).toBe("bars:GME:2024-05-01");
  });

  it("fetches once within the TTL", async () => {
    const fetchFn = vi.fn().mockResolvedValue("a");
    expect(await cache.get("k", 1_000, fetchFn)).toBe("a");
    t = 999;
    expect(await cache.get("k", 1_000, fetchFn)).toBe("a");
    expect(fetchFn).toHaveBeenCalledTimes(1);

    t = 1_000;
    fetchFn.mockResolvedValue("b");
    expect(await cache.get("k", 1_000, fetchFn)).toBe("b");
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("collapses concurrent misses into one fetch", async () => {
    let release: (v: string) => void = () => undefined;
    const fetchFn = vi.fn(() => new Promise<string>((r) => (release = r)));
    const a = cache.get("k", 1_000, fetchFn);
    const b = cache.get("k", 1_000, fetchFn);
    release("shared");
    expect(await Promise.all([a, b])).toEqual(["shared", "shared"]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("serves stale data on failure and honours Retry-After", async () => {
    await cache.get("k", 1_000, async () => "old");
    t = 2_000;
    const failing = vi.fn().mockRejectedValue(new UpstreamRateLimited("bars", "429", 60_000));
    expect(await cache.get("k", 1_000, failing)).toBe("old");
    expect(cache.isCoolingDown()).toBe(true);
    expect(cache.stats().coolDownUntil).toBe(62_000);

    t = 61_999;
    expect(await cache.get("k", 1_000, failing)).toBe("old");
    expect(failing).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it("rethrows without a stale value, then refuses to fetch during cool-down", async () => {
    const err = new UpstreamRateLimited("bars", "503");
    const failing = vi.fn().mockRejectedValue(err);
    await expect(cache.get("k", 1_000, failing)).rejects.toBe(err);
    await expect(cache.get("k", 1_000, failing)).rejects.toBeInstanceOf(UpstreamRateLimited);
    expect(failing).toHaveBeenCalledTimes(1);
  });

  it("doubles the cool-down per consecutive failure up to the cap and resets on success", async () => {
    const failing = vi.fn().mockRejectedValue(new Error("boom"));
    const until: number[] = [];
    for (const at of [0, 1_000, 3_000, 7_000]) {
      t = at;
      await expect(cache.get("k", 1_000, failing)).rejects.toThrow("boom");
      until.push(cache.stats().coolDownUntil);
    }
    expect(until).toEqual([1_000, 3_000, 7_000, 12_000]);

    t = 12_000;
    expect(await cache.get("k", 1_000, async () => "ok")).toBe("ok");
    expect(cache.stats()).toMatchObject({ consecutiveFailures: 0, coolDownUntil: 0 });
  });

  it("propagates auth failures even with a stale value, without back-off", async () => {
    await cache.get("k", 1_000, async () => "old");
    t = 5_000;
    const err = new UpstreamAuthError("bars", "401");
    await expect(cache.get("k", 1_000, () => Promise.reject(err))).rejects.toBe(err);
    expect(cache.isCoolingDown()).toBe(false);
  });

  it("passes cancellations through without back-off", async () => {
    await expect(cache.get("k", 1_000, () => Promise.reject(new CycleCancelledError()))).rejects.toBeInstanceOf(
      CycleCancelledError
    );
    expect(cache.stats().consecutiveFailures).toBe(0);
  });

  it("invalidates one key, a prefix, or everything", async () => {
    await cache.get("bars:GME:d1", 1_000, async () => "1");
    await cache.get("bars:GME:d2", 1_000, async () => "2");
    await cache.get("bars:AMC:d1", 1_000, async () => "3");

    expect(cache.invalidate("bars:AMC:d1")).toBe(1);
    expect(cache.invalidate("bars:AMC:d1")).toBe(0);
    expect(cache.invalidatePrefix("bars:GME:")).toBe(2);

    await cache.get("x", 1_000, async () => "x");
    expect(cache.invalidate("*")).toBe(1);

    const refetch = vi.fn().mockResolvedValue("fresh");
    expect(await cache.get("x", 1_000, refetch)).toBe("fresh");
    expect(refetch).toHaveBeenCalledTimes(1);
  });
});
