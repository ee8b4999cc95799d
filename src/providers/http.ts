import axios from "axios";
import { UpstreamAuthError, UpstreamRateLimited, UpstreamTimeout } from "../errors.js";
import type { SourceName } from "../types.js";

export const httpClient = axios.create({
  timeout: 10_000,
  headers: { "User-Agent": "node:meme-radar:v0.1.0" },
});

/** `Retry-After` is seconds or an HTTP date. */
export function parseRetryAfter(value: unknown, now = Date.now()): number | null {
  if (typeof value !== "string" && typeof value !== "number") return null;
  const secs = Number(value);
  if (Number.isFinite(secs)) return Math.max(0, secs * 1000);
  const at = Date.parse(String(value));
  return Number.isFinite(at) ? Math.max(0, at - now) : null;
}

/**
 * Map an axios failure onto the engine taxonomy:
 * 401/403 → auth, 429 → rate-limited, timeout/abort → timeout,
 * 5xx and network errors → rate-limited (transient, back off).
 * Anything that is not an axios error is returned unchanged.
 */
export function toUpstreamError(source: SourceName, err: unknown, timeoutMs = 10_000): unknown {
  if (!axios.isAxiosError(err)) return err;

  const status = err.response?.status;
  if (status === 401 || status === 403) {
    return new UpstreamAuthError(source, `${source} rejected credentials (HTTP ${status})`);
  }
  if (status === 429) {
    const retry = parseRetryAfter(err.response?.headers?.["retry-after"]);
    return new UpstreamRateLimited(source, `${source} rate limited (HTTP 429)`, retry);
  }
  if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT" || err.code === "ERR_CANCELED") {
    return new UpstreamTimeout(source, timeoutMs);
  }
  if (status === undefined || status >= 500) {
    return new UpstreamRateLimited(source, `${source} unavailable: ${status ?? err.code ?? err.message}`);
  }
  return err;
}
