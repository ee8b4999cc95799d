import type { SourceName } from "./types.js";

export type EngineErrorCode =
  | "UPSTREAM_AUTH"
  | "UPSTREAM_RATE_LIMITED"
  | "UPSTREAM_TIMEOUT"
  | "DATA_PARSE"
  | "CONFIG_VALIDATION"
  | "CYCLE_CANCELLED";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

/** Credentials rejected. Fatal for the source until reconfigured. */
export class UpstreamAuthError extends EngineError {
  readonly source: SourceName;

  constructor(source: SourceName, message: string) {
    super("UPSTREAM_AUTH", message);
    this.name = "UpstreamAuthError";
    this.source = source;
  }
}

/** 429s, exhausted quotas, and other transient upstream failures. */
export class UpstreamRateLimited extends EngineError {
  readonly source: SourceName;
  readonly retryAfterMs: number | null;

  constructor(source: SourceName, message: string, retryAfterMs: number | null = null) {
    super("UPSTREAM_RATE_LIMITED", message);
    this.name = "UpstreamRateLimited";
    this.source = source;
    this.retryAfterMs = retryAfterMs;
  }
}

export class UpstreamTimeout extends EngineError {
  readonly source: SourceName;
  readonly timeoutMs: number;

  constructor(source: SourceName, timeoutMs: number) {
    super("UPSTREAM_TIMEOUT", `${source} fetch exceeded ${timeoutMs}ms`);
    this.name = "UpstreamTimeout";
    this.source = source;
    this.timeoutMs = timeoutMs;
  }
}

/** A single malformed post or bar. The item is skipped, the cycle continues. */
export class DataParseError extends EngineError {
  readonly itemId: string | null;

  constructor(message: string, itemId: string | null = null) {
    super("DATA_PARSE", message);
    this.name = "DataParseError";
    this.itemId = itemId;
  }
}

export class ConfigValidationError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_VALIDATION", `invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export class CycleCancelledError extends EngineError {
  constructor(reason = "cycle cancelled") {
    super("CYCLE_CANCELLED", reason);
    this.name = "CycleCancelledError";
  }
}

/** Rate limits and timeouts degrade a cycle; anything else is unexpected. */
export function isTransient(err: unknown): err is UpstreamRateLimited | UpstreamTimeout {
  return err instanceof UpstreamRateLimited || err instanceof UpstreamTimeout;
}
