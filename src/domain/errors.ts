import type { ErrorKind } from "../types/monitoring.js";

export interface ContentApiErrorOptions {
  status?: number;
  code?: number;
  kind?: ErrorKind;
  cause?: unknown;
}

/** Failure raised by a content API collaborator. */
export class ContentApiError extends Error {
  readonly status?: number;
  readonly code?: number;
  readonly kind?: ErrorKind;

  constructor(message: string, options: ContentApiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ContentApiError";
    this.status = options.status;
    this.code = options.code;
    this.kind = options.kind;
  }
}

export class MissingCredentialError extends ContentApiError {
  constructor(message = "No usable access token is configured") {
    super(message, { kind: "authentication" });
    this.name = "MissingCredentialError";
  }
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

// Graph API error codes: 190 invalid/expired token, 102 session, 463/467 expired/invalid.
const AUTH_CODES = new Set([102, 190, 463, 467]);
// 4 app-level, 17 user-level, 32 page-level, 613 custom throttling.
const RATE_LIMIT_CODES = new Set([4, 17, 32, 613]);

const AUTH_MARKERS = ["expired", "unauthorized", "invalid access token", "oauth"];
const RATE_LIMIT_MARKERS = ["rate limit", "too many requests"];

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof ContentApiError) {
    if (error.kind) return error.kind;
    if (error.status === 401) return "authentication";
    if (error.status === 429) return "rate_limit";
    if (error.code !== undefined && AUTH_CODES.has(error.code)) return "authentication";
    if (error.code !== undefined && RATE_LIMIT_CODES.has(error.code)) return "rate_limit";
  }

  const text = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (AUTH_MARKERS.some((marker) => text.includes(marker))) return "authentication";
  if (RATE_LIMIT_MARKERS.some((marker) => text.includes(marker))) return "rate_limit";
  return "unclassified";
}

export function describeError(kind: ErrorKind, error: unknown): string {
  switch (kind) {
    case "authentication":
      return "Access token is missing, invalid or expired. Update the credential and restart monitoring.";
    case "rate_limit":
      return "API rate limit exceeded. Monitoring will retry on the next tick.";
    default:
      return `Monitoring failed: ${error instanceof Error ? error.message : String(error)}`;
  }
}
