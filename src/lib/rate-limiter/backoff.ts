/**
 * Retry delays and failure classification for the request pipeline and the
 * WebSocket reconnect loop.
 */

export interface BackoffConfig {
  /** Delay before the first retry (ms) */
  initialDelayMs: number;
  /** Ceiling for the exponential delay, before jitter (ms) */
  maxDelayMs: number;
  multiplier: number;
  /** Up to this fraction of the delay is added at random (0-1) */
  jitterFactor: number;
}

/** 1s, doubling, capped at 60s, +10% jitter */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1_000,
  maxDelayMs: 60_000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/** After a quota denial or HTTP 429: 2s, tripling, capped at 120s, +20% jitter */
export const RATE_LIMIT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 2_000,
  maxDelayMs: 120_000,
  multiplier: 3,
  jitterFactor: 0.2,
};

/**
 * Delay before retry number `attempt` (0 for the first retry).
 *
 * @example
 * ```typescript
 * calculateBackoffMs(0); // ~1000
 * calculateBackoffMs(3); // ~8000
 * calculateBackoffMs(2, RATE_LIMIT_BACKOFF_CONFIG); // ~18000
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
  random: () => number = Math.random,
): number => {
  const exponential = config.initialDelayMs * config.multiplier ** Math.max(0, attempt);
  const capped = Math.min(exponential, config.maxDelayMs);
  return Math.floor(capped * (1 + config.jitterFactor * random()));
};

/**
 * Reads a Retry-After header: delta-seconds or an HTTP date. Dates in the
 * past yield 0, anything unreadable yields null.
 */
export const parseRetryAfterMs = (
  value: string | null | undefined,
  now: number = Date.now(),
): number | null => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1_000;
  }
  const at = Date.parse(trimmed);
  return Number.isNaN(at) ? null : Math.max(0, at - now);
};

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const NON_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([400, 401, 403, 404, 422]);

/** 429 and every 5xx */
export const isRetryableStatusCode = (status: number): boolean =>
  RETRYABLE_STATUS_CODES.has(status) || (status >= 500 && status <= 599);

// Raised by this library for conditions a retry cannot fix
const NEVER_RETRIED = new Set([
  "InvalidUsageError",
  "ConfigurationError",
  "CircuitOpenError",
  "DeadlineExceededError",
  "CancelledError",
  "RetriesExhaustedError",
  "RateLimitExceededError",
]);

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ERR_SOCKET_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

// Credential and request-shape rejections some APIs report without a status
const FATAL_MESSAGES = [
  "invalid api key",
  "invalid signature",
  "permission denied",
  "invalid parameter",
  "validation error",
];

/**
 * - RETRYABLE: transient, retry with the regular backoff
 * - RATE_LIMITED: the remote side throttled us, retry with the rate-limit backoff
 * - FATAL: retrying cannot help
 */
export type FailureClass = "RETRYABLE" | "RATE_LIMITED" | "FATAL";

const statusOf = (error: object): number | undefined => {
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
};

/**
 * Classifies a failure. An explicit boolean `retryable` property wins, then
 * the error name, the HTTP status, the network error code and finally known
 * fatal messages. Anything unrecognized is treated as transient.
 */
export const classifyFailure = (error: unknown): FailureClass => {
  if (error === null || typeof error !== "object") {
    return "RETRYABLE";
  }

  const status = statusOf(error);
  if ("retryable" in error && typeof error.retryable === "boolean") {
    if (!error.retryable) {
      return "FATAL";
    }
    return status === 429 ? "RATE_LIMITED" : "RETRYABLE";
  }

  if ("name" in error && typeof error.name === "string" && NEVER_RETRIED.has(error.name)) {
    return "FATAL";
  }

  if (status !== undefined) {
    if (status === 429) {
      return "RATE_LIMITED";
    }
    if (NON_RETRYABLE_STATUS_CODES.has(status)) {
      return "FATAL";
    }
    if (isRetryableStatusCode(status)) {
      return "RETRYABLE";
    }
  }

  if ("code" in error && typeof error.code === "string" && TRANSIENT_NETWORK_CODES.has(error.code)) {
    return "RETRYABLE";
  }

  if ("message" in error && typeof error.message === "string") {
    const message = error.message.toLowerCase();
    if (FATAL_MESSAGES.some((pattern) => message.includes(pattern))) {
      return "FATAL";
    }
  }

  return "RETRYABLE";
};

export const isRetryableError = (error: unknown): boolean => classifyFailure(error) !== "FATAL";
