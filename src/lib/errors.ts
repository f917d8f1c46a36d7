/**
 * Error taxonomy shared by the throttler, time synchronizer, pipeline and
 * connections.
 *
 * Every error sets `name` so callers (and `isRetryableError`) can classify
 * errors that crossed a realm or were re-thrown without their prototype.
 */

/**
 * Invalid quota rule or connection option. Raised at setup time.
 */
export class ConfigurationError extends Error {
  public override readonly name = "ConfigurationError";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}

/**
 * Quota denied and no retries left.
 */
export class RateLimitExceededError extends Error {
  public override readonly name = "RateLimitExceededError";

  constructor(
    message: string,
    public readonly path: string,
    public readonly retryAfterMs: number,
    public readonly limitId: string,
  ) {
    super(message);
  }
}

/**
 * A caller-supplied deadline elapsed while waiting for quota.
 */
export class DeadlineExceededError extends Error {
  public override readonly name = "DeadlineExceededError";

  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
  }
}

/**
 * Clock synchronization round trip failed or was too noisy to trust.
 */
export class SyncError extends Error {
  public override readonly name = "SyncError";

  constructor(
    message: string,
    public readonly roundTripMs?: number,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export interface ConnectionErrorOptions {
  retryable: boolean;
  code?: string;
  cause?: unknown;
}

/**
 * Transport-level failure, classified as retryable or fatal.
 */
export class ConnectionError extends Error {
  public override readonly name: string = "ConnectionError";
  public readonly retryable: boolean;
  public readonly code?: string;

  constructor(message: string, options: ConnectionErrorOptions) {
    super(message, { cause: options.cause });
    this.retryable = options.retryable;
    this.code = options.code;
  }
}

/**
 * Non-2xx HTTP response. 429 and 5xx are retryable, everything else is fatal.
 */
export class HttpStatusError extends ConnectionError {
  public override readonly name: string = "HttpStatusError";

  constructor(
    message: string,
    public readonly status: number,
    public readonly headers: Readonly<Record<string, string>>,
    public readonly body: unknown,
    retryable: boolean,
  ) {
    super(message, { retryable, code: `HTTP_${status}` });
  }
}

/**
 * A single transport attempt exceeded its timeout.
 */
export class RequestTimeoutError extends ConnectionError {
  public override readonly name: string = "RequestTimeoutError";

  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, { retryable: true, code: "ETIMEDOUT" });
  }
}

/**
 * Retryable failures persisted past the attempt ceiling.
 */
export class RetriesExhaustedError extends Error {
  public override readonly name = "RetriesExhaustedError";

  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(message, { cause: lastError });
  }
}

/**
 * Programming misuse, e.g. releasing a permit twice.
 */
export class InvalidUsageError extends Error {
  public override readonly name = "InvalidUsageError";
}

/**
 * The operation was canceled through its AbortSignal or by closing its owner.
 */
export class CancelledError extends Error {
  public override readonly name = "CancelledError";

  constructor(message = "Operation cancelled") {
    super(message);
  }
}

/**
 * The circuit breaker is open and the attempt was not made.
 */
export class CircuitOpenError extends Error {
  public override readonly name = "CircuitOpenError";

  constructor(
    message: string,
    /** Upper bound until the next trial attempt is let through (ms) */
    public readonly resetTimeoutMs: number,
  ) {
    super(message);
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
