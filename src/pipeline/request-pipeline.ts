/**
 * Request pipeline shared by REST calls and WebSocket sends.
 *
 * Order of operations, per attempt:
 * 1. Acquire a permit from the throttler (waits or is denied, per its mode)
 * 2. Resolve a corrected timestamp for timestamped operations
 * 3. Run the operation with a per-attempt timeout, inside the circuit breaker
 *    when one is configured
 * 4. Classify failures and back off before the next attempt
 *
 * A permit whose operation never started (sync failure, cancellation, open
 * circuit) is released before the error propagates.
 */

import { WALL_CLOCK } from "@/lib/clock";
import { getConfig } from "@/lib/config";
import {
  CancelledError,
  HttpStatusError,
  RateLimitExceededError,
  RequestTimeoutError,
  RetriesExhaustedError,
  SyncError,
} from "@/lib/errors";
import { type Logger, getDefaultLogger } from "@/lib/logger";
import {
  type AcquireDecision,
  type BackoffConfig,
  type CircuitBreaker,
  DEFAULT_BACKOFF_CONFIG,
  type Permit,
  RATE_LIMIT_BACKOFF_CONFIG,
  type Throttler,
  calculateBackoffMs,
  classifyFailure,
  isRetryableError,
  parseRetryAfterMs,
} from "@/lib/rate-limiter";
import type { CorrectedTimestamp, TimeSynchronizer } from "@/lib/time-sync";

export type OperationState =
  | "PENDING"
  | "THROTTLED"
  | "IN_FLIGHT"
  | "SUCCEEDED"
  | "FAILED_RETRYABLE"
  | "FAILED_FATAL";

export interface OperationContext {
  /** 0 for the first attempt */
  attempt: number;
  permit: Permit;
  /** Present for timestamped operations */
  timestamp?: CorrectedTimestamp;
  /** Aborted when the attempt times out or the caller cancels */
  signal: AbortSignal;
}

export type Operation<T> = (context: OperationContext) => Promise<T>;

export interface ExecuteOptions {
  /** Path matched against quota rules */
  path: string;
  weight?: number;
  priority?: number;
  /** Quota rules charged in addition to the pipeline's own `limitIds` */
  limitIds?: readonly string[];
  /** Maximum time to wait for quota (ms) */
  timeoutMs?: number;
  /** Per-attempt timeout override (ms) */
  requestTimeoutMs?: number;
  signal?: AbortSignal;
  /** Resolve a corrected timestamp before running the operation */
  timestamped?: boolean;
  /** Fail instead of falling back to local time when the clock cannot be synced */
  requireFreshSync?: boolean;
  /** Max retries override */
  maxRetries?: number;
  /** Custom retry check (default: isRetryableError) */
  retryable?: (error: unknown) => boolean;
  onStateChange?: (state: OperationState, attempt: number) => void;
}

export interface RequestPipelineConfig {
  throttler: Throttler;
  /** Quota rules charged by every execution whatever its path */
  limitIds?: readonly string[];
  timeSynchronizer?: TimeSynchronizer;
  /** Retries after the first attempt */
  maxRetries?: number;
  backoffConfig?: BackoffConfig;
  /** Backoff after quota denials and HTTP 429 */
  rateLimitBackoffConfig?: BackoffConfig;
  retryable?: (error: unknown) => boolean;
  /** Per-attempt timeout (ms) */
  requestTimeoutMs?: number;
  /** Offsets older than this are refreshed before timestamped operations (ms) */
  resyncIntervalMs?: number;
  circuitBreaker?: CircuitBreaker;
  logger?: Logger;
}

export interface PipelineMetrics {
  totalOperations: number;
  succeeded: number;
  failed: number;
  totalRetries: number;
  /** Acquisitions that had to wait for quota */
  quotaWaits: number;
  quotaWaitTimeMs: number;
  /** Acquisitions answered with a denial */
  quotaDenials: number;
  syncFailures: number;
  circuitBreakerTrips: number;
}

export interface RequestPipeline {
  execute: <T>(operation: Operation<T>, options: ExecuteOptions) => Promise<T>;
  getMetrics: () => PipelineMetrics;
  resetMetrics: () => void;
  getThrottler: () => Throttler;
  getTimeSynchronizer: () => TimeSynchronizer | undefined;
}

export const DEFAULT_RESYNC_INTERVAL_MS = 60_000;

const emptyMetrics = (): PipelineMetrics => ({
  totalOperations: 0,
  succeeded: 0,
  failed: 0,
  totalRetries: 0,
  quotaWaits: 0,
  quotaWaitTimeMs: 0,
  quotaDenials: 0,
  syncFailures: 0,
  circuitBreakerTrips: 0,
});

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const throwIfAborted = (signal: AbortSignal | undefined, path: string): void => {
  if (signal?.aborted) {
    throw new CancelledError(`Operation on ${path} was cancelled`);
  }
};

/**
 * Sleep that rejects with CancelledError when the signal aborts.
 */
const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError("Operation cancelled during backoff"));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError("Operation cancelled during backoff"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

/**
 * Runs one attempt with its own AbortSignal, aborted on timeout or when the
 * caller's signal aborts.
 */
const runWithTimeout = <T>(
  operation: Operation<T>,
  context: Omit<OperationContext, "signal">,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const onParentAbort = (): void => {
      controller.abort(parent?.reason);
    };

    const timer = setTimeout(() => {
      const error = new RequestTimeoutError(`Attempt timed out after ${timeoutMs}ms`, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
    parent?.addEventListener("abort", onParentAbort, { once: true });

    const cleanup = (): void => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    };

    operation({ ...context, signal: controller.signal }).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });

/**
 * Creates a request pipeline.
 *
 * @example
 * ```typescript
 * const pipeline = createRequestPipeline({ throttler, timeSynchronizer, maxRetries: 2 });
 *
 * const balance = await pipeline.execute(
 *   ({ timestamp, signal }) => client.getBalance(timestamp?.timestampMs, signal),
 *   { path: "/api/v3/account", timestamped: true },
 * );
 * ```
 */
export const createRequestPipeline = (config: RequestPipelineConfig): RequestPipeline => {
  const {
    throttler,
    timeSynchronizer,
    maxRetries = getConfig().pipeline.maxRetries,
    backoffConfig = DEFAULT_BACKOFF_CONFIG,
    rateLimitBackoffConfig = RATE_LIMIT_BACKOFF_CONFIG,
    retryable: defaultRetryable = isRetryableError,
    requestTimeoutMs = getConfig().pipeline.requestTimeoutMs,
    resyncIntervalMs = DEFAULT_RESYNC_INTERVAL_MS,
    circuitBreaker,
    logger = getDefaultLogger(),
    limitIds: pipelineLimitIds = [],
  } = config;

  const log = logger.child({ component: "RequestPipeline" });

  let metrics = emptyMetrics();

  circuitBreaker?.onStateChange((state) => {
    if (state === "OPEN") {
      metrics.circuitBreakerTrips++;
      log.warn("Circuit breaker opened", { trips: metrics.circuitBreakerTrips });
    } else if (state === "CLOSED") {
      log.info("Circuit breaker closed");
    }
  });

  const resolveTimestamp = async (
    path: string,
    requireFreshSync: boolean,
  ): Promise<CorrectedTimestamp> => {
    if (!timeSynchronizer) {
      if (requireFreshSync) {
        throw new SyncError(`No time synchronizer available for ${path}`);
      }
      return { timestampMs: WALL_CLOCK.now(), offsetMs: 0, synchronized: false, ageMs: null };
    }

    if (timeSynchronizer.isStale(resyncIntervalMs)) {
      try {
        await timeSynchronizer.sync();
      } catch (error) {
        metrics.syncFailures++;
        if (requireFreshSync) {
          throw error;
        }
        log.warn("Proceeding with unsynchronized timestamp", {
          path,
          error: describeError(error),
        });
      }
    }
    return timeSynchronizer.now();
  };

  const retryDelayMs = (error: unknown, attempt: number, path: string): number => {
    if (error instanceof HttpStatusError) {
      const retryAfterMs = parseRetryAfterMs(error.headers["retry-after"] ?? null);
      if (retryAfterMs !== null) {
        log.debug("Using Retry-After header", { path, backoffMs: retryAfterMs });
        return retryAfterMs;
      }
    }
    return calculateBackoffMs(
      attempt,
      classifyFailure(error) === "RATE_LIMITED" ? rateLimitBackoffConfig : backoffConfig,
    );
  };

  const execute = async <T>(operation: Operation<T>, options: ExecuteOptions): Promise<T> => {
    const {
      path,
      weight,
      priority,
      limitIds: operationLimitIds = [],
      timeoutMs,
      requestTimeoutMs: attemptTimeoutMs = requestTimeoutMs,
      signal,
      timestamped = false,
      requireFreshSync = false,
      maxRetries: retryLimit = maxRetries,
      retryable = defaultRetryable,
      onStateChange,
    } = options;

    metrics.totalOperations++;

    const limitIds = [...pipelineLimitIds, ...operationLimitIds];
    let attempt = 0;
    const transition = (state: OperationState): void => {
      onStateChange?.(state, attempt);
    };
    const fail = (state: "FAILED_RETRYABLE" | "FAILED_FATAL", error: unknown): unknown => {
      metrics.failed++;
      transition(state);
      return error;
    };

    transition("PENDING");

    for (;;) {
      try {
        throwIfAborted(signal, path);
      } catch (error) {
        throw fail("FAILED_FATAL", error);
      }

      // Step 1: Acquire quota
      transition("THROTTLED");
      let decision: AcquireDecision;
      try {
        decision = await throttler.acquire({ path, weight, priority, limitIds, timeoutMs, signal });
      } catch (error) {
        throw fail("FAILED_FATAL", error);
      }
      if (decision.granted && decision.permit.queuedMs > 0) {
        metrics.quotaWaits++;
        metrics.quotaWaitTimeMs += decision.permit.queuedMs;
      }

      if (!decision.granted) {
        metrics.quotaDenials++;
        if (attempt >= retryLimit) {
          throw fail(
            "FAILED_RETRYABLE",
            new RateLimitExceededError(
              `Quota "${decision.limitId}" exhausted for ${path}, retry after ${decision.retryAfterMs}ms`,
              path,
              decision.retryAfterMs,
              decision.limitId,
            ),
          );
        }

        const backoffMs = Math.max(
          decision.retryAfterMs,
          calculateBackoffMs(attempt, rateLimitBackoffConfig),
        );
        metrics.totalRetries++;
        log.debug("Quota denied, backing off", {
          path,
          limitId: decision.limitId,
          attempt,
          backoffMs,
        });
        try {
          await sleep(backoffMs, signal);
        } catch (error) {
          throw fail("FAILED_FATAL", error);
        }
        attempt++;
        continue;
      }

      const { permit } = decision;
      const progress = { started: false };

      try {
        // Step 2: Corrected timestamp
        const timestamp = timestamped ? await resolveTimestamp(path, requireFreshSync) : undefined;
        throwIfAborted(signal, path);

        // Step 3: Run the attempt
        const run = (): Promise<T> => {
          progress.started = true;
          transition("IN_FLIGHT");
          return runWithTimeout(operation, { attempt, permit, timestamp }, attemptTimeoutMs, signal);
        };
        const result = circuitBreaker ? await circuitBreaker.execute(run) : await run();

        metrics.succeeded++;
        transition("SUCCEEDED");
        if (attempt > 0) {
          log.info("Request succeeded after retry", { path, attempt });
        }
        return result;
      } catch (error) {
        // Step 4: Classify
        if (!progress.started) {
          throttler.release(permit);
          log.debug("Released unused permit", {
            path,
            permitId: permit.id,
            error: describeError(error),
          });
          throw fail("FAILED_FATAL", error);
        }

        if (signal?.aborted) {
          throw fail("FAILED_FATAL", new CancelledError(`Operation on ${path} was cancelled`));
        }

        if (!retryable(error)) {
          log.warn("Request failed: non-retryable error", {
            path,
            attempt,
            error: describeError(error),
          });
          throw fail("FAILED_FATAL", error);
        }

        if (attempt >= retryLimit) {
          throw fail(
            "FAILED_RETRYABLE",
            new RetriesExhaustedError(
              `Max retries (${retryLimit}) exceeded for ${path}`,
              attempt + 1,
              error,
            ),
          );
        }

        transition("FAILED_RETRYABLE");
        const backoffMs = retryDelayMs(error, attempt, path);
        metrics.totalRetries++;
        log.debug("Retrying request", { path, attempt, backoffMs, error: describeError(error) });

        try {
          await sleep(backoffMs, signal);
        } catch (sleepError) {
          throw fail("FAILED_FATAL", sleepError);
        }
        attempt++;
      }
    }
  };

  const getMetrics = (): PipelineMetrics => ({ ...metrics });

  const resetMetrics = (): void => {
    metrics = emptyMetrics();
  };

  return {
    execute,
    getMetrics,
    resetMetrics,
    getThrottler: () => throttler,
    getTimeSynchronizer: () => timeSynchronizer,
  };
};
