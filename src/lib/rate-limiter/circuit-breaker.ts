/**
 * Fail-fast stage for the request pipeline, backed by cockatiel.
 *
 * Only upstream faults count toward opening the circuit: by default the
 * failures `isRetryableError` accepts (timeouts, 5xx, 429, dropped
 * connections). A rejected signature or a 404 says nothing about the health
 * of the remote service and leaves the failure streak untouched.
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleWhen,
} from "cockatiel";

import { CircuitOpenError } from "../errors";

import { isRetryableError } from "./backoff";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Consecutive upstream failures that open the circuit */
  failureThreshold: number;
  /** Time the circuit stays open before one trial attempt (ms) */
  resetTimeoutMs: number;
  /** Which errors count as upstream failures (default: isRetryableError) */
  isFailure?: (error: Error) => boolean;
}

export interface CircuitBreaker {
  execute: <T>(operation: () => Promise<T>) => Promise<T>;
  getState: () => CircuitBreakerState;
  isOpen: () => boolean;
  onStateChange: (listener: (state: CircuitBreakerState) => void) => () => void;
  /** Detaches from cockatiel's events; the breaker keeps working without listeners */
  dispose: () => void;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30_000,
};

const toBreakerState = (state: CircuitState): CircuitBreakerState => {
  if (state === CircuitState.HalfOpen) {
    return "HALF_OPEN";
  }
  // Isolated is a manual hold-open; nothing here isolates, but report it as open
  return state === CircuitState.Closed ? "CLOSED" : "OPEN";
};

/**
 * Creates a circuit breaker.
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker({ failureThreshold: 5, resetTimeoutMs: 30_000 });
 * const pipeline = createRequestPipeline({ throttler, circuitBreaker: breaker });
 * ```
 */
export const createCircuitBreaker = (
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs, isFailure = isRetryableError } = config;

  const policy = circuitBreaker(handleWhen(isFailure), {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  const listeners = new Set<(state: CircuitBreakerState) => void>();
  const subscription = policy.onStateChange((state) => {
    const next = toBreakerState(state);
    for (const listener of listeners) {
      listener(next);
    }
  });

  const execute = async <T>(operation: () => Promise<T>): Promise<T> => {
    try {
      return await policy.execute(() => operation());
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        throw new CircuitOpenError(
          `Circuit open after ${failureThreshold} consecutive failures, next trial within ${resetTimeoutMs}ms`,
          resetTimeoutMs,
        );
      }
      throw error;
    }
  };

  return {
    execute,
    getState: () => toBreakerState(policy.state),
    isOpen: () => policy.state === CircuitState.Open,
    onStateChange: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    dispose: () => {
      subscription.dispose();
      listeners.clear();
    },
  };
};
