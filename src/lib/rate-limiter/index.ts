/**
 * Rate limiter module exports.
 */

// Quota rules
export {
  describeQuotaRule,
  effectiveLimit,
  filterQuotaRules,
  matchesPath,
  quotaRuleSchema,
  validateQuotaRule,
  validateQuotaRules,
  type LinkedLimit,
  type PathScope,
  type QuotaRule,
} from "./quota-rule";

// Sliding window
export { createUsageWindow, type UsageEntry, type UsageWindow } from "./sliding-window";

// Throttler (main entry point)
export {
  createThrottler,
  type AcquireDecision,
  type AcquisitionRequest,
  type ConfigureOptions,
  type Permit,
  type RuleUsage,
  type ThrottleMode,
  type Throttler,
  type ThrottlerConfig,
  type ThrottlerCopyOptions,
} from "./throttler";

// Backoff utilities
export {
  calculateBackoffMs,
  classifyFailure,
  DEFAULT_BACKOFF_CONFIG,
  isRetryableError,
  isRetryableStatusCode,
  NON_RETRYABLE_STATUS_CODES,
  parseRetryAfterMs,
  RATE_LIMIT_BACKOFF_CONFIG,
  RETRYABLE_STATUS_CODES,
  type BackoffConfig,
  type FailureClass,
} from "./backoff";

// Circuit breaker
export {
  createCircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  type CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerState,
} from "./circuit-breaker";
