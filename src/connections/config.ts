/**
 * Connection options accepted by the factory, validated with valibot.
 */

import * as v from "valibot";

import { ConfigurationError } from "@/lib/errors";
import {
  type BackoffConfig,
  DEFAULT_BACKOFF_CONFIG,
  type QuotaRule,
  quotaRuleSchema,
} from "@/lib/rate-limiter";
import type { TimeSynchronizer } from "@/lib/time-sync";

const positiveNumber = (message: string) =>
  v.pipe(
    v.number(),
    v.finite(message),
    v.check((value) => value > 0, message),
  );

const positiveInteger = (message: string) =>
  v.pipe(v.number(), v.integer(message), v.minValue(1, message));

const isTimeSynchronizer = (input: unknown): input is TimeSynchronizer =>
  typeof input === "object" &&
  input !== null &&
  "sync" in input &&
  typeof input.sync === "function" &&
  "now" in input &&
  typeof input.now === "function";

const sharedEntries = {
  /** Names the connection's own rule (`<name>:default`) in a shared throttler */
  name: v.optional(v.pipe(v.string(), v.minLength(1, "name must not be empty"))),
  /** Cap for every request on this connection */
  rateLimit: v.optional(positiveInteger("rateLimit must be at least 1")),
  /** Window of `rateLimit` (ms) */
  timeWindowMs: v.optional(positiveNumber("timeWindowMs must be greater than 0"), 1_000),
  /** Extra quota rules, scoped or linked */
  rules: v.optional(v.array(quotaRuleSchema), []),
  throttleMode: v.optional(v.picklist(["wait", "deny"]), "wait"),
  sharePercentage: v.optional(
    v.pipe(
      v.number(),
      v.check((value) => value > 0 && value <= 100, "sharePercentage must be in (0, 100]"),
    ),
    100,
  ),
  safetyMarginPercentage: v.optional(
    v.pipe(
      v.number(),
      v.check((value) => value >= 0 && value < 100, "safetyMarginPercentage must be in [0, 100)"),
    ),
    0,
  ),
  /** Takes precedence over the synchronizer passed as a dependency */
  timeSynchronizer: v.optional(
    v.custom<TimeSynchronizer>(isTimeSynchronizer, "timeSynchronizer must provide sync() and now()"),
  ),
  maxRetries: v.optional(
    v.pipe(v.number(), v.integer(), v.minValue(0, "maxRetries must not be negative")),
  ),
  /** First retry delay (ms) */
  backoffBaseMs: v.optional(
    v.pipe(v.number(), v.minValue(0, "backoffBaseMs must not be negative")),
  ),
  requestTimeoutMs: v.optional(positiveNumber("requestTimeoutMs must be greater than 0")),
  resyncIntervalMs: v.optional(positiveNumber("resyncIntervalMs must be greater than 0")),
  circuitBreaker: v.optional(
    v.object({
      failureThreshold: positiveInteger("failureThreshold must be at least 1"),
      resetTimeoutMs: positiveNumber("resetTimeoutMs must be greater than 0"),
    }),
  ),
};

export const restConnectionOptionsSchema = v.strictObject({
  transport: v.literal("rest"),
  baseUrl: v.optional(v.pipe(v.string(), v.url("baseUrl must be an absolute URL"))),
  defaultHeaders: v.optional(v.record(v.string(), v.string()), {}),
  ...sharedEntries,
});

export const webSocketConnectionOptionsSchema = v.strictObject({
  transport: v.literal("websocket"),
  url: v.pipe(v.string(), v.url("url must be an absolute URL")),
  protocols: v.optional(v.array(v.string())),
  /** Path charged for sends without their own */
  throttlePath: v.optional(v.string()),
  maxInboundQueueSize: v.optional(positiveInteger("maxInboundQueueSize must be at least 1")),
  reconnect: v.optional(
    v.object({
      maxAttempts: v.pipe(v.number(), v.integer(), v.minValue(0)),
      maxAuthFailureAttempts: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0))),
    }),
  ),
  heartbeat: v.optional(
    v.object({
      intervalMs: positiveNumber("heartbeat.intervalMs must be greater than 0"),
      timeoutMs: positiveNumber("heartbeat.timeoutMs must be greater than 0"),
    }),
  ),
  ...sharedEntries,
});

export const connectionOptionsSchema = v.variant("transport", [
  restConnectionOptionsSchema,
  webSocketConnectionOptionsSchema,
]);

export type RestConnectionOptionsInput = v.InferInput<typeof restConnectionOptionsSchema>;
export type WebSocketConnectionOptionsInput = v.InferInput<typeof webSocketConnectionOptionsSchema>;
export type ConnectionOptionsInput = v.InferInput<typeof connectionOptionsSchema>;
export type ConnectionOptions = v.InferOutput<typeof connectionOptionsSchema>;

/**
 * @throws ConfigurationError listing every invalid option
 */
export const parseConnectionOptions = (input: unknown): ConnectionOptions => {
  const result = v.safeParse(connectionOptionsSchema, input);
  if (!result.success) {
    const issues = result.issues.map((issue) => {
      const key = issue.path?.map((item) => String(item.key)).join(".");
      return key ? `${key}: ${issue.message}` : issue.message;
    });
    throw new ConfigurationError(`Invalid connection options: ${issues.join("; ")}`, issues);
  }
  return result.output;
};

export const connectionRuleId = (connectionName: string): string => `${connectionName}:default`;

/**
 * Configured rules plus, when `rateLimit` is set, the connection's own rule.
 * That rule is explicit: only requests naming it are charged, so connections
 * sharing a throttler never consume each other's cap.
 */
export const buildQuotaRules = (
  options: ConnectionOptions,
  connectionName = options.name ?? options.transport,
): QuotaRule[] => {
  const rules: QuotaRule[] = [...options.rules];
  if (options.rateLimit !== undefined) {
    rules.push({
      id: connectionRuleId(connectionName),
      maxRequests: options.rateLimit,
      timeWindowMs: options.timeWindowMs,
      explicit: true,
    });
  }
  return rules;
};

export const buildBackoffConfig = (options: ConnectionOptions): BackoffConfig | undefined =>
  options.backoffBaseMs === undefined
    ? undefined
    : { ...DEFAULT_BACKOFF_CONFIG, initialDelayMs: options.backoffBaseMs };
