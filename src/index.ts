/**
 * pacewire: quota-aware REST and WebSocket connections with sliding-window
 * throttling and clock-skew correction.
 *
 * @example
 * ```typescript
 * import { createConnection, createThrottler, createTimeSynchronizer } from "pacewire";
 *
 * const throttler = createThrottler({
 *   rules: [{ id: "account", maxRequests: 1200, timeWindowMs: 60_000 }],
 * });
 * const timeSynchronizer = createTimeSynchronizer({ fetchServerTime });
 *
 * const rest = createConnection(
 *   { transport: "rest", baseUrl: "https://api.example.com", maxRetries: 2 },
 *   { throttler, timeSynchronizer, restAuth: createHmacAuth({ apiKey, apiSecret }) },
 * );
 * const balances = await rest.get("/v1/balances", undefined, { isAuthRequired: true });
 * ```
 */

export * from "./connections";
export { MONOTONIC_CLOCK, WALL_CLOCK, type Clock } from "./lib/clock";
export { buildConfig, getConfig, type PacewireConfig } from "./lib/config";
export { env, getEnv, parseEnv, resetEnvCache, type Env } from "./lib/env";
export * from "./lib/errors";
export { createLogger, getDefaultLogger, type Logger, type LoggerConfig, type LogLevel } from "./lib/logger";
export * from "./lib/rate-limiter";
export * from "./lib/time-sync";
export * from "./pipeline";
