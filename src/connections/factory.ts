/**
 * Wires a throttler, request pipeline and connection from validated options.
 *
 * Passing the same throttler to several connections makes them share every
 * rule, which is how an account-wide cap spans REST and WebSocket traffic.
 */

import { type Logger, getDefaultLogger } from "@/lib/logger";
import { type Throttler, createCircuitBreaker, createThrottler } from "@/lib/rate-limiter";
import type { TimeSynchronizer } from "@/lib/time-sync";
import { type RequestPipeline, createRequestPipeline } from "@/pipeline";

import {
  type ConnectionOptions,
  type ConnectionOptionsInput,
  type RestConnectionOptionsInput,
  type WebSocketConnectionOptionsInput,
  buildBackoffConfig,
  buildQuotaRules,
  connectionRuleId,
  parseConnectionOptions,
} from "./config";
import {
  type RestAuth,
  type RestConnection,
  type RestTransport,
  createFetchTransport,
  createRestConnection,
} from "./rest";
import {
  type WebSocketAuth,
  type WebSocketConnection,
  type WebSocketTransport,
  createWebSocketConnection,
} from "./websocket";

export interface ConnectionDependencies {
  /**
   * Shared throttler; the connection's rules are merged into it. Its mode and
   * share stay as they are, and options setting them are logged as ignored.
   */
  throttler?: Throttler;
  timeSynchronizer?: TimeSynchronizer;
  logger?: Logger;
  /** Fetch implementation for the default REST transport */
  fetch?: typeof fetch;
  restTransport?: RestTransport;
  restAuth?: RestAuth;
  webSocketTransport?: WebSocketTransport;
  webSocketAuth?: WebSocketAuth;
}

let connectionSeq = 0;

/**
 * Throttler settings a shared throttler already owns. Returns the names of
 * those the input sets anyway.
 */
const ignoredThrottlerSettings = (input: ConnectionOptionsInput, throttler: Throttler): string[] => {
  const ignored: string[] = [];
  if (input.throttleMode !== undefined && input.throttleMode !== throttler.getMode()) {
    ignored.push("throttleMode");
  }
  if (input.sharePercentage !== undefined) {
    ignored.push("sharePercentage");
  }
  if (input.safetyMarginPercentage !== undefined) {
    ignored.push("safetyMarginPercentage");
  }
  return ignored;
};

const buildPipeline = (
  input: ConnectionOptionsInput,
  options: ConnectionOptions,
  dependencies: ConnectionDependencies,
  logger: Logger,
): RequestPipeline => {
  connectionSeq++;
  const name = options.name ?? `${options.transport}-${connectionSeq}`;
  const rules = buildQuotaRules(options, name);

  let throttler: Throttler;
  if (dependencies.throttler) {
    throttler = dependencies.throttler;
    const ignored = ignoredThrottlerSettings(input, throttler);
    if (ignored.length > 0) {
      logger.warn("Shared throttler keeps its own settings", {
        connection: name,
        ignored,
        mode: throttler.getMode(),
      });
    }
    if (rules.length > 0) {
      throttler.configure(rules);
    }
  } else {
    throttler = createThrottler({
      rules,
      mode: options.throttleMode,
      sharePercentage: options.sharePercentage,
      safetyMarginPercentage: options.safetyMarginPercentage,
      logger,
    });
  }

  return createRequestPipeline({
    throttler,
    limitIds: options.rateLimit === undefined ? [] : [connectionRuleId(name)],
    timeSynchronizer: options.timeSynchronizer ?? dependencies.timeSynchronizer,
    maxRetries: options.maxRetries,
    backoffConfig: buildBackoffConfig(options),
    requestTimeoutMs: options.requestTimeoutMs,
    resyncIntervalMs: options.resyncIntervalMs,
    circuitBreaker: options.circuitBreaker && createCircuitBreaker(options.circuitBreaker),
    logger,
  });
};

/**
 * Creates a REST or WebSocket connection from options.
 *
 * @throws ConfigurationError when the options are invalid
 *
 * @example
 * ```typescript
 * const throttler = createThrottler({ rules: [accountRule] });
 *
 * const rest = createConnection(
 *   { transport: "rest", name: "rest", baseUrl: "https://api.example.com", rateLimit: 20 },
 *   { throttler, timeSynchronizer },
 * );
 * const stream = createConnection(
 *   { transport: "websocket", url: "wss://stream.example.com/ws", rateLimit: 5 },
 *   { throttler },
 * );
 * ```
 */
export function createConnection(
  options: RestConnectionOptionsInput,
  dependencies?: ConnectionDependencies,
): RestConnection;
export function createConnection(
  options: WebSocketConnectionOptionsInput,
  dependencies?: ConnectionDependencies,
): WebSocketConnection;
export function createConnection(
  options: ConnectionOptionsInput,
  dependencies?: ConnectionDependencies,
): RestConnection | WebSocketConnection;
export function createConnection(
  input: ConnectionOptionsInput,
  dependencies: ConnectionDependencies = {},
): RestConnection | WebSocketConnection {
  const options = parseConnectionOptions(input);
  const logger = dependencies.logger ?? getDefaultLogger();
  const pipeline = buildPipeline(input, options, dependencies, logger);

  if (options.transport === "rest") {
    return createRestConnection({
      baseUrl: options.baseUrl,
      pipeline,
      transport: dependencies.restTransport ?? createFetchTransport({ fetch: dependencies.fetch }),
      auth: dependencies.restAuth,
      defaultHeaders: options.defaultHeaders,
      logger,
    });
  }

  const shared = {
    pipeline,
    auth: dependencies.webSocketAuth,
    throttlePath: options.throttlePath,
    maxInboundQueueSize: options.maxInboundQueueSize,
    logger,
  };
  if (dependencies.webSocketTransport) {
    return createWebSocketConnection({ ...shared, transport: dependencies.webSocketTransport });
  }
  return createWebSocketConnection({
    ...shared,
    url: options.url,
    protocols: options.protocols,
    reconnect: options.reconnect && { enabled: true, ...options.reconnect },
    heartbeat: options.heartbeat && { enabled: true, ...options.heartbeat },
  });
}
