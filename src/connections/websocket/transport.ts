/**
 * WebSocket transport with automatic reconnection, close-code policies and
 * heartbeat.
 *
 * - Single-flight connect
 * - Generation counter for stale event detection
 * - Close-code aware reconnection policies
 *
 * Sends are not queued here: a send on a socket that is not open fails with a
 * retryable ConnectionError so the request pipeline can back off and retry.
 */

import WebSocket from "ws";

import { CancelledError, ConnectionError, toError } from "@/lib/errors";
import { type Logger, getDefaultLogger } from "@/lib/logger";
import { type BackoffConfig, DEFAULT_BACKOFF_CONFIG, calculateBackoffMs } from "@/lib/rate-limiter";

import { decodeBody } from "../codec";

export type WebSocketState = "DISCONNECTED" | "CONNECTING" | "CONNECTED" | "RECONNECTING";

/**
 * Close code categories for policy-based handling.
 */
export type CloseCategory = "AUTH_FAILURE" | "RATE_LIMITED" | "NORMAL" | "UNKNOWN";

/**
 * Classifies WebSocket close codes for policy decisions.
 *
 * @see https://developer.mozilla.org/en-US/docs/Web/API/CloseEvent/code
 */
export const classifyCloseCode = (code: number): CloseCategory => {
  if (code === 4401 || code === 4403 || code === 1008) return "AUTH_FAILURE";
  if (code === 4429 || code === 1013) return "RATE_LIMITED";
  if (code === 1000 || code === 1001 || code === 1006) return "NORMAL";
  return "UNKNOWN";
};

export interface ReconnectConfig {
  enabled: boolean;
  maxAttempts: number;
  /** Ceiling for auth failures (usually lower) */
  maxAuthFailureAttempts?: number;
  backoffConfig?: BackoffConfig;
  /** Backoff after RATE_LIMITED closes */
  rateLimitBackoffConfig?: BackoffConfig;
}

export interface HeartbeatConfig {
  enabled: boolean;
  intervalMs: number;
  /** Socket is terminated when no pong arrives within this time */
  timeoutMs: number;
}

export interface WebSocketTransportConfig {
  url: string;
  protocols?: string[];
  reconnect?: ReconnectConfig;
  heartbeat?: HeartbeatConfig;
  logger?: Logger;
}

export type DisconnectHandler = (code: number, reason: string, category: CloseCategory) => void;

export type InboundHandler = (data: unknown, generation: number) => void;

export interface WebSocketTransport {
  /** Connect (single-flight) */
  connect: () => Promise<void>;
  /** Close the socket and cancel pending reconnects */
  close: () => Promise<void>;
  /** Write one frame; rejects with a retryable ConnectionError when not connected */
  send: (data: string) => Promise<void>;
  /** Write a protocol-level ping frame */
  ping: () => Promise<void>;
  getState: () => WebSocketState;
  /** Incremented on every new socket */
  getGeneration: () => number;
  getUrl: () => string;
  onConnected: (handler: () => Promise<void> | void) => () => void;
  onDisconnected: (handler: DisconnectHandler) => () => void;
  /** Inbound frames, decoded as JSON when they parse, otherwise text */
  onMessage: (handler: InboundHandler) => () => void;
  onStateChange: (handler: (state: WebSocketState) => void) => () => void;
  onError: (handler: (error: Error) => void) => () => void;
}

/**
 * Error reported when reconnection attempts for a close category run out.
 */
export class MaxReconnectsExceededError extends Error {
  public override readonly name = "MaxReconnectsExceededError";

  constructor(
    public readonly attempts: number,
    public readonly category: CloseCategory,
  ) {
    super(`Max reconnection attempts (${attempts}) exceeded for category ${category}`);
  }
}

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
};

const subscribe = <T>(handlers: Set<T>, handler: T): (() => void) => {
  handlers.add(handler);
  return () => {
    handlers.delete(handler);
  };
};

/**
 * Creates a WebSocket transport.
 *
 * @example
 * ```typescript
 * const transport = createWebSocketTransport({
 *   url: "wss://stream.example.com/ws",
 *   reconnect: { enabled: true, maxAttempts: 10 },
 *   heartbeat: { enabled: true, intervalMs: 15_000, timeoutMs: 5_000 },
 * });
 *
 * transport.onConnected(() => transport.send(JSON.stringify({ op: "subscribe" })));
 * transport.onMessage((data, generation) => {
 *   if (generation !== transport.getGeneration()) return; // Stale
 *   handle(data);
 * });
 *
 * await transport.connect();
 * ```
 */
export const createWebSocketTransport = (config: WebSocketTransportConfig): WebSocketTransport => {
  const {
    url,
    protocols,
    reconnect = { enabled: false, maxAttempts: 0 },
    heartbeat,
    logger = getDefaultLogger(),
  } = config;

  const log = logger.child({ component: "WebSocketTransport", url });

  let state: WebSocketState = "DISCONNECTED";
  let socket: WebSocket | null = null;
  let generationId = 0;
  let connectPromise: Promise<void> | null = null;
  let rejectPendingConnect: ((error: Error) => void) | null = null;
  let reconnectAttempts = 0;
  let reconnectTimer: NodeJS.Timeout | null = null;
  let heartbeatTimer: NodeJS.Timeout | null = null;
  let heartbeatTimeout: NodeJS.Timeout | null = null;

  const connectedHandlers = new Set<() => Promise<void> | void>();
  const disconnectedHandlers = new Set<DisconnectHandler>();
  const messageHandlers = new Set<InboundHandler>();
  const stateChangeHandlers = new Set<(state: WebSocketState) => void>();
  const errorHandlers = new Set<(error: Error) => void>();

  const setState = (newState: WebSocketState): void => {
    if (state !== newState) {
      state = newState;
      for (const handler of stateChangeHandlers) {
        handler(newState);
      }
    }
  };

  const emitError = (error: Error): void => {
    for (const handler of errorHandlers) {
      handler(error);
    }
  };

  const stopHeartbeat = (): void => {
    if (heartbeatTimer) {
      clearInterval(heartbeatTimer);
      heartbeatTimer = null;
    }
    if (heartbeatTimeout) {
      clearTimeout(heartbeatTimeout);
      heartbeatTimeout = null;
    }
  };

  const startHeartbeat = (current: WebSocket): void => {
    if (!heartbeat?.enabled) return;

    heartbeatTimer = setInterval(() => {
      if (current.readyState !== WebSocket.OPEN) return;

      current.ping();
      if (heartbeatTimeout) {
        clearTimeout(heartbeatTimeout);
      }
      heartbeatTimeout = setTimeout(() => {
        log.warn("Heartbeat timeout, terminating socket", { timeoutMs: heartbeat.timeoutMs });
        current.terminate();
      }, heartbeat.timeoutMs);
    }, heartbeat.intervalMs);
  };

  const scheduleReconnect = (category: CloseCategory): void => {
    const maxAttempts =
      category === "AUTH_FAILURE" && reconnect.maxAuthFailureAttempts !== undefined
        ? reconnect.maxAuthFailureAttempts
        : reconnect.maxAttempts;

    if (reconnectAttempts >= maxAttempts) {
      const error = new MaxReconnectsExceededError(reconnectAttempts, category);
      log.error("Giving up on reconnection", error, { category });
      emitError(error);
      return;
    }

    const backoffConfig =
      category === "RATE_LIMITED" && reconnect.rateLimitBackoffConfig
        ? reconnect.rateLimitBackoffConfig
        : (reconnect.backoffConfig ?? DEFAULT_BACKOFF_CONFIG);
    const delayMs = calculateBackoffMs(reconnectAttempts, backoffConfig);

    setState("RECONNECTING");
    reconnectAttempts++;
    log.info("Reconnecting", { attempt: reconnectAttempts, delayMs, category });

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null;
      // A failed attempt closes its socket, which schedules the next one
      connect().catch((error: unknown) => {
        log.debug("Reconnect attempt failed", { error: toError(error).message });
      });
    }, delayMs);
  };

  const openSocket = (): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      setState("CONNECTING");
      generationId++;
      const generation = generationId;
      const current = new WebSocket(url, protocols);
      socket = current;

      let settled = false;
      const settle = (error?: Error): void => {
        if (settled) return;
        settled = true;
        rejectPendingConnect = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };
      rejectPendingConnect = settle;

      current.on("open", () => {
        if (socket !== current) return;
        setState("CONNECTED");
        reconnectAttempts = 0;
        startHeartbeat(current);
        log.info("Connected", { generation });

        void (async () => {
          for (const handler of connectedHandlers) {
            try {
              await handler();
            } catch (error) {
              emitError(toError(error));
            }
          }
          settle();
        })();
      });

      current.on("error", (error: Error) => {
        if (socket !== current) return;
        log.warn("Socket error", { generation, error: error.message });
        emitError(error);
        settle(new ConnectionError(`WebSocket ${url} failed: ${error.message}`, {
          retryable: true,
          cause: error,
        }));
      });

      current.on("close", (code: number, reason: Buffer) => {
        if (socket !== current) return;
        socket = null;
        stopHeartbeat();
        const reasonText = reason.toString("utf-8");
        const category = classifyCloseCode(code);

        settle(new ConnectionError(`WebSocket ${url} closed before opening (code ${code})`, {
          retryable: true,
          code: String(code),
        }));
        setState("DISCONNECTED");
        log.info("Disconnected", { generation, code, reason: reasonText, category });

        for (const handler of disconnectedHandlers) {
          handler(code, reasonText, category);
        }

        if (reconnect.enabled) {
          scheduleReconnect(category);
        }
      });

      current.on("message", (data: WebSocket.RawData) => {
        if (socket !== current) return;
        const decoded = decodeBody(rawDataToString(data));
        for (const handler of messageHandlers) {
          handler(decoded, generation);
        }
      });

      current.on("pong", () => {
        if (heartbeatTimeout) {
          clearTimeout(heartbeatTimeout);
          heartbeatTimeout = null;
        }
      });
    });

  const connect = async (): Promise<void> => {
    if (connectPromise) {
      return connectPromise;
    }
    if (state === "CONNECTED") {
      return;
    }
    if (reconnectTimer) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }

    connectPromise = openSocket();
    try {
      await connectPromise;
    } finally {
      connectPromise = null;
    }
  };

  const close = async (): Promise<void> => {
    if (reconnectTimer) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }
    stopHeartbeat();

    const current = socket;
    socket = null;
    rejectPendingConnect?.(new CancelledError(`WebSocket ${url} closed before it opened`));
    if (current) {
      current.removeAllListeners();
      // ws reports an aborted handshake as an 'error' on the next tick
      current.on("error", (error: Error) => {
        log.debug("Socket error after close", { error: error.message });
      });
      if (current.readyState === WebSocket.CONNECTING) {
        current.terminate();
      } else if (current.readyState === WebSocket.OPEN) {
        current.close(1000, "Client closing");
      }
    }

    reconnectAttempts = 0;
    setState("DISCONNECTED");
  };

  const openSocketOrThrow = (operation: string): WebSocket => {
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      throw new ConnectionError(`Cannot ${operation}: WebSocket ${url} is not connected`, {
        retryable: true,
        code: "ENOTCONN",
      });
    }
    return socket;
  };

  const write = (operation: string, perform: (done: (error?: Error) => void) => void): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      perform((error?: Error) => {
        if (error) {
          reject(
            new ConnectionError(`Cannot ${operation}: ${error.message}`, {
              retryable: true,
              cause: error,
            }),
          );
        } else {
          resolve();
        }
      });
    });

  const send = async (data: string): Promise<void> => {
    const current = openSocketOrThrow("send");
    await write("send", (done) => current.send(data, done));
  };

  const ping = async (): Promise<void> => {
    const current = openSocketOrThrow("ping");
    await write("ping", (done) => current.ping(undefined, undefined, done));
  };

  return {
    connect,
    close,
    send,
    ping,
    getState: () => state,
    getGeneration: () => generationId,
    getUrl: () => url,
    onConnected: (handler) => subscribe(connectedHandlers, handler),
    onDisconnected: (handler) => subscribe(disconnectedHandlers, handler),
    onMessage: (handler) => subscribe(messageHandlers, handler),
    onStateChange: (handler) => subscribe(stateChangeHandlers, handler),
    onError: (handler) => subscribe(errorHandlers, handler),
  };
};
