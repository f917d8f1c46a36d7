/**
 * WebSocket connection manager.
 *
 * Outbound messages go through a single-concurrency send queue so that one
 * caller's messages keep their submission order, and each message runs its
 * own pipeline execution (quota, timestamp, retries). Inbound frames bypass
 * the throttler and reach handlers through a bounded dispatcher.
 */

import PQueue from "p-queue";

import { type Clock, WALL_CLOCK } from "@/lib/clock";
import { CancelledError, DeadlineExceededError, InvalidUsageError } from "@/lib/errors";
import { type Logger, getDefaultLogger } from "@/lib/logger";
import type { RequestPipeline } from "@/pipeline";

import { runProcessors } from "../processors";

import { DEFAULT_MAX_INBOUND_QUEUE_SIZE, createInboundDispatcher } from "./inbound-dispatcher";
import {
  type HeartbeatConfig,
  type ReconnectConfig,
  type WebSocketState,
  type WebSocketTransport,
  createWebSocketTransport,
} from "./transport";
import type {
  WebSocketAuth,
  WebSocketMessageHandler,
  WebSocketPostProcessor,
  WebSocketPreProcessor,
  WebSocketRequest,
  WebSocketResponse,
} from "./types";

export interface WebSocketConnectionBaseConfig {
  pipeline: RequestPipeline;
  auth?: WebSocketAuth;
  preProcessors?: readonly WebSocketPreProcessor[];
  postProcessors?: readonly WebSocketPostProcessor[];
  /** Path charged for sends without their own (default: the URL pathname) */
  throttlePath?: string;
  maxInboundQueueSize?: number;
  /** Stamps `receivedAt` on inbound messages */
  clock?: Clock;
  logger?: Logger;
}

export type WebSocketConnectionConfig = WebSocketConnectionBaseConfig &
  (
    | {
        url: string;
        protocols?: string[];
        reconnect?: ReconnectConfig;
        heartbeat?: HeartbeatConfig;
      }
    | { transport: WebSocketTransport }
  );

export interface DisconnectOptions {
  /** Wait for queued sends instead of cancelling them */
  drain?: boolean;
}

export interface ReceiveOptions {
  /** Rejects with DeadlineExceededError when no message arrives in time (ms) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface WebSocketConnection {
  connect: () => Promise<void>;
  disconnect: (options?: DisconnectOptions) => Promise<void>;
  /** Resolves once the frame is written */
  send: (request: WebSocketRequest) => Promise<void>;
  ping: () => Promise<void>;
  onMessage: (handler: WebSocketMessageHandler) => () => void;
  /**
   * Next inbound message after post-processing. Each message settles one
   * pending call, oldest first; messages arriving with no call pending only
   * reach `onMessage` handlers.
   */
  receive: (options?: ReceiveOptions) => Promise<WebSocketResponse>;
  onStateChange: (handler: (state: WebSocketState) => void) => () => void;
  onError: (handler: (error: Error) => void) => () => void;
  getState: () => WebSocketState;
  /** Queued plus in-flight sends */
  getPendingSendCount: () => number;
  getDroppedMessageCount: () => number;
  getUrl: () => string;
}

export const serializeRequest = (request: WebSocketRequest): string =>
  request.type === "text" ? request.payload : JSON.stringify(request.payload);

interface LinkedSignal {
  signal: AbortSignal;
  unlink: () => void;
}

/**
 * Signal that aborts when any of the given signals does.
 */
const linkSignals = (signals: ReadonlyArray<AbortSignal | undefined>): LinkedSignal => {
  const controller = new AbortController();
  const unlinkers: Array<() => void> = [];
  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = (): void => controller.abort(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    unlinkers.push(() => signal.removeEventListener("abort", onAbort));
  }
  return {
    signal: controller.signal,
    unlink: () => {
      for (const unlink of unlinkers) {
        unlink();
      }
    },
  };
};

interface Receiver {
  resolve: (message: WebSocketResponse) => void;
  reject: (error: Error) => void;
}

const defaultThrottlePath = (url: string): string => {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
};

/**
 * Creates a WebSocket connection.
 *
 * @example
 * ```typescript
 * const stream = createWebSocketConnection({
 *   url: "wss://stream.example.com/ws",
 *   pipeline,
 *   reconnect: { enabled: true, maxAttempts: 10 },
 * });
 *
 * stream.onMessage(({ data }) => handleUpdate(data));
 * await stream.connect();
 * await stream.send({ type: "json", payload: { op: "subscribe", channel: "ticker" } });
 * ```
 */
export const createWebSocketConnection = (
  config: WebSocketConnectionConfig,
): WebSocketConnection => {
  const {
    pipeline,
    auth,
    preProcessors = [],
    postProcessors = [],
    maxInboundQueueSize = DEFAULT_MAX_INBOUND_QUEUE_SIZE,
    clock = WALL_CLOCK,
    logger = getDefaultLogger(),
  } = config;

  const transport =
    "transport" in config
      ? config.transport
      : createWebSocketTransport({
          url: config.url,
          protocols: config.protocols,
          reconnect: config.reconnect,
          heartbeat: config.heartbeat,
          logger,
        });
  const throttlePath = config.throttlePath ?? defaultThrottlePath(transport.getUrl());

  const log = logger.child({ component: "WebSocketConnection", url: transport.getUrl() });

  const sendQueue = new PQueue({ concurrency: 1 });
  let cancelController = new AbortController();
  let closing = false;

  const messageHandlers = new Set<WebSocketMessageHandler>();
  const receivers: Receiver[] = [];
  const errorHandlers = new Set<(error: Error) => void>();

  const emitError = (error: Error): void => {
    for (const handler of errorHandlers) {
      handler(error);
    }
  };

  const dispatcher = createInboundDispatcher<WebSocketResponse>(
    async (message) => {
      const processed = await runProcessors(message, postProcessors);
      receivers[0]?.resolve(processed);
      for (const handler of messageHandlers) {
        await handler(processed);
      }
    },
    {
      maxQueueSize: maxInboundQueueSize,
      onDrop: (dropped) => {
        log.warn("Dropped inbound message, handlers are falling behind", { dropped });
      },
      onError: (error) => {
        log.error("Inbound message handler failed", error);
        emitError(error);
      },
    },
  );

  transport.onMessage((data, generation) => {
    dispatcher.enqueue({ data, generation, receivedAt: clock.now() });
  });
  transport.onError(emitError);

  const transmit = async (initial: WebSocketRequest, cancelSignal: AbortSignal): Promise<void> => {
    cancelSignal.throwIfAborted();
    const request = await runProcessors(initial, preProcessors);
    if (request.isAuthRequired && !auth) {
      throw new InvalidUsageError(
        `Message on ${transport.getUrl()} requires authentication but no auth is configured`,
      );
    }

    const path = request.throttlePath ?? throttlePath;
    const linked = linkSignals([cancelSignal, request.signal]);
    try {
      await pipeline.execute(
        async ({ timestamp }) => {
          const outgoing =
            request.isAuthRequired && auth && timestamp
              ? await auth.authenticate(request, timestamp)
              : request;
          await transport.send(serializeRequest(outgoing));
        },
        {
          path,
          weight: request.weight,
          priority: request.priority,
          limitIds: request.limitIds,
          timeoutMs: request.timeoutMs,
          signal: linked.signal,
          timestamped: request.isAuthRequired ?? false,
        },
      );
    } finally {
      linked.unlink();
    }
    log.debug("WebSocket message sent", { path, type: request.type });
  };

  const send = async (request: WebSocketRequest): Promise<void> => {
    if (closing) {
      throw new CancelledError(`Connection to ${transport.getUrl()} is closing`);
    }
    const { signal } = cancelController;
    await sendQueue.add(() => transmit(request, signal));
  };

  const receive = (options: ReceiveOptions = {}): Promise<WebSocketResponse> => {
    const { timeoutMs, signal } = options;
    if (closing) {
      return Promise.reject(new CancelledError(`Connection to ${transport.getUrl()} is closing`));
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError("Receive was cancelled"));
    }

    return new Promise<WebSocketResponse>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const detach = (): void => {
        const index = receivers.indexOf(receiver);
        if (index !== -1) {
          receivers.splice(index, 1);
        }
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const receiver: Receiver = {
        resolve: (message) => {
          detach();
          resolve(message);
        },
        reject: (error) => {
          detach();
          reject(error);
        },
      };

      const onAbort = (): void => {
        receiver.reject(new CancelledError("Receive was cancelled"));
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          receiver.reject(
            new DeadlineExceededError(
              `No message on ${transport.getUrl()} within ${timeoutMs}ms`,
              timeoutMs,
            ),
          );
        }, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      receivers.push(receiver);
    });
  };

  const connect = async (): Promise<void> => {
    if (cancelController.signal.aborted) {
      cancelController = new AbortController();
    }
    closing = false;
    await transport.connect();
  };

  const disconnect = async (options: DisconnectOptions = {}): Promise<void> => {
    closing = true;
    for (const receiver of [...receivers]) {
      receiver.reject(new CancelledError(`Connection to ${transport.getUrl()} closed`));
    }
    const pending = sendQueue.size + sendQueue.pending;

    if (!options.drain && pending > 0) {
      log.info("Cancelling queued sends", { pending });
      cancelController.abort(new CancelledError(`Connection to ${transport.getUrl()} closed`));
    }
    await sendQueue.onIdle();
    await transport.close();
  };

  return {
    connect,
    disconnect,
    send,
    ping: () => transport.ping(),
    onMessage: (handler) => {
      messageHandlers.add(handler);
      return () => {
        messageHandlers.delete(handler);
      };
    },
    receive,
    onStateChange: (handler) => transport.onStateChange(handler),
    onError: (handler) => {
      errorHandlers.add(handler);
      return () => {
        errorHandlers.delete(handler);
      };
    },
    getState: () => transport.getState(),
    getPendingSendCount: () => sendQueue.size + sendQueue.pending,
    getDroppedMessageCount: () => dispatcher.getDroppedCount(),
    getUrl: () => transport.getUrl(),
  };
};
