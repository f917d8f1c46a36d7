import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CancelledError, ConnectionError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import {
  MaxReconnectsExceededError,
  type WebSocketTransportConfig,
  classifyCloseCode,
  createWebSocketTransport,
} from "./transport";

const { FakeSocket, sockets } = await vi.hoisted(async () => {
  const { EventEmitter } = await import("node:events");

  class FakeSocket extends EventEmitter {
    static readonly CONNECTING = 0;
    static readonly OPEN = 1;
    static readonly CLOSING = 2;
    static readonly CLOSED = 3;

    readyState = FakeSocket.CONNECTING;
    readonly send = vi.fn((_data: string, cb?: (error?: Error) => void) => {
      cb?.();
    });
    readonly ping = vi.fn((_data?: unknown, _mask?: boolean, cb?: (error?: Error) => void) => {
      cb?.();
    });
    readonly close = vi.fn();
    readonly terminate = vi.fn();

    constructor(
      readonly url: string,
      readonly protocols?: string[],
    ) {
      super();
      sockets.push(this);
    }

    open(): void {
      this.readyState = FakeSocket.OPEN;
      this.emit("open");
    }

    drop(code: number, reason = ""): void {
      this.readyState = FakeSocket.CLOSED;
      this.emit("close", code, Buffer.from(reason));
    }

    receive(text: string): void {
      this.emit("message", Buffer.from(text), false);
    }
  }

  const sockets: FakeSocket[] = [];
  return { FakeSocket, sockets };
});

vi.mock("ws", () => ({ default: FakeSocket }));

const logger = createLogger({ level: "error" });

const NO_JITTER = { initialDelayMs: 100, maxDelayMs: 1_000, multiplier: 2, jitterFactor: 0 };

const socketAt = (index: number): InstanceType<typeof FakeSocket> => {
  const socket = sockets[index];
  if (!socket) {
    throw new Error(`Socket ${index} was not created`);
  }
  return socket;
};

const connected = async (overrides: Partial<WebSocketTransportConfig> = {}) => {
  const transport = createWebSocketTransport({ url: "ws://test", logger, ...overrides });
  const connecting = transport.connect();
  socketAt(sockets.length - 1).open();
  await connecting;
  return transport;
};

describe("classifyCloseCode", () => {
  it("should classify auth failures", () => {
    expect(classifyCloseCode(4401)).toBe("AUTH_FAILURE");
    expect(classifyCloseCode(4403)).toBe("AUTH_FAILURE");
    expect(classifyCloseCode(1008)).toBe("AUTH_FAILURE");
  });

  it("should classify rate limits", () => {
    expect(classifyCloseCode(4429)).toBe("RATE_LIMITED");
    expect(classifyCloseCode(1013)).toBe("RATE_LIMITED");
  });

  it("should classify normal closures", () => {
    expect(classifyCloseCode(1000)).toBe("NORMAL");
    expect(classifyCloseCode(1001)).toBe("NORMAL");
    expect(classifyCloseCode(1006)).toBe("NORMAL");
  });

  it("should classify unknown codes", () => {
    expect(classifyCloseCode(9999)).toBe("UNKNOWN");
    expect(classifyCloseCode(2000)).toBe("UNKNOWN");
  });
});

describe("createWebSocketTransport", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    sockets.length = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("connect", () => {
    it("should start disconnected", () => {
      const transport = createWebSocketTransport({ url: "ws://test", logger });

      expect(transport.getState()).toBe("DISCONNECTED");
      expect(transport.getGeneration()).toBe(0);
    });

    it("should transition to CONNECTING then CONNECTED", async () => {
      const transport = createWebSocketTransport({
        url: "ws://test",
        protocols: ["v1"],
        logger,
      });
      const states: string[] = [];
      transport.onStateChange((state) => states.push(state));

      const connecting = transport.connect();
      expect(socketAt(0).url).toBe("ws://test");
      expect(socketAt(0).protocols).toEqual(["v1"]);
      socketAt(0).open();
      await connecting;

      expect(states).toEqual(["CONNECTING", "CONNECTED"]);
      expect(transport.getGeneration()).toBe(1);
    });

    it("should be single-flight", async () => {
      const transport = createWebSocketTransport({ url: "ws://test", logger });

      const first = transport.connect();
      const second = transport.connect();
      socketAt(0).open();
      await Promise.all([first, second]);

      expect(sockets).toHaveLength(1);
    });

    it("should not open a second socket when already connected", async () => {
      const transport = await connected();

      await transport.connect();

      expect(sockets).toHaveLength(1);
    });

    it("should reject with a retryable ConnectionError when the socket errors", async () => {
      const transport = createWebSocketTransport({ url: "ws://test", logger });
      const errors: Error[] = [];
      transport.onError((error) => errors.push(error));

      const connecting = transport.connect();
      socketAt(0).emit("error", new Error("connect ECONNREFUSED"));

      const error = await connecting.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toMatchObject({
        message: "WebSocket ws://test failed: connect ECONNREFUSED",
        retryable: true,
      });
      expect(errors.map((e) => e.message)).toEqual(["connect ECONNREFUSED"]);
    });

    it("should run connected handlers before resolving and report their failures", async () => {
      const transport = createWebSocketTransport({ url: "ws://test", logger });
      const calls: string[] = [];
      const errors: Error[] = [];
      transport.onConnected(async () => {
        calls.push("subscribe");
      });
      transport.onConnected(() => {
        throw new Error("auth rejected");
      });
      transport.onError((error) => errors.push(error));

      const connecting = transport.connect();
      socketAt(0).open();
      await connecting;

      expect(calls).toEqual(["subscribe"]);
      expect(errors.map((e) => e.message)).toEqual(["auth rejected"]);
    });

    it("should reject a pending connect when closed", async () => {
      const transport = createWebSocketTransport({ url: "ws://test", logger });

      const outcome = transport.connect().catch((e: unknown) => e);
      await transport.close();

      expect(await outcome).toBeInstanceOf(CancelledError);
      expect(socketAt(0).terminate).toHaveBeenCalledTimes(1);
      expect(socketAt(0).close).not.toHaveBeenCalled();
      expect(transport.getState()).toBe("DISCONNECTED");
    });

    it("should absorb the handshake abort error when closed while connecting", async () => {
      const transport = createWebSocketTransport({ url: "ws://test", logger });
      const outcome = transport.connect().catch((e: unknown) => e);
      const socket = socketAt(0);
      socket.terminate.mockImplementation(() => {
        socket.emit("error", new Error("WebSocket was closed before the connection was established"));
      });

      await expect(transport.close()).resolves.toBeUndefined();

      expect(await outcome).toBeInstanceOf(CancelledError);
      expect(socket.listenerCount("error")).toBe(1);
    });

    it("should close an open socket with a normal close frame", async () => {
      const transport = await connected();

      await transport.close();

      expect(socketAt(0).close).toHaveBeenCalledWith(1000, "Client closing");
      expect(socketAt(0).terminate).not.toHaveBeenCalled();
    });
  });

  describe("send and ping", () => {
    it("should write frames when connected", async () => {
      const transport = await connected();

      await transport.send('{"op":"subscribe"}');
      await transport.ping();

      expect(socketAt(0).send).toHaveBeenCalledWith('{"op":"subscribe"}', expect.any(Function));
      expect(socketAt(0).ping).toHaveBeenCalledTimes(1);
    });

    it("should reject sends with a retryable ConnectionError when not connected", async () => {
      const transport = createWebSocketTransport({ url: "ws://test", logger });

      await expect(transport.send("hello")).rejects.toMatchObject({
        name: "ConnectionError",
        retryable: true,
        code: "ENOTCONN",
      });
      await expect(transport.ping()).rejects.toBeInstanceOf(ConnectionError);
    });

    it("should reject when the socket reports a write error", async () => {
      const transport = await connected();
      socketAt(0).send.mockImplementationOnce((_data: string, cb?: (error?: Error) => void) => {
        cb?.(new Error("write EPIPE"));
      });

      await expect(transport.send("hello")).rejects.toMatchObject({
        message: "Cannot send: write EPIPE",
        retryable: true,
      });
    });

    it("should reject sends after close", async () => {
      const transport = await connected();

      await transport.close();

      expect(socketAt(0).close).toHaveBeenCalledWith(1000, "Client closing");
      await expect(transport.send("hello")).rejects.toBeInstanceOf(ConnectionError);
    });
  });

  describe("inbound messages", () => {
    it("should decode JSON and fall back to text", async () => {
      const transport = await connected();
      const received: Array<[unknown, number]> = [];
      transport.onMessage((data, generation) => received.push([data, generation]));

      socketAt(0).receive('{"channel":"ticker","price":101.5}');
      socketAt(0).receive("pong");

      expect(received).toEqual([
        [{ channel: "ticker", price: 101.5 }, 1],
        ["pong", 1],
      ]);
    });

    it("should stop delivering after the handler unsubscribes", async () => {
      const transport = await connected();
      const handler = vi.fn();
      const unsubscribe = transport.onMessage(handler);

      unsubscribe();
      socketAt(0).receive("late");

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe("reconnect", () => {
    it("should reconnect with backoff after an abnormal close", async () => {
      const transport = await connected({
        reconnect: { enabled: true, maxAttempts: 3, backoffConfig: NO_JITTER },
      });
      const disconnects: Array<[number, string, string]> = [];
      transport.onDisconnected((code, reason, category) => disconnects.push([code, reason, category]));

      socketAt(0).drop(1006, "gone");

      expect(disconnects).toEqual([[1006, "gone", "NORMAL"]]);
      expect(transport.getState()).toBe("RECONNECTING");

      await vi.advanceTimersByTimeAsync(99);
      expect(sockets).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(sockets).toHaveLength(2);

      socketAt(1).open();
      await vi.advanceTimersByTimeAsync(0);

      expect(transport.getState()).toBe("CONNECTED");
      expect(transport.getGeneration()).toBe(2);
    });

    it("should ignore events from a replaced socket", async () => {
      const transport = await connected({
        reconnect: { enabled: true, maxAttempts: 3, backoffConfig: NO_JITTER },
      });
      const handler = vi.fn();
      transport.onMessage(handler);

      socketAt(0).drop(1006);
      await vi.advanceTimersByTimeAsync(100);
      socketAt(1).open();
      await vi.advanceTimersByTimeAsync(0);

      socketAt(0).receive("stale");
      socketAt(1).receive("fresh");

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith("fresh", 2);
    });

    it("should give up after the attempt ceiling", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      const transport = await connected({
        reconnect: { enabled: true, maxAttempts: 1, backoffConfig: NO_JITTER },
      });
      const errors: Error[] = [];
      transport.onError((error) => errors.push(error));

      socketAt(0).drop(1006);
      await vi.advanceTimersByTimeAsync(100);
      socketAt(1).drop(1006);
      await vi.advanceTimersByTimeAsync(0);

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(MaxReconnectsExceededError);
      expect(errors[0]).toMatchObject({ attempts: 1, category: "NORMAL" });
      expect(transport.getState()).toBe("DISCONNECTED");
    });

    it("should apply the lower ceiling to auth failures", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      const transport = await connected({
        reconnect: {
          enabled: true,
          maxAttempts: 5,
          maxAuthFailureAttempts: 0,
          backoffConfig: NO_JITTER,
        },
      });
      const errors: Error[] = [];
      transport.onError((error) => errors.push(error));

      socketAt(0).drop(4401, "unauthorized");
      await vi.advanceTimersByTimeAsync(10_000);

      expect(errors[0]).toMatchObject({ attempts: 0, category: "AUTH_FAILURE" });
      expect(sockets).toHaveLength(1);
    });

    it("should use the rate limit backoff for RATE_LIMITED closes", async () => {
      const transport = await connected({
        reconnect: {
          enabled: true,
          maxAttempts: 3,
          backoffConfig: NO_JITTER,
          rateLimitBackoffConfig: { ...NO_JITTER, initialDelayMs: 5_000 },
        },
      });

      socketAt(0).drop(4429);
      await vi.advanceTimersByTimeAsync(4_999);
      expect(sockets).toHaveLength(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(sockets).toHaveLength(2);
      expect(transport.getState()).toBe("CONNECTING");
    });

    it("should cancel a pending reconnect on close", async () => {
      const transport = await connected({
        reconnect: { enabled: true, maxAttempts: 3, backoffConfig: NO_JITTER },
      });

      socketAt(0).drop(1006);
      await transport.close();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(sockets).toHaveLength(1);
      expect(transport.getState()).toBe("DISCONNECTED");
    });
  });

  describe("heartbeat", () => {
    const heartbeat = { enabled: true, intervalMs: 1_000, timeoutMs: 500 };

    it("should ping on the interval and terminate when no pong arrives", async () => {
      await connected({ heartbeat });

      await vi.advanceTimersByTimeAsync(1_000);
      expect(socketAt(0).ping).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(500);
      expect(socketAt(0).terminate).toHaveBeenCalledTimes(1);
    });

    it("should keep the socket when a pong arrives", async () => {
      await connected({ heartbeat });

      await vi.advanceTimersByTimeAsync(1_000);
      socketAt(0).emit("pong", Buffer.alloc(0));
      await vi.advanceTimersByTimeAsync(500);

      expect(socketAt(0).terminate).not.toHaveBeenCalled();
    });
  });
});
