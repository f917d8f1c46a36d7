import { createHmac } from "node:crypto";

import * as v from "valibot";
import { describe, expect, it, vi } from "vitest";

import { WALL_CLOCK } from "@/lib/clock";
import { HttpStatusError, InvalidUsageError, RetriesExhaustedError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { type QuotaRule, createThrottler } from "@/lib/rate-limiter";
import type { ClockOffset, TimeSynchronizer } from "@/lib/time-sync";
import { createRequestPipeline } from "@/pipeline";

import { createHmacAuth } from "./auth";
import {
  type RestConnectionConfig,
  buildUrl,
  createRestConnection,
  parseResponse,
} from "./rest-connection";
import { createFetchTransport } from "./transport";

const logger = createLogger({ level: "error" });

const offset: ClockOffset = { offsetMs: 250, roundTripMs: 20, syncedAt: 0 };

const fixedSynchronizer: TimeSynchronizer = {
  sync: async () => offset,
  now: () => ({ timestampMs: 1_700_000_000_000, offsetMs: 250, synchronized: true, ageMs: 0 }),
  getOffset: () => offset,
  isStale: () => false,
  getConsecutiveFailures: () => 0,
};

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });

const setup = (
  fetch: typeof globalThis.fetch,
  overrides: Partial<RestConnectionConfig> = {},
  rules: QuotaRule[] = [{ id: "default", maxRequests: 100, timeWindowMs: 60_000 }],
) => {
  const throttler = createThrottler({ rules, clock: WALL_CLOCK, logger });
  const pipeline = createRequestPipeline({
    throttler,
    timeSynchronizer: fixedSynchronizer,
    maxRetries: 1,
    backoffConfig: { initialDelayMs: 0, maxDelayMs: 0, multiplier: 2, jitterFactor: 0 },
    requestTimeoutMs: 1_000,
    logger,
  });
  const connection = createRestConnection({
    baseUrl: "https://api.example.com",
    pipeline,
    transport: createFetchTransport({ fetch }),
    logger,
    ...overrides,
  });
  return { throttler, connection };
};

describe("buildUrl", () => {
  it("should join the base URL and path and append params", () => {
    expect(
      buildUrl(
        { method: "GET", path: "/v1/data", params: { filter: "active", page: 1, skip: undefined } },
        "https://api.example.com/",
      ),
    ).toBe("https://api.example.com/v1/data?filter=active&page=1");
  });

  it("should prefer an absolute URL and encode it", () => {
    expect(
      buildUrl({ method: "GET", url: "https://api.example.com/data with spaces", path: "/ignored" }),
    ).toBe("https://api.example.com/data%20with%20spaces");
  });

  it("should reject a request without url or path", () => {
    expect(() => buildUrl({ method: "GET" }, "https://api.example.com")).toThrow(
      new InvalidUsageError("Request URL cannot be empty: set url or path"),
    );
  });

  it("should reject a path without a base URL", () => {
    expect(() => buildUrl({ method: "GET", path: "/v1/data" })).toThrow(InvalidUsageError);
  });
});

describe("createRestConnection", () => {
  it("should perform a GET with query parameters", async () => {
    const fetch = vi.fn().mockResolvedValue(json({ key: "value" }));
    const { connection } = setup(fetch);

    const response = await connection.get("/v1/data", { filter: "active", page: "1" });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0]?.[0]).toBe("https://api.example.com/v1/data?filter=active&page=1");
    expect(response).toMatchObject({
      method: "GET",
      status: 200,
      ok: true,
      data: { key: "value" },
    });
    expect(response.headers["content-type"]).toBe("application/json");
  });

  it("should serialize object bodies as JSON", async () => {
    const fetch = vi.fn().mockResolvedValue(json({ created: true }, 201));
    const { connection } = setup(fetch, { defaultHeaders: { "User-Agent": "pacewire-test" } });

    const response = await connection.post("/v1/items", { name: "test", value: 123 });

    expect(response.status).toBe(201);
    expect(fetch.mock.calls[0]?.[1]).toMatchObject({
      method: "POST",
      body: '{"name":"test","value":123}',
      headers: { "User-Agent": "pacewire-test", "Content-Type": "application/json" },
    });
  });

  it("should send string bodies verbatim and keep an explicit content type", async () => {
    const fetch = vi.fn().mockResolvedValue(new Response("accepted"));
    const { connection } = setup(fetch);

    const response = await connection.put("/v1/items/1", "a=1&b=2", {
      headers: { "content-type": "application/x-www-form-urlencoded" },
    });

    expect(response.data).toBe("accepted");
    expect(fetch.mock.calls[0]?.[1]).toMatchObject({
      method: "PUT",
      body: "a=1&b=2",
      headers: { "content-type": "application/x-www-form-urlencoded" },
    });
  });

  it("should reject a request without url or path before charging quota", async () => {
    const fetch = vi.fn();
    const { connection, throttler } = setup(fetch);

    await expect(connection.request({ method: "GET" })).rejects.toBeInstanceOf(InvalidUsageError);

    expect(fetch).not.toHaveBeenCalled();
    expect(throttler.getUsage("default")?.used).toBe(0);
  });

  it("should retry server errors and report exhaustion", async () => {
    const fetch = vi
      .fn()
      .mockImplementation(() => Promise.resolve(json({ error: "Internal Server Error" }, 500)));
    const { connection } = setup(fetch);

    const error = await connection.get("/v1/data").catch((e: unknown) => e);

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(RetriesExhaustedError);
    if (error instanceof RetriesExhaustedError) {
      expect(error.lastError).toBeInstanceOf(HttpStatusError);
      expect(error.lastError).toMatchObject({
        status: 500,
        body: { error: "Internal Server Error" },
      });
    }
  });

  it("should not retry client errors", async () => {
    const fetch = vi.fn().mockImplementation(() => Promise.resolve(json({ error: "not found" }, 404)));
    const { connection } = setup(fetch);

    await expect(connection.delete("/v1/items/9")).rejects.toMatchObject({
      name: "HttpStatusError",
      status: 404,
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("should charge the throttle path when one is given", async () => {
    const fetch = vi.fn().mockImplementation(() => Promise.resolve(json({})));
    const { connection, throttler } = setup(fetch, {}, [
      { id: "orders", maxRequests: 5, timeWindowMs: 60_000, pathScope: "orders" },
      { id: "market", maxRequests: 5, timeWindowMs: 60_000, pathScope: "/v1/market" },
    ]);

    await connection.post("/v1/order", { side: "buy" }, { throttlePath: "orders" });
    await connection.get("/v1/market/ticker");

    expect(throttler.getUsage("orders")?.used).toBe(1);
    expect(throttler.getUsage("market")?.used).toBe(1);
  });

  it("should run pre-processors in order before the request is built", async () => {
    const fetch = vi.fn().mockResolvedValue(json({}));
    const { connection } = setup(fetch, {
      preProcessors: [
        (request) => ({ ...request, headers: { ...request.headers, "X-Test": "test_value" } }),
        async (request) => ({ ...request, headers: { ...request.headers, "X-Second": "second_value" } }),
      ],
    });

    await connection.get("/v1/data", undefined, { headers: { Accept: "application/json" } });

    expect(fetch.mock.calls[0]?.[1]).toMatchObject({
      headers: {
        Accept: "application/json",
        "X-Test": "test_value",
        "X-Second": "second_value",
      },
    });
  });

  it("should run post-processors on the response", async () => {
    const fetch = vi.fn().mockResolvedValue(json({ result: "success", value: 42 }));
    const { connection } = setup(fetch, {
      postProcessors: [
        (response) =>
          typeof response.data === "object" && response.data !== null
            ? { ...response, data: { ...response.data, processed: true } }
            : response,
      ],
    });

    const response = await connection.get("/v1/data");

    expect(response.data).toEqual({ result: "success", value: 42, processed: true });
  });

  describe("authentication", () => {
    it("should sign auth-required requests with the corrected timestamp", async () => {
      const fetch = vi.fn().mockResolvedValue(json({ orderId: "1" }));
      const { connection } = setup(fetch, {
        auth: createHmacAuth({ apiKey: "test-key", apiSecret: "test-secret" }),
      });

      await connection.post(
        "/v1/order",
        { symbol: "BTC-USD" },
        { isAuthRequired: true },
      );

      const expectedSignature = createHmac("sha256", "test-secret")
        .update('1700000000000POST/v1/order{"symbol":"BTC-USD"}')
        .digest("hex");
      expect(fetch.mock.calls[0]?.[1]).toMatchObject({
        headers: {
          "X-API-KEY": "test-key",
          "X-TIMESTAMP": "1700000000000",
          "X-SIGNATURE": expectedSignature,
        },
      });
    });

    it("should sign the query string too", async () => {
      const fetch = vi.fn().mockResolvedValue(json([]));
      const { connection } = setup(fetch, {
        auth: createHmacAuth({ apiKey: "test-key", apiSecret: "test-secret" }),
      });

      await connection.get("/v1/fills", { limit: 10 }, { isAuthRequired: true });

      const expectedSignature = createHmac("sha256", "test-secret")
        .update("1700000000000GET/v1/fills?limit=10")
        .digest("hex");
      expect(fetch.mock.calls[0]?.[1]).toMatchObject({
        headers: { "X-SIGNATURE": expectedSignature },
      });
    });

    it("should leave public requests unsigned", async () => {
      const fetch = vi.fn().mockResolvedValue(json({}));
      const { connection } = setup(fetch, {
        auth: createHmacAuth({ apiKey: "test-key", apiSecret: "test-secret" }),
      });

      await connection.get("/v1/time");

      expect(fetch.mock.calls[0]?.[1]?.headers).toEqual({});
    });

    it("should refuse auth-required requests without auth", async () => {
      const fetch = vi.fn();
      const { connection } = setup(fetch);

      await expect(
        connection.get("/v1/fills", undefined, { isAuthRequired: true }),
      ).rejects.toBeInstanceOf(InvalidUsageError);
      expect(fetch).not.toHaveBeenCalled();
    });
  });
});

describe("parseResponse", () => {
  const tickerSchema = v.object({ symbol: v.string(), price: v.number() });

  it("should return typed data when the body matches", () => {
    const parsed = parseResponse(
      {
        url: "https://api.example.com/v1/ticker",
        method: "GET",
        status: 200,
        ok: true,
        headers: {},
        data: { symbol: "BTC-USD", price: 42_000 },
      },
      tickerSchema,
    );

    expect(parsed.data.price).toBe(42_000);
  });

  it("should throw when the body does not match", () => {
    expect(() =>
      parseResponse(
        {
          url: "https://api.example.com/v1/ticker",
          method: "GET",
          status: 200,
          ok: true,
          headers: {},
          data: { symbol: "BTC-USD" },
        },
        tickerSchema,
      ),
    ).toThrow(v.ValiError);
  });
});
