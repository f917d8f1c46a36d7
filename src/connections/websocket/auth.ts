import { createHmac } from "node:crypto";

import * as v from "valibot";

import { InvalidUsageError } from "@/lib/errors";
import type { CorrectedTimestamp } from "@/lib/time-sync";

import type { WebSocketAuth, WebSocketRequest } from "./types";

export interface HmacPayloadAuthConfig {
  apiKey: string;
  apiSecret: string;
}

const payloadObjectSchema = v.record(v.string(), v.unknown());

/**
 * Adds `apiKey`, `timestamp` and `signature` to JSON object payloads, where
 * the signature is the hex HMAC-SHA256 of `timestamp + JSON(payload)`.
 *
 * @example
 * ```typescript
 * const stream = createWebSocketConnection({
 *   url: "wss://stream.example.com/ws",
 *   pipeline,
 *   auth: createHmacPayloadAuth({ apiKey: "key", apiSecret: "secret" }),
 * });
 * await stream.send({ type: "json", payload: { op: "login" }, isAuthRequired: true });
 * ```
 */
export const createHmacPayloadAuth = (config: HmacPayloadAuthConfig): WebSocketAuth => ({
  authenticate: (request: WebSocketRequest, timestamp: CorrectedTimestamp) => {
    const parsed = v.safeParse(payloadObjectSchema, request.payload);
    if (request.type !== "json" || !parsed.success) {
      throw new InvalidUsageError("Only JSON object payloads can be signed");
    }

    const timestampMs = Math.round(timestamp.timestampMs);
    const signature = createHmac("sha256", config.apiSecret)
      .update(`${timestampMs}${JSON.stringify(parsed.output)}`)
      .digest("hex");

    return {
      ...request,
      payload: { ...parsed.output, apiKey: config.apiKey, timestamp: timestampMs, signature },
    };
  },
});
