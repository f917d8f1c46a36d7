import { createHmac } from "node:crypto";

import type { CorrectedTimestamp } from "@/lib/time-sync";

import type { PreparedRestRequest, RestAuth } from "./types";

export interface HmacAuthConfig {
  apiKey: string;
  apiSecret: string;
}

/**
 * Hex HMAC-SHA256 of `timestamp + method + path?query + body`.
 */
export const signRequest = (
  request: PreparedRestRequest,
  timestampMs: number,
  apiSecret: string,
): string => {
  const url = new URL(request.url);
  const payload = `${timestampMs}${request.method}${url.pathname}${url.search}${request.body ?? ""}`;
  return createHmac("sha256", apiSecret).update(payload).digest("hex");
};

/**
 * Signs requests with an API key header, the corrected timestamp and an
 * HMAC-SHA256 signature.
 *
 * @example
 * ```typescript
 * const connection = createRestConnection({
 *   baseUrl: "https://api.example.com",
 *   pipeline,
 *   auth: createHmacAuth({ apiKey: "key", apiSecret: "secret" }),
 * });
 * ```
 */
export const createHmacAuth = (config: HmacAuthConfig): RestAuth => ({
  authenticate: (request: PreparedRestRequest, timestamp: CorrectedTimestamp) => {
    const timestampMs = Math.round(timestamp.timestampMs);
    return {
      ...request,
      headers: {
        ...request.headers,
        "X-API-KEY": config.apiKey,
        "X-TIMESTAMP": String(timestampMs),
        "X-SIGNATURE": signRequest(request, timestampMs, config.apiSecret),
      },
    };
  },
});
