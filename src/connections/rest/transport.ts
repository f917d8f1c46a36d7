import * as v from "valibot";

import { CancelledError, ConnectionError, HttpStatusError } from "@/lib/errors";
import { isRetryableStatusCode } from "@/lib/rate-limiter";

import { decodeBody } from "../codec";

import type { PreparedRestRequest, RestResponse, RestTransport } from "./types";

export interface FetchTransportConfig {
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

/** Failures that no retry can fix */
const FATAL_FETCH_ERROR_CODES = new Set([
  "ERR_INVALID_URL",
  "ERR_INVALID_ARG_TYPE",
  "ERR_INVALID_ARG_VALUE",
  "UND_ERR_INVALID_ARG",
]);

const errorWithCodeSchema = v.object({ code: v.string() });

/**
 * undici reports network failures as `TypeError: fetch failed` with the
 * system error as its cause.
 */
const extractErrorCode = (error: unknown): string | undefined => {
  for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
    const result = v.safeParse(errorWithCodeSchema, candidate);
    if (result.success) {
      return result.output.code;
    }
  }
  return undefined;
};

const collectHeaders = (headers: Headers): Record<string, string> => {
  const collected: Record<string, string> = {};
  headers.forEach((value, key) => {
    collected[key.toLowerCase()] = value;
  });
  return collected;
};

/**
 * HTTP transport over the Fetch API.
 */
export const createFetchTransport = (config: FetchTransportConfig = {}): RestTransport => {
  const fetchImpl = config.fetch ?? globalThis.fetch;

  const send = async (request: PreparedRestRequest, signal: AbortSignal): Promise<RestResponse> => {
    let response: Response;
    try {
      response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw signal.reason instanceof Error
          ? signal.reason
          : new CancelledError(`${request.method} ${request.url} was aborted`);
      }
      const code = extractErrorCode(error);
      throw new ConnectionError(
        `${request.method} ${request.url} failed: ${error instanceof Error ? error.message : String(error)}`,
        {
          retryable: code === undefined || !FATAL_FETCH_ERROR_CODES.has(code),
          code,
          cause: error,
        },
      );
    }

    const headers = collectHeaders(response.headers);
    const data = decodeBody(await response.text());

    if (!response.ok) {
      throw new HttpStatusError(
        `${request.method} ${request.url} returned HTTP ${response.status}`,
        response.status,
        headers,
        data,
        isRetryableStatusCode(response.status),
      );
    }

    return {
      url: request.url,
      method: request.method,
      status: response.status,
      ok: response.ok,
      headers,
      data,
    };
  };

  return { send };
};
