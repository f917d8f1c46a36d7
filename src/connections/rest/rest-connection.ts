/**
 * REST connection manager. Stateless between calls beyond its configuration:
 * every call is one pipeline execution (quota, timestamp, retries) around a
 * single transport exchange.
 */

import * as v from "valibot";

import { InvalidUsageError } from "@/lib/errors";
import { type Logger, getDefaultLogger } from "@/lib/logger";
import type { RequestPipeline } from "@/pipeline";

import { runProcessors } from "../processors";

import { createFetchTransport } from "./transport";
import type {
  PreparedRestRequest,
  QueryValue,
  RestAuth,
  RestPostProcessor,
  RestPreProcessor,
  RestRequest,
  RestResponse,
  RestTransport,
} from "./types";

export interface RestConnectionConfig {
  /** Prefix for request paths */
  baseUrl?: string;
  pipeline: RequestPipeline;
  transport?: RestTransport;
  auth?: RestAuth;
  preProcessors?: readonly RestPreProcessor[];
  postProcessors?: readonly RestPostProcessor[];
  defaultHeaders?: Readonly<Record<string, string>>;
  logger?: Logger;
}

/** Per-call settings accepted by the verb helpers */
export type RestCallOptions = Omit<RestRequest, "method" | "path" | "url" | "params" | "body">;

export interface RestConnection {
  request: (request: RestRequest) => Promise<RestResponse>;
  get: (
    path: string,
    params?: Readonly<Record<string, QueryValue>>,
    options?: RestCallOptions,
  ) => Promise<RestResponse>;
  post: (path: string, body?: unknown, options?: RestCallOptions) => Promise<RestResponse>;
  put: (path: string, body?: unknown, options?: RestCallOptions) => Promise<RestResponse>;
  patch: (path: string, body?: unknown, options?: RestCallOptions) => Promise<RestResponse>;
  delete: (path: string, options?: RestCallOptions) => Promise<RestResponse>;
  getBaseUrl: () => string | undefined;
  /** Pipeline every request runs through (throttler, synchronizer, metrics) */
  getPipeline: () => RequestPipeline;
}

/**
 * Validates a response body and narrows its type.
 *
 * @throws ValiError when the body does not match the schema
 */
export const parseResponse = <TSchema extends v.GenericSchema>(
  response: RestResponse,
  schema: TSchema,
): RestResponse<v.InferOutput<TSchema>> => ({
  ...response,
  data: v.parse(schema, response.data),
});

const joinUrl = (baseUrl: string, path: string): string =>
  `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;

/**
 * Resolves the absolute URL of a request, query string included.
 */
export const buildUrl = (request: RestRequest, baseUrl?: string): string => {
  let target: string;
  if (request.url !== undefined) {
    target = request.url;
  } else if (request.path !== undefined && baseUrl !== undefined) {
    target = joinUrl(baseUrl, request.path);
  } else if (request.path !== undefined) {
    throw new InvalidUsageError(`Request path ${request.path} needs a connection base URL`);
  } else {
    throw new InvalidUsageError("Request URL cannot be empty: set url or path");
  }

  let url: URL;
  try {
    url = new URL(target);
  } catch (error) {
    throw new InvalidUsageError(`Invalid request URL: ${target}`, { cause: error });
  }

  for (const [key, value] of Object.entries(request.params ?? {})) {
    if (value !== undefined) {
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
};

const hasHeader = (headers: Record<string, string>, name: string): boolean =>
  Object.keys(headers).some((key) => key.toLowerCase() === name.toLowerCase());

/**
 * Creates a REST connection.
 *
 * @example
 * ```typescript
 * const rest = createRestConnection({ baseUrl: "https://api.example.com", pipeline });
 *
 * const response = await rest.get("/v1/ticker", { symbol: "BTC-USD" });
 * const ticker = parseResponse(response, tickerSchema).data;
 * ```
 */
export const createRestConnection = (config: RestConnectionConfig): RestConnection => {
  const {
    baseUrl,
    pipeline,
    transport = createFetchTransport(),
    auth,
    preProcessors = [],
    postProcessors = [],
    defaultHeaders = {},
    logger = getDefaultLogger(),
  } = config;

  const log = logger.child({ component: "RestConnection" });

  const prepare = (request: RestRequest): PreparedRestRequest => {
    const headers: Record<string, string> = { ...defaultHeaders, ...request.headers };
    let body: string | undefined;
    if (typeof request.body === "string") {
      body = request.body;
    } else if (request.body !== undefined) {
      body = JSON.stringify(request.body);
      if (!hasHeader(headers, "content-type")) {
        headers["Content-Type"] = "application/json";
      }
    }
    return { method: request.method, url: buildUrl(request, baseUrl), headers, body };
  };

  const request = async (initial: RestRequest): Promise<RestResponse> => {
    const processed = await runProcessors(initial, preProcessors);
    const prepared = prepare(processed);

    if (processed.isAuthRequired && !auth) {
      throw new InvalidUsageError(
        `${processed.method} ${prepared.url} requires authentication but no auth is configured`,
      );
    }

    const throttlePath = processed.throttlePath ?? processed.path ?? new URL(prepared.url).pathname;

    const response = await pipeline.execute(
      async ({ timestamp, signal }) => {
        const outgoing =
          processed.isAuthRequired && auth && timestamp
            ? await auth.authenticate(prepared, timestamp)
            : prepared;
        return transport.send(outgoing, signal);
      },
      {
        path: throttlePath,
        weight: processed.weight,
        priority: processed.priority,
        limitIds: processed.limitIds,
        timeoutMs: processed.timeoutMs,
        signal: processed.signal,
        timestamped: processed.isAuthRequired ?? false,
      },
    );

    log.debug("REST request completed", {
      method: processed.method,
      url: prepared.url,
      status: response.status,
    });

    return runProcessors(response, postProcessors);
  };

  return {
    request,
    get: (path, params, options) => request({ ...options, method: "GET", path, params }),
    post: (path, body, options) => request({ ...options, method: "POST", path, body }),
    put: (path, body, options) => request({ ...options, method: "PUT", path, body }),
    patch: (path, body, options) => request({ ...options, method: "PATCH", path, body }),
    delete: (path, options) => request({ ...options, method: "DELETE", path }),
    getBaseUrl: () => baseUrl,
    getPipeline: () => pipeline,
  };
};
