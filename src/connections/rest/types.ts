import type { CorrectedTimestamp } from "@/lib/time-sync";

import type { ProcessorStep } from "../processors";

export type RestMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface RestRequest {
  method: RestMethod;
  /** Path appended to the connection's base URL */
  path?: string;
  /** Absolute URL, used as-is instead of `path` */
  url?: string;
  params?: Readonly<Record<string, QueryValue>>;
  /** Strings are sent verbatim, anything else as JSON */
  body?: unknown;
  headers?: Readonly<Record<string, string>>;
  /** Sign the request and give it a corrected timestamp */
  isAuthRequired?: boolean;
  /** Path matched against quota rules (default: the request path) */
  throttlePath?: string;
  weight?: number;
  priority?: number;
  /** Explicit quota rules charged on top of path matches */
  limitIds?: readonly string[];
  /** Maximum time to wait for quota (ms) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** A request ready for the wire: absolute URL, final headers, serialized body */
export interface PreparedRestRequest {
  method: RestMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface RestResponse<T = unknown> {
  url: string;
  method: RestMethod;
  status: number;
  ok: boolean;
  /** Header names are lower-cased */
  headers: Readonly<Record<string, string>>;
  /** Parsed JSON when the body is JSON, otherwise the raw text */
  data: T;
}

export interface RestTransport {
  /** Performs one HTTP exchange. Non-2xx responses reject with HttpStatusError. */
  send: (request: PreparedRestRequest, signal: AbortSignal) => Promise<RestResponse>;
}

export interface RestAuth {
  authenticate: (
    request: PreparedRestRequest,
    timestamp: CorrectedTimestamp,
  ) => PreparedRestRequest | Promise<PreparedRestRequest>;
}

export type RestPreProcessor = ProcessorStep<RestRequest>;

export type RestPostProcessor = ProcessorStep<RestResponse>;
