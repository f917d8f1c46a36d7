import type { CorrectedTimestamp } from "@/lib/time-sync";

import type { ProcessorStep } from "../processors";

export interface WebSocketSendOptions {
  /** Path matched against quota rules (default: the connection's throttle path) */
  throttlePath?: string;
  weight?: number;
  priority?: number;
  /** Explicit quota rules charged on top of path matches */
  limitIds?: readonly string[];
  /** Sign the message and give it a corrected timestamp */
  isAuthRequired?: boolean;
  /** Maximum time to wait for quota (ms) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type WebSocketJsonRequest = WebSocketSendOptions & { type: "json"; payload: unknown };

export type WebSocketTextRequest = WebSocketSendOptions & { type: "text"; payload: string };

export type WebSocketRequest = WebSocketJsonRequest | WebSocketTextRequest;

export interface WebSocketResponse<T = unknown> {
  /** Parsed JSON when the frame is JSON, otherwise the raw text */
  data: T;
  /** Transport generation the frame arrived on */
  generation: number;
  /** Wall-clock arrival time (ms) */
  receivedAt: number;
}

export interface WebSocketAuth {
  authenticate: (
    request: WebSocketRequest,
    timestamp: CorrectedTimestamp,
  ) => WebSocketRequest | Promise<WebSocketRequest>;
}

export type WebSocketPreProcessor = ProcessorStep<WebSocketRequest>;

export type WebSocketPostProcessor = ProcessorStep<WebSocketResponse>;

export type WebSocketMessageHandler = (response: WebSocketResponse) => Promise<void> | void;
