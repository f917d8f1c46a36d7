export { createHmacPayloadAuth, type HmacPayloadAuthConfig } from "./auth";
export {
  createInboundDispatcher,
  DEFAULT_MAX_INBOUND_QUEUE_SIZE,
  type InboundDispatcher,
  type InboundDispatcherConfig,
} from "./inbound-dispatcher";
export {
  classifyCloseCode,
  createWebSocketTransport,
  MaxReconnectsExceededError,
  type CloseCategory,
  type DisconnectHandler,
  type HeartbeatConfig,
  type InboundHandler,
  type ReconnectConfig,
  type WebSocketState,
  type WebSocketTransport,
  type WebSocketTransportConfig,
} from "./transport";
export type {
  WebSocketAuth,
  WebSocketJsonRequest,
  WebSocketMessageHandler,
  WebSocketPostProcessor,
  WebSocketPreProcessor,
  WebSocketRequest,
  WebSocketResponse,
  WebSocketSendOptions,
  WebSocketTextRequest,
} from "./types";
export {
  createWebSocketConnection,
  serializeRequest,
  type DisconnectOptions,
  type ReceiveOptions,
  type WebSocketConnection,
  type WebSocketConnectionBaseConfig,
  type WebSocketConnectionConfig,
} from "./websocket-connection";
