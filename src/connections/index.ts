export { decodeBody } from "./codec";
export {
  buildBackoffConfig,
  buildQuotaRules,
  connectionOptionsSchema,
  connectionRuleId,
  parseConnectionOptions,
  type ConnectionOptions,
  type ConnectionOptionsInput,
  type RestConnectionOptionsInput,
  type WebSocketConnectionOptionsInput,
} from "./config";
export { createConnection, type ConnectionDependencies } from "./factory";
export { runProcessors, type ProcessorStep } from "./processors";
export * from "./rest";
export * from "./websocket";
