export { createHmacAuth, signRequest, type HmacAuthConfig } from "./auth";
export {
  buildUrl,
  createRestConnection,
  parseResponse,
  type RestCallOptions,
  type RestConnection,
  type RestConnectionConfig,
} from "./rest-connection";
export { createFetchTransport, type FetchTransportConfig } from "./transport";
export type {
  PreparedRestRequest,
  QueryValue,
  RestAuth,
  RestMethod,
  RestPostProcessor,
  RestPreProcessor,
  RestRequest,
  RestResponse,
  RestTransport,
} from "./types";
