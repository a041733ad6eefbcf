/**
 * Transport module public API.
 */
export type {
  ClientCertificate,
  GatewayReply,
  GatewayRequest,
  GatewayTransport,
  Http2TransportOptions,
} from "./schema.js";
export { MAX_REPLY_BYTES } from "./schema.js";

export { createHttp2Transport, loadClientCertificate } from "./service.js";

export { buildSessionOptions, normalizeResponseHeaders } from "./transform.js";
