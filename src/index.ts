/**
 * Push gateway client - public entry point.
 *
 * Every fallible operation resolves to a Result whose error arm is a
 * FailureKind. Branch on `failure.type`, log with `renderFailure` and
 * group metrics with `describeFailure`.
 *
 * @example
 * const client = createPushClient({ transport, signer });
 * const result = await client.sendWithTimeout(notification, 5_000);
 * if (result.isErr() && isDeviceTokenReason(rejectionReason(result.error) ?? "")) {
 *   await forgetDevice(notification.deviceToken);
 * }
 */

export * from "./failure/index.js";

export type {
  PushClient,
  PushClientOptions,
  SendResult,
} from "./client/index.js";
export {
  createPushClient,
  createPushClientFromConfig,
} from "./client/index.js";

export type { Notification, NotificationOptions } from "./request/index.js";
export { NotificationOptionsSchema, PUSH_TYPES } from "./request/index.js";

export type { TokenSigner } from "./signer/index.js";
export { createTokenSigner, loadTokenSigner } from "./signer/index.js";

export type {
  ClientCertificate,
  GatewayReply,
  GatewayRequest,
  GatewayTransport,
} from "./transport/index.js";
export {
  createHttp2Transport,
  loadClientCertificate,
} from "./transport/index.js";

export { GATEWAY_ENDPOINTS } from "./config.js";
