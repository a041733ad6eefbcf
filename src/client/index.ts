/**
 * Client module public API.
 */
export type { PushClient, PushClientOptions, SendResult } from "./schema.js";
export {
  createPushClient,
  createPushClientFromConfig,
  maskDeviceToken,
  validateTimeout,
} from "./service.js";
