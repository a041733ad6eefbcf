/**
 * Request module public API.
 */
export type { Notification, NotificationOptions } from "./schema.js";
export {
  DeviceTokenSchema,
  MAX_COLLAPSE_ID_BYTES,
  NotificationOptionsSchema,
  PUSH_TYPES,
} from "./schema.js";

export {
  buildRequestHeaders,
  buildRequestPath,
  serializePayload,
  validateDeviceToken,
  validateOptions,
} from "./transform.js";
