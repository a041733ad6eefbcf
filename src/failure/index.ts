/**
 * Failure module public API.
 * Modules import from other modules via index.ts only - no deep imports.
 */

// Types
export type { FailureKind, FailureType } from "./errors.js";
export type {
  DeliveryResponse,
  GatewayReason,
  ReasonBody,
} from "./schema.js";
export type {
  FailureCategory,
  FailureClass,
  FailureLogContext,
} from "./transform.js";

// Schemas
export {
  DEVICE_TOKEN_REASONS,
  DeliveryResponseSchema,
  GATEWAY_REASONS,
  GatewayReasonSchema,
  ReasonBodySchema,
} from "./schema.js";

// Constructors
export {
  connectionFailure,
  invalidOptions,
  readFailure,
  remoteRejection,
  serializeFailure,
  signingFailure,
  timeoutFailure,
  tlsFailure,
} from "./errors.js";

// Conversions and observers
export {
  FAILURE_CATEGORIES,
  describeFailure,
  errorCause,
  errorCode,
  failureClass,
  failureDetail,
  failureLogContext,
  fromConnectionError,
  fromGatewayRejection,
  fromJsonError,
  fromOptionIssues,
  fromReadError,
  fromSigningError,
  fromTlsError,
  fromTransportError,
  isDeviceTokenReason,
  isKnownReason,
  isTlsErrorCode,
  rejectionReason,
  renderCause,
  renderFailure,
} from "./transform.js";
