/**
 * Failure Module - Pure Transformations
 *
 * Conversions from lower-layer failures into FailureKind, and the
 * observers callers use for branching, logging and metrics.
 * No side effects, no I/O - just data in, data out.
 *
 * How much detail survives a conversion differs per source: signing,
 * read and TLS failures keep the rendered message, serialization and
 * connection failures keep nothing, gateway rejections keep everything.
 */
import type { ZodIssue } from "zod";
import {
  type FailureKind,
  type FailureType,
  connectionFailure,
  invalidOptions,
  readFailure,
  remoteRejection,
  serializeFailure,
  signingFailure,
  tlsFailure,
} from "./errors.js";
import {
  DEVICE_TOKEN_REASONS,
  type DeliveryResponse,
  type GatewayReason,
  GatewayReasonSchema,
} from "./schema.js";

// =============================================================================
// Lower-layer Message Rendering
// =============================================================================

/**
 * Render a thrown value into an owned message string.
 */
export function renderCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the `code` property Node attaches to system, TLS and OpenSSL errors.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Read the `cause` an error was wrapped around, if any.
 */
export function errorCause(error: unknown): unknown {
  if (typeof error === "object" && error !== null && "cause" in error) {
    return error.cause;
  }
  return undefined;
}

/**
 * Certificate verification codes OpenSSL reports without a prefix.
 */
const CERTIFICATE_CODES: ReadonlySet<string> = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_REVOKED",
  "CERT_UNTRUSTED",
  "CERT_REJECTED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "HOSTNAME_MISMATCH",
]);

/**
 * Whether a transport error happened while establishing the TLS session.
 */
export function isTlsErrorCode(code: string | undefined): boolean {
  if (code === undefined) {
    return false;
  }
  return (
    code.startsWith("ERR_TLS_") ||
    code.startsWith("ERR_SSL_") ||
    code.startsWith("ERR_OSSL_") ||
    CERTIFICATE_CODES.has(code)
  );
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * JSON encode/decode failure → SERIALIZE_FAILURE.
 * The originating error is dropped.
 */
export function fromJsonError(_error: unknown): FailureKind {
  return serializeFailure();
}

/**
 * Signing-key or signature failure from node:crypto → SIGNING_FAILURE.
 */
export function fromSigningError(error: unknown): FailureKind {
  return signingFailure(renderCause(error));
}

/**
 * File-system failure reading a key or certificate → READ_FAILURE.
 */
export function fromReadError(error: unknown): FailureKind {
  return readFailure(renderCause(error));
}

/**
 * Transport/connection failure → CONNECTION_FAILURE.
 * The originating error and its code are dropped.
 */
export function fromConnectionError(_error: unknown): FailureKind {
  return connectionFailure();
}

/**
 * TLS session establishment failure → TLS_FAILURE.
 */
export function fromTlsError(error: unknown): FailureKind {
  return tlsFailure(renderCause(error));
}

/**
 * Errors raised by the HTTP/2 session: TLS errors keep their message,
 * everything else is a connection failure.
 *
 * A failed handshake reaches pending streams as ERR_HTTP2_STREAM_CANCEL
 * with the TLS error as its `cause`, so the cause is checked as well.
 */
export function fromTransportError(error: unknown): FailureKind {
  if (isTlsErrorCode(errorCode(error))) {
    return fromTlsError(error);
  }
  const cause = errorCause(error);
  if (isTlsErrorCode(errorCode(cause))) {
    return fromTlsError(cause);
  }
  return fromConnectionError(error);
}

/**
 * Gateway rejection → REMOTE_REJECTION, carried verbatim.
 */
export function fromGatewayRejection(response: DeliveryResponse): FailureKind {
  return remoteRejection(response);
}

/**
 * Option validation issues → INVALID_OPTIONS naming each offending option.
 */
export function fromOptionIssues(issues: ReadonlyArray<ZodIssue>): FailureKind {
  const message = issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
  return invalidOptions(message);
}

// =============================================================================
// Observers
// =============================================================================

/**
 * Category strings, one per variant. Stable: safe as metric labels.
 */
export const FAILURE_CATEGORIES = {
  SERIALIZE_FAILURE: "Error serializing to JSON",
  CONNECTION_FAILURE: "Error connecting to the gateway",
  TIMEOUT_FAILURE: "Timeout in sending a push notification",
  SIGNING_FAILURE: "Error creating a signature",
  REMOTE_REJECTION: "Notification was not accepted by the gateway",
  INVALID_OPTIONS: "Invalid options for the notification payload",
  TLS_FAILURE: "Error in creating a TLS connection",
  READ_FAILURE: "Error in reading a certificate file",
} as const satisfies Record<FailureType, string>;

export type FailureCategory =
  (typeof FAILURE_CATEGORIES)[keyof typeof FAILURE_CATEGORIES];

/**
 * Categorical description of a failure. Depends on the variant only.
 */
export function describeFailure(failure: FailureKind): FailureCategory {
  return FAILURE_CATEGORIES[failure.type];
}

/**
 * Human-readable rendering. Appends the gateway reason to rejections.
 *
 * @example
 * renderFailure(remoteRejection({ code: 400, error: { reason: "BadDeviceToken" } }))
 * // 'Notification was not accepted by the gateway (reason: "BadDeviceToken")'
 */
export function renderFailure(failure: FailureKind): string {
  const text = describeFailure(failure);
  const reason = rejectionReason(failure);
  return reason === undefined
    ? text
    : `${text} (reason: ${JSON.stringify(reason)})`;
}

/**
 * Who can act on a failure.
 */
export type FailureClass = "local-input" | "infrastructure" | "remote-outcome";

/**
 * Partition failures by remediation: fix the request, fix the
 * environment, or surface the gateway's reason.
 */
export function failureClass(failure: FailureKind): FailureClass {
  switch (failure.type) {
    case "SERIALIZE_FAILURE":
    case "INVALID_OPTIONS":
      return "local-input";
    case "CONNECTION_FAILURE":
    case "TIMEOUT_FAILURE":
    case "TLS_FAILURE":
    case "READ_FAILURE":
    case "SIGNING_FAILURE":
      return "infrastructure";
    case "REMOTE_REJECTION":
      return "remote-outcome";
  }
}

/**
 * Gateway reason of a rejection, if any.
 */
export function rejectionReason(failure: FailureKind): string | undefined {
  return failure.type === "REMOTE_REJECTION"
    ? failure.response.error?.reason
    : undefined;
}

/**
 * Diagnostic string a variant carries, if any.
 */
export function failureDetail(failure: FailureKind): string | undefined {
  switch (failure.type) {
    case "SIGNING_FAILURE":
    case "INVALID_OPTIONS":
    case "TLS_FAILURE":
    case "READ_FAILURE":
      return failure.message;
    case "SERIALIZE_FAILURE":
    case "CONNECTION_FAILURE":
    case "TIMEOUT_FAILURE":
    case "REMOTE_REJECTION":
      return undefined;
  }
}

export type FailureLogContext = Readonly<{
  failureType: FailureType;
  category: FailureCategory;
  failureClass: FailureClass;
  detail?: string;
  statusCode?: number;
  reason?: string;
  apnsId?: string;
}>;

/**
 * Flat structured context for pino. Only keys with a value are present.
 */
export function failureLogContext(failure: FailureKind): FailureLogContext {
  const detail = failureDetail(failure);
  const response =
    failure.type === "REMOTE_REJECTION" ? failure.response : undefined;
  const reason = response?.error?.reason;

  return {
    failureType: failure.type,
    category: describeFailure(failure),
    failureClass: failureClass(failure),
    ...(detail !== undefined && { detail }),
    ...(response !== undefined && { statusCode: response.code }),
    ...(reason !== undefined && { reason }),
    ...(response?.apnsId !== undefined && { apnsId: response.apnsId }),
  };
}

// =============================================================================
// Reason Helpers
// =============================================================================

/**
 * Whether a reason is one the gateway documents.
 */
export function isKnownReason(reason: string): reason is GatewayReason {
  return GatewayReasonSchema.safeParse(reason).success;
}

/**
 * Whether a reason means the device token should be discarded.
 */
export function isDeviceTokenReason(reason: string): boolean {
  return isKnownReason(reason) && DEVICE_TOKEN_REASONS.includes(reason);
}
