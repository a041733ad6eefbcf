/**
 * Failure Module - Error Types
 *
 * The closed set of failures every public client operation can return.
 * Errors are values, not exceptions.
 */
import type { DeliveryResponse } from "./schema.js";

/**
 * Union type of all possible client failures.
 *
 * Only REMOTE_REJECTION carries a gateway response: every other variant
 * means the gateway never issued a structured answer.
 */
export type FailureKind =
  | { readonly type: "SERIALIZE_FAILURE" }
  | { readonly type: "CONNECTION_FAILURE" }
  | { readonly type: "TIMEOUT_FAILURE" }
  | { readonly type: "SIGNING_FAILURE"; readonly message: string }
  | { readonly type: "REMOTE_REJECTION"; readonly response: DeliveryResponse }
  | { readonly type: "INVALID_OPTIONS"; readonly message: string }
  | { readonly type: "TLS_FAILURE"; readonly message: string }
  | { readonly type: "READ_FAILURE"; readonly message: string };

export type FailureType = FailureKind["type"];

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Create a SERIALIZE_FAILURE error.
 */
export function serializeFailure(): FailureKind {
  return { type: "SERIALIZE_FAILURE" };
}

/**
 * Create a CONNECTION_FAILURE error.
 */
export function connectionFailure(): FailureKind {
  return { type: "CONNECTION_FAILURE" };
}

/**
 * Create a TIMEOUT_FAILURE error.
 */
export function timeoutFailure(): FailureKind {
  return { type: "TIMEOUT_FAILURE" };
}

/**
 * Create a SIGNING_FAILURE error.
 */
export function signingFailure(message: string): FailureKind {
  return { type: "SIGNING_FAILURE", message };
}

/**
 * Create a REMOTE_REJECTION error.
 */
export function remoteRejection(response: DeliveryResponse): FailureKind {
  return { type: "REMOTE_REJECTION", response };
}

/**
 * Create an INVALID_OPTIONS error.
 */
export function invalidOptions(message: string): FailureKind {
  return { type: "INVALID_OPTIONS", message };
}

/**
 * Create a TLS_FAILURE error.
 */
export function tlsFailure(message: string): FailureKind {
  return { type: "TLS_FAILURE", message };
}

/**
 * Create a READ_FAILURE error.
 */
export function readFailure(message: string): FailureKind {
  return { type: "READ_FAILURE", message };
}
