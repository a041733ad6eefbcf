/**
 * Request Module - Pure Transformations
 *
 * Validates caller input and turns it into the path, headers and body
 * of a gateway request.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type FailureKind,
  fromJsonError,
  fromOptionIssues,
} from "../failure/index.js";
import type { NotificationOptions } from "./schema.js";
import { DeviceTokenSchema, NotificationOptionsSchema } from "./schema.js";

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate caller options. Missing options are an empty set.
 */
export function validateOptions(
  raw: unknown,
): Result<NotificationOptions, FailureKind> {
  const parsed = NotificationOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return err(fromOptionIssues(parsed.error.issues));
  }
  return ok(parsed.data);
}

/**
 * Validate a device token, reporting issues under `deviceToken`.
 */
export function validateDeviceToken(
  token: unknown,
): Result<string, FailureKind> {
  const parsed = DeviceTokenSchema.safeParse(token);
  if (!parsed.success) {
    return err(
      fromOptionIssues(
        parsed.error.issues.map((issue) => ({
          ...issue,
          path: ["deviceToken", ...issue.path],
        })),
      ),
    );
  }
  return ok(parsed.data);
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Encode the payload. BigInt values and cycles are SERIALIZE_FAILURE.
 */
export function serializePayload(
  payload: Readonly<Record<string, unknown>>,
): Result<string, FailureKind> {
  try {
    return ok(JSON.stringify(payload));
  } catch (error) {
    return err(fromJsonError(error));
  }
}

// =============================================================================
// Request Building
// =============================================================================

export function buildRequestPath(deviceToken: string): string {
  return `/3/device/${deviceToken}`;
}

/**
 * Map options onto request headers. `options.topic` wins over the
 * client's default topic.
 */
export function buildRequestHeaders(
  options: NotificationOptions,
  defaultTopic?: string,
  authToken?: string,
): Record<string, string> {
  const topic = options.topic ?? defaultTopic;

  return {
    "content-type": "application/json",
    ...(options.apnsId !== undefined && { "apns-id": options.apnsId }),
    ...(options.expiration !== undefined && {
      "apns-expiration": String(options.expiration),
    }),
    ...(options.priority !== undefined && {
      "apns-priority": String(options.priority),
    }),
    ...(topic !== undefined && { "apns-topic": topic }),
    ...(options.collapseId !== undefined && {
      "apns-collapse-id": options.collapseId,
    }),
    ...(options.pushType !== undefined && {
      "apns-push-type": options.pushType,
    }),
    ...(authToken !== undefined && { authorization: `bearer ${authToken}` }),
  };
}
