/**
 * Failure Module - Schemas and Types
 *
 * Shapes of the gateway's structured outcome. Schemas are the source of
 * truth - types derived with z.infer<>.
 *
 * Must be kept in lockstep with the gateway's rejection body.
 */
import { z } from "zod";

// =============================================================================
// Gateway Reasons
// =============================================================================

/**
 * Reasons the gateway documents for rejecting a notification.
 * Reasons outside this list are still carried verbatim.
 */
export const GATEWAY_REASONS = [
  "BadCollapseId",
  "BadDeviceToken",
  "BadExpirationDate",
  "BadMessageId",
  "BadPriority",
  "BadTopic",
  "DeviceTokenNotForTopic",
  "DuplicateHeaders",
  "IdleTimeout",
  "InvalidPushType",
  "MissingDeviceToken",
  "MissingTopic",
  "PayloadEmpty",
  "TopicDisallowed",
  "BadCertificate",
  "BadCertificateEnvironment",
  "ExpiredProviderToken",
  "Forbidden",
  "InvalidProviderToken",
  "MissingProviderToken",
  "UnrelatedKeyIdInToken",
  "BadPath",
  "MethodNotAllowed",
  "ExpiredToken",
  "Unregistered",
  "PayloadTooLarge",
  "TooManyProviderTokenUpdates",
  "TooManyRequests",
  "InternalServerError",
  "ServiceUnavailable",
  "Shutdown",
] as const;

export const GatewayReasonSchema = z.enum(GATEWAY_REASONS);

export type GatewayReason = z.infer<typeof GatewayReasonSchema>;

/**
 * Reasons meaning the device token should no longer be used for this topic.
 */
export const DEVICE_TOKEN_REASONS: ReadonlyArray<GatewayReason> = [
  "BadDeviceToken",
  "Unregistered",
  "DeviceTokenNotForTopic",
];

// =============================================================================
// Delivery Response
// =============================================================================

/**
 * JSON body the gateway returns alongside a non-200 status.
 */
export const ReasonBodySchema = z.object({
  reason: z.string().describe("Machine-readable rejection reason"),
  timestamp: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe("Last time the token was valid (ms since epoch)"),
});

export type ReasonBody = Readonly<z.infer<typeof ReasonBodySchema>>;

/**
 * Structured outcome of a send, as reported by the gateway.
 */
export const DeliveryResponseSchema = z.object({
  code: z.number().int().describe("HTTP status returned by the gateway"),
  apnsId: z.string().optional().describe("apns-id echoed by the gateway"),
  error: ReasonBodySchema.optional(),
});

export type DeliveryResponse = Readonly<{
  code: number;
  apnsId?: string;
  error?: ReasonBody;
}>;
