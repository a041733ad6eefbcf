/**
 * Request Module - Schemas and Types
 *
 * Per-notification options sent as request headers, and the
 * notification a caller hands to the client.
 */
import { z } from "zod";

export const PUSH_TYPES = [
  "alert",
  "background",
  "location",
  "voip",
  "complication",
  "fileprovider",
  "mdm",
  "liveactivity",
  "pushtotalk",
] as const;

export const MAX_COLLAPSE_ID_BYTES = 64;

/**
 * Options mapped onto apns-* headers. Unknown keys are rejected.
 */
export const NotificationOptionsSchema = z
  .object({
    apnsId: z.string().uuid("apnsId must be a UUID").optional(),
    expiration: z
      .number()
      .int("expiration must be whole seconds")
      .nonnegative("expiration must not be negative")
      .optional()
      .describe("UNIX epoch seconds; 0 means deliver once or drop"),
    priority: z
      .union([z.literal(1), z.literal(5), z.literal(10)], {
        errorMap: () => ({ message: "priority must be 1, 5 or 10" }),
      })
      .optional(),
    topic: z.string().min(1, "topic must not be empty").optional(),
    collapseId: z
      .string()
      .refine(
        (value) => Buffer.byteLength(value, "utf8") <= MAX_COLLAPSE_ID_BYTES,
        `collapseId must be at most ${MAX_COLLAPSE_ID_BYTES} bytes`,
      )
      .optional(),
    pushType: z.enum(PUSH_TYPES).optional(),
  })
  .strict();

export type NotificationOptions = z.infer<typeof NotificationOptionsSchema>;

export const DeviceTokenSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{64,200}$/, "must be 64 to 200 hex characters");

/**
 * A notification ready to send. The payload is opaque JSON.
 */
export type Notification = Readonly<{
  deviceToken: string;
  payload: Readonly<Record<string, unknown>>;
  options?: NotificationOptions;
}>;
