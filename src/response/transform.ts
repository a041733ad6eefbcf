/**
 * Response Module - Pure Transformations
 *
 * Turns a raw gateway reply into a DeliveryResponse: 200 is delivery,
 * anything else is a REMOTE_REJECTION carrying the gateway's reason.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type DeliveryResponse,
  type FailureKind,
  type ReasonBody,
  ReasonBodySchema,
  fromGatewayRejection,
  fromJsonError,
} from "../failure/index.js";
import type { GatewayReply } from "../transport/index.js";

export const DELIVERED_STATUS = 200;

/**
 * Parse the rejection body. An empty body has no reason.
 */
export function parseReasonBody(
  text: string,
): Result<ReasonBody | undefined, FailureKind> {
  if (text.trim() === "") {
    return ok(undefined);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return err(fromJsonError(error));
  }

  const parsed = ReasonBodySchema.safeParse(data);
  if (!parsed.success) {
    return err(fromJsonError(parsed.error));
  }
  return ok(parsed.data);
}

/**
 * Interpret a reply. A malformed rejection body is SERIALIZE_FAILURE.
 */
export function interpretReply(
  reply: GatewayReply,
): Result<DeliveryResponse, FailureKind> {
  const apnsId = reply.headers["apns-id"];

  if (reply.status === DELIVERED_STATUS) {
    return ok({
      code: reply.status,
      ...(apnsId !== undefined && { apnsId }),
    });
  }

  const reasonBody = parseReasonBody(reply.body);
  if (reasonBody.isErr()) {
    return err(reasonBody.error);
  }

  return err(
    fromGatewayRejection({
      code: reply.status,
      ...(apnsId !== undefined && { apnsId }),
      ...(reasonBody.value !== undefined && { error: reasonBody.value }),
    }),
  );
}
