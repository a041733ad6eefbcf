/**
 * Client Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { DeliveryResponse, FailureKind } from "../failure/index.js";
import type { Notification } from "../request/index.js";
import type { TokenSigner } from "../signer/index.js";
import type { GatewayTransport } from "../transport/index.js";

export type PushClientOptions = Readonly<{
  transport: GatewayTransport;
  /** Provider token signer; omit when the transport authenticates by certificate */
  signer?: TokenSigner;
  /** apns-topic used when a notification does not name one */
  defaultTopic?: string;
  /** Budget used by sendWithTimeout when none is given */
  defaultTimeoutMs?: number;
}>;

export type SendResult = Result<DeliveryResponse, FailureKind>;

export interface PushClient {
  send(notification: Notification): Promise<SendResult>;
  sendWithTimeout(
    notification: Notification,
    timeoutMs?: number,
  ): Promise<SendResult>;
  close(): Promise<void>;
}
