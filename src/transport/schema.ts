/**
 * Transport Module - Schemas and Types
 *
 * The port the client sends through. Adapters convert their native
 * errors into FailureKind before returning.
 */
import type { Result } from "neverthrow";

import type { FailureKind } from "../failure/index.js";

/**
 * One POST to the gateway.
 */
export type GatewayRequest = Readonly<{
  path: string;
  headers: Readonly<Record<string, string>>;
  body: string;
  /** Aborts the in-flight stream, e.g. when a time budget elapses */
  signal?: AbortSignal;
}>;

/**
 * Raw reply: status, lower-cased headers and the body text.
 */
export type GatewayReply = Readonly<{
  status: number;
  headers: Readonly<Record<string, string | undefined>>;
  body: string;
}>;

export interface GatewayTransport {
  request(request: GatewayRequest): Promise<Result<GatewayReply, FailureKind>>;
  close(): Promise<void>;
}

/**
 * PKCS#12 client certificate for certificate-based authentication.
 */
export type ClientCertificate = Readonly<{
  pfx: Buffer;
  passphrase: string;
}>;

export type Http2TransportOptions = Readonly<{
  /** Base URL, e.g. https://api.sandbox.push.apple.com */
  endpoint: string;
  certificate?: ClientCertificate;
  /** Trust anchors replacing the default CA store */
  ca?: string | Buffer;
}>;

/**
 * Largest reply body accepted. Gateway replies are a short JSON reason
 * or empty.
 */
export const MAX_REPLY_BYTES = 8 * 1024;
