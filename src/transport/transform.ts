/**
 * Transport Module - Pure Transformations
 */
import type { SecureClientSessionOptions } from "node:http2";

import type { ClientCertificate } from "./schema.js";

/**
 * Flatten HTTP/2 response headers into single string values.
 * Pseudo-headers such as `:status` are kept as strings.
 */
export function normalizeResponseHeaders(
  headers: Readonly<Record<string, string | string[] | number | undefined>>,
): Record<string, string | undefined> {
  const normalized: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(headers)) {
    normalized[name.toLowerCase()] = Array.isArray(value)
      ? value.join(", ")
      : value === undefined
        ? undefined
        : String(value);
  }
  return normalized;
}

/**
 * TLS options for the session. Without a certificate the session
 * authenticates with provider tokens only.
 */
export function buildSessionOptions(
  certificate?: ClientCertificate,
  ca?: string | Buffer,
): SecureClientSessionOptions {
  return {
    ...(certificate && {
      pfx: certificate.pfx,
      passphrase: certificate.passphrase,
    }),
    ...(ca !== undefined && { ca }),
  };
}
