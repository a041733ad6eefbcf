/**
 * Signer Module - Pure Transformations
 *
 * Builds the unsigned parts of a provider token and decides when a
 * cached token must be replaced.
 */
import type { TokenClaims, TokenHeader } from "./schema.js";
import { TOKEN_REFRESH_MS } from "./schema.js";

/**
 * Base64url without padding.
 */
export function base64UrlEncode(input: string | Uint8Array): string {
  return Buffer.from(input).toString("base64url");
}

export function buildTokenHeader(keyId: string): TokenHeader {
  return { alg: "ES256", kid: keyId };
}

export function buildTokenClaims(teamId: string, nowMs: number): TokenClaims {
  return { iss: teamId, iat: Math.floor(nowMs / 1000) };
}

/**
 * `<header>.<claims>`, the bytes the signature covers.
 */
export function buildSigningInput(
  header: TokenHeader,
  claims: TokenClaims,
): string {
  return `${base64UrlEncode(JSON.stringify(header))}.${base64UrlEncode(JSON.stringify(claims))}`;
}

/**
 * Check whether a token issued at `issuedAt` can still be sent at `now`.
 */
export function isTokenFresh(issuedAt: number, now: number): boolean {
  return now >= issuedAt && now - issuedAt < TOKEN_REFRESH_MS;
}
