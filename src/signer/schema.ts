/**
 * Signer Module - Schemas and Types
 *
 * Provider token shapes. The gateway accepts an ES256 JWT whose header
 * names the key id and whose claims name the team and issue time.
 */
import { z } from "zod";

/**
 * Signing key settings supplied by the caller.
 */
export const SigningKeyConfigSchema = z.object({
  pem: z.string().min(1, "Signing key is empty").describe("PKCS#8 PEM"),
  keyId: z.string().min(1, "Key id is required").describe("kid header"),
  teamId: z.string().min(1, "Team id is required").describe("iss claim"),
});

export type SigningKeyConfig = z.infer<typeof SigningKeyConfigSchema>;

export type TokenHeader = Readonly<{
  alg: "ES256";
  kid: string;
}>;

export type TokenClaims = Readonly<{
  iss: string;
  /** Issue time in whole seconds */
  iat: number;
}>;

/**
 * A signed token and the millisecond timestamp it was issued at.
 */
export type CachedToken = Readonly<{
  token: string;
  issuedAt: number;
}>;

/**
 * Tokens are reissued before the gateway's one hour limit.
 */
export const TOKEN_REFRESH_MS = 55 * 60 * 1000;
