/**
 * Signer module public API.
 */
export type {
  CachedToken,
  SigningKeyConfig,
  TokenClaims,
  TokenHeader,
} from "./schema.js";
export { SigningKeyConfigSchema, TOKEN_REFRESH_MS } from "./schema.js";

export type { TokenSigner } from "./service.js";
export {
  createTokenSigner,
  loadSigningKey,
  loadTokenSigner,
  parseSigningKey,
  signToken,
} from "./service.js";

export {
  base64UrlEncode,
  buildSigningInput,
  buildTokenClaims,
  buildTokenHeader,
  isTokenFresh,
} from "./transform.js";
