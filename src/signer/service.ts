/**
 * Signer Module - Service Layer
 *
 * Side effects happen here: reading the key file and signing with
 * node:crypto. Native exceptions are converted into FailureKind at
 * this boundary.
 */
import { type KeyObject, createPrivateKey, sign } from "node:crypto";
import { readFile } from "node:fs/promises";
import { type Result, err, ok } from "neverthrow";

import {
  type FailureKind,
  failureLogContext,
  fromOptionIssues,
  fromReadError,
  fromSigningError,
  renderFailure,
  signingFailure,
} from "../failure/index.js";
import { createLogger } from "../logger.js";
import type { CachedToken, SigningKeyConfig } from "./schema.js";
import { SigningKeyConfigSchema } from "./schema.js";
import {
  base64UrlEncode,
  buildSigningInput,
  buildTokenClaims,
  buildTokenHeader,
  isTokenFresh,
} from "./transform.js";

const log = createLogger("signer");

/**
 * Issues provider tokens, reusing one until it is due for refresh.
 */
export interface TokenSigner {
  readonly keyId: string;
  token(now?: number): Result<string, FailureKind>;
}

// =============================================================================
// Key Loading
// =============================================================================

/**
 * Read a PEM signing key from disk.
 *
 * @param path - Location of the .p8 key
 * @returns Result with the PEM text or READ_FAILURE
 */
export async function loadSigningKey(
  path: string,
): Promise<Result<string, FailureKind>> {
  try {
    const pem = await readFile(path, "utf8");
    log.debug({ path }, "Signing key read");
    return ok(pem);
  } catch (error) {
    const failure = fromReadError(error);
    log.error({ path, ...failureLogContext(failure) }, renderFailure(failure));
    return err(failure);
  }
}

/**
 * Parse a PEM private key and check it can produce ES256 signatures.
 */
export function parseSigningKey(pem: string): Result<KeyObject, FailureKind> {
  let key: KeyObject;
  try {
    key = createPrivateKey(pem);
  } catch (error) {
    return err(fromSigningError(error));
  }

  if (
    key.asymmetricKeyType !== "ec" ||
    key.asymmetricKeyDetails?.namedCurve !== "prime256v1"
  ) {
    return err(signingFailure("Signing key must be an EC P-256 private key"));
  }

  return ok(key);
}

// =============================================================================
// Token Signing
// =============================================================================

/**
 * Sign a fresh provider token.
 */
export function signToken(
  key: KeyObject,
  keyId: string,
  teamId: string,
  now: number,
): Result<string, FailureKind> {
  const input = buildSigningInput(
    buildTokenHeader(keyId),
    buildTokenClaims(teamId, now),
  );

  try {
    const signature = sign("sha256", Buffer.from(input), {
      key,
      dsaEncoding: "ieee-p1363",
    });
    return ok(`${input}.${base64UrlEncode(signature)}`);
  } catch (error) {
    return err(fromSigningError(error));
  }
}

/**
 * Create a signer from an in-memory key.
 *
 * @returns Result with the signer, INVALID_OPTIONS for missing ids, or
 * SIGNING_FAILURE for an unusable key
 */
export function createTokenSigner(
  rawConfig: SigningKeyConfig,
): Result<TokenSigner, FailureKind> {
  const parsed = SigningKeyConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    return err(fromOptionIssues(parsed.error.issues));
  }

  const { pem, keyId, teamId } = parsed.data;
  const keyResult = parseSigningKey(pem);
  if (keyResult.isErr()) {
    log.error(
      { keyId, ...failureLogContext(keyResult.error) },
      renderFailure(keyResult.error),
    );
    return err(keyResult.error);
  }

  const key = keyResult.value;
  let cached: CachedToken | null = null;

  return ok({
    keyId,
    token(now = Date.now()) {
      if (cached && isTokenFresh(cached.issuedAt, now)) {
        return ok(cached.token);
      }

      const signed = signToken(key, keyId, teamId, now);
      if (signed.isOk()) {
        cached = { token: signed.value, issuedAt: now };
        log.debug({ keyId, issuedAt: now }, "Provider token issued");
      }
      return signed;
    },
  });
}

/**
 * Read a key file and create a signer from it.
 */
export async function loadTokenSigner(options: {
  keyPath: string;
  keyId: string;
  teamId: string;
}): Promise<Result<TokenSigner, FailureKind>> {
  const pem = await loadSigningKey(options.keyPath);
  if (pem.isErr()) {
    return err(pem.error);
  }

  return createTokenSigner({
    pem: pem.value,
    keyId: options.keyId,
    teamId: options.teamId,
  });
}
