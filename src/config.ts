/**
 * Typed configuration - all config lives in .env, parsed with Zod.
 *
 * This is a library, so nothing here ends the host process: the
 * gateway settings are parsed when a client is built from the
 * environment, and invalid values come back as INVALID_OPTIONS. The
 * runtime and log settings fall back to their defaults when the host
 * uses values of its own (e.g. NODE_ENV=staging).
 *
 * Push gateway client configuration covering:
 * - Runtime and logging
 * - Gateway endpoint and timeout budget
 * - Provider token authentication (signing key)
 * - Client certificate authentication (PKCS#12)
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

import { type FailureKind, fromOptionIssues } from "./failure/index.js";

/**
 * Parse optional string - empty string becomes undefined.
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const RuntimeSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .catch("development")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .catch("info")
    .describe("Pino log level"),
});

/** Default time budget for a single send (ms) */
export const DEFAULT_TIMEOUT_MS = 10_000;

const ConfigSchema = RuntimeSchema.extend({

  // ==========================================================================
  // Gateway
  // ==========================================================================
  GATEWAY_ENVIRONMENT: z
    .enum(["production", "sandbox"])
    .default("sandbox")
    .describe("Which gateway host to connect to"),
  GATEWAY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TIMEOUT_MS)
    .describe("Time budget for a single send (ms)"),
  GATEWAY_TOPIC: optionalString.describe(
    "Default apns-topic (usually the app bundle id)",
  ),

  // ==========================================================================
  // Provider token authentication
  // ==========================================================================
  SIGNING_KEY_PATH: optionalString.describe("Path to the .p8 signing key"),
  SIGNING_KEY_ID: optionalString.describe("Key id (kid) of the signing key"),
  SIGNING_TEAM_ID: optionalString.describe("Team id used as token issuer"),

  // ==========================================================================
  // Client certificate authentication
  // ==========================================================================
  CLIENT_CERT_PATH: optionalString.describe("Path to a PKCS#12 certificate"),
  CLIENT_CERT_PASSPHRASE: z
    .string()
    .default("")
    .describe("Passphrase of the PKCS#12 certificate"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeSchema>;

/**
 * Runtime and log settings. Never fails: unknown values fall back.
 */
export function readRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  return RuntimeSchema.parse(env);
}

/**
 * Parse the full client configuration.
 *
 * @returns Result with the config or INVALID_OPTIONS naming each bad key
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): Result<Config, FailureKind> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    return err(fromOptionIssues(parsed.error.issues));
  }
  return ok(parsed.data);
}

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Gateway base URLs by environment.
 */
export const GATEWAY_ENDPOINTS = {
  production: "https://api.push.apple.com",
  sandbox: "https://api.sandbox.push.apple.com",
} as const;

/**
 * Resolve the configured gateway base URL.
 */
export function getGatewayEndpoint(config: Config): string {
  return GATEWAY_ENDPOINTS[config.GATEWAY_ENVIRONMENT];
}

/**
 * Provider token configuration.
 * Returns null if any of the key path, key id or team id is missing.
 */
export function getTokenAuthConfig(config: Config): Readonly<{
  keyPath: string;
  keyId: string;
  teamId: string;
}> | null {
  if (
    !config.SIGNING_KEY_PATH ||
    !config.SIGNING_KEY_ID ||
    !config.SIGNING_TEAM_ID
  ) {
    return null;
  }

  return {
    keyPath: config.SIGNING_KEY_PATH,
    keyId: config.SIGNING_KEY_ID,
    teamId: config.SIGNING_TEAM_ID,
  };
}

/**
 * Client certificate configuration.
 * Returns null if no certificate path is configured.
 */
export function getCertificateAuthConfig(config: Config): Readonly<{
  certPath: string;
  passphrase: string;
}> | null {
  if (!config.CLIENT_CERT_PATH) {
    return null;
  }

  return {
    certPath: config.CLIENT_CERT_PATH,
    passphrase: config.CLIENT_CERT_PASSPHRASE,
  };
}
