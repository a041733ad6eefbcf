/**
 * Client Module - Service Layer
 *
 * Orchestration reads like the send path: validate → serialize → sign →
 * transmit → interpret. Each step returns a Result; the first failure is
 * logged once and handed back to the caller unchanged. Nothing retries.
 */
import { type Result, err, ok } from "neverthrow";

import {
  DEFAULT_TIMEOUT_MS,
  getCertificateAuthConfig,
  getGatewayEndpoint,
  getTokenAuthConfig,
  loadConfig,
} from "../config.js";
import {
  type FailureKind,
  failureLogContext,
  invalidOptions,
  renderFailure,
  timeoutFailure,
} from "../failure/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type Notification,
  buildRequestHeaders,
  buildRequestPath,
  serializePayload,
  validateDeviceToken,
  validateOptions,
} from "../request/index.js";
import { interpretReply } from "../response/index.js";
import { type TokenSigner, loadTokenSigner } from "../signer/index.js";
import {
  type ClientCertificate,
  createHttp2Transport,
  loadClientCertificate,
} from "../transport/index.js";
import type { PushClient, PushClientOptions, SendResult } from "./schema.js";

const log = createLogger("client");

/**
 * Shorten a device token for logs. Callers without types may pass
 * anything here; validation reports it later.
 */
export function maskDeviceToken(token: unknown): string {
  if (typeof token !== "string") {
    return "(missing)";
  }
  return token.length > 8 ? `${token.slice(0, 8)}…` : token;
}

/**
 * Check a time budget before starting the race.
 */
export function validateTimeout(timeoutMs: number): Result<number, FailureKind> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return err(invalidOptions("timeoutMs: must be a positive number"));
  }
  return ok(timeoutMs);
}

/**
 * Create a client over the given transport.
 */
export function createPushClient(options: PushClientOptions): PushClient {
  const { transport, signer, defaultTopic } = options;

  const dispatch = async (
    notification: Notification,
    signal?: AbortSignal,
  ): Promise<SendResult> => {
    const deviceToken = validateDeviceToken(notification.deviceToken);
    if (deviceToken.isErr()) {
      return err(deviceToken.error);
    }

    const requestOptions = validateOptions(notification.options);
    if (requestOptions.isErr()) {
      return err(requestOptions.error);
    }

    const body = serializePayload(notification.payload);
    if (body.isErr()) {
      return err(body.error);
    }

    let authToken: string | undefined;
    if (signer) {
      const token = signer.token();
      if (token.isErr()) {
        return err(token.error);
      }
      authToken = token.value;
    }

    const reply = await transport.request({
      path: buildRequestPath(deviceToken.value),
      headers: buildRequestHeaders(
        requestOptions.value,
        defaultTopic,
        authToken,
      ),
      body: body.value,
      ...(signal !== undefined && { signal }),
    });
    if (reply.isErr()) {
      return err(reply.error);
    }

    return interpretReply(reply.value);
  };

  const observe = async (
    operation: string,
    notification: Notification,
    run: () => Promise<SendResult>,
  ): Promise<SendResult> => {
    const startTime = Date.now();
    const context = { deviceToken: maskDeviceToken(notification.deviceToken) };
    logOperationStart(log, operation, context);

    const result = await run();

    if (result.isErr()) {
      logOperationFailed(log, operation, renderFailure(result.error), {
        ...context,
        ...failureLogContext(result.error),
      });
    } else {
      logOperationComplete(log, operation, startTime, {
        ...context,
        apnsId: result.value.apnsId,
      });
    }
    return result;
  };

  const send = (notification: Notification): Promise<SendResult> =>
    observe("send", notification, () => dispatch(notification));

  const sendWithTimeout = (
    notification: Notification,
    timeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS,
  ): Promise<SendResult> =>
    observe("sendWithTimeout", notification, async () => {
      const budget = validateTimeout(timeoutMs);
      if (budget.isErr()) {
        return err(budget.error);
      }

      const controller = new AbortController();
      let timer: ReturnType<typeof setTimeout> | undefined;
      const elapsed = new Promise<SendResult>((resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve(err(timeoutFailure()));
        }, budget.value);
      });

      try {
        return await Promise.race([
          dispatch(notification, controller.signal),
          elapsed,
        ]);
      } finally {
        clearTimeout(timer);
      }
    });

  return {
    send,
    sendWithTimeout,
    close: () => transport.close(),
  };
}

/**
 * Build a client from environment configuration. Token authentication
 * is used when a signing key is configured, a client certificate
 * otherwise; with neither, or with invalid settings, the result is
 * INVALID_OPTIONS.
 */
export async function createPushClientFromConfig(
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<PushClient, FailureKind>> {
  const loaded = loadConfig(env);
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  const config = loaded.value;
  const tokenAuth = getTokenAuthConfig(config);
  const certificateAuth = getCertificateAuthConfig(config);

  let signer: TokenSigner | undefined;
  let certificate: ClientCertificate | undefined;

  if (tokenAuth) {
    const loadedSigner = await loadTokenSigner(tokenAuth);
    if (loadedSigner.isErr()) {
      return err(loadedSigner.error);
    }
    signer = loadedSigner.value;
  } else if (certificateAuth) {
    const loadedCertificate = await loadClientCertificate(
      certificateAuth.certPath,
      certificateAuth.passphrase,
    );
    if (loadedCertificate.isErr()) {
      return err(loadedCertificate.error);
    }
    certificate = loadedCertificate.value;
  } else {
    return err(
      invalidOptions(
        "credentials: set SIGNING_KEY_PATH, SIGNING_KEY_ID and SIGNING_TEAM_ID, or CLIENT_CERT_PATH",
      ),
    );
  }

  const endpoint = getGatewayEndpoint(config);
  log.info(
    { endpoint, auth: signer ? "token" : "certificate" },
    "Push client configured",
  );

  return ok(
    createPushClient({
      transport: createHttp2Transport({
        endpoint,
        ...(certificate !== undefined && { certificate }),
      }),
      ...(signer !== undefined && { signer }),
      ...(config.GATEWAY_TOPIC !== undefined && {
        defaultTopic: config.GATEWAY_TOPIC,
      }),
      defaultTimeoutMs: config.GATEWAY_TIMEOUT_MS,
    }),
  );
}
