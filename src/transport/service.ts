/**
 * Transport Module - Service Layer
 *
 * HTTP/2 over TLS to the gateway. One session is shared by all sends
 * and reopened on the next request once it has closed.
 */
import { readFile } from "node:fs/promises";
import { type ClientHttp2Session, connect, constants } from "node:http2";
import { type Result, err, ok } from "neverthrow";

import {
  type FailureKind,
  failureLogContext,
  fromConnectionError,
  fromReadError,
  fromTlsError,
  fromTransportError,
  renderFailure,
  serializeFailure,
} from "../failure/index.js";
import { createLogger } from "../logger.js";
import {
  type ClientCertificate,
  type GatewayReply,
  type GatewayRequest,
  type GatewayTransport,
  type Http2TransportOptions,
  MAX_REPLY_BYTES,
} from "./schema.js";
import { buildSessionOptions, normalizeResponseHeaders } from "./transform.js";

const log = createLogger("transport");

/**
 * Read a PKCS#12 client certificate from disk.
 *
 * @returns Result with the certificate or READ_FAILURE
 */
export async function loadClientCertificate(
  path: string,
  passphrase: string,
): Promise<Result<ClientCertificate, FailureKind>> {
  try {
    const pfx = await readFile(path);
    return ok({ pfx, passphrase });
  } catch (error) {
    const failure = fromReadError(error);
    log.error({ path, ...failureLogContext(failure) }, renderFailure(failure));
    return err(failure);
  }
}

/**
 * Create the HTTP/2 transport.
 */
export function createHttp2Transport(
  options: Http2TransportOptions,
): GatewayTransport {
  let session: ClientHttp2Session | null = null;

  const openSession = (): Result<ClientHttp2Session, FailureKind> => {
    if (session && !session.closed && !session.destroyed) {
      return ok(session);
    }

    let opened: ClientHttp2Session;
    try {
      // A bad PKCS#12 file or passphrase throws here, before any socket
      opened = connect(
        options.endpoint,
        buildSessionOptions(options.certificate, options.ca),
      );
    } catch (error) {
      return err(fromTlsError(error));
    }

    opened.on("connect", () => {
      log.info({ endpoint: options.endpoint }, "Gateway session established");
    });
    // Streams receive the same error; this listener keeps it from going unhandled
    opened.on("error", (error: Error) => {
      const failure = fromTransportError(error);
      log.warn(
        { endpoint: options.endpoint, ...failureLogContext(failure) },
        `Gateway session error: ${renderFailure(failure)}`,
      );
    });
    opened.on("close", () => {
      if (session === opened) {
        session = null;
      }
      log.debug({ endpoint: options.endpoint }, "Gateway session closed");
    });

    session = opened;
    return ok(opened);
  };

  const request = (
    gatewayRequest: GatewayRequest,
  ): Promise<Result<GatewayReply, FailureKind>> => {
    const opened = openSession();
    if (opened.isErr()) {
      return Promise.resolve(err(opened.error));
    }

    return new Promise((resolve) => {
      let settled = false;
      const settle = (result: Result<GatewayReply, FailureKind>): void => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };

      let status: number | undefined;
      let headers: Record<string, string | undefined> = {};
      const chunks: Buffer[] = [];
      let received = 0;

      try {
        const stream = opened.value.request(
          {
            ":method": "POST",
            ":path": gatewayRequest.path,
            ...gatewayRequest.headers,
          },
          gatewayRequest.signal ? { signal: gatewayRequest.signal } : {},
        );

        stream.on("response", (responseHeaders) => {
          status = Number(responseHeaders[":status"]);
          headers = normalizeResponseHeaders(responseHeaders);
        });
        stream.on("data", (chunk: Buffer) => {
          received += chunk.length;
          if (received > MAX_REPLY_BYTES) {
            log.warn(
              { path: gatewayRequest.path, received },
              "Gateway reply exceeds size limit",
            );
            settle(err(serializeFailure()));
            stream.close(constants.NGHTTP2_CANCEL);
            return;
          }
          chunks.push(chunk);
        });
        stream.on("end", () => {
          // No :status means the gateway never answered
          if (status === undefined) {
            settle(err(fromConnectionError(stream.rstCode)));
            return;
          }
          const body = Buffer.concat(chunks).toString("utf8");
          settle(ok({ status, headers, body }));
        });
        stream.on("error", (error: Error) => {
          settle(err(fromTransportError(error)));
        });
        // Settles a stream that was reset before it ended
        stream.on("close", () => {
          settle(err(fromConnectionError(stream.rstCode)));
        });
        stream.end(gatewayRequest.body);
      } catch (error) {
        settle(err(fromTransportError(error)));
      }
    });
  };

  const close = (): Promise<void> =>
    new Promise((resolve) => {
      const current = session;
      session = null;
      if (!current || current.closed || current.destroyed) {
        resolve();
        return;
      }
      current.close(() => resolve());
    });

  return { request, close };
}
