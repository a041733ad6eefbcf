/**
 * Request Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  buildRequestHeaders,
  buildRequestPath,
  serializePayload,
  validateDeviceToken,
  validateOptions,
} from "../transform.js";

const DEVICE_TOKEN = "a".repeat(64);

describe("validateOptions", () => {
  it("treats missing options as empty", () => {
    expect(validateOptions(undefined)._unsafeUnwrap()).toEqual({});
  });

  it("accepts a complete option set", () => {
    const options = {
      apnsId: "123e4567-e89b-12d3-a456-426614174000",
      expiration: 0,
      priority: 10,
      topic: "com.example.app",
      collapseId: "score-update",
      pushType: "alert",
    };

    expect(validateOptions(options)._unsafeUnwrap()).toEqual(options);
  });

  it("rejects an unsupported priority", () => {
    expect(validateOptions({ priority: 7 })._unsafeUnwrapErr()).toEqual({
      type: "INVALID_OPTIONS",
      message: "priority: priority must be 1, 5 or 10",
    });
  });

  it("rejects an apnsId that is not a UUID", () => {
    expect(validateOptions({ apnsId: "42" })._unsafeUnwrapErr()).toEqual({
      type: "INVALID_OPTIONS",
      message: "apnsId: apnsId must be a UUID",
    });
  });

  it("measures the collapse id in bytes", () => {
    const result = validateOptions({ collapseId: "é".repeat(33) });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_OPTIONS",
      message: "collapseId: collapseId must be at most 64 bytes",
    });
  });

  it("accepts a collapse id of exactly 64 bytes", () => {
    expect(validateOptions({ collapseId: "x".repeat(64) }).isOk()).toBe(true);
  });

  it("rejects a negative expiration", () => {
    expect(validateOptions({ expiration: -1 })._unsafeUnwrapErr()).toEqual({
      type: "INVALID_OPTIONS",
      message: "expiration: expiration must not be negative",
    });
  });

  it("rejects unknown push types", () => {
    const failure = validateOptions({ pushType: "banner" })._unsafeUnwrapErr();

    expect(failure.type).toBe("INVALID_OPTIONS");
    if (failure.type === "INVALID_OPTIONS") {
      expect(failure.message.startsWith("pushType: Invalid enum value")).toBe(
        true,
      );
    }
  });

  it("rejects unknown option keys", () => {
    expect(validateOptions({ sound: "ping" })._unsafeUnwrapErr()).toEqual({
      type: "INVALID_OPTIONS",
      message: "(root): Unrecognized key(s) in object: 'sound'",
    });
  });

  it("reports every failing option", () => {
    const failure = validateOptions({
      priority: 3,
      topic: "",
    })._unsafeUnwrapErr();

    expect(failure).toEqual({
      type: "INVALID_OPTIONS",
      message:
        "priority: priority must be 1, 5 or 10; topic: topic must not be empty",
    });
  });
});

describe("validateDeviceToken", () => {
  it("accepts hex tokens", () => {
    expect(validateDeviceToken(DEVICE_TOKEN)._unsafeUnwrap()).toBe(
      DEVICE_TOKEN,
    );
  });

  it("reports short tokens under deviceToken", () => {
    expect(validateDeviceToken("abc")._unsafeUnwrapErr()).toEqual({
      type: "INVALID_OPTIONS",
      message: "deviceToken: must be 64 to 200 hex characters",
    });
  });

  it("rejects non-hex characters", () => {
    expect(validateDeviceToken("z".repeat(64)).isErr()).toBe(true);
  });

  it("rejects non-strings", () => {
    expect(validateDeviceToken(42)._unsafeUnwrapErr()).toEqual({
      type: "INVALID_OPTIONS",
      message: "deviceToken: Expected string, received number",
    });
  });
});

describe("serializePayload", () => {
  it("encodes the payload as JSON", () => {
    expect(
      serializePayload({ aps: { alert: "Hello" }, badge: 1 })._unsafeUnwrap(),
    ).toBe('{"aps":{"alert":"Hello"},"badge":1}');
  });

  it("returns SERIALIZE_FAILURE for BigInt values", () => {
    expect(serializePayload({ count: 10n })._unsafeUnwrapErr()).toEqual({
      type: "SERIALIZE_FAILURE",
    });
  });

  it("returns SERIALIZE_FAILURE for cycles", () => {
    const payload: Record<string, unknown> = {};
    payload.self = payload;

    expect(serializePayload(payload)._unsafeUnwrapErr()).toEqual({
      type: "SERIALIZE_FAILURE",
    });
  });
});

describe("buildRequestPath", () => {
  it("targets the device endpoint", () => {
    expect(buildRequestPath(DEVICE_TOKEN)).toBe(`/3/device/${DEVICE_TOKEN}`);
  });
});

describe("buildRequestHeaders", () => {
  it("maps every option onto its header", () => {
    const headers = buildRequestHeaders(
      {
        apnsId: "123e4567-e89b-12d3-a456-426614174000",
        expiration: 1_700_000_000,
        priority: 5,
        topic: "com.example.app",
        collapseId: "c1",
        pushType: "background",
      },
      undefined,
      "header.claims.sig",
    );

    expect(headers).toEqual({
      "content-type": "application/json",
      "apns-id": "123e4567-e89b-12d3-a456-426614174000",
      "apns-expiration": "1700000000",
      "apns-priority": "5",
      "apns-topic": "com.example.app",
      "apns-collapse-id": "c1",
      "apns-push-type": "background",
      authorization: "bearer header.claims.sig",
    });
  });

  it("falls back to the default topic", () => {
    expect(buildRequestHeaders({}, "com.example.default")).toEqual({
      "content-type": "application/json",
      "apns-topic": "com.example.default",
    });
  });

  it("prefers the option topic over the default", () => {
    const headers = buildRequestHeaders(
      { topic: "com.example.voip" },
      "com.example.default",
    );

    expect(headers["apns-topic"]).toBe("com.example.voip");
  });

  it("omits headers for missing options", () => {
    expect(buildRequestHeaders({})).toEqual({
      "content-type": "application/json",
    });
  });
});
