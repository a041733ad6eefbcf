/**
 * Transport Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  buildSessionOptions,
  normalizeResponseHeaders,
} from "../transform.js";

describe("normalizeResponseHeaders", () => {
  it("stringifies the status pseudo-header", () => {
    expect(
      normalizeResponseHeaders({ ":status": 410, "apns-id": "abc" }),
    ).toEqual({ ":status": "410", "apns-id": "abc" });
  });

  it("joins repeated headers and lower-cases names", () => {
    expect(normalizeResponseHeaders({ "X-Trace": ["a", "b"] })).toEqual({
      "x-trace": "a, b",
    });
  });

  it("keeps undefined values", () => {
    expect(normalizeResponseHeaders({ "apns-id": undefined })).toEqual({
      "apns-id": undefined,
    });
  });
});

describe("buildSessionOptions", () => {
  it("is empty without a certificate", () => {
    expect(buildSessionOptions()).toEqual({});
  });

  it("passes the PKCS#12 data and passphrase", () => {
    const pfx = Buffer.from("pfx");

    expect(buildSessionOptions({ pfx, passphrase: "test-secret" })).toEqual({
      pfx,
      passphrase: "test-secret",
    });
  });

  it("adds trust anchors when given", () => {
    expect(buildSessionOptions(undefined, "ca-pem")).toEqual({ ca: "ca-pem" });
  });
});
