/**
 * Response Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import { interpretReply, parseReasonBody } from "../transform.js";

const APNS_ID = "EC1BF194-B3B2-424A-8D2B-6E7A8B2D3F4C";

describe("parseReasonBody", () => {
  it("has no reason for an empty body", () => {
    expect(parseReasonBody("")._unsafeUnwrap()).toBeUndefined();
    expect(parseReasonBody("  \n")._unsafeUnwrap()).toBeUndefined();
  });

  it("parses the reason and timestamp", () => {
    expect(
      parseReasonBody(
        '{"reason":"Unregistered","timestamp":1700000000000}',
      )._unsafeUnwrap(),
    ).toEqual({ reason: "Unregistered", timestamp: 1_700_000_000_000 });
  });

  it("keeps reasons it does not know", () => {
    expect(parseReasonBody('{"reason":"BrandNew"}')._unsafeUnwrap()).toEqual({
      reason: "BrandNew",
    });
  });

  it("returns SERIALIZE_FAILURE for invalid JSON", () => {
    expect(parseReasonBody("<html>")._unsafeUnwrapErr()).toEqual({
      type: "SERIALIZE_FAILURE",
    });
  });

  it("returns SERIALIZE_FAILURE for a body without a reason", () => {
    expect(parseReasonBody('{"status":"bad"}')._unsafeUnwrapErr()).toEqual({
      type: "SERIALIZE_FAILURE",
    });
  });
});

describe("interpretReply", () => {
  it("treats 200 as delivered", () => {
    const result = interpretReply({
      status: 200,
      headers: { "apns-id": APNS_ID },
      body: "",
    });

    expect(result._unsafeUnwrap()).toEqual({ code: 200, apnsId: APNS_ID });
  });

  it("omits the apns-id when the gateway sends none", () => {
    expect(
      interpretReply({ status: 200, headers: {}, body: "" })._unsafeUnwrap(),
    ).toEqual({ code: 200 });
  });

  it("turns a 410 into a rejection with timestamp", () => {
    const result = interpretReply({
      status: 410,
      headers: { "apns-id": APNS_ID },
      body: '{"reason":"Unregistered","timestamp":1700000000000}',
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "REMOTE_REJECTION",
      response: {
        code: 410,
        apnsId: APNS_ID,
        error: { reason: "Unregistered", timestamp: 1_700_000_000_000 },
      },
    });
  });

  it("rejects without a reason when the body is empty", () => {
    expect(
      interpretReply({ status: 503, headers: {}, body: "" })._unsafeUnwrapErr(),
    ).toEqual({ type: "REMOTE_REJECTION", response: { code: 503 } });
  });

  it("returns SERIALIZE_FAILURE for a malformed rejection body", () => {
    expect(
      interpretReply({
        status: 400,
        headers: {},
        body: "not json",
      })._unsafeUnwrapErr(),
    ).toEqual({ type: "SERIALIZE_FAILURE" });
  });
});
