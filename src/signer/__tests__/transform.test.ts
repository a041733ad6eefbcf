/**
 * Signer Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import { TOKEN_REFRESH_MS } from "../schema.js";
import {
  base64UrlEncode,
  buildSigningInput,
  buildTokenClaims,
  buildTokenHeader,
  isTokenFresh,
} from "../transform.js";

const decodePart = (part: string | undefined): unknown =>
  JSON.parse(Buffer.from(part ?? "", "base64url").toString("utf8"));

describe("base64UrlEncode", () => {
  it("uses the url-safe alphabet without padding", () => {
    expect(base64UrlEncode("hi?")).toBe("aGk_");
    expect(base64UrlEncode("a")).toBe("YQ");
  });

  it("encodes bytes", () => {
    expect(base64UrlEncode(new Uint8Array([0xfb, 0xff]))).toBe("-_8");
  });
});

describe("buildTokenHeader", () => {
  it("names the algorithm and key id", () => {
    expect(buildTokenHeader("KEY1234567")).toEqual({
      alg: "ES256",
      kid: "KEY1234567",
    });
  });
});

describe("buildTokenClaims", () => {
  it("truncates the issue time to whole seconds", () => {
    expect(buildTokenClaims("TEAM123456", 1_700_000_000_999)).toEqual({
      iss: "TEAM123456",
      iat: 1_700_000_000,
    });
  });
});

describe("buildSigningInput", () => {
  it("joins the encoded header and claims with a dot", () => {
    const input = buildSigningInput(buildTokenHeader("KEY"), {
      iss: "TEAM",
      iat: 1,
    });
    const parts = input.split(".");

    expect(parts).toHaveLength(2);
    expect(decodePart(parts[0])).toEqual({ alg: "ES256", kid: "KEY" });
    expect(decodePart(parts[1])).toEqual({ iss: "TEAM", iat: 1 });
  });
});

describe("isTokenFresh", () => {
  it("accepts tokens younger than the refresh interval", () => {
    expect(isTokenFresh(0, TOKEN_REFRESH_MS - 1)).toBe(true);
  });

  it("rejects tokens at the refresh interval", () => {
    expect(isTokenFresh(0, TOKEN_REFRESH_MS)).toBe(false);
  });

  it("rejects tokens issued in the future", () => {
    expect(isTokenFresh(1_000, 999)).toBe(false);
  });
});
