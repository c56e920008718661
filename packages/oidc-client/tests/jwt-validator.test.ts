import { describe, expect, it } from "vitest";
import {
  createJwksIdentityTokenValidator,
  createMockIdentityTokenValidator,
  createMockJwt,
} from "../src/jwt-validator.ts";
import { CLIENT_ID, ISSUER, metadata } from "./helpers.ts";

describe("createMockIdentityTokenValidator", () => {
  it("should turn a valid token into claims", async () => {
    const token = await createMockJwt("test-secret", {
      iss: ISSUER,
      aud: [CLIENT_ID, "api"],
      sub: "user-1",
    });

    const result = await createMockIdentityTokenValidator("test-secret").validate(
      token,
      CLIENT_ID,
      metadata
    );

    expect(result).toEqual({
      ok: true,
      value: {
        claims: [
          { type: "iss", value: ISSUER },
          { type: "aud", value: CLIENT_ID },
          { type: "aud", value: "api" },
          { type: "sub", value: "user-1" },
        ],
        authenticationType: "jwt",
      },
    });
  });

  it("should reject a token signed with another secret", async () => {
    const token = await createMockJwt("other-secret", { sub: "user-1" });

    const result = await createMockIdentityTokenValidator("test-secret").validate(
      token,
      CLIENT_ID,
      metadata
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("invalid_token");
      expect(result.error.message).toMatch(/^identity token validation failed: /);
    }
  });

  it("should reject an expired token", async () => {
    const token = await createMockJwt("test-secret", {
      sub: "user-1",
      exp: Math.floor(Date.now() / 1000) - 60,
    });

    const result = await createMockIdentityTokenValidator("test-secret").validate(
      token,
      CLIENT_ID,
      metadata
    );

    expect(result.ok).toBe(false);
  });

  it("should reject a malformed token", async () => {
    const result = await createMockIdentityTokenValidator("test-secret").validate(
      "not-a-jwt",
      CLIENT_ID,
      metadata
    );

    expect(result.ok).toBe(false);
  });
});

describe("createJwksIdentityTokenValidator", () => {
  it("should fail without a JWKS URI", async () => {
    const result = await createJwksIdentityTokenValidator().validate("a.b.c", CLIENT_ID, {
      issuer: ISSUER,
      tokenEndpoint: metadata.tokenEndpoint,
    });

    expect(result).toEqual({
      ok: false,
      error: {
        code: "invalid_configuration",
        message: "No JWKS URI configured or advertised by the provider",
        statusCode: 500,
      },
    });
  });
});
