import { describe, expect, it } from "vitest";
import { computeTokenHash, verifyHashBinding } from "../src/hash-binding.ts";

// Values from the OpenID Connect Core examples (Appendix A.3 and A.4)
const ACCESS_TOKEN = "jHkWEdUXMU1BwAsC4vtUsZwnNvTIxEl0z9K3vx5KF0Y";
const AT_HASH = "77QmUPtjPfzWtF2AnpK9RQ";
const CODE = "Qcb0Orv1zh30vL1MPRsbm-diHiMwcLyZvn1arpZv-Jxf_11jnpEX3Tgfvk";
const C_HASH = "LDktKdoQak3Pk0cnXxCltA";

describe("computeTokenHash", () => {
  it("should hash an access token to its at_hash", () => {
    expect(computeTokenHash(ACCESS_TOKEN)).toBe(AT_HASH);
  });

  it("should hash an authorization code to its c_hash", () => {
    expect(computeTokenHash(CODE)).toBe(C_HASH);
  });

  it("should produce 22 unpadded base64url characters", () => {
    expect(computeTokenHash("any-secret")).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });
});

describe("verifyHashBinding", () => {
  it("should accept a matching hash", () => {
    expect(verifyHashBinding(CODE, C_HASH)).toBe(true);
  });

  it("should reject a hash for a different secret", () => {
    expect(verifyHashBinding(ACCESS_TOKEN, C_HASH)).toBe(false);
  });

  it("should compare exactly, without case folding", () => {
    expect(verifyHashBinding(CODE, C_HASH.toLowerCase())).toBe(false);
  });

  it("should treat an absent or empty claim as satisfied", () => {
    expect(verifyHashBinding(CODE, undefined)).toBe(true);
    expect(verifyHashBinding(CODE, "")).toBe(true);
  });
});
