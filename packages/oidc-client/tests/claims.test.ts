import { describe, expect, it } from "vitest";
import {
  claimsFromPayload,
  createIdentity,
  filterClaims,
  finalizeIdentity,
  findFirstClaim,
  mergeClaims,
} from "../src/claims.ts";

const primary = createIdentity(
  [
    { type: "sub", value: "1" },
    { type: "name", value: "A" },
  ],
  "jwt"
);

const userInfo = [
  { type: "name", value: "B" },
  { type: "email", value: "e@x.com" },
];

describe("claimsFromPayload", () => {
  it("should flatten arrays, stringify scalars and encode objects", () => {
    expect(
      claimsFromPayload({
        sub: "1",
        aud: ["a", "b"],
        exp: 1700000000,
        email_verified: true,
        address: { country: "NZ" },
        middle_name: null,
      })
    ).toEqual([
      { type: "sub", value: "1" },
      { type: "aud", value: "a" },
      { type: "aud", value: "b" },
      { type: "exp", value: "1700000000" },
      { type: "email_verified", value: "true" },
      { type: "address", value: '{"country":"NZ"}' },
    ]);
  });
});

describe("findFirstClaim", () => {
  it("should return the first value of a repeated claim", () => {
    const identity = createIdentity(claimsFromPayload({ aud: ["a", "b"] }));
    expect(findFirstClaim(identity, "aud")).toBe("a");
  });

  it("should return undefined when the claim is absent", () => {
    expect(findFirstClaim(primary, "email")).toBeUndefined();
  });
});

describe("mergeClaims", () => {
  it("should keep primary claims on type collision", () => {
    expect(mergeClaims(primary, userInfo)).toEqual({
      claims: [
        { type: "sub", value: "1" },
        { type: "name", value: "A" },
        { type: "email", value: "e@x.com" },
      ],
      authenticationType: "jwt",
    });
  });

  it("should add every value of a new claim type", () => {
    const merged = mergeClaims(primary, [
      { type: "role", value: "admin" },
      { type: "role", value: "user" },
    ]);
    expect(merged.claims.filter((claim) => claim.type === "role")).toHaveLength(2);
  });

  it("should not mutate the primary identity", () => {
    mergeClaims(primary, userInfo);
    expect(primary.claims).toHaveLength(2);
  });
});

describe("filterClaims", () => {
  it("should drop every claim of an excluded type", () => {
    const identity = createIdentity(claimsFromPayload({ sub: "1", aud: ["a", "b"] }));
    expect(filterClaims(identity, ["aud"]).claims).toEqual([{ type: "sub", value: "1" }]);
  });
});

describe("finalizeIdentity", () => {
  it("should filter after merging", () => {
    const result = finalizeIdentity(primary, userInfo, {
      filterClaims: true,
      filteredClaims: ["email"],
    });
    expect(result.claims).toEqual([
      { type: "sub", value: "1" },
      { type: "name", value: "A" },
    ]);
  });

  it("should skip filtering when disabled", () => {
    const result = finalizeIdentity(primary, userInfo, {
      filterClaims: false,
      filteredClaims: ["email"],
    });
    expect(result.claims.map((claim) => claim.type)).toEqual(["sub", "name", "email"]);
  });

  it("should return the primary claims when no profile was loaded", () => {
    const result = finalizeIdentity(primary, undefined, { filterClaims: true, filteredClaims: [] });
    expect(result.claims).toEqual(primary.claims);
  });
});
