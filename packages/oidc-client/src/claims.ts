/**
 * Claims
 *
 * Conversion from JSON claim sets, lookup, and the merge/filter step that
 * produces the final identity. Every operation returns a new identity;
 * inputs are never mutated.
 */

import type { Claim, ClaimsIdentity } from "./types.ts";

// ============================================================================
// Conversion & Lookup
// ============================================================================

function claimValue(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Flatten a JSON claim set (JWT payload or user-info response) into claims.
 *
 * Arrays become one claim per element, nested objects are JSON-encoded,
 * and `null` values are dropped.
 *
 * @example
 * ```ts
 * claimsFromPayload({ sub: "1", aud: ["a", "b"] });
 * // [{ type: "sub", value: "1" }, { type: "aud", value: "a" }, { type: "aud", value: "b" }]
 * ```
 */
export function claimsFromPayload(payload: Record<string, unknown>): Claim[] {
  const claims: Claim[] = [];
  for (const [type, raw] of Object.entries(payload)) {
    const values = Array.isArray(raw) ? raw : [raw];
    for (const item of values) {
      const value = claimValue(item);
      if (value !== undefined) claims.push({ type, value });
    }
  }
  return claims;
}

export function createIdentity(claims: readonly Claim[], authenticationType?: string): ClaimsIdentity {
  return authenticationType === undefined
    ? { claims: [...claims] }
    : { claims: [...claims], authenticationType };
}

/**
 * Value of the first claim of the given type, if any.
 */
export function findFirstClaim(identity: ClaimsIdentity, type: string): string | undefined {
  return identity.claims.find((claim) => claim.type === type)?.value;
}

// ============================================================================
// Merge & Filter
// ============================================================================

/**
 * Union of `primary` and `additional` keyed by claim type.
 *
 * Claim types already present in `primary` are kept as-is; only types the
 * primary identity lacks are appended (all of their values).
 */
export function mergeClaims(primary: ClaimsIdentity, additional: readonly Claim[]): ClaimsIdentity {
  const primaryTypes = new Set(primary.claims.map((claim) => claim.type));
  const added = additional.filter((claim) => !primaryTypes.has(claim.type));
  return createIdentity([...primary.claims, ...added], primary.authenticationType);
}

/**
 * Remove every claim whose type is in `excluded`.
 */
export function filterClaims(identity: ClaimsIdentity, excluded: Iterable<string>): ClaimsIdentity {
  const excludedTypes = new Set(excluded);
  return createIdentity(
    identity.claims.filter((claim) => !excludedTypes.has(claim.type)),
    identity.authenticationType
  );
}

export type ClaimFilterOptions = {
  /** Apply `filteredClaims` */
  filterClaims: boolean;
  /** Claim types removed from the final identity */
  filteredClaims: readonly string[];
};

/**
 * Build the identity exposed in a login result: merge user-info claims
 * into the primary identity, then apply the exclusion set last so it
 * covers claims from either source.
 */
export function finalizeIdentity(
  primary: ClaimsIdentity,
  userInfoClaims: readonly Claim[] | undefined,
  options: ClaimFilterOptions
): ClaimsIdentity {
  const merged = userInfoClaims ? mergeClaims(primary, userInfoClaims) : primary;
  return options.filterClaims ? filterClaims(merged, options.filteredClaims) : merged;
}
