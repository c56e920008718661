/**
 * Hash Binding
 *
 * Verifies the `c_hash` / `at_hash` claims that bind an identity token to
 * the authorization code / access token issued alongside it.
 *
 * @see https://openid.net/specs/openid-connect-core-1_0.html#CodeValidation
 */

import { createHash } from "node:crypto";

/**
 * Left-most 128 bits of SHA-256 over the UTF-8 bytes of `secret`,
 * base64url-encoded without padding.
 */
export function computeTokenHash(secret: string): string {
  const digest = createHash("sha256").update(secret, "utf8").digest();
  return digest.subarray(0, digest.length / 2).toString("base64url");
}

/**
 * Check `secret` against the hash asserted in the identity token.
 *
 * A missing or empty `claimedHash` counts as satisfied: some providers omit
 * the claim. Comparison is exact string equality.
 */
export function verifyHashBinding(secret: string, claimedHash: string | undefined): boolean {
  if (!claimedHash) return true;
  return computeTokenHash(secret) === claimedHash;
}
