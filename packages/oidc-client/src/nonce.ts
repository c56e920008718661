/**
 * Compare the session nonce with the token's `nonce` claim.
 * A missing claim is treated as the empty string.
 */
export function verifyNonce(sessionNonce: string, tokenNonce: string | undefined): boolean {
  return sessionNonce === (tokenNonce ?? "");
}
