/**
 * Identity Token Validation
 *
 * Runs the injected {@link IdentityTokenValidator} (signature/structure),
 * then binds the token to this client and provider: `aud` must equal the
 * client id and `iss` must equal the discovery issuer, both exactly.
 */

import { findFirstClaim } from "./claims.ts";
import type { OidcLogger } from "./logger.ts";
import type {
  IdentityTokenValidationResult,
  IdentityTokenValidator,
  ProviderMetadata,
} from "./types.ts";

export const DEFAULT_VALIDATION_ERROR = "identity token validation error";

export async function validateIdentityToken(
  identityToken: string,
  clientId: string,
  metadata: ProviderMetadata,
  validator: IdentityTokenValidator,
  logger: OidcLogger
): Promise<IdentityTokenValidationResult> {
  logger.debug("validating identity token");

  const result = await validator.validate(identityToken, clientId, metadata);
  if (!result.ok) {
    return {
      ok: false,
      error: { ...result.error, message: result.error.message || DEFAULT_VALIDATION_ERROR },
    };
  }

  const user = result.value;
  logger.claims?.("identity token claims:", user.claims);

  const audience = findFirstClaim(user, "aud") ?? "";
  if (audience !== clientId) {
    logger.error(`client id (${clientId}) does not match audience (${audience})`);
    return {
      ok: false,
      error: { code: "invalid_audience", message: "invalid audience", statusCode: 401 },
    };
  }

  const issuer = findFirstClaim(user, "iss") ?? "";
  if (issuer !== metadata.issuer) {
    logger.error(`configured issuer (${metadata.issuer}) does not match token issuer (${issuer})`);
    return {
      ok: false,
      error: { code: "invalid_issuer", message: "invalid issuer", statusCode: 401 },
    };
  }

  return result;
}
