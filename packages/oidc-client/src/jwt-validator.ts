/**
 * Identity Token Validators
 *
 * Factory functions for {@link IdentityTokenValidator}:
 * - {@link createJwksIdentityTokenValidator} — production JWKS-based verification
 * - {@link createMockIdentityTokenValidator} — HMAC-based verification for dev/test
 * - {@link createMockJwt} — generate mock JWTs for testing
 *
 * Validators check signature, structure and token lifetime only. Audience and
 * issuer binding happen afterwards in the validation pipeline.
 */

import { createRemoteJWKSet, jwtVerify, SignJWT, type JWTPayload } from "jose";
import { claimsFromPayload, createIdentity } from "./claims.ts";
import type { IdentityTokenValidationResult, IdentityTokenValidator } from "./types.ts";

const AUTHENTICATION_TYPE = "jwt";

function identityFromPayload(payload: JWTPayload): IdentityTokenValidationResult {
  return { ok: true, value: createIdentity(claimsFromPayload(payload), AUTHENTICATION_TYPE) };
}

function validationFailure(err: unknown): IdentityTokenValidationResult {
  const message = err instanceof Error ? err.message : String(err);
  return {
    ok: false,
    error: {
      code: "invalid_token",
      message: `identity token validation failed: ${message}`,
      statusCode: 401,
    },
  };
}

// ============================================================================
// JWKS Validator (Production)
// ============================================================================

/**
 * Configuration for {@link createJwksIdentityTokenValidator}.
 */
export type JwksValidatorConfig = {
  /** JWKS endpoint URL; falls back to the discovery document's `jwks_uri` */
  jwksUri?: string;
  /** Accepted signing algorithms (default: whatever the key set allows) */
  algorithms?: string[];
  /** Clock skew tolerance in seconds (default: 0) */
  clockTolerance?: number;
};

/**
 * Create a validator that verifies identity tokens against a remote JWKS.
 *
 * Key sets are cached per JWKS URI; `jose` handles key rotation.
 *
 * @example
 * ```ts
 * const client = createOidcClient(options, {
 *   discovery,
 *   identityTokenValidator: createJwksIdentityTokenValidator({ algorithms: ["RS256"] }),
 * });
 * ```
 */
export function createJwksIdentityTokenValidator(
  config: JwksValidatorConfig = {}
): IdentityTokenValidator {
  const keySets = new Map<string, ReturnType<typeof createRemoteJWKSet>>();

  const keySetFor = (uri: string) => {
    let keySet = keySets.get(uri);
    if (!keySet) {
      keySet = createRemoteJWKSet(new URL(uri));
      keySets.set(uri, keySet);
    }
    return keySet;
  };

  return {
    validate: async (identityToken, _clientId, metadata) => {
      const uri = config.jwksUri ?? metadata.jwksUri;
      if (!uri) {
        return {
          ok: false,
          error: {
            code: "invalid_configuration",
            message: "No JWKS URI configured or advertised by the provider",
            statusCode: 500,
          },
        };
      }

      try {
        const { payload } = await jwtVerify(identityToken, keySetFor(uri), {
          algorithms: config.algorithms,
          clockTolerance: config.clockTolerance,
        });
        return identityFromPayload(payload);
      } catch (err) {
        return validationFailure(err);
      }
    },
  };
}

// ============================================================================
// Mock Validator (Dev/Test)
// ============================================================================

/**
 * Create a validator for HS256 tokens signed with a shared secret.
 * Does NOT contact any JWKS endpoint.
 */
export function createMockIdentityTokenValidator(secret: string): IdentityTokenValidator {
  const key = new TextEncoder().encode(secret);

  return {
    validate: async (identityToken) => {
      try {
        const { payload } = await jwtVerify(identityToken, key, { algorithms: ["HS256"] });
        return identityFromPayload(payload);
      } catch (err) {
        return validationFailure(err);
      }
    },
  };
}

/**
 * Create an HS256 JWT compatible with {@link createMockIdentityTokenValidator}.
 *
 * @example
 * ```ts
 * const idToken = await createMockJwt("test-secret", {
 *   iss: "https://id.example.com",
 *   aud: "my-client",
 *   sub: "user_123",
 * });
 * ```
 */
export async function createMockJwt(secret: string, payload: JWTPayload): Promise<string> {
  return new SignJWT(payload)
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .sign(new TextEncoder().encode(secret));
}
