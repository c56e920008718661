/**
 * OIDC Discovery
 *
 * Fetches and parses the OpenID Connect Discovery document into
 * {@link ProviderMetadata}. No caching happens here; wrap the provider if
 * the document should be shared across login attempts.
 *
 * @see https://openid.net/specs/openid-connect-discovery-1_0.html
 */

import { z } from "zod";
import type { DiscoveryProvider, ProviderMetadata, Result } from "./types.ts";

/**
 * Expected shape of the OIDC Discovery document.
 * Only the fields we need are listed.
 */
const OidcDiscoveryDocumentSchema = z.object({
  issuer: z.string().nullish(),
  authorization_endpoint: z.string().nullish(),
  token_endpoint: z.string().nullish(),
  userinfo_endpoint: z.string().nullish(),
  jwks_uri: z.string().nullish(),
  end_session_endpoint: z.string().nullish(),
});

/**
 * Fetch provider metadata from an OIDC Discovery URL.
 *
 * @param discoveryUrl - Full URL to the discovery document
 *   (typically ending in `/.well-known/openid-configuration`)
 * @param fetchImpl - Fetch implementation (default: global `fetch`)
 *
 * @example
 * ```ts
 * const result = await discoverProviderMetadata(
 *   "https://id.example.com/.well-known/openid-configuration"
 * );
 * if (result.ok) {
 *   console.log(result.value.tokenEndpoint);
 * }
 * ```
 */
export async function discoverProviderMetadata(
  discoveryUrl: string,
  fetchImpl: typeof fetch = fetch
): Promise<Result<ProviderMetadata>> {
  let response: Response;
  try {
    response = await fetchImpl(discoveryUrl);
  } catch (err) {
    return {
      ok: false,
      error: {
        code: "discovery_failed",
        message: `Failed to fetch discovery document: ${err instanceof Error ? err.message : String(err)}`,
        statusCode: 502,
      },
    };
  }

  if (!response.ok) {
    return {
      ok: false,
      error: {
        code: "discovery_failed",
        message: `Discovery endpoint returned HTTP ${response.status}`,
        statusCode: 502,
      },
    };
  }

  let json: unknown;
  try {
    json = (await response.json()) ?? {};
  } catch {
    return {
      ok: false,
      error: {
        code: "discovery_failed",
        message: "Discovery document is not valid JSON",
        statusCode: 502,
      },
    };
  }

  const parsed = OidcDiscoveryDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "document").join(", ");
    return {
      ok: false,
      error: {
        code: "discovery_failed",
        message: `Discovery document has invalid fields: ${fields}`,
        statusCode: 502,
      },
    };
  }

  const doc = parsed.data;
  const { issuer, token_endpoint: tokenEndpoint } = doc;
  if (!issuer || !tokenEndpoint) {
    const missing: string[] = [];
    if (!issuer) missing.push("issuer");
    if (!tokenEndpoint) missing.push("token_endpoint");
    return {
      ok: false,
      error: {
        code: "discovery_failed",
        message: `Discovery document missing required fields: ${missing.join(", ")}`,
        statusCode: 502,
      },
    };
  }

  return {
    ok: true,
    value: {
      issuer,
      tokenEndpoint,
      userInfoEndpoint: doc.userinfo_endpoint ?? undefined,
      authorizationEndpoint: doc.authorization_endpoint ?? undefined,
      jwksUri: doc.jwks_uri ?? undefined,
      endSessionEndpoint: doc.end_session_endpoint ?? undefined,
    },
  };
}

/**
 * Discovery provider that fetches the document on every call.
 */
export function createDiscoveryProvider(
  discoveryUrl: string,
  fetchImpl?: typeof fetch
): DiscoveryProvider {
  return {
    getProviderMetadata: () => discoverProviderMetadata(discoveryUrl, fetchImpl),
  };
}

/**
 * Discovery provider for metadata that is configured by hand or already fetched.
 */
export function createStaticDiscoveryProvider(metadata: ProviderMetadata): DiscoveryProvider {
  const snapshot = Object.freeze({ ...metadata });
  return {
    getProviderMetadata: async () => ({ ok: true, value: snapshot }),
  };
}
