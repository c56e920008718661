/**
 * Token Client
 *
 * {@link TokenClient} backed by the Fetch API:
 * - Redeem authorization codes (with PKCE verifier)
 * - Refresh tokens
 *
 * Never throws; transport and protocol failures come back as `Result` errors.
 */

import { z } from "zod";
import type { ClientCredentials, Result, TokenClient, TokenSet } from "./types.ts";

/**
 * Configuration for {@link createHttpTokenClient}.
 */
export type HttpTokenClientConfig = ClientCredentials & {
  /** Token endpoint URL */
  tokenEndpoint: string;
  /** Fetch implementation (default: global `fetch`) */
  fetch?: typeof fetch;
};

/**
 * Create a token client for one token endpoint.
 *
 * Requests are `POST`ed as `application/x-www-form-urlencoded`, per OAuth 2.0.
 * The client secret, when configured, is sent in the body.
 *
 * @example
 * ```ts
 * const tokens = createHttpTokenClient({
 *   tokenEndpoint: "https://id.example.com/oauth2/token",
 *   clientId: "my-client",
 * });
 * const result = await tokens.redeemAuthorizationCode(code, redirectUri, verifier);
 * if (result.ok) {
 *   // result.value.accessToken, result.value.identityToken, ...
 * }
 * ```
 */
export function createHttpTokenClient(config: HttpTokenClientConfig): TokenClient {
  const fetchImpl = config.fetch ?? fetch;

  const withCredentials = (body: URLSearchParams): URLSearchParams => {
    if (config.clientSecret) {
      body.set("client_secret", config.clientSecret);
    }
    return body;
  };

  return {
    redeemAuthorizationCode: (code, redirectUri, codeVerifier) => {
      const body = new URLSearchParams({
        grant_type: "authorization_code",
        client_id: config.clientId,
        code,
        redirect_uri: redirectUri,
      });
      if (codeVerifier) {
        body.set("code_verifier", codeVerifier);
      }
      return fetchTokenEndpoint(fetchImpl, config.tokenEndpoint, withCredentials(body));
    },

    refreshToken: (refreshToken) => {
      const body = new URLSearchParams({
        grant_type: "refresh_token",
        client_id: config.clientId,
        refresh_token: refreshToken,
      });
      return fetchTokenEndpoint(fetchImpl, config.tokenEndpoint, withCredentials(body));
    },
  };
}

/**
 * Default factory used by the client when none is injected.
 */
export function httpTokenClientFactory(
  tokenEndpoint: string,
  credentials: ClientCredentials
): TokenClient {
  return createHttpTokenClient({ tokenEndpoint, ...credentials });
}

// ============================================================================
// Internal: Token Endpoint Request
// ============================================================================

/**
 * Raw token response shape (snake_case, RFC 6749 §5.1). Unknown members are
 * dropped; `null` is read as absent.
 */
const RawTokenResponseSchema = z.object({
  access_token: z.string().nullish(),
  id_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expires_in: z.union([z.number(), z.string()]).nullish(),
  token_type: z.string().nullish(),
  error: z.string().nullish(),
  error_description: z.string().nullish(),
});

type RawTokenResponse = z.infer<typeof RawTokenResponseSchema>;

function parseExpiresIn(value: number | string | null | undefined): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const seconds = typeof value === "number" ? value : Number(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}

async function fetchTokenEndpoint(
  fetchImpl: typeof fetch,
  tokenEndpoint: string,
  body: URLSearchParams
): Promise<Result<TokenSet>> {
  let response: Response;
  try {
    response = await fetchImpl(tokenEndpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: body.toString(),
    });
  } catch (err) {
    return {
      ok: false,
      error: {
        code: "network_error",
        message: `Failed to reach token endpoint: ${err instanceof Error ? err.message : String(err)}`,
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
        code: "token_exchange_failed",
        message: `Token endpoint returned invalid JSON (HTTP ${response.status})`,
        statusCode: 502,
      },
    };
  }

  const parsed = RawTokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "body").join(", ");
    return {
      ok: false,
      error: {
        code: "token_exchange_failed",
        message: `Token endpoint response has invalid fields: ${fields} (HTTP ${response.status})`,
        statusCode: 502,
      },
    };
  }

  const data: RawTokenResponse = parsed.data;
  if (!response.ok || data.error) {
    return {
      ok: false,
      error: {
        code: data.error || "token_exchange_failed",
        message: data.error || data.error_description || `HTTP ${response.status}`,
        statusCode: response.ok ? 400 : response.status,
      },
    };
  }

  if (!data.access_token) {
    return {
      ok: false,
      error: {
        code: "token_exchange_failed",
        message: "Token endpoint response missing access_token",
        statusCode: 502,
      },
    };
  }

  return {
    ok: true,
    value: {
      accessToken: data.access_token,
      identityToken: data.id_token ?? undefined,
      refreshToken: data.refresh_token ?? undefined,
      expiresIn: parseExpiresIn(data.expires_in),
      tokenType: data.token_type ?? "Bearer",
    },
  };
}
