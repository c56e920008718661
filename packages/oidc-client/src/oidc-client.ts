/**
 * OIDC Client
 *
 * Validates the authorization response that comes back from the browser
 * redirect and turns it into a {@link LoginResult}.
 *
 * Every check is fail-closed and runs strictly in sequence: the parsed
 * response shape, then state binding, then the flow-specific token checks,
 * then profile loading and claim filtering.
 */

import { parseAuthorizeResponse } from "./authorize-response.ts";
import { finalizeIdentity } from "./claims.ts";
import {
  type FlowStrategy,
  selectFlowStrategy,
  UNKNOWN_LOGIN_ERROR,
  type ValidatedTokens,
} from "./flows.ts";
import { noopLogger, type OidcLogger } from "./logger.ts";
import {
  type OidcClientOptions,
  type OidcClientOptionsInput,
  parseOidcClientOptions,
} from "./options.ts";
import { createRefreshTokenHandler } from "./refresh-handler.ts";
import { httpTokenClientFactory } from "./token-client.ts";
import type {
  AuthorizeState,
  Claim,
  DiscoveryProvider,
  IdentityTokenValidator,
  LoginFailure,
  LoginResult,
  ProviderMetadata,
  Result,
  TokenClientFactory,
  TokenSet,
  UserInfoClientFactory,
} from "./types.ts";
import { httpUserInfoClientFactory } from "./userinfo-client.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * Collaborators for {@link createOidcClient}.
 */
export type OidcClientDeps = {
  /** Source of the provider's discovery document */
  discovery: DiscoveryProvider;
  /** Signature/structure validation for identity tokens */
  identityTokenValidator: IdentityTokenValidator;
  /** Token endpoint client factory (default: Fetch-based) */
  createTokenClient?: TokenClientFactory;
  /** User-info endpoint client factory (default: Fetch-based) */
  createUserInfoClient?: UserInfoClientFactory;
  /** Diagnostic sink (default: silent) */
  logger?: OidcLogger;
  /** Clock used for expiration and authentication timestamps */
  now?: () => Date;
};

export type OidcClient = {
  readonly options: OidcClientOptions;
  readonly style: FlowStrategy["style"];
  /**
   * Validate a raw authorization response against the state captured when the
   * request was issued. Never throws for login failures.
   */
  validateResponse(rawResponse: string, state: AuthorizeState): Promise<LoginResult>;
  /** Fetch user-info claims for an access token */
  getUserInfo(accessToken: string): Promise<Result<Claim[]>>;
  /** Exchange a refresh token at the provider's token endpoint */
  refreshToken(refreshToken: string): Promise<Result<TokenSet>>;
};

// ============================================================================
// Factory
// ============================================================================

/**
 * Create an OIDC client.
 *
 * Throws when `options` are invalid (e.g. an unknown response style); that is
 * a configuration error, not a login failure.
 *
 * @example
 * ```ts
 * const client = createOidcClient(
 *   { clientId: "my-client", style: "hybrid" },
 *   {
 *     discovery: createDiscoveryProvider("https://id.example.com/.well-known/openid-configuration"),
 *     identityTokenValidator: createJwksIdentityTokenValidator(),
 *   }
 * );
 *
 * const result = await client.validateResponse(callbackUrl, authorizeState);
 * if (result.success) {
 *   console.log(result.user.claims);
 * } else {
 *   console.error(result.error);
 * }
 * ```
 */
export function createOidcClient(options: OidcClientOptionsInput, deps: OidcClientDeps): OidcClient {
  const config = parseOidcClientOptions(options);
  const flow = selectFlowStrategy(config.style);

  const logger = deps.logger ?? noopLogger;
  const now = deps.now ?? (() => new Date());
  const createTokenClient = deps.createTokenClient ?? httpTokenClientFactory;
  const createUserInfoClient = deps.createUserInfoClient ?? httpUserInfoClientFactory;
  const credentials = { clientId: config.clientId, clientSecret: config.clientSecret };

  const failure = (error: string): LoginFailure => {
    const message = error.trim() ? error : UNKNOWN_LOGIN_ERROR;
    logger.error(message);
    return { success: false, error: message };
  };

  const fetchUserInfo = async (
    metadata: ProviderMetadata,
    accessToken: string
  ): Promise<Result<Claim[]>> => {
    if (!metadata.userInfoEndpoint) {
      return {
        ok: false,
        error: {
          code: "userinfo_unavailable",
          message: "Provider does not advertise a user-info endpoint",
          statusCode: 400,
        },
      };
    }
    return createUserInfoClient(metadata.userInfoEndpoint).fetch(accessToken);
  };

  const processClaims = async (
    metadata: ProviderMetadata,
    validated: ValidatedTokens
  ): Promise<LoginResult> => {
    const { tokens, user } = validated;

    let userInfoClaims: Claim[] | undefined;
    if (config.loadProfile && metadata.userInfoEndpoint) {
      logger.debug("loading profile");
      const userInfo = await fetchUserInfo(metadata, tokens.accessToken);
      if (!userInfo.ok) {
        return failure(userInfo.error.message);
      }
      userInfoClaims = userInfo.value;
      logger.claims?.("profile claims:", userInfoClaims);
    } else {
      logger.debug("not loading profile");
    }

    const finalUser = finalizeIdentity(user, userInfoClaims, config);
    logger.claims?.("final claims:", finalUser.claims);

    const timestamp = now();
    const expiresInMs = (tokens.expiresIn ?? 0) * 1000;

    const refreshToken = tokens.refreshToken?.trim() ? tokens.refreshToken : undefined;
    const refreshTokenHandler = refreshToken
      ? createRefreshTokenHandler({
          tokenEndpoint: metadata.tokenEndpoint,
          ...credentials,
          refreshToken,
          accessToken: tokens.accessToken,
          createTokenClient,
        })
      : undefined;

    return {
      success: true,
      user: finalUser,
      accessToken: tokens.accessToken,
      identityToken: validated.identityToken,
      refreshToken,
      accessTokenExpiration: new Date(timestamp.getTime() + expiresInMs),
      authenticationTime: timestamp,
      refreshTokenHandler,
    };
  };

  return {
    options: config,
    style: flow.style,

    validateResponse: async (rawResponse, state) => {
      logger.debug("validating authorize response");

      const response = parseAuthorizeResponse(rawResponse);

      if (response.error) {
        return failure(response.error);
      }
      if (!response.code) {
        return failure("missing authorization code");
      }
      if (!response.state) {
        return failure("missing state");
      }
      if (response.state !== state.state) {
        return failure("invalid state");
      }

      const discovered = await deps.discovery.getProviderMetadata();
      if (!discovered.ok) {
        return failure(discovered.error.message);
      }
      const metadata = discovered.value;

      const outcome = await flow.validate(
        { code: response.code, response, state },
        {
          options: config,
          metadata,
          identityTokenValidator: deps.identityTokenValidator,
          tokenClient: createTokenClient(metadata.tokenEndpoint, credentials),
          logger,
        }
      );
      if (!outcome.ok) {
        return { success: false, error: outcome.error };
      }

      return processClaims(metadata, outcome.value);
    },

    getUserInfo: async (accessToken) => {
      const discovered = await deps.discovery.getProviderMetadata();
      if (!discovered.ok) return discovered;
      return fetchUserInfo(discovered.value, accessToken);
    },

    refreshToken: async (refreshToken) => {
      const discovered = await deps.discovery.getProviderMetadata();
      if (!discovered.ok) return discovered;
      return createTokenClient(discovered.value.tokenEndpoint, credentials).refreshToken(
        refreshToken
      );
    },
  };
}
