/**
 * @oidc-rp/oidc-client
 *
 * OpenID Connect relying-party response validation. Takes the raw redirect
 * payload and the state captured at request time, and decides whether the
 * user is authenticated:
 *
 * 1. **Response binding** — upstream errors, code/state presence, state match
 * 2. **Token validation** — signature (injected), audience, issuer, nonce,
 *    `c_hash` / `at_hash`, in the order the response style requires
 * 3. **Identity** — user-info merge, claim filtering, refresh capability
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================

export type {
  AuthorizeResponse,
  AuthorizeState,
  Claim,
  ClaimsIdentity,
  ClientCredentials,
  DiscoveryProvider,
  IdentityTokenValidationResult,
  IdentityTokenValidator,
  LoginFailure,
  LoginResult,
  LoginSuccess,
  OAuthError,
  ProviderMetadata,
  Result,
  TokenClient,
  TokenClientFactory,
  TokenSet,
  UserInfoClient,
  UserInfoClientFactory,
} from "./types.ts";

// ============================================================================
// Client
// ============================================================================

export { createOidcClient, type OidcClient, type OidcClientDeps } from "./oidc-client.ts";

export {
  type AuthenticationStyle,
  AuthenticationStyleSchema,
  DEFAULT_FILTERED_CLAIMS,
  loadOidcClientOptionsFromEnv,
  type OidcClientOptions,
  type OidcClientOptionsInput,
  OidcClientOptionsSchema,
  parseOidcClientOptions,
} from "./options.ts";

export {
  codeFlow,
  type FlowStrategy,
  hybridFlow,
  selectFlowStrategy,
  UNKNOWN_LOGIN_ERROR,
} from "./flows.ts";

// ============================================================================
// Validation Steps
// ============================================================================

export { parseAuthorizeResponse } from "./authorize-response.ts";
export {
  type ClaimFilterOptions,
  claimsFromPayload,
  filterClaims,
  finalizeIdentity,
  findFirstClaim,
  mergeClaims,
} from "./claims.ts";
export { computeTokenHash, verifyHashBinding } from "./hash-binding.ts";
export { validateIdentityToken } from "./id-token-validation.ts";
export { verifyNonce } from "./nonce.ts";

// ============================================================================
// Collaborators
// ============================================================================

export {
  createDiscoveryProvider,
  createStaticDiscoveryProvider,
  discoverProviderMetadata,
} from "./discovery.ts";
export {
  createJwksIdentityTokenValidator,
  createMockIdentityTokenValidator,
  createMockJwt,
  type JwksValidatorConfig,
} from "./jwt-validator.ts";
export { createHttpTokenClient, type HttpTokenClientConfig } from "./token-client.ts";
export { createHttpUserInfoClient, type HttpUserInfoClientConfig } from "./userinfo-client.ts";
export {
  createRefreshTokenHandler,
  type RefreshTokenHandler,
  type RefreshTokenHandlerConfig,
} from "./refresh-handler.ts";

// ============================================================================
// Logging
// ============================================================================

export { type ConsoleLoggerOptions, createConsoleLogger, noopLogger, type OidcLogger } from "./logger.ts";
