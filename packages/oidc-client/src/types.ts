/**
 * @oidc-rp/oidc-client — Types
 *
 * Core type definitions for validating an OpenID Connect authorization
 * response: request/response state, token sets, claims, login results,
 * and the collaborator interfaces the pipeline is wired against.
 */

import type { RefreshTokenHandler } from "./refresh-handler.ts";

// ============================================================================
// Result & Error
// ============================================================================

/**
 * Discriminated union for all function returns.
 * Forces callers to handle errors explicitly.
 */
export type Result<T, E = OAuthError> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Standard error shape used across the package.
 */
export type OAuthError = {
  /** Machine-readable error code (e.g. "invalid_audience", "token_exchange_failed") */
  code: string;
  /** Human-readable description */
  message: string;
  /** Suggested HTTP status code */
  statusCode: number;
};

// ============================================================================
// Claims
// ============================================================================

/**
 * A single (type, value) claim. Types may repeat (e.g. multiple `aud` entries).
 */
export type Claim = {
  readonly type: string;
  readonly value: string;
};

/**
 * Immutable set of claims describing the authenticated user.
 */
export type ClaimsIdentity = {
  readonly claims: readonly Claim[];
  /** Where the identity came from (e.g. "jwt") */
  readonly authenticationType?: string;
};

// ============================================================================
// Provider Metadata
// ============================================================================

/**
 * Snapshot of the provider's discovery document.
 * Treated as trusted and immutable for the duration of one call.
 */
export type ProviderMetadata = {
  /** Issuer identifier; must match the `iss` claim exactly */
  issuer: string;
  /** Token endpoint URL */
  tokenEndpoint: string;
  /** User-info endpoint URL (required for profile loading) */
  userInfoEndpoint?: string;
  /** Authorization endpoint URL */
  authorizationEndpoint?: string;
  /** JWKS endpoint URL for signature verification */
  jwksUri?: string;
  /** RP-initiated logout endpoint */
  endSessionEndpoint?: string;
};

// ============================================================================
// Request / Response State
// ============================================================================

/**
 * State captured when the authorize request was issued. Single use.
 */
export type AuthorizeState = {
  readonly state: string;
  /** PKCE code_verifier */
  readonly codeVerifier: string;
  readonly redirectUri: string;
  readonly nonce: string;
};

/**
 * Parsed view of the raw callback payload.
 */
export type AuthorizeResponse = {
  readonly raw: string;
  readonly error?: string;
  readonly errorDescription?: string;
  readonly code?: string;
  readonly state?: string;
  /** Front-channel identity token (hybrid flow only) */
  readonly identityToken?: string;
  /** Every parameter in the payload */
  readonly values: Readonly<Record<string, string>>;
};

/**
 * Token set returned by the token endpoint after code redemption or refresh.
 */
export type TokenSet = {
  accessToken: string;
  identityToken?: string;
  refreshToken?: string;
  /** Access token lifetime in seconds */
  expiresIn?: number;
  /** Token type (typically "Bearer") */
  tokenType: string;
};

export type IdentityTokenValidationResult = Result<ClaimsIdentity>;

// ============================================================================
// Login Result
// ============================================================================

export type LoginSuccess = {
  readonly success: true;
  readonly user: ClaimsIdentity;
  readonly accessToken: string;
  /**
   * In hybrid flow, the token endpoint's identity token when it returned one.
   * That token is not validated again; only the front-channel token is.
   */
  readonly identityToken?: string;
  readonly refreshToken?: string;
  readonly accessTokenExpiration: Date;
  readonly authenticationTime: Date;
  /** Present when the provider issued a refresh token */
  readonly refreshTokenHandler?: RefreshTokenHandler;
};

export type LoginFailure = {
  readonly success: false;
  readonly error: string;
};

/**
 * Outcome of one login attempt. Exactly one of the two shapes.
 */
export type LoginResult = LoginSuccess | LoginFailure;

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Supplies the provider's discovery document.
 * Any caching is the provider's own business.
 */
export type DiscoveryProvider = {
  getProviderMetadata(): Promise<Result<ProviderMetadata>>;
};

/**
 * Client for the provider's token endpoint.
 */
export type TokenClient = {
  redeemAuthorizationCode(
    code: string,
    redirectUri: string,
    codeVerifier?: string
  ): Promise<Result<TokenSet>>;
  refreshToken(refreshToken: string): Promise<Result<TokenSet>>;
};

/**
 * Client for the provider's user-info endpoint.
 */
export type UserInfoClient = {
  fetch(accessToken: string): Promise<Result<Claim[]>>;
};

/**
 * Verifies an identity token's signature and structure.
 *
 * Audience and issuer binding are NOT the validator's job; the pipeline
 * enforces them after a successful validation.
 */
export type IdentityTokenValidator = {
  validate(
    identityToken: string,
    clientId: string,
    metadata: ProviderMetadata
  ): Promise<IdentityTokenValidationResult>;
};

/**
 * Client credentials used against the token endpoint.
 */
export type ClientCredentials = {
  clientId: string;
  /** Omit for public clients */
  clientSecret?: string;
};

export type TokenClientFactory = (
  tokenEndpoint: string,
  credentials: ClientCredentials
) => TokenClient;

export type UserInfoClientFactory = (userInfoEndpoint: string) => UserInfoClient;
