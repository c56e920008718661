/**
 * Test helpers: an in-process fake provider (token + user-info endpoints)
 * and identity token builders.
 */

import { vi } from "vitest";
import type { JWTPayload } from "jose";
import { createMockJwt } from "../src/jwt-validator.ts";
import type {
  AuthorizeState,
  Claim,
  ProviderMetadata,
  Result,
  TokenClient,
  TokenSet,
  UserInfoClient,
} from "../src/types.ts";

// ============================================================================
// Fixtures
// ============================================================================

export const CLIENT_ID = "my-client";
export const ISSUER = "https://id.example.com";
export const SIGNING_SECRET = "test-secret";
export const REDIRECT_URI = "https://app.example.com/callback";

export const metadata: ProviderMetadata = {
  issuer: ISSUER,
  tokenEndpoint: `${ISSUER}/oauth2/token`,
  userInfoEndpoint: `${ISSUER}/oauth2/userinfo`,
  jwksUri: `${ISSUER}/.well-known/jwks.json`,
};

export const createAuthorizeState = (overrides: Partial<AuthorizeState> = {}): AuthorizeState => ({
  state: "state-123",
  codeVerifier: "verifier-123",
  redirectUri: REDIRECT_URI,
  nonce: "nonce-123",
  ...overrides,
});

/**
 * Sign an identity token for `my-client` issued by the fake provider.
 * Fields in `claims` are added after the defaults and may override them.
 */
export const createIdToken = (claims: JWTPayload = {}): Promise<string> => {
  const now = Math.floor(Date.now() / 1000);
  return createMockJwt(SIGNING_SECRET, {
    iss: ISSUER,
    aud: CLIENT_ID,
    sub: "user-1",
    iat: now,
    exp: now + 3600,
    ...claims,
  });
};

const invalidGrant = (message: string): Result<TokenSet> => ({
  ok: false,
  error: { code: "invalid_grant", message, statusCode: 400 },
});

// ============================================================================
// Fake Provider
// ============================================================================

/**
 * Token and user-info endpoints kept in memory. Codes and refresh tokens are
 * single use, as a real provider would enforce.
 */
export const createFakeProvider = () => {
  const codes = new Map<string, { tokens: TokenSet; codeVerifier: string }>();
  const refreshGrants = new Map<string, TokenSet>();
  const userInfo = new Map<string, Result<Claim[]>>();

  const redeemAuthorizationCode = vi.fn(
    async (code: string, redirectUri: string, codeVerifier?: string): Promise<Result<TokenSet>> => {
      const grant = codes.get(code);
      if (!grant) return invalidGrant("invalid_grant");
      codes.delete(code);
      if (redirectUri !== REDIRECT_URI || codeVerifier !== grant.codeVerifier) {
        return invalidGrant("invalid_grant");
      }
      return { ok: true, value: grant.tokens };
    }
  );

  const refreshToken = vi.fn(async (token: string): Promise<Result<TokenSet>> => {
    const tokens = refreshGrants.get(token);
    if (!tokens) return invalidGrant("invalid_grant");
    refreshGrants.delete(token);
    return { ok: true, value: tokens };
  });

  const tokenClient: TokenClient = { redeemAuthorizationCode, refreshToken };
  const createTokenClient = vi.fn((_tokenEndpoint: string) => tokenClient);

  const fetchUserInfo = vi.fn(async (accessToken: string): Promise<Result<Claim[]>> => {
    return (
      userInfo.get(accessToken) ?? {
        ok: false,
        error: { code: "userinfo_failed", message: "User-info endpoint returned HTTP 401", statusCode: 401 },
      }
    );
  });
  const userInfoClient: UserInfoClient = { fetch: fetchUserInfo };
  const createUserInfoClient = vi.fn((_userInfoEndpoint: string) => userInfoClient);

  return {
    /** Register a code the token endpoint will redeem exactly once */
    issueCode: (code: string, tokens: TokenSet, codeVerifier = "verifier-123") => {
      codes.set(code, { tokens, codeVerifier });
    },
    /** Register a refresh token the token endpoint will exchange exactly once */
    issueRefreshGrant: (token: string, tokens: TokenSet) => {
      refreshGrants.set(token, tokens);
    },
    setUserInfo: (accessToken: string, claims: Claim[]) => {
      userInfo.set(accessToken, { ok: true, value: claims });
    },
    redeemAuthorizationCode,
    refreshToken,
    createTokenClient,
    fetchUserInfo,
    createUserInfoClient,
  };
};

export type FakeProvider = ReturnType<typeof createFakeProvider>;
