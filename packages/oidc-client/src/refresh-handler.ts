/**
 * Refresh Token Handler
 *
 * Capability handed out with a successful login when the provider issued a
 * refresh token. Holds the token endpoint, client credentials and the current
 * token pair so tokens can be renewed without running the login flow again.
 */

import { httpTokenClientFactory } from "./token-client.ts";
import type { Result, TokenClientFactory, TokenSet } from "./types.ts";

export type RefreshTokenHandlerConfig = {
  tokenEndpoint: string;
  clientId: string;
  clientSecret?: string;
  refreshToken: string;
  accessToken: string;
  /** Token client factory (default: Fetch-based client) */
  createTokenClient?: TokenClientFactory;
};

export type RefreshTokenHandler = {
  readonly tokenEndpoint: string;
  readonly clientId: string;
  /** Current refresh token (updated when the provider rotates it) */
  readonly refreshToken: string;
  /** Current access token */
  readonly accessToken: string;
  /**
   * Exchange the current refresh token for a new token set.
   * On success the handler's token pair is updated.
   */
  refresh(): Promise<Result<TokenSet>>;
};

export function createRefreshTokenHandler(config: RefreshTokenHandlerConfig): RefreshTokenHandler {
  const createTokenClient = config.createTokenClient ?? httpTokenClientFactory;
  const tokenClient = createTokenClient(config.tokenEndpoint, {
    clientId: config.clientId,
    clientSecret: config.clientSecret,
  });

  let refreshToken = config.refreshToken;
  let accessToken = config.accessToken;

  return {
    tokenEndpoint: config.tokenEndpoint,
    clientId: config.clientId,
    get refreshToken() {
      return refreshToken;
    },
    get accessToken() {
      return accessToken;
    },
    refresh: async () => {
      const result = await tokenClient.refreshToken(refreshToken);
      if (result.ok) {
        accessToken = result.value.accessToken;
        if (result.value.refreshToken) {
          refreshToken = result.value.refreshToken;
        }
      }
      return result;
    },
  };
}
