/**
 * User-info Client
 *
 * {@link UserInfoClient} backed by the Fetch API. Sends the access token as a
 * Bearer credential and flattens the JSON response into claims.
 */

import { claimsFromPayload } from "./claims.ts";
import type { Claim, Result, UserInfoClient } from "./types.ts";

export type HttpUserInfoClientConfig = {
  userInfoEndpoint: string;
  /** Fetch implementation (default: global `fetch`) */
  fetch?: typeof fetch;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createHttpUserInfoClient(config: HttpUserInfoClientConfig): UserInfoClient {
  const fetchImpl = config.fetch ?? fetch;

  return {
    fetch: async (accessToken: string): Promise<Result<Claim[]>> => {
      let response: Response;
      try {
        response = await fetchImpl(config.userInfoEndpoint, {
          method: "GET",
          headers: {
            Authorization: `Bearer ${accessToken}`,
            Accept: "application/json",
          },
        });
      } catch (err) {
        return {
          ok: false,
          error: {
            code: "network_error",
            message: `Failed to reach user-info endpoint: ${err instanceof Error ? err.message : String(err)}`,
            statusCode: 502,
          },
        };
      }

      if (!response.ok) {
        return {
          ok: false,
          error: {
            code: "userinfo_failed",
            message: `User-info endpoint returned HTTP ${response.status}`,
            statusCode: response.status,
          },
        };
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch {
        return {
          ok: false,
          error: {
            code: "userinfo_failed",
            message: "User-info response is not valid JSON",
            statusCode: 502,
          },
        };
      }

      if (!isRecord(data)) {
        return {
          ok: false,
          error: {
            code: "userinfo_failed",
            message: "User-info response is not a JSON object",
            statusCode: 502,
          },
        };
      }

      return { ok: true, value: claimsFromPayload(data) };
    },
  };
}

export function httpUserInfoClientFactory(userInfoEndpoint: string): UserInfoClient {
  return createHttpUserInfoClient({ userInfoEndpoint });
}
