/**
 * Authorize Response
 *
 * Parses the raw redirect payload handed back by the browser. Accepts a full
 * callback URL, a `?query`, a `#fragment`, or a bare form-encoded string.
 * When a fragment is present it wins: hybrid responses use fragment encoding.
 */

import type { AuthorizeResponse } from "./types.ts";

function extractParameters(raw: string): string {
  const hashIndex = raw.indexOf("#");
  if (hashIndex >= 0) return raw.slice(hashIndex + 1);

  const queryIndex = raw.indexOf("?");
  if (queryIndex >= 0) return raw.slice(queryIndex + 1);

  return raw;
}

function nonEmpty(value: string | null): string | undefined {
  return value ? value : undefined;
}

export function parseAuthorizeResponse(raw: string): AuthorizeResponse {
  const params = new URLSearchParams(extractParameters(raw.trim()));

  const values: Record<string, string> = {};
  for (const [key, value] of params) {
    values[key] ??= value;
  }

  return {
    raw,
    error: nonEmpty(params.get("error")),
    errorDescription: nonEmpty(params.get("error_description")),
    code: nonEmpty(params.get("code")),
    state: nonEmpty(params.get("state")),
    identityToken: nonEmpty(params.get("id_token")),
    values,
  };
}
