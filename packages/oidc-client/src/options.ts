/**
 * Client options schema and loaders
 */

import { z } from "zod";

// ============================================================================
// Schema
// ============================================================================

/**
 * Response styles the client can validate.
 * - `authorization_code`: only a code comes back on the front channel
 * - `hybrid`: `code id_token`; the identity token arrives with the code
 */
export const AuthenticationStyleSchema = z.enum(["authorization_code", "hybrid"]);

export type AuthenticationStyle = z.infer<typeof AuthenticationStyleSchema>;

/**
 * Protocol claims that say nothing about the user and are removed from the
 * final identity by default.
 */
export const DEFAULT_FILTERED_CLAIMS = [
  "iss",
  "exp",
  "nbf",
  "aud",
  "nonce",
  "iat",
  "auth_time",
  "c_hash",
  "at_hash",
] as const;

export const OidcClientOptionsSchema = z.object({
  clientId: z.string().min(1),
  /** Omit for public clients */
  clientSecret: z.string().min(1).optional(),
  style: AuthenticationStyleSchema.default("authorization_code"),
  /** Fetch user-info claims after redemption and merge them into the identity */
  loadProfile: z.boolean().default(true),
  /** Remove `filteredClaims` from the final identity */
  filterClaims: z.boolean().default(true),
  filteredClaims: z.array(z.string()).default([...DEFAULT_FILTERED_CLAIMS]),
});

/** Options as accepted by {@link createOidcClient} (defaults optional) */
export type OidcClientOptionsInput = z.input<typeof OidcClientOptionsSchema>;

/** Options after validation, all defaults applied */
export type OidcClientOptions = z.output<typeof OidcClientOptionsSchema>;

/**
 * Validate client options. Throws on invalid configuration, including an
 * unrecognised response style.
 */
export function parseOidcClientOptions(input: unknown): OidcClientOptions {
  const result = OidcClientOptionsSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid OIDC client options: ${details}`);
  }
  return result.data;
}

// ============================================================================
// Environment
// ============================================================================

const EnvFlagSchema = z.enum(["true", "false", "1", "0"]);

function parseFlag(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  const flag = EnvFlagSchema.safeParse(value.trim().toLowerCase());
  if (!flag.success) {
    throw new Error(`Invalid OIDC client options: ${name}: expected one of true, false, 1, 0`);
  }
  return flag.data === "true" || flag.data === "1";
}

/**
 * Build client options from environment variables:
 * `OIDC_CLIENT_ID`, `OIDC_CLIENT_SECRET`, `OIDC_STYLE`, `OIDC_LOAD_PROFILE`,
 * `OIDC_FILTER_CLAIMS`, `OIDC_FILTERED_CLAIMS` (comma-separated).
 * Flags take `true`/`false`/`1`/`0` in any case; anything else throws.
 */
export function loadOidcClientOptionsFromEnv(
  env: Record<string, string | undefined> = process.env
): OidcClientOptions {
  return parseOidcClientOptions({
    clientId: env.OIDC_CLIENT_ID ?? "",
    clientSecret: env.OIDC_CLIENT_SECRET || undefined,
    style: env.OIDC_STYLE || undefined,
    loadProfile: parseFlag("OIDC_LOAD_PROFILE", env.OIDC_LOAD_PROFILE),
    filterClaims: parseFlag("OIDC_FILTER_CLAIMS", env.OIDC_FILTER_CLAIMS),
    filteredClaims: env.OIDC_FILTERED_CLAIMS
      ? env.OIDC_FILTERED_CLAIMS.split(",")
          .map((claim) => claim.trim())
          .filter(Boolean)
      : undefined,
  });
}
