/**
 * Flow Strategies
 *
 * The two response styles validate the same artifacts in a different order:
 *
 * - Authorization code: the code is the only front-channel artifact. Redeem it,
 *   validate the identity token that comes back, then bind the access token
 *   through `at_hash`.
 * - Hybrid: the identity token arrives unauthenticated on the front channel.
 *   Validate it, check the nonce, bind the code through `c_hash`, and only then
 *   redeem the code.
 *
 * A strategy is selected once per client from its configured style.
 */

import { findFirstClaim } from "./claims.ts";
import { verifyHashBinding } from "./hash-binding.ts";
import { validateIdentityToken } from "./id-token-validation.ts";
import type { OidcLogger } from "./logger.ts";
import { verifyNonce } from "./nonce.ts";
import type { AuthenticationStyle, OidcClientOptions } from "./options.ts";
import type {
  AuthorizeResponse,
  AuthorizeState,
  ClaimsIdentity,
  IdentityTokenValidator,
  ProviderMetadata,
  Result,
  TokenClient,
  TokenSet,
} from "./types.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * Everything one validation pass needs. Built per call; nothing is shared
 * between login attempts.
 */
export type FlowContext = {
  options: OidcClientOptions;
  metadata: ProviderMetadata;
  identityTokenValidator: IdentityTokenValidator;
  tokenClient: TokenClient;
  logger: OidcLogger;
};

/**
 * Front-channel input, after the shape and state checks passed.
 */
export type FlowInput = {
  code: string;
  response: AuthorizeResponse;
  state: AuthorizeState;
};

/**
 * Tokens and the validated (unmerged, unfiltered) identity.
 */
export type ValidatedTokens = {
  tokens: TokenSet;
  user: ClaimsIdentity;
  identityToken: string;
};

/** Failures carry the login error string, never empty. */
export type FlowOutcome = Result<ValidatedTokens, string>;

/** Reported when a failing step gives no message of its own. */
export const UNKNOWN_LOGIN_ERROR = "login failed";

type FlowValidator = (input: FlowInput, context: FlowContext) => Promise<FlowOutcome>;

export type CodeFlowStrategy = {
  readonly style: "authorization_code";
  readonly validate: FlowValidator;
};

export type HybridFlowStrategy = {
  readonly style: "hybrid";
  readonly validate: FlowValidator;
};

export type FlowStrategy = CodeFlowStrategy | HybridFlowStrategy;

// ============================================================================
// Shared Steps
// ============================================================================

function fail(logger: OidcLogger, error: string): FlowOutcome {
  const message = error.trim() ? error : UNKNOWN_LOGIN_ERROR;
  logger.error(message);
  return { ok: false, error: message };
}

/**
 * Redeem the code; a failure carries the token endpoint's message, or
 * "token endpoint error" when it has none.
 */
async function redeemCode(
  code: string,
  state: AuthorizeState,
  context: FlowContext
): Promise<Result<TokenSet, string>> {
  context.logger.debug("redeeming authorization code");
  const redeemed = await context.tokenClient.redeemAuthorizationCode(
    code,
    state.redirectUri,
    state.codeVerifier
  );
  if (!redeemed.ok) {
    const { message } = redeemed.error;
    return { ok: false, error: message.trim() ? message : "token endpoint error" };
  }
  return redeemed;
}

// ============================================================================
// Authorization Code Flow
// ============================================================================

export const codeFlow: CodeFlowStrategy = {
  style: "authorization_code",
  validate: async ({ code, state }, context) => {
    const { logger } = context;
    logger.debug("validating code flow response");

    const redeemed = await redeemCode(code, state, context);
    if (!redeemed.ok) {
      return fail(logger, redeemed.error);
    }

    const tokens = redeemed.value;
    if (!tokens.identityToken) {
      return fail(logger, "missing identity token");
    }

    const validation = await validateIdentityToken(
      tokens.identityToken,
      context.options.clientId,
      context.metadata,
      context.identityTokenValidator,
      logger
    );
    if (!validation.ok) {
      return fail(logger, validation.error.message);
    }

    const user = validation.value;
    logger.debug("validating access token hash");
    if (!verifyHashBinding(tokens.accessToken, findFirstClaim(user, "at_hash"))) {
      return fail(logger, "invalid access token hash");
    }

    return { ok: true, value: { tokens, user, identityToken: tokens.identityToken } };
  },
};

// ============================================================================
// Hybrid Flow
// ============================================================================

export const hybridFlow: HybridFlowStrategy = {
  style: "hybrid",
  validate: async ({ code, response, state }, context) => {
    const { logger } = context;
    logger.debug("validating hybrid flow response");

    const frontChannelToken = response.identityToken;
    if (!frontChannelToken) {
      return fail(logger, "missing identity token");
    }

    const validation = await validateIdentityToken(
      frontChannelToken,
      context.options.clientId,
      context.metadata,
      context.identityTokenValidator,
      logger
    );
    if (!validation.ok) {
      return fail(logger, validation.error.message);
    }

    const user = validation.value;

    logger.debug("validating nonce");
    if (!verifyNonce(state.nonce, findFirstClaim(user, "nonce"))) {
      return fail(logger, "invalid nonce");
    }

    logger.debug("validating authorization code hash");
    if (!verifyHashBinding(code, findFirstClaim(user, "c_hash"))) {
      return fail(logger, "invalid c_hash");
    }

    const redeemed = await redeemCode(code, state, context);
    if (!redeemed.ok) {
      return fail(logger, redeemed.error);
    }

    // The redeemed identity token is reported as-is, without a second validation.
    const tokens = redeemed.value;
    return {
      ok: true,
      value: { tokens, user, identityToken: tokens.identityToken ?? frontChannelToken },
    };
  },
};

// ============================================================================
// Selection
// ============================================================================

/**
 * Pick the strategy for a configured style. An unknown style is a
 * programming error and throws.
 */
export function selectFlowStrategy(style: AuthenticationStyle): FlowStrategy {
  switch (style) {
    case "authorization_code":
      return codeFlow;
    case "hybrid":
      return hybridFlow;
    default: {
      const unknownStyle: never = style;
      throw new Error(`Invalid authentication style: ${String(unknownStyle)}`);
    }
  }
}
