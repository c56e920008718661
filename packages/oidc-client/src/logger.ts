/**
 * Diagnostic logging
 *
 * The pipeline never writes to the console on its own. Callers pass an
 * {@link OidcLogger}; claim values only reach the optional `claims` sink,
 * since they may carry personal data.
 */

import type { Claim } from "./types.ts";

export type OidcLogger = {
  debug(message: string): void;
  error(message: string): void;
  /** Receives full claim sets at validation steps. Omit to keep claims out of logs. */
  claims?(label: string, claims: readonly Claim[]): void;
};

export const noopLogger: OidcLogger = {
  debug: () => {},
  error: () => {},
};

export type ConsoleLoggerOptions = {
  /** Line prefix (default: "[OIDC]") */
  prefix?: string;
  /** Print debug lines (default: false) */
  verbose?: boolean;
  /** Print claim values (default: false) */
  logClaims?: boolean;
};

/**
 * Create a logger that writes through `console`.
 *
 * @example
 * ```ts
 * const client = createOidcClient(options, {
 *   ...deps,
 *   logger: createConsoleLogger({ verbose: true }),
 * });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): OidcLogger {
  const prefix = options.prefix ?? "[OIDC]";
  const logger: OidcLogger = {
    debug: (message) => {
      if (options.verbose) console.log(`${prefix} ${message}`);
    },
    error: (message) => {
      console.error(`${prefix} ${message}`);
    },
  };

  if (options.logClaims) {
    logger.claims = (label, claims) => {
      console.log(`${prefix} ${label}`);
      for (const claim of claims) {
        console.log(`${prefix}   ${claim.type}: ${claim.value}`);
      }
    };
  }

  return logger;
}
