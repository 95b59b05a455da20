/**
 * Error taxonomy
 *
 * Only ConfigurationError and SessionBootstrapError end a run.
 * TransportTimeoutError is caught by the component that issued the
 * navigation/query and turned into that component's fallback.
 * Unresolved fields, challenges and stale sessions are reported through
 * Diagnostics, not thrown.
 */

export type ScraperErrorCode =
  | "CONFIGURATION"
  | "SESSION_BOOTSTRAP"
  | "TRANSPORT_TIMEOUT";

export abstract class ScraperError extends Error {
  abstract readonly code: ScraperErrorCode;

  /** Whether the whole run must stop */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid input, raised before any browser activity
 */
export class ConfigurationError extends ScraperError {
  readonly code = "CONFIGURATION";
  readonly fatal = true;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

/**
 * Browser launch or cookie injection failed
 */
export class SessionBootstrapError extends ScraperError {
  readonly code = "SESSION_BOOTSTRAP";
  readonly fatal = true;
}

/**
 * A navigation, query or interaction exceeded its timeout
 */
export class TransportTimeoutError extends ScraperError {
  readonly code = "TRANSPORT_TIMEOUT";
  readonly fatal = false;

  constructor(
    readonly operation: string,
    readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(`${operation} timed out: ${target}`, options);
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
