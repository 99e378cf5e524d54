// ============================================================================
// ERRORS: fatal failure taxonomy for a run
// ============================================================================

/** A bounded wait (page load, login form, login completion, story grid) expired. */
export class WaitTimeoutError extends Error {
  readonly what: string;
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs / 1000}s waiting for ${what}`);
    this.name = "WaitTimeoutError";
    this.what = what;
    this.timeoutMs = timeoutMs;
  }
}

/** Credentials were missing or the login never produced a session cookie. */
export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthError";
  }
}

/** The browser session is gone or a navigation failed outright. */
export class InfrastructureError extends Error {
  readonly original?: Error;

  constructor(message: string, original?: Error) {
    super(original ? `${message}: ${original.message}` : message);
    this.name = "InfrastructureError";
    this.original = original;
  }
}

/** Invalid CLI flags or config file contents. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type FatalError = WaitTimeoutError | AuthError | InfrastructureError;

export function isFatalError(error: unknown): error is FatalError {
  return error instanceof WaitTimeoutError
    || error instanceof AuthError
    || error instanceof InfrastructureError;
}

const DISCONNECT_PATTERN = /Target (page, context or browser )?(has been )?closed|Browser has been closed|browser has disconnected|Session closed|Connection closed/i;

/** True when a Playwright error means the page/context/browser is no longer usable. */
export function isDisconnectError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return DISCONNECT_PATTERN.test(message);
}

/** Normalize an unknown thrown value into an Error. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
