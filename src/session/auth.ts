// ============================================================================
// AUTHENTICATION: session cookie check and form login
// ============================================================================

import { actOnFirst, cssAll } from "../ui-query";
import type { LocatorSet } from "../ui-query";
import { AuthError, WaitTimeoutError } from "../errors";
import { pollUntil } from "../timing";
import type { Sleep } from "../timing";
import type { BrowserSession, CredentialsProvider } from "./types";
import { DEFAULT_SITE_URLS, SESSION_COOKIE } from "./types";

export const IDENTIFIER_LOCATORS: LocatorSet = cssAll([
  "[data-test='email-input'] input",
  "[data-test='email-input']",
  "input[name='identifier']",
  "input[name='login']",
  "input[name='email']",
  "input[name='username']",
  "input[type='email']",
  "input[autocomplete='username']",
]);

export const PASSWORD_LOCATORS: LocatorSet = cssAll([
  "[data-test='password-input'] input",
  "[data-test='password-input']",
  "input[name='password']",
  "input[type='password']",
  "input[autocomplete='current-password']",
]);

export const LOGIN_BUTTON_LOCATORS: LocatorSet = cssAll([
  "button[data-test='register-button']",
  "button[data-test='login-button']",
  "button[data-test='have-account']",
  "button[type='submit']",
  "[data-test='confirm-button']",
]);

export interface AuthOptions {
  timeoutMs: number;
  loginUrl?: string;
  cookieName?: string;
  pollIntervalMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

export async function hasSessionCookie<H>(session: BrowserSession<H>, cookieName: string = SESSION_COOKIE): Promise<boolean> {
  return (await session.getCookie(cookieName)) !== null;
}

/**
 * Make sure the session is logged in. The session cookie alone decides
 * success; credentials are only requested when it is missing.
 *
 * Throws WaitTimeoutError when the login form never shows up, and AuthError
 * when credentials are missing or no session cookie appears after submitting.
 */
export async function ensureAuthenticated<H>(
  session: BrowserSession<H>,
  credentials: CredentialsProvider,
  options: AuthOptions
): Promise<void> {
  const cookieName = options.cookieName ?? SESSION_COOKIE;
  const poll = {
    timeoutMs: options.timeoutMs,
    intervalMs: options.pollIntervalMs,
    sleep: options.sleep,
    now: options.now,
  };

  if (await hasSessionCookie(session, cookieName)) {
    console.log(`[ensureAuthenticated] Session cookie present, already logged in`);
    return;
  }

  const { username, password } = await credentials();
  await session.goto(options.loginUrl ?? DEFAULT_SITE_URLS.login, { what: "login page", timeoutMs: options.timeoutMs });

  const ui = session.ui;
  const identifierInput = await pollUntil("login form", () => ui.findFirst(IDENTIFIER_LOCATORS), poll);
  const passwordInput = await pollUntil("password input", () => ui.findFirst(PASSWORD_LOCATORS), poll);

  if (!(await ui.safeAct(identifierInput, { kind: "type", text: username }))) {
    throw new AuthError("Could not type into the username field");
  }
  if (!(await ui.safeAct(passwordInput, { kind: "type", text: password }))) {
    throw new AuthError("Could not type into the password field");
  }

  const submitted = await actOnFirst(ui, LOGIN_BUTTON_LOCATORS);
  if (!submitted) {
    await ui.safeAct(passwordInput, { kind: "type", text: password, submitKey: "Enter" });
  }
  console.log(`[ensureAuthenticated] Submitted login form for ${username}`);

  try {
    await pollUntil("session cookie", async () => ((await hasSessionCookie(session, cookieName)) ? true : null), poll);
  } catch (error) {
    if (error instanceof WaitTimeoutError) {
      throw new AuthError(`Login did not complete within ${options.timeoutMs / 1000}s`);
    }
    throw error;
  }
  console.log(`[ensureAuthenticated] Logged in`);
}
