// ============================================================================
// SESSION TYPES
// ============================================================================

import type { UiQuery } from "../ui-query";

/** Close must finish within this bound on every exit path (ms) */
export const CLOSE_TIMEOUT_MS = 10_000;

/** Cookie whose presence means the browser is logged in */
export const SESSION_COOKIE = "jwt_token";

export interface NavigateOptions {
  /** Used in the WaitTimeoutError when the page does not load in time */
  what: string;
  timeoutMs: number;
}

/**
 * One live, authenticated-or-not browser context, owned by a single run.
 * `ui` queries whatever the current page renders.
 */
export interface BrowserSession<H> {
  readonly ui: UiQuery<H>;
  /** Load `url` and wait for a document body. Throws WaitTimeoutError or InfrastructureError. */
  goto(url: string, options: NavigateOptions): Promise<void>;
  currentUrl(): string;
  /** Value of a non-empty cookie by name, or null. */
  getCookie(name: string): Promise<string | null>;
  close(): Promise<void>;
}

export interface Credentials {
  username: string;
  password: string;
}

/** Supplies credentials on demand; only asked when the session cookie is missing. */
export type CredentialsProvider = () => Promise<Credentials>;

export interface SiteUrls {
  home: string;
  login: string;
  stories: string;
}

export const DEFAULT_SITE_URLS: SiteUrls = {
  home: "https://www.duolingo.com/",
  login: "https://www.duolingo.com/log-in",
  stories: "https://www.duolingo.com/stories",
};
