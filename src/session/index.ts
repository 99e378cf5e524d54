// ============================================================================
// BARREL RE-EXPORTS: session public API
// ============================================================================

// --- Types ---
export type {
  BrowserSession,
  NavigateOptions,
  Credentials,
  CredentialsProvider,
  SiteUrls,
} from "./types";
export { CLOSE_TIMEOUT_MS, SESSION_COOKIE, DEFAULT_SITE_URLS } from "./types";

// --- Lifecycle ---
export { PlaywrightBrowserSession, launchBrowserSession, launchArgs } from "./browser";
export { withSession, releaseSession } from "./scoped";

// --- Bootstrap ---
export { staticCredentials, promptingCredentials, askOnTerminal } from "./credentials";
export type { Ask } from "./credentials";
export {
  ensureAuthenticated,
  hasSessionCookie,
  IDENTIFIER_LOCATORS,
  PASSWORD_LOCATORS,
  LOGIN_BUTTON_LOCATORS,
} from "./auth";
export type { AuthOptions } from "./auth";
export { openTargetFlow, resolveTargetUrl, STORY_CARD_LOCATORS } from "./navigation";
export type { OpenFlowOptions } from "./navigation";
