// ============================================================================
// NAVIGATION: reach the story player
// ============================================================================

import { CLICK, cssAll } from "../ui-query";
import type { LocatorSet } from "../ui-query";
import { pollUntil } from "../timing";
import type { Sleep } from "../timing";
import { ensureAuthenticated } from "./auth";
import type { BrowserSession, CredentialsProvider, SiteUrls } from "./types";
import { DEFAULT_SITE_URLS } from "./types";

export const STORY_CARD_LOCATORS: LocatorSet = cssAll([
  "[data-test='story-card']",
  "a[href*='/stories/']",
  "[data-test*='story']",
]);

/**
 * Full URLs are used as-is; a path is appended to the stories grid URL;
 * no path means the grid itself.
 */
export function resolveTargetUrl(storyPath: string | null, storiesUrl: string = DEFAULT_SITE_URLS.stories): string {
  if (!storyPath) return storiesUrl;
  if (/^https?:\/\//i.test(storyPath)) return storyPath;
  return storiesUrl + storyPath;
}

export interface OpenFlowOptions {
  storyPath: string | null;
  timeoutMs: number;
  urls?: SiteUrls;
  pollIntervalMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Home page → login if needed → target page. Without an explicit story,
 * the first card on the stories grid is opened.
 */
export async function openTargetFlow<H>(
  session: BrowserSession<H>,
  credentials: CredentialsProvider,
  options: OpenFlowOptions
): Promise<void> {
  const urls = options.urls ?? DEFAULT_SITE_URLS;
  const { timeoutMs } = options;
  const poll = { timeoutMs, intervalMs: options.pollIntervalMs, sleep: options.sleep, now: options.now };

  await session.goto(urls.home, { what: "home page", timeoutMs });
  await ensureAuthenticated(session, credentials, {
    timeoutMs,
    loginUrl: urls.login,
    pollIntervalMs: options.pollIntervalMs,
    sleep: options.sleep,
    now: options.now,
  });

  const target = resolveTargetUrl(options.storyPath, urls.stories);
  console.log(`[openTargetFlow] Opening ${target}`);
  await session.goto(target, { what: "target page", timeoutMs });

  if (!options.storyPath && session.currentUrl().includes(urls.stories)) {
    const card = await pollUntil("story grid", () => session.ui.findFirst(STORY_CARD_LOCATORS), poll);
    if (!(await session.ui.safeAct(card, CLICK))) {
      console.log(`[openTargetFlow] First story card did not accept the click; continuing from the grid`);
    }
  }
}
