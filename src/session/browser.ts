// ============================================================================
// PLAYWRIGHT SESSION: persistent Chrome profile
// ============================================================================

import { chromium, errors } from "playwright";
import type { BrowserContext, Page, Locator as PwLocator } from "playwright";
import { PlaywrightUiQuery } from "../ui-query";
import type { PlaywrightUiQueryOptions } from "../ui-query";
import type { AutopilotConfig } from "../config";
import { InfrastructureError, WaitTimeoutError, isDisconnectError, toError } from "../errors";
import type { BrowserSession, NavigateOptions } from "./types";

export class PlaywrightBrowserSession implements BrowserSession<PwLocator> {
  readonly ui: PlaywrightUiQuery;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    uiOptions: PlaywrightUiQueryOptions = {}
  ) {
    this.ui = new PlaywrightUiQuery(page, uiOptions);
  }

  async goto(url: string, options: NavigateOptions): Promise<void> {
    const { what, timeoutMs } = options;
    try {
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
      await this.page.waitForSelector("body", { state: "attached", timeout: timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) throw new WaitTimeoutError(what, timeoutMs);
      if (isDisconnectError(error)) throw new InfrastructureError("Browser session lost", toError(error));
      throw new InfrastructureError(`Navigation to ${url} failed`, toError(error));
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async getCookie(name: string): Promise<string | null> {
    try {
      const cookies = await this.context.cookies();
      const match = cookies.find(c => c.name === name && c.value !== "");
      return match?.value ?? null;
    } catch (error) {
      throw new InfrastructureError("Could not read cookies", toError(error));
    }
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/** Chrome flags for containers: explicit binary or running as root. */
export function launchArgs(profileName: string, sandboxed: boolean): string[] {
  const args = [
    `--profile-directory=${profileName}`,
    "--disable-gpu",
    "--disable-dev-shm-usage",
  ];
  if (!sandboxed) args.push("--no-sandbox", "--disable-setuid-sandbox");
  return args;
}

/**
 * Launch Chrome on the user's real profile so existing login cookies are
 * reused. Uses the installed Chrome channel unless CHROME_PATH names a binary.
 */
export async function launchBrowserSession(
  config: AutopilotConfig,
  uiOptions: PlaywrightUiQueryOptions = {}
): Promise<PlaywrightBrowserSession> {
  const { executablePath } = config;
  const isDocker = !!executablePath || process.getuid?.() === 0;

  console.log(`[launchBrowserSession] profile=${config.chromeProfileName}, headless=${config.headless}, dir=${config.chromeUserDataDir}`);

  let context: BrowserContext;
  try {
    context = await chromium.launchPersistentContext(config.chromeUserDataDir, {
      headless: config.headless,
      ...(executablePath ? { executablePath } : { channel: "chrome" }),
      chromiumSandbox: !isDocker,
      args: launchArgs(config.chromeProfileName, !isDocker),
      viewport: { width: 1280, height: 1000 },
    });
  } catch (error) {
    throw new InfrastructureError("Could not launch the browser", toError(error));
  }

  const page = context.pages()[0] ?? (await context.newPage());
  return new PlaywrightBrowserSession(context, page, uiOptions);
}
