// ============================================================================
// PLAYWRIGHT UI QUERY: facade over a live Playwright page
// ============================================================================

import type { Page, Locator as PwLocator } from "playwright";
import type { Locator, LocatorSet, UiAction, UiQuery } from "./types";
import { describeLocator } from "./locators";
import { InfrastructureError, isDisconnectError, toError } from "../errors";

/** Per-interaction upper bound; an element that never becomes actionable is a plain failure. */
export const DEFAULT_ACTION_TIMEOUT_MS = 2000;

/** Playwright reports occlusion as "<node> intercepts pointer events" while retrying. */
export function isObstructedError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return /intercepts pointer events|not receiving pointer events|outside of the viewport/i.test(message);
}

/**
 * Stamped on matched nodes so a handle keeps pointing at its own node when the
 * list it came from re-renders. Each query uses a fresh tag; older handles go stale.
 */
export const HANDLE_ATTRIBUTE = "data-autopilot-handle";

export interface PlaywrightUiQueryOptions {
  actionTimeoutMs?: number;
  quiet?: boolean;
}

export class PlaywrightUiQuery implements UiQuery<PwLocator> {
  private readonly actionTimeoutMs: number;
  private readonly quiet: boolean;
  private queries = 0;

  constructor(private readonly page: Page, options: PlaywrightUiQueryOptions = {}) {
    this.actionTimeoutMs = options.actionTimeoutMs ?? DEFAULT_ACTION_TIMEOUT_MS;
    this.quiet = options.quiet ?? false;
  }

  async findFirst(locators: LocatorSet): Promise<PwLocator | null> {
    for (const locator of locators) {
      const handles = await this.findAll(locator);
      if (handles.length > 0) return handles[0];
    }
    return null;
  }

  async findAll(locator: Locator): Promise<PwLocator[]> {
    const tag = `q${++this.queries}`;
    const n = await this.pin(this.resolve(locator), locator, tag);
    return Array.from({ length: n }, (_, i) => this.page.locator(`[${HANDLE_ATTRIBUTE}="${tag}-${i}"]`));
  }

  async safeAct(handle: PwLocator, action: UiAction): Promise<boolean> {
    const timeout = this.actionTimeoutMs;
    try {
      await handle.scrollIntoViewIfNeeded({ timeout });
      if (action.kind === "click") {
        await handle.click({ timeout });
      } else {
        await handle.fill(action.text, { timeout });
        if (action.submitKey) await this.submit(handle, action.submitKey);
      }
      return true;
    } catch (error) {
      this.rethrowIfDisconnected(error);
      if (!isObstructedError(error)) {
        this.log(`direct ${action.kind} failed: ${toError(error).message.split("\n")[0]}`);
        return false;
      }
    }

    // Obstructed: one forced attempt that bypasses hit-testing
    try {
      if (action.kind === "click") {
        await handle.dispatchEvent("click", undefined, { timeout });
      } else {
        await handle.fill(action.text, { timeout, force: true });
        if (action.submitKey) await this.submit(handle, action.submitKey);
      }
      this.log(`forced ${action.kind} dispatched after obstruction`);
      return true;
    } catch (error) {
      this.rethrowIfDisconnected(error);
      this.log(`forced ${action.kind} failed: ${toError(error).message.split("\n")[0]}`);
      return false;
    }
  }

  private resolve(locator: Locator): PwLocator {
    switch (locator.kind) {
      case "css":
        return this.page.locator(locator.selector);
      case "text":
        return this.page.getByRole("button", { name: locator.text, exact: locator.exact });
      case "role":
        return locator.name === undefined
          ? this.page.getByRole(locator.role)
          : this.page.getByRole(locator.role, { name: locator.name });
    }
  }

  /** Tag every current match in document order; returns how many were tagged. */
  private async pin(resolved: PwLocator, locator: Locator, tag: string): Promise<number> {
    try {
      return await resolved.evaluateAll((nodes, args) => {
        nodes.forEach((node, i) => node.setAttribute(args.attribute, `${args.tag}-${i}`));
        return nodes.length;
      }, { attribute: HANDLE_ATTRIBUTE, tag });
    } catch (error) {
      this.rethrowIfDisconnected(error);
      // Malformed or unsupported query: same as no match
      this.log(`query ${describeLocator(locator)} failed: ${toError(error).message.split("\n")[0]}`);
      return 0;
    }
  }

  /** The text has landed once fill resolves; a failed key press does not undo that. */
  private async submit(handle: PwLocator, key: string): Promise<void> {
    try {
      await handle.press(key, { timeout: this.actionTimeoutMs });
    } catch (error) {
      this.rethrowIfDisconnected(error);
      this.log(`press ${key} failed after fill: ${toError(error).message.split("\n")[0]}`);
    }
  }

  private rethrowIfDisconnected(error: unknown): void {
    if (isDisconnectError(error)) {
      throw new InfrastructureError("Browser session lost", toError(error));
    }
  }

  private log(message: string): void {
    if (!this.quiet) console.log(`[PlaywrightUiQuery] ${message}`);
  }
}
