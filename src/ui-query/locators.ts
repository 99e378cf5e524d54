// ============================================================================
// LOCATOR BUILDERS
// ============================================================================

import type { Locator, LocatorSet, UiRole } from "./types";

export function css(selector: string): Locator {
  return { kind: "css", selector };
}

export function cssAll(selectors: readonly string[]): LocatorSet {
  return selectors.map(css);
}

export function byText(text: string, exact = true): Locator {
  return { kind: "text", text: text.trim(), exact };
}

export function byRole(role: UiRole, name?: string): Locator {
  return name === undefined ? { kind: "role", role } : { kind: "role", role, name };
}

/**
 * Expand button labels into text locators. All exact matches come before any
 * substring match, so "Continue" never loses to a longer "Continue later".
 */
export function buttonTextLocators(texts: readonly string[]): LocatorSet {
  return [
    ...texts.map(t => byText(t, true)),
    ...texts.map(t => byText(t, false)),
  ];
}

/** Short human-readable form used in log lines. */
export function describeLocator(locator: Locator): string {
  switch (locator.kind) {
    case "css":
      return locator.selector;
    case "text":
      return locator.exact ? `text="${locator.text}"` : `text~="${locator.text}"`;
    case "role":
      return locator.name ? `role=${locator.role}[name="${locator.name}"]` : `role=${locator.role}`;
  }
}
