// ============================================================================
// ORDERED CASCADE: "try each candidate in order, stop at the first hit"
// ============================================================================

import type { Locator, LocatorSet, UiAction, UiQuery } from "./types";
import { CLICK } from "./types";

/**
 * Evaluate `probe` on each item in order and return the first non-null result.
 * Items after the first hit are never probed.
 */
export async function firstSuccess<T, R>(
  items: readonly T[],
  probe: (item: T, index: number) => Promise<R | null>
): Promise<R | null> {
  for (let i = 0; i < items.length; i++) {
    const result = await probe(items[i], i);
    if (result !== null) return result;
  }
  return null;
}

/** First locator whose match set has at least `min` elements, with that set. */
export async function findFirstSet<H>(
  ui: UiQuery<H>,
  locators: LocatorSet,
  min = 1
): Promise<{ locator: Locator; handles: H[] } | null> {
  return firstSuccess(locators, async (locator) => {
    const handles = await ui.findAll(locator);
    return handles.length >= min ? { locator, handles } : null;
  });
}

/**
 * Act on the first element of the first locator that both matches and accepts
 * the action. A locator whose element refuses the action falls through to the
 * next one. Returns the locator that succeeded.
 */
export async function actOnFirst<H>(
  ui: UiQuery<H>,
  locators: LocatorSet,
  action: UiAction = CLICK
): Promise<Locator | null> {
  return firstSuccess(locators, async (locator) => {
    const handle = await ui.findFirst([locator]);
    if (handle === null) return null;
    return (await ui.safeAct(handle, action)) ? locator : null;
  });
}
