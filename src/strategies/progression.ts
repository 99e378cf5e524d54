// ============================================================================
// PROGRESSION STRATEGY: continue / next / check / skip controls
// ============================================================================

import { actOnFirst } from "../ui-query";
import type { LocatorSet, UiQuery } from "../ui-query";
import type { ActionOutcome, Strategy } from "./types";
import { progressionLocators } from "./selectors";

/**
 * Clicks exactly one progression control: the first locator in the cascade
 * whose element accepts the click.
 */
export class ProgressionStrategy implements Strategy {
  readonly name = "progression" as const;

  constructor(private readonly locators: LocatorSet = progressionLocators()) {}

  async attempt<H>(ui: UiQuery<H>): Promise<ActionOutcome> {
    return (await actOnFirst(ui, this.locators)) ? "acted" : "no-match";
  }
}
