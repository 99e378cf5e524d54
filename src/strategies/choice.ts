// ============================================================================
// CHOICE STRATEGY: pick one multiple-choice option
// ============================================================================

import { findFirstSet, CLICK } from "../ui-query";
import type { LocatorSet, UiQuery } from "../ui-query";
import type { ActionOutcome, RandomSource, Strategy } from "./types";
import { CHOICE_LOCATORS } from "./selectors";

/** Map a uniform draw onto [0, n). */
export function pickIndex(n: number, random: RandomSource): number {
  return Math.min(n - 1, Math.max(0, Math.floor(random() * n)));
}

export interface ChoiceOptions {
  locators?: LocatorSet;
  random?: RandomSource;
}

/**
 * Options are treated as interchangeable: the pick is unweighted. A wrong
 * answer is fine, the flow's own remediation moves things along. An option
 * that refuses the click is dropped and another is drawn from the rest.
 */
export class ChoiceStrategy implements Strategy {
  readonly name = "choice" as const;
  private readonly locators: LocatorSet;
  private readonly random: RandomSource;

  constructor(options: ChoiceOptions = {}) {
    this.locators = options.locators ?? CHOICE_LOCATORS;
    this.random = options.random ?? Math.random;
  }

  async attempt<H>(ui: UiQuery<H>): Promise<ActionOutcome> {
    const set = await findFirstSet(ui, this.locators, 1);
    if (!set) return "no-match";

    const remaining = [...set.handles];
    while (remaining.length > 0) {
      const [choice] = remaining.splice(pickIndex(remaining.length, this.random), 1);
      if (await ui.safeAct(choice, CLICK)) return "acted";
    }
    return "no-match";
  }
}
