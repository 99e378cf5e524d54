// ============================================================================
// ACTION RESOLVER: one turn: first strategy that acts wins
// ============================================================================

import { actOnFirst, firstSuccess } from "../ui-query";
import type { LocatorSet, UiQuery } from "../ui-query";
import { createStrategyCatalog, FOLLOW_UP_LOCATORS } from "../strategies";
import type { Strategy } from "../strategies";
import type { TurnResolution } from "./types";

export interface ActionResolverOptions {
  /** Click a revealed check/continue control right after answering (default true) */
  followUp?: boolean;
  followUpLocators?: LocatorSet;
}

export class ActionResolver {
  private readonly followUp: boolean;
  private readonly followUpLocators: LocatorSet;

  constructor(
    private readonly strategies: readonly Strategy[] = createStrategyCatalog(),
    options: ActionResolverOptions = {}
  ) {
    this.followUp = options.followUp ?? true;
    this.followUpLocators = options.followUpLocators ?? FOLLOW_UP_LOCATORS;
  }

  /**
   * Try strategies in priority order and stop at the first that acts.
   * Answering usually reveals a "check" control, so after a non-progression
   * strategy acts one follow-up click is attempted in the same turn.
   */
  async resolveTurn<H>(ui: UiQuery<H>): Promise<TurnResolution> {
    const acted = await firstSuccess(this.strategies, async (strategy) =>
      (await strategy.attempt(ui)) === "acted" ? strategy : null
    );
    if (!acted) return { outcome: "no-match", followUp: false };

    let followUp = false;
    if (this.followUp && acted.name !== "progression") {
      followUp = (await actOnFirst(ui, this.followUpLocators)) !== null;
    }
    return { outcome: "acted", strategy: acted.name, followUp };
  }
}
