// ============================================================================
// TOKEN TAP STRATEGY: select every token of a tap-to-complete sentence
// ============================================================================

import { findFirstSet, CLICK } from "../ui-query";
import type { LocatorSet, UiQuery } from "../ui-query";
import type { ActionOutcome, Strategy } from "./types";
import { TOKEN_LOCATORS } from "./selectors";
import { delay } from "../timing";
import type { Sleep } from "../timing";

/** A word bank is only recognized when it offers at least this many tokens. */
export const MIN_TOKENS = 2;

export const DEFAULT_TOKEN_PAUSE_MS = 50;

export interface TokenTapOptions {
  locators?: LocatorSet;
  pauseMs?: number;
  sleep?: Sleep;
}

export class TokenTapStrategy implements Strategy {
  readonly name = "token-tap" as const;
  private readonly locators: LocatorSet;
  private readonly pauseMs: number;
  private readonly sleep: Sleep;

  constructor(options: TokenTapOptions = {}) {
    this.locators = options.locators ?? TOKEN_LOCATORS;
    this.pauseMs = options.pauseMs ?? DEFAULT_TOKEN_PAUSE_MS;
    this.sleep = options.sleep ?? delay;
  }

  /** Taps all N tokens in order; a token that refuses the tap does not stop the rest. */
  async attempt<H>(ui: UiQuery<H>): Promise<ActionOutcome> {
    const set = await findFirstSet(ui, this.locators, MIN_TOKENS);
    if (!set) return "no-match";

    let tapped = 0;
    for (const token of set.handles) {
      if (await ui.safeAct(token, CLICK)) tapped++;
      await this.sleep(this.pauseMs);
    }
    return tapped > 0 ? "acted" : "no-match";
  }
}
