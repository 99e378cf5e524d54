// ============================================================================
// TEXT FILL STRATEGY: unblock free-text steps
// ============================================================================

import type { LocatorSet, UiQuery } from "../ui-query";
import type { ActionOutcome, Strategy } from "./types";
import { TEXT_INPUT_LOCATORS } from "./selectors";

export const DEFAULT_FILLER_TEXT = "a";
export const DEFAULT_SUBMIT_KEY = "Enter";

export interface TextFillOptions {
  locators?: LocatorSet;
  fillerText?: string;
  submitKey?: string;
}

/** Types a fixed filler and submits; an incorrect attempt usually reveals the answer. */
export class TextFillStrategy implements Strategy {
  readonly name = "text-fill" as const;
  private readonly locators: LocatorSet;
  private readonly fillerText: string;
  private readonly submitKey: string;

  constructor(options: TextFillOptions = {}) {
    this.locators = options.locators ?? TEXT_INPUT_LOCATORS;
    this.fillerText = options.fillerText || DEFAULT_FILLER_TEXT;
    this.submitKey = options.submitKey ?? DEFAULT_SUBMIT_KEY;
  }

  async attempt<H>(ui: UiQuery<H>): Promise<ActionOutcome> {
    const input = await ui.findFirst(this.locators);
    if (input === null) return "no-match";

    const typed = await ui.safeAct(input, {
      kind: "type",
      text: this.fillerText,
      submitKey: this.submitKey,
    });
    return typed ? "acted" : "no-match";
  }
}
