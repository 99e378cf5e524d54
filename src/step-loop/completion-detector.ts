// ============================================================================
// COMPLETION DETECTOR: terminal markers of a finished flow
// ============================================================================

import { describeLocator, firstSuccess } from "../ui-query";
import type { LocatorSet, UiQuery } from "../ui-query";
import { COMPLETION_LOCATORS } from "../strategies";

export class CompletionDetector {
  constructor(private readonly markers: LocatorSet = COMPLETION_LOCATORS) {}

  /** The first terminal marker present in the render, described, or null. */
  async detect<H>(ui: UiQuery<H>): Promise<string | null> {
    return firstSuccess(this.markers, async (marker) =>
      (await ui.findFirst([marker])) !== null ? describeLocator(marker) : null
    );
  }

  async isComplete<H>(ui: UiQuery<H>): Promise<boolean> {
    return (await this.detect(ui)) !== null;
  }
}
