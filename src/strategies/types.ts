// ============================================================================
// STRATEGY TYPES
// ============================================================================

import type { UiQuery } from "../ui-query";

/** `acted`: a click/type was attempted. `no-match`: nothing applicable, no side effect. */
export type ActionOutcome = "acted" | "no-match";

export type StrategyName = "progression" | "token-tap" | "choice" | "text-fill";

/** Uniform source in [0, 1). Injected so tests can pin multiple-choice picks. */
export type RandomSource = () => number;

/**
 * One self-contained policy for recognizing and acting on a class of step.
 * Attempting twice on an unchanged render must be harmless.
 */
export interface Strategy {
  readonly name: StrategyName;
  attempt<H>(ui: UiQuery<H>): Promise<ActionOutcome>;
}
