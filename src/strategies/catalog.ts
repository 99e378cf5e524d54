// ============================================================================
// STRATEGY CATALOG: fixed priority order
// ============================================================================

import type { Strategy, RandomSource } from "./types";
import type { Sleep } from "../timing";
import { ProgressionStrategy } from "./progression";
import { TokenTapStrategy } from "./token-tap";
import { ChoiceStrategy } from "./choice";
import { TextFillStrategy } from "./text-fill";
import { progressionLocators, PROGRESSION_LABELS } from "./selectors";

export interface StrategyCatalogOptions {
  random?: RandomSource;
  fillerText?: string;
  tokenPauseMs?: number;
  sleep?: Sleep;
  /** Extra visible labels for progression controls (other UI languages, new wordings). */
  extraProgressionLabels?: readonly string[];
}

/**
 * Progression first, so a step that is already answered advances without
 * being answered again; then token-tap, multiple-choice and text-fill.
 */
export function createStrategyCatalog(options: StrategyCatalogOptions = {}): Strategy[] {
  const labels = [...PROGRESSION_LABELS, ...(options.extraProgressionLabels ?? [])];
  return [
    new ProgressionStrategy(progressionLocators(labels)),
    new TokenTapStrategy({ pauseMs: options.tokenPauseMs, sleep: options.sleep }),
    new ChoiceStrategy({ random: options.random }),
    new TextFillStrategy({ fillerText: options.fillerText }),
  ];
}
