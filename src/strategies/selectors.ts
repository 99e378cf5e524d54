// ============================================================================
// SELECTORS: locator cascades for the story player
// ============================================================================

import { buttonTextLocators, byRole, cssAll } from "../ui-query";
import type { LocatorSet } from "../ui-query";

/** Continue/next/check controls identified by attribute markers. */
export const PROGRESSION_SELECTORS = [
  "[data-test='stories-player-continue']",
  "[data-test='stories-player-cta']",
  "[data-test='player-continue']",
  "button[data-test*='continue']",
  "button[data-test*='check']",
] as const;

/** Visible labels of progression controls, tried after the attribute markers. */
export const PROGRESSION_LABELS = [
  "Start",
  "Continue",
  "Next",
  "Check",
  "Skip",
  "Got it",
  "Keep going",
  "Done",
] as const;

/** Tap-to-complete word bank tokens. */
export const TOKEN_SELECTORS = [
  "[data-test='challenge-tap-token']",
  "[data-test='word-bank'] [role='button']",
  "[data-test*='challenge'] [data-test*='token']",
] as const;

export const CHOICE_SELECTORS = [
  "[data-test='challenge-choice']",
  "[data-test='challenge-judge-text']",
  "[data-test*='challenge'] [role='radio']",
  "[data-test*='challenge'] [data-test*='option']",
] as const;

export const TEXT_INPUT_SELECTORS = [
  "[data-test='challenge-text-input'] textarea",
  "[data-test='challenge-text-input'] input",
  "textarea",
  "input[type='text']",
] as const;

/** Controls revealed right after answering ("check" first). */
export const FOLLOW_UP_SELECTORS = [
  "button[data-test*='check']",
  "[data-test='stories-player-continue']",
  "button[type='submit']",
] as const;

/** Celebration, streak and explicit finished markers. */
export const COMPLETION_SELECTORS = [
  "[data-test*='streak']",
  "[data-test*='finished']",
] as const;

/** Last-resort labels when a turn found nothing to do. */
export const FALLBACK_LABELS = ["Continue", "Next", "Done"] as const;

export function progressionLocators(labels: readonly string[] = PROGRESSION_LABELS): LocatorSet {
  return [...cssAll(PROGRESSION_SELECTORS), ...buttonTextLocators(labels)];
}

export const TOKEN_LOCATORS: LocatorSet = cssAll(TOKEN_SELECTORS);
/** Attribute markers first, then any ARIA radio or listbox option on the page. */
export const CHOICE_LOCATORS: LocatorSet = [...cssAll(CHOICE_SELECTORS), byRole("radio"), byRole("option")];
export const TEXT_INPUT_LOCATORS: LocatorSet = cssAll(TEXT_INPUT_SELECTORS);
export const FOLLOW_UP_LOCATORS: LocatorSet = cssAll(FOLLOW_UP_SELECTORS);
export const COMPLETION_LOCATORS: LocatorSet = cssAll(COMPLETION_SELECTORS);
export const FALLBACK_LOCATORS: LocatorSet = buttonTextLocators(FALLBACK_LABELS);
