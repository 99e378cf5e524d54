// ============================================================================
// BARREL RE-EXPORTS: ui-query public API
// ============================================================================

export type { Locator, LocatorSet, UiAction, UiQuery, UiRole } from "./types";
export { CLICK } from "./types";
export { css, cssAll, byText, byRole, buttonTextLocators, describeLocator } from "./locators";
export { firstSuccess, findFirstSet, actOnFirst } from "./cascade";
export {
  PlaywrightUiQuery,
  isObstructedError,
  DEFAULT_ACTION_TIMEOUT_MS,
} from "./playwright-query";
export type { PlaywrightUiQueryOptions } from "./playwright-query";
