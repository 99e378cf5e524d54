// ============================================================================
// BARREL RE-EXPORTS: strategies public API
// ============================================================================

export type { ActionOutcome, RandomSource, Strategy, StrategyName } from "./types";
export { ProgressionStrategy } from "./progression";
export { TokenTapStrategy, MIN_TOKENS, DEFAULT_TOKEN_PAUSE_MS } from "./token-tap";
export type { TokenTapOptions } from "./token-tap";
export { ChoiceStrategy, pickIndex } from "./choice";
export type { ChoiceOptions } from "./choice";
export { TextFillStrategy, DEFAULT_FILLER_TEXT, DEFAULT_SUBMIT_KEY } from "./text-fill";
export type { TextFillOptions } from "./text-fill";
export { createStrategyCatalog } from "./catalog";
export type { StrategyCatalogOptions } from "./catalog";
export * from "./selectors";
