// ============================================================================
// BARREL RE-EXPORTS: step-loop public API
// ============================================================================

// --- Types ---
export type {
  RunState,
  RunStatus,
  TerminalStatus,
  TurnResolution,
  TurnRecord,
  RunReport,
} from "./types";
export { DEFAULT_STEP_BUDGET, DEFAULT_PACING_MS, DEFAULT_STUCK_PAUSE_MS } from "./types";

// --- Engine ---
export { createRunState, finish, takeStep, terminalStatus } from "./run-state";
export { ActionResolver } from "./action-resolver";
export type { ActionResolverOptions } from "./action-resolver";
export { CompletionDetector } from "./completion-detector";
export { StepLoopController } from "./controller";
export type { StepLoopOptions } from "./controller";

// --- Summary ---
export { exitCodeFor, countActions, formatRunSummary } from "./summary";
