// ============================================================================
// STEP LOOP TYPES: run state, turn records and the final report
// ============================================================================

import type { ActionOutcome, StrategyName } from "../strategies";

/** Default max turns per run */
export const DEFAULT_STEP_BUDGET = 200;

/** Wait before each turn so the previous action has rendered */
export const DEFAULT_PACING_MS = 500;

/** Extra wait when even the fallback found nothing to click */
export const DEFAULT_STUCK_PAUSE_MS = 500;

export type RunStatus = "running" | "completed" | "exhausted" | "failed";

export type TerminalStatus = Exclude<RunStatus, "running">;

/**
 * Mutable per-run counters, owned by the StepLoopController.
 * `stepsTaken <= stepBudget` always holds; once terminal, status never changes.
 */
export interface RunState {
  stepsTaken: number;
  stepBudget: number;
  status: RunStatus;
}

export interface TurnResolution {
  outcome: ActionOutcome;
  /** Strategy that acted, when one did */
  strategy?: StrategyName;
  /** Whether a follow-up check/continue click landed after answering */
  followUp: boolean;
}

export type TurnRecord =
  | { step: number; kind: "acted"; strategy: StrategyName; followUp: boolean }
  | { step: number; kind: "completed"; marker: string }
  | { step: number; kind: "fallback"; clicked: boolean };

export interface RunReport {
  status: TerminalStatus;
  stepsTaken: number;
  stepBudget: number;
  turns: TurnRecord[];
  /** Set when status is "failed" */
  cause?: Error;
  durationMs: number;
}
