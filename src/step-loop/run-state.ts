// ============================================================================
// RUN STATE: creation and monotone transitions
// ============================================================================

import type { RunState, TerminalStatus } from "./types";

export function createRunState(stepBudget: number): RunState {
  if (!Number.isInteger(stepBudget) || stepBudget <= 0) {
    throw new RangeError(`Step budget must be a positive integer, got ${stepBudget}`);
  }
  return { stepsTaken: 0, stepBudget, status: "running" };
}

/** Move a running state into a terminal one. Terminal states are final. */
export function finish(state: RunState, status: TerminalStatus): void {
  if (state.status !== "running") {
    throw new Error(`Illegal transition ${state.status} → ${status}`);
  }
  state.status = status;
}

/**
 * Count one more turn. Returns false (and leaves the counter alone) when that
 * turn would exceed the budget.
 */
export function takeStep(state: RunState): boolean {
  if (state.stepsTaken >= state.stepBudget) return false;
  state.stepsTaken++;
  return true;
}

export function terminalStatus(state: RunState): TerminalStatus {
  if (state.status === "running") {
    throw new Error("Run has not reached a terminal state");
  }
  return state.status;
}
