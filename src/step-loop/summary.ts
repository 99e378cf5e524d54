// ============================================================================
// RUN SUMMARY & EXIT CODES
// ============================================================================

import type { RunReport, RunStatus } from "./types";
import type { StrategyName } from "../strategies";

/** Completed and Exhausted both ran to a stopping point; only Failed is an error. */
export function exitCodeFor(status: RunStatus): number {
  return status === "completed" || status === "exhausted" ? 0 : 1;
}

export function countActions(report: RunReport): Partial<Record<StrategyName, number>> {
  const counts: Partial<Record<StrategyName, number>> = {};
  for (const turn of report.turns) {
    if (turn.kind === "acted") counts[turn.strategy] = (counts[turn.strategy] ?? 0) + 1;
  }
  return counts;
}

function headline(report: RunReport): string {
  const steps = `${report.stepsTaken}/${report.stepBudget} steps`;
  const seconds = (report.durationMs / 1000).toFixed(1);
  switch (report.status) {
    case "completed":
      return `Completed in ${steps} (${seconds}s)`;
    case "exhausted":
      return `Gave up: step budget exhausted after ${steps} (${seconds}s)`;
    case "failed":
      return `Failed after ${steps}: ${report.cause ? `${report.cause.name}: ${report.cause.message}` : "unknown cause"}`;
  }
}

export function formatRunSummary(report: RunReport): string {
  const parts = Object.entries(countActions(report)).map(([name, n]) => `${name}=${n}`);
  const fallbacks = report.turns.filter(t => t.kind === "fallback").length;
  if (fallbacks > 0) parts.push(`fallback=${fallbacks}`);

  const line = headline(report);
  return parts.length > 0 ? `${line} [${parts.join(", ")}]` : line;
}
