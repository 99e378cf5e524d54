// ============================================================================
// STEP LOOP CONTROLLER: turn orchestration, budget and pacing
// ============================================================================

import { actOnFirst } from "../ui-query";
import type { LocatorSet, UiQuery } from "../ui-query";
import { FALLBACK_LOCATORS } from "../strategies";
import { delay } from "../timing";
import type { Sleep } from "../timing";
import { toError } from "../errors";
import { ActionResolver } from "./action-resolver";
import { CompletionDetector } from "./completion-detector";
import { createRunState, finish, takeStep, terminalStatus } from "./run-state";
import type { RunReport, TurnRecord } from "./types";
import {
  DEFAULT_PACING_MS,
  DEFAULT_STEP_BUDGET,
  DEFAULT_STUCK_PAUSE_MS,
} from "./types";

export interface StepLoopOptions {
  stepBudget?: number;
  resolver?: ActionResolver;
  detector?: CompletionDetector;
  /** Last-resort progression-by-text when a turn is stuck */
  fallbackLocators?: LocatorSet;
  pacingMs?: number;
  stuckPauseMs?: number;
  sleep?: Sleep;
  now?: () => number;
  quiet?: boolean;
}

/**
 * Drives turns until the flow completes, the budget runs out, or the session
 * fails. Stuck-turn fallbacks count against the budget, so every run ends
 * within `stepBudget` turns.
 *
 * Per turn:
 * 1. Stop as Exhausted if another turn would exceed the budget
 * 2. Pacing delay (lets the previous action render)
 * 3. Resolver acts → next turn
 * 4. Nothing to do → terminal marker? Completed : one fallback click
 * Any thrown error (only session-level failures escape the strategies) → Failed.
 */
export class StepLoopController {
  private readonly stepBudget: number;
  private readonly resolver: ActionResolver;
  private readonly detector: CompletionDetector;
  private readonly fallbackLocators: LocatorSet;
  private readonly pacingMs: number;
  private readonly stuckPauseMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly quiet: boolean;

  constructor(options: StepLoopOptions = {}) {
    this.stepBudget = options.stepBudget ?? DEFAULT_STEP_BUDGET;
    this.resolver = options.resolver ?? new ActionResolver();
    this.detector = options.detector ?? new CompletionDetector();
    this.fallbackLocators = options.fallbackLocators ?? FALLBACK_LOCATORS;
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
    this.stuckPauseMs = options.stuckPauseMs ?? DEFAULT_STUCK_PAUSE_MS;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
    this.quiet = options.quiet ?? false;
  }

  async run<H>(ui: UiQuery<H>): Promise<RunReport> {
    const startTime = this.now();
    const state = createRunState(this.stepBudget);
    const turns: TurnRecord[] = [];
    let cause: Error | undefined;

    try {
      while (state.status === "running") {
        if (!takeStep(state)) {
          finish(state, "exhausted");
          this.log(`Step budget of ${state.stepBudget} exhausted`);
          break;
        }
        const step = state.stepsTaken;
        await this.sleep(this.pacingMs);

        const resolution = await this.resolver.resolveTurn(ui);
        if (resolution.outcome === "acted" && resolution.strategy) {
          turns.push({ step, kind: "acted", strategy: resolution.strategy, followUp: resolution.followUp });
          this.log(`turn ${step}: ${resolution.strategy} acted${resolution.followUp ? " (+follow-up)" : ""}`);
          continue;
        }

        const marker = await this.detector.detect(ui);
        if (marker !== null) {
          turns.push({ step, kind: "completed", marker });
          finish(state, "completed");
          this.log(`turn ${step}: completion marker ${marker}`);
          break;
        }

        const clicked = (await actOnFirst(ui, this.fallbackLocators)) !== null;
        turns.push({ step, kind: "fallback", clicked });
        this.log(`turn ${step}: stuck, fallback ${clicked ? "clicked" : "found nothing"}`);
        if (!clicked) await this.sleep(this.stuckPauseMs);
      }
    } catch (error) {
      cause = toError(error);
      finish(state, "failed");
      console.error(`[StepLoop] Run failed at step ${state.stepsTaken}: ${cause.message}`);
    }

    return {
      status: terminalStatus(state),
      stepsTaken: state.stepsTaken,
      stepBudget: state.stepBudget,
      turns,
      cause,
      durationMs: this.now() - startTime,
    };
  }

  private log(message: string): void {
    if (!this.quiet) console.log(`[StepLoop] ${message}`);
  }
}
