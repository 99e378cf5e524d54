// ============================================================================
// RUN: one invocation: session → bootstrap → step loop → release
// ============================================================================

import type { AutopilotConfig } from "./config";
import { openTargetFlow, withSession } from "./session";
import type { BrowserSession, CredentialsProvider, SiteUrls } from "./session";
import { createStrategyCatalog } from "./strategies";
import type { RandomSource } from "./strategies";
import { ActionResolver, StepLoopController } from "./step-loop";
import type { RunReport } from "./step-loop";
import { delay } from "./timing";
import type { Sleep } from "./timing";
import { isFatalError, toError } from "./errors";

/** Pause before releasing the browser so the final screen can settle */
export const COOLDOWN_MS = 1500;

export interface RunDependencies<H> {
  openSession: () => Promise<BrowserSession<H>>;
  credentials: CredentialsProvider;
  random?: RandomSource;
  sleep?: Sleep;
  now?: () => number;
  urls?: SiteUrls;
  quiet?: boolean;
}

/**
 * Run a story to a stopping point. Never throws: launch, load and login
 * failures come back as a `failed` report with the cause attached, and the
 * session is released on every path.
 */
export async function runStory<H>(config: AutopilotConfig, deps: RunDependencies<H>): Promise<RunReport> {
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? delay;
  const startTime = now();
  const timeoutMs = config.waitSecs * 1000;

  try {
    return await withSession(deps.openSession, async (session) => {
      await openTargetFlow(session, deps.credentials, {
        storyPath: config.storyPath,
        timeoutMs,
        urls: deps.urls,
        sleep,
        now,
      });

      const controller = new StepLoopController({
        stepBudget: config.maxSteps,
        resolver: new ActionResolver(createStrategyCatalog({ random: deps.random, sleep })),
        sleep,
        now,
        quiet: deps.quiet,
      });
      const report = await controller.run(session.ui);

      if (report.status !== "failed") await sleep(COOLDOWN_MS);
      return report;
    });
  } catch (error) {
    const cause = toError(error);
    if (isFatalError(cause)) console.error(`[runStory] ${cause.name}: ${cause.message}`);
    else console.error(`[runStory] Unexpected error:`, cause);
    return {
      status: "failed",
      stepsTaken: 0,
      stepBudget: config.maxSteps,
      turns: [],
      cause,
      durationMs: now() - startTime,
    };
  }
}
