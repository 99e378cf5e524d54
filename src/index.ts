/**
 * story-autopilot: drive a third-party guided story flow to completion
 *
 * - **ui-query**: locator cascades and the query/act facade over a live render
 * - **strategies**: progression, token-tap, multiple-choice and text-fill policies
 * - **step-loop**: action resolver, completion detector and the budgeted turn loop
 * - **session**: Playwright profile launch, scoped release, login and navigation
 */

export { runStory, COOLDOWN_MS } from "./run";
export type { RunDependencies } from "./run";

export * from "./ui-query";
export * from "./strategies";
export * from "./step-loop";
export * from "./session";
export * from "./config";

export {
  WaitTimeoutError,
  AuthError,
  InfrastructureError,
  ConfigError,
  isFatalError,
  isDisconnectError,
} from "./errors";
export type { FatalError } from "./errors";
export { delay, pollUntil, withTimeout } from "./timing";
export type { Sleep, PollOptions } from "./timing";
