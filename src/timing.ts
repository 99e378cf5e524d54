// ============================================================================
// TIMING: delays and bounded polling
// ============================================================================

import { WaitTimeoutError } from "./errors";

export type Sleep = (ms: number) => Promise<void>;

/** Delay helper for pacing and polling. */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Poll `probe` until it yields a non-null value. Throws WaitTimeoutError naming
 * `what` once `timeoutMs` has elapsed; the probe is always tried at least once.
 */
export async function pollUntil<T>(
  what: string,
  probe: () => Promise<T | null>,
  options: PollOptions
): Promise<T> {
  const { timeoutMs, intervalMs = 250, sleep = delay, now = Date.now } = options;
  const deadline = now() + timeoutMs;

  for (;;) {
    const value = await probe();
    if (value !== null) return value;
    if (now() >= deadline) throw new WaitTimeoutError(what, timeoutMs);
    await sleep(intervalMs);
  }
}

/**
 * Reject with `timeoutError` if `promise` has not settled within `ms`.
 * The timer is cleared either way so nothing keeps the process alive.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, timeoutError: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error(timeoutError)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
