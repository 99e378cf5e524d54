// ============================================================================
// SCOPED SESSION: acquire, use, always release
// ============================================================================

import { withTimeout } from "../timing";
import { toError } from "../errors";
import { CLOSE_TIMEOUT_MS } from "./types";

interface Closeable {
  close(): Promise<void>;
}

/** Close a session, bounded in time. A failed close is logged, never thrown. */
export async function releaseSession(session: Closeable, timeoutMs: number = CLOSE_TIMEOUT_MS): Promise<void> {
  try {
    await withTimeout(session.close(), timeoutMs, `Browser close timed out after ${timeoutMs / 1000}s`);
  } catch (error) {
    console.error(`[releaseSession] ${toError(error).message}`);
  }
}

/**
 * Open a session, hand it to `use`, and release it whether `use` returns or
 * throws. A release failure never masks the error thrown by `use`.
 */
export async function withSession<S extends Closeable, T>(
  open: () => Promise<S>,
  use: (session: S) => Promise<T>,
  closeTimeoutMs: number = CLOSE_TIMEOUT_MS
): Promise<T> {
  const session = await open();
  try {
    return await use(session);
  } finally {
    await releaseSession(session, closeTimeoutMs);
  }
}
