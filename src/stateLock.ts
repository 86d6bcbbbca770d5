/**
 * Session Lock - serializes guide operations per session.
 *
 * A session context is mutated in place by triage, advance and report; two
 * sockets on the same session must not interleave those operations. Different
 * sessions never wait on each other.
 */

import { log, logError } from "./logger";
import { LockTimeoutError } from "./errors";

interface LockState {
  queue: Promise<void>;
  count: number;
}
const sessionLocks = new Map<string, LockState>();

const DEFAULT_LOCK_TIMEOUT_MS = 60000;

/**
 * Execute a function with exclusive access to a session.
 *
 * @param operation - Description for logging
 * @param timeoutMs - How long to wait for earlier operations before giving up
 * @throws LockTimeoutError if earlier operations hold the lock too long, or whatever `fn` throws
 *
 * @example
 * ```typescript
 * await withSessionLock(sessionId, "advance", async () => {
 *   return orchestrator.advanceInstruction(ctx, text);
 * });
 * ```
 */
export async function withSessionLock<T>(
  sessionId: string,
  operation: string,
  fn: () => Promise<T>,
  timeoutMs = DEFAULT_LOCK_TIMEOUT_MS
): Promise<T> {
  const lockStart = Date.now();

  const lockState = sessionLocks.get(sessionId) ?? { queue: Promise.resolve(), count: 0 };
  const existingQueue = lockState.queue;

  lockState.count++;
  sessionLocks.set(sessionId, lockState);

  let releaseOurLock: () => void = () => undefined;
  const ourLock = new Promise<void>((resolve) => {
    releaseOurLock = resolve;
  });
  lockState.queue = existingQueue.then(() => ourLock);

  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      existingQueue,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new LockTimeoutError(sessionId, operation, timeoutMs)), timeoutMs);
      }),
    ]);
    clearTimeout(timer);

    const waitTime = Date.now() - lockStart;
    if (waitTime > 100) {
      log(`[sessionLock] ${operation} waited ${waitTime}ms for lock on ${sessionId}`);
    }

    return await fn();
  } catch (err) {
    if (err instanceof LockTimeoutError) {
      logError(`[sessionLock] Lock timeout for ${sessionId}:`, operation);
    }
    throw err;
  } finally {
    clearTimeout(timer);
    releaseOurLock();

    const currentState = sessionLocks.get(sessionId);
    if (currentState) {
      currentState.count--;
      if (currentState.count <= 0) {
        sessionLocks.delete(sessionId);
      }
    }
  }
}

/** Clear all locks. Only use in tests or shutdown. */
export function clearAllLocks(): void {
  sessionLocks.clear();
}

export function getActiveLockCount(): number {
  return sessionLocks.size;
}
