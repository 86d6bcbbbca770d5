export type GuideErrorCode = "protocol_not_found" | "triage_required" | "lock_timeout";

/**
 * Base class for errors the guide surfaces to its caller.
 * Recoverable collaborator problems never reach this layer; they are
 * substituted and logged as session events instead.
 */
export class GuideError extends Error {
  readonly code: GuideErrorCode;

  constructor(code: GuideErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Triage resolved an emergency type the protocol catalog does not know. */
export class ProtocolNotFoundError extends GuideError {
  readonly emergencyType: string;

  constructor(emergencyType: string) {
    super("protocol_not_found", `Protocol lookup failed: unknown emergency type "${emergencyType}"`);
    this.emergencyType = emergencyType;
  }
}

/** An operation that needs a protocol ran before triage succeeded. */
export class SessionSequenceError extends GuideError {
  readonly sessionId: string;

  constructor(sessionId: string, operation: string) {
    super("triage_required", `Protocol is not set for session ${sessionId}; run triage before ${operation}`);
    this.sessionId = sessionId;
  }
}

export class LockTimeoutError extends GuideError {
  constructor(sessionId: string, operation: string, timeoutMs: number) {
    super("lock_timeout", `Session lock timeout after ${timeoutMs}ms for ${sessionId} operation ${operation}`);
  }
}

export function isGuideError(err: unknown): err is GuideError {
  return err instanceof GuideError;
}

/**
 * Run a background promise and log its rejection.
 * Use instead of `.catch(() => {})` or a bare `void promise`.
 */
export function fireAndForget(promise: Promise<unknown>, context: string, log: (...args: unknown[]) => void): void {
  promise.catch((err: unknown) => {
    log(`[fireAndForget] ${context} failed:`, err);
  });
}
