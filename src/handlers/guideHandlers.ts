/**
 * Guide message handlers
 * Runs orchestrator operations for a joined session under the session lock
 * and broadcasts results to every socket on that session.
 */

import type { GuideOrchestrator } from "../guide/orchestrator";
import type { SessionContext } from "../guide/types";
import type { GuideSocket, SessionManager } from "../sessionManager";
import { send } from "../transport";
import { withSessionLock } from "../stateLock";
import { isGuideError } from "../errors";
import { logError, logEvent } from "../logger";

// ============================================================================
// Types
// ============================================================================

export interface GuideHandlerDeps {
  orchestrator: GuideOrchestrator;
  sessionManager: SessionManager;
  lockTimeoutMs: number;
}

export interface GuideHandlers {
  handleTriage: (sessionId: string, text: string, ws: GuideSocket) => Promise<void>;
  handleUpdate: (sessionId: string, text: string, ws: GuideSocket) => Promise<void>;
  handleReport: (sessionId: string, ws: GuideSocket) => Promise<void>;
}

// ============================================================================
// Factory
// ============================================================================

export function createGuideHandlers(deps: GuideHandlerDeps): GuideHandlers {
  const { orchestrator, sessionManager, lockTimeoutMs } = deps;

  async function runLocked(
    sessionId: string,
    operation: string,
    ws: GuideSocket,
    fn: (ctx: SessionContext) => Promise<void>
  ): Promise<void> {
    try {
      await withSessionLock(
        sessionId,
        operation,
        async () => {
          const ctx = sessionManager.getContext(sessionId);
          if (!ctx) {
            send(ws, { type: "error", sessionId, message: "Session not found; join again" });
            return;
          }
          await fn(ctx);
        },
        lockTimeoutMs
      );
    } catch (err) {
      if (isGuideError(err)) {
        logEvent("guide.error", { sessionId, operation, code: err.code });
        send(ws, { type: "error", sessionId, code: err.code, message: err.message });
        return;
      }
      logError(`[handlers] ${operation} failed for ${sessionId}`, err);
      send(ws, { type: "error", sessionId, message: `${operation} failed` });
    }
  }

  async function handleTriage(sessionId: string, text: string, ws: GuideSocket): Promise<void> {
    await runLocked(sessionId, "triage", ws, async (ctx) => {
      const outcome = await orchestrator.triage(ctx, text);
      sessionManager.broadcastToSession(sessionId, {
        type: "triage_result",
        sessionId,
        emergencyType: outcome.emergencyType,
        protocolTitle: outcome.protocol.title,
        firstStep: outcome.protocol.steps[0],
        stepCount: outcome.protocol.steps.length,
        confidence: outcome.triage.confidence,
        redFlags: outcome.triage.red_flags,
      });
    });
  }

  async function handleUpdate(sessionId: string, text: string, ws: GuideSocket): Promise<void> {
    await runLocked(sessionId, "update", ws, async (ctx) => {
      const result = await orchestrator.advanceInstruction(ctx, text);
      sessionManager.broadcastToSession(sessionId, { type: "instruction", sessionId, ...result });
    });
  }

  async function handleReport(sessionId: string, ws: GuideSocket): Promise<void> {
    await runLocked(sessionId, "report", ws, async (ctx) => {
      const text = await orchestrator.generateReport(ctx);
      sessionManager.broadcastToSession(sessionId, { type: "report", sessionId, text });
    });
  }

  return { handleTriage, handleUpdate, handleReport };
}
