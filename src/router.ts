import WebSocket from "ws";
import { ClientContext, send } from "./transport";
import type { GuideSocket, SessionManager } from "./sessionManager";
import type { GuideHandlers } from "./handlers";
import { getSessionState } from "./guide/types";
import { validateMessage } from "./validators";
import { log, logError, logEvent } from "./logger";

export function rawDataToString(raw: WebSocket.RawData | string): string {
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

export function makeRouter(opts: { sessionManager: SessionManager; handlers: GuideHandlers }) {
  const { sessionManager, handlers } = opts;

  return async function route(ws: GuideSocket, ctx: ClientContext, raw: WebSocket.RawData | string): Promise<void> {
    let decoded: unknown;
    try {
      decoded = JSON.parse(rawDataToString(raw));
    } catch (err) {
      logError("Invalid JSON", err);
      send(ws, { type: "error", message: "Invalid JSON" });
      return;
    }

    const parsed = validateMessage(decoded);
    if (!parsed) {
      send(ws, { type: "error", message: "Invalid message shape" });
      return;
    }

    if (parsed.type === "ping") {
      send(ws, { type: "pong" });
      return;
    }

    if (parsed.type === "join") {
      if (ctx.joined && ctx.sessionId && ctx.sessionId !== parsed.sessionId) {
        sessionManager.leave(ctx.sessionId, ws);
      }
      const { context, created } = sessionManager.join(parsed.sessionId, ws);
      ctx.joined = true;
      ctx.sessionId = parsed.sessionId;
      send(ws, { type: "joined", sessionId: parsed.sessionId, state: getSessionState(context) });
      logEvent("ws.join", { sessionId: parsed.sessionId, created });
      log("Client joined", parsed.sessionId);
      return;
    }

    if (!ctx.joined || !ctx.sessionId) {
      send(ws, { type: "error", message: "Must join first" });
      return;
    }
    if (parsed.sessionId !== ctx.sessionId) {
      send(ws, { type: "error", sessionId: parsed.sessionId, message: "Session mismatch" });
      return;
    }

    switch (parsed.type) {
      case "triage":
        await handlers.handleTriage(ctx.sessionId, parsed.text, ws);
        return;
      case "update":
        await handlers.handleUpdate(ctx.sessionId, parsed.text, ws);
        return;
      case "report":
        await handlers.handleReport(ctx.sessionId, ws);
        return;
    }
  };
}
