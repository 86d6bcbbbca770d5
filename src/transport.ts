import WebSocket from "ws";
import http from "http";
import type { ServerToClientMessage } from "./messageTypes";
import type { GuideSocket, SessionManager } from "./sessionManager";
import type { RecordedEvent } from "./guide/eventLog";
import { getActiveLockCount } from "./stateLock";
import { fireAndForget } from "./errors";
import { log, logError, logEvent } from "./logger";

const HEALTH_PATH = "/health";
const RECENT_EVENTS_PATH = "/debug/events";
const DEFAULT_RECENT_EVENTS = 50;
const MAX_RECENT_EVENTS = 500;
// Frames past the soft cap get an error reply; ws drops anything past this many times the cap with 1009.
const HARD_PAYLOAD_MULTIPLIER = 4;
export const GUIDE_WS_PATH = "/ws/guide";

export type ClientContext = {
  joined: boolean;
  sessionId: string | null;
};

export type MessageHandler = (ws: WebSocket, ctx: ClientContext, raw: WebSocket.RawData) => Promise<void>;

export function rawDataByteLength(data: WebSocket.RawData): number {
  if (Array.isArray(data)) return data.reduce((total, chunk) => total + chunk.byteLength, 0);
  return data.byteLength;
}

export function parseRecentLimit(raw: string | null): number {
  const parsed = raw === null ? NaN : Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_RECENT_EVENTS;
  return Math.min(parsed, MAX_RECENT_EVENTS);
}

export function createTransport(opts: {
  port: number;
  maxPayloadBytes: number;
  handleMessage: MessageHandler;
  sessionManager: SessionManager;
  /** Serves GET /debug/events when set; leave unset in production. */
  recentEvents?: (limit: number) => RecordedEvent[];
}) {
  const { port, maxPayloadBytes, handleMessage, sessionManager, recentEvents } = opts;
  const server = http.createServer();
  const wss = new WebSocket.Server({
    server,
    path: GUIDE_WS_PATH,
    maxPayload: maxPayloadBytes * HARD_PAYLOAD_MULTIPLIER,
  });

  server.on("request", (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname === HEALTH_PATH) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(
        JSON.stringify({ ok: true, sessions: sessionManager.getSessionCount(), activeLocks: getActiveLockCount() })
      );
      return;
    }
    if (recentEvents && url.pathname === RECENT_EVENTS_PATH) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ events: recentEvents(parseRecentLimit(url.searchParams.get("limit"))) }));
      return;
    }
    res.writeHead(404);
    res.end();
  });

  wss.on("connection", (ws) => {
    const ctx: ClientContext = { joined: false, sessionId: null };

    ws.on("message", (data) => {
      if (rawDataByteLength(data) > maxPayloadBytes) {
        send(ws, { type: "error", message: "Payload too large" });
        ws.close();
        return;
      }
      fireAndForget(handleMessage(ws, ctx, data), "handleMessage", logError);
    });

    ws.on("close", () => {
      if (ctx.joined && ctx.sessionId) {
        sessionManager.leave(ctx.sessionId, ws);
        log("Client disconnected", ctx.sessionId);
        logEvent("ws.disconnect", { sessionId: ctx.sessionId });
      }
    });

    ws.on("error", (err) => {
      logError("Socket error", err);
    });
  });

  server.listen(port, () => {
    log(`First-aid guide gateway listening on :${port} (path: ${GUIDE_WS_PATH})`);
  });

  return {
    server,
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        wss.clients.forEach((client) => client.close());
        wss.close();
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}

export function send(ws: GuideSocket, msg: ServerToClientMessage) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(msg));
  }
}
