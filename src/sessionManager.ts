import WebSocket from "ws";
import type { ServerToClientMessage } from "./messageTypes";
import type { SessionContext } from "./guide/types";

/** The part of a ws socket the gateway writes to. */
export interface GuideSocket {
  readonly readyState: number;
  send(data: string): void;
}

type GuideSession = {
  context: SessionContext;
  sockets: Set<GuideSocket>;
};

export class SessionManager {
  private sessions: Map<string, GuideSession> = new Map();
  private onSessionEmptyCallback?: (sessionId: string) => void;

  constructor(private readonly createContext: (sessionId: string) => SessionContext) {}

  /** Register callback to be notified when a session has no more clients */
  onSessionEmpty(callback: (sessionId: string) => void) {
    this.onSessionEmptyCallback = callback;
  }

  /** Attach a socket; the session context is created on first join only. */
  join(sessionId: string, ws: GuideSocket): { context: SessionContext; created: boolean } {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.sockets.add(ws);
      return { context: existing.context, created: false };
    }
    const session: GuideSession = { context: this.createContext(sessionId), sockets: new Set([ws]) };
    this.sessions.set(sessionId, session);
    return { context: session.context, created: true };
  }

  leave(sessionId: string, ws: GuideSocket) {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    session.sockets.delete(ws);
    if (session.sockets.size === 0) {
      this.sessions.delete(sessionId);
      this.onSessionEmptyCallback?.(sessionId);
    }
  }

  getContext(sessionId: string): SessionContext | undefined {
    return this.sessions.get(sessionId)?.context;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  broadcastToSession(sessionId: string, msg: ServerToClientMessage) {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    const payload = JSON.stringify(msg);
    session.sockets.forEach((sock) => {
      if (sock.readyState === WebSocket.OPEN) {
        sock.send(payload);
      }
    });
  }
}
