import type { SessionEvent } from "./types";
import { logSessionEvent } from "../persistence";
import { logError } from "../logger";
import { getConfig } from "../config";

export type RecordedEvent = { sessionId: string; seq: number; event: SessionEvent };

/**
 * Receives every event the orchestrator appends to a session. The session's
 * own `events` array stays the source of truth; sinks are mirrors. `seq` is
 * the event's position in that array, since several events can share a `ts`.
 */
export interface EventSink {
  append(sessionId: string, event: SessionEvent, seq: number): void;
  getRecent?(limit?: number): RecordedEvent[];
}

export class InMemoryEventSink implements EventSink {
  private events: RecordedEvent[] = [];

  constructor(private readonly capacity = 5000) {}

  append(sessionId: string, event: SessionEvent, seq: number): void {
    this.events.push({ sessionId, seq, event });
    if (this.events.length > this.capacity) {
      this.events.shift();
    }
  }

  getRecent(limit = 50): RecordedEvent[] {
    return this.events.slice(-limit);
  }
}

/**
 * Firestore-backed mirror for audit and replay.
 * Writes to sessions/{sessionId}/events without blocking the session.
 */
export class FirestoreEventSink implements EventSink {
  append(sessionId: string, event: SessionEvent, seq: number): void {
    logSessionEvent(sessionId, event, seq).catch((err: unknown) => {
      logError(`[eventLog] Firestore mirror failed for ${sessionId} (${event.kind})`, err);
    });
  }
}

export class CompositeEventSink implements EventSink {
  private readonly sinks: EventSink[];
  private readonly memory?: InMemoryEventSink;

  constructor(...sinks: EventSink[]) {
    this.sinks = sinks;
    this.memory = sinks.find((sink): sink is InMemoryEventSink => sink instanceof InMemoryEventSink);
  }

  append(sessionId: string, event: SessionEvent, seq: number): void {
    for (const sink of this.sinks) {
      try {
        sink.append(sessionId, event, seq);
      } catch (err) {
        logError("[eventLog] sink append failed", err);
      }
    }
  }

  getRecent(limit = 50): RecordedEvent[] {
    return this.memory?.getRecent(limit) ?? [];
  }
}

/**
 * Memory-only by default; production with a Firestore service account also
 * mirrors to Firestore.
 */
export function createEventSink(): EventSink {
  const { isProduction, hasFirestoreCredentials } = getConfig();
  if (isProduction && hasFirestoreCredentials) {
    return new CompositeEventSink(new InMemoryEventSink(), new FirestoreEventSink());
  }
  return new InMemoryEventSink();
}
