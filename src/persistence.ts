import admin from "firebase-admin";
import { getFirestore } from "./firebaseAdmin";
import type { SessionEvent } from "./guide/types";

export type StoredSessionEvent = {
  id: string;
  kind: string;
  ts: number;
  /** Position in the session's event log; `ts` alone does not order same-millisecond events. */
  seq: number;
  payload: unknown;
  recordedAt?: Date;
};

/** Firestore rejects nested arrays and undefined; store the payload as JSON text. */
export async function logSessionEvent(sessionId: string, event: SessionEvent, seq: number) {
  const db = getFirestore();
  if (!db) return;
  const colRef = db.collection("sessions").doc(sessionId).collection("events");
  await colRef.add({
    recordedAt: admin.firestore.FieldValue.serverTimestamp(),
    kind: event.kind,
    ts: event.ts,
    seq,
    payload: JSON.stringify(event.payload),
  });
}

function decodePayload(raw: unknown): unknown {
  if (typeof raw !== "string") return raw;
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export async function loadSessionEvents(sessionId: string, limit = 200): Promise<StoredSessionEvent[] | null> {
  const db = getFirestore();
  if (!db) return null;
  const snap = await db
    .collection("sessions")
    .doc(sessionId)
    .collection("events")
    .orderBy("seq", "asc")
    .limit(limit)
    .get();
  return snap.docs.map((doc) => {
    const data = doc.data();
    const recordedAt = data.recordedAt instanceof admin.firestore.Timestamp ? data.recordedAt.toDate() : undefined;
    return {
      id: doc.id,
      kind: typeof data.kind === "string" ? data.kind : "unknown",
      ts: typeof data.ts === "number" ? data.ts : 0,
      seq: typeof data.seq === "number" ? data.seq : 0,
      payload: decodePayload(data.payload),
      recordedAt,
    };
  });
}
