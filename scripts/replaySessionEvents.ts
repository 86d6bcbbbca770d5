#!/usr/bin/env ts-node
import "dotenv/config";
import { loadSessionEvents } from "../src/persistence";

async function main() {
  const sessionId = process.argv[2];
  const limit = parseInt(process.argv[3] || "200", 10);
  if (!sessionId) {
    console.error("Usage: replaySessionEvents <sessionId> [limit]");
    process.exit(1);
  }
  const events = await loadSessionEvents(sessionId, limit);
  if (!events) {
    console.error("Firestore not initialized. Set credentials/env before running.");
    process.exit(1);
  }
  events.forEach((evt) => {
    console.log(`#${evt.seq} [${new Date(evt.ts).toISOString()}] ${evt.kind}`, evt.payload);
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
