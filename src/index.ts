import "dotenv/config";
import { getConfig } from "./config";
import { createEventSink } from "./guide/eventLog";
import { OpenAIGenerationClient } from "./guide/generationClient";
import { GuideOrchestrator } from "./guide/orchestrator";
import { SessionManager } from "./sessionManager";
import { createGuideHandlers } from "./handlers";
import { makeRouter } from "./router";
import { createTransport } from "./transport";
import { fireAndForget } from "./errors";
import { log, logError, logEvent } from "./logger";

const config = getConfig();
if (!config.openaiApiKey) {
  log("[warn] OPENAI_API_KEY is not set; triage falls back to the recovery-position protocol and reassurance is fixed.");
}

const eventSink = createEventSink();
const orchestrator = new GuideOrchestrator({
  generation: new OpenAIGenerationClient(),
  eventSink,
});

const sessionManager = new SessionManager((sessionId) => orchestrator.start(sessionId));
sessionManager.onSessionEmpty((sessionId) => {
  logEvent("session.dropped", { sessionId });
});

const handlers = createGuideHandlers({
  orchestrator,
  sessionManager,
  lockTimeoutMs: config.sessionLockTimeoutMs,
});

const transport = createTransport({
  port: config.port,
  maxPayloadBytes: config.maxWsPayloadBytes,
  handleMessage: makeRouter({ sessionManager, handlers }),
  sessionManager,
  recentEvents: config.isProduction ? undefined : (limit) => eventSink.getRecent?.(limit) ?? [],
});

function shutdown(signal: string) {
  log(`Received ${signal}; closing gateway`);
  fireAndForget(
    transport.close().then(() => process.exit(0)),
    "shutdown",
    logError
  );
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
