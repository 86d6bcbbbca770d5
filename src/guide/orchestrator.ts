import { FALLBACK_EMERGENCY_TYPE, lookupProtocol } from "./protocols";
import {
  CALMER_PERSONA,
  INSTRUCTOR_PERSONA,
  REPORTER_PERSONA,
  TRIAGE_PERSONA,
  instructionOutputSchema,
  triageOutputSchema,
  type Persona,
  type TriageOutput,
} from "./personas";
import { parseStructuredOutput } from "./structuredOutput";
import type { GenerationClient } from "./generationClient";
import type { EventSink } from "./eventLog";
import type {
  InstructionResult,
  SessionContext,
  SessionEvent,
  SessionEventKind,
  TriageOutcome,
  TriagePayload,
} from "./types";
import { ProtocolNotFoundError, SessionSequenceError } from "../errors";
import { logError, logEvent } from "../logger";

export const FALLBACK_CALMING_MESSAGE =
  "You're doing the right thing. Keep going with the current step; help is on the way.";

const FALLBACK_TRIAGE: TriagePayload = {
  emergency_type: null,
  confidence: null,
  summary: "",
  red_flags: [],
};

type PendingEvent = {
  [K in SessionEventKind]: Omit<Extract<SessionEvent, { kind: K }>, "ts">;
}[SessionEventKind];

export type OrchestratorOptions = {
  generation: GenerationClient;
  eventSink?: EventSink;
  /** Clock for event timestamps. */
  now?: () => number;
};

function normalizeTriage(output: TriageOutput): TriagePayload {
  const type = output.emergency_type?.trim().toLowerCase();
  return {
    emergency_type: type ? type : null,
    confidence: output.confidence ?? null,
    summary: output.summary ?? "",
    red_flags: output.red_flags ?? [],
  };
}

/**
 * Runs the guided first-aid workflow for one session at a time:
 * triage, one protocol step per user update, then the EMT handoff report.
 *
 * The caller owns each SessionContext and must not run two operations on the
 * same context concurrently.
 */
export class GuideOrchestrator {
  private readonly generation: GenerationClient;
  private readonly eventSink?: EventSink;
  private readonly now: () => number;

  constructor(opts: OrchestratorOptions) {
    this.generation = opts.generation;
    this.eventSink = opts.eventSink;
    this.now = opts.now ?? Date.now;
  }

  start(sessionId: string): SessionContext {
    return {
      sessionId,
      currentStepIndex: 0,
      done: false,
      events: [],
    };
  }

  async triage(ctx: SessionContext, userMessage: string): Promise<TriageOutcome> {
    this.append(ctx, { kind: "user_message", payload: userMessage });
    const raw = await this.callPersona(TRIAGE_PERSONA, ctx.sessionId, userMessage);
    this.append(ctx, { kind: "triage_output_raw", payload: raw });

    const parsed = parseStructuredOutput(raw, triageOutputSchema);
    const triage: TriagePayload = parsed.ok ? normalizeTriage(parsed.value) : { ...FALLBACK_TRIAGE, red_flags: [] };
    if (!parsed.ok) {
      logEvent("triage.fallback", { sessionId: ctx.sessionId, reason: parsed.reason, detail: parsed.detail });
    }
    this.append(ctx, { kind: "triage_output_parsed", payload: { ...triage, fallback: !parsed.ok } });

    const emergencyType = triage.emergency_type ?? FALLBACK_EMERGENCY_TYPE;
    ctx.emergencyType = emergencyType;

    const lookup = lookupProtocol(emergencyType);
    this.append(ctx, { kind: "protocol_lookup", payload: lookup });
    if (!lookup.ok) {
      ctx.protocol = undefined;
      ctx.currentStepIndex = 0;
      ctx.done = false;
      logError(`[guide] ${lookup.message}`, { sessionId: ctx.sessionId });
      throw new ProtocolNotFoundError(lookup.emergencyType);
    }

    ctx.protocol = lookup.protocol;
    ctx.currentStepIndex = 0;
    ctx.done = false;
    logEvent("triage.complete", {
      sessionId: ctx.sessionId,
      emergencyType: lookup.emergencyType,
      confidence: triage.confidence,
      fallback: !parsed.ok,
    });

    return { emergencyType: lookup.emergencyType, protocol: lookup.protocol, triage, fallback: !parsed.ok };
  }

  /**
   * Always moves exactly one step forward, pinned at the last step. The
   * instructor persona's recommendation is logged but does not drive pacing.
   */
  async advanceInstruction(ctx: SessionContext, userUpdate: string): Promise<InstructionResult> {
    const protocol = ctx.protocol;
    if (!protocol) {
      throw new SessionSequenceError(ctx.sessionId, "advanceInstruction");
    }

    const steps = protocol.steps;
    const lastIndex = steps.length - 1;
    this.append(ctx, { kind: "user_update", payload: userUpdate });

    const instructorInput = JSON.stringify({
      emergency_type: ctx.emergencyType ?? null,
      protocol_title: protocol.title,
      steps,
      current_step_index: ctx.currentStepIndex,
      user_update: userUpdate,
    });
    const nextIndex = Math.min(ctx.currentStepIndex + 1, lastIndex);
    const done = nextIndex === lastIndex;
    const calmerInput = `User said: "${userUpdate}". They are on step ${nextIndex + 1} of ${steps.length}.`;

    // No data dependency between the two; events still go in issue order.
    const [instructionRaw, calmingRaw] = await Promise.all([
      this.callPersona(INSTRUCTOR_PERSONA, ctx.sessionId, instructorInput),
      this.callPersona(CALMER_PERSONA, ctx.sessionId, calmerInput),
    ]);
    this.append(ctx, { kind: "instruction_output_raw", payload: instructionRaw });
    this.append(ctx, { kind: "calming_output_raw", payload: calmingRaw });
    this.noteInstructorAdvice(ctx.sessionId, instructionRaw, nextIndex, done);

    ctx.currentStepIndex = nextIndex;
    ctx.done = done;

    const calming = calmingRaw.trim();
    return {
      instructionMessage: steps[nextIndex],
      calmingMessage: calming ? calming : FALLBACK_CALMING_MESSAGE,
      done,
      stepIndex: nextIndex,
      stepCount: steps.length,
    };
  }

  async generateReport(ctx: SessionContext): Promise<string> {
    const serialized = JSON.stringify(ctx.events, null, 2);
    const report = await this.callPersona(REPORTER_PERSONA, ctx.sessionId, serialized);
    this.append(ctx, { kind: "emt_report", payload: report });
    logEvent("report.generated", { sessionId: ctx.sessionId, events: ctx.events.length, chars: report.length });
    return report;
  }

  private append(ctx: SessionContext, pending: PendingEvent) {
    const event: SessionEvent = { ...pending, ts: this.now() };
    const seq = ctx.events.push(event) - 1;
    this.eventSink?.append(ctx.sessionId, event, seq);
  }

  private async callPersona(persona: Persona, sessionId: string, input: string): Promise<string> {
    try {
      return await this.generation.generate({ persona, sessionId, input });
    } catch (err) {
      logError(`[guide] ${persona.name} generation rejected; treating as empty output`, err);
      return "";
    }
  }

  private noteInstructorAdvice(sessionId: string, raw: string, appliedIndex: number, appliedDone: boolean) {
    const advice = parseStructuredOutput(raw, instructionOutputSchema);
    if (!advice.ok) return;
    const { next_step_index, done } = advice.value;
    if (next_step_index !== appliedIndex || done !== appliedDone) {
      logEvent("instruction.advice_ignored", {
        sessionId,
        advisedIndex: next_step_index,
        advisedDone: done,
        appliedIndex,
        appliedDone,
      });
    }
  }
}
