import type { EmergencyType, Protocol, ProtocolLookupResult } from "./protocols";

export type TriagePayload = {
  emergency_type: string | null;
  confidence: number | null;
  summary: string;
  red_flags: string[];
};

type EventBase<K extends string, P> = {
  kind: K;
  /** Epoch milliseconds from the orchestrator clock. */
  ts: number;
  payload: P;
};

export type SessionEvent =
  | EventBase<"user_message", string>
  | EventBase<"triage_output_raw", string>
  | EventBase<"triage_output_parsed", TriagePayload & { fallback: boolean }>
  | EventBase<"protocol_lookup", ProtocolLookupResult>
  | EventBase<"user_update", string>
  | EventBase<"instruction_output_raw", string>
  | EventBase<"calming_output_raw", string>
  | EventBase<"emt_report", string>;

export type SessionEventKind = SessionEvent["kind"];

export type SessionContext = {
  sessionId: string;
  /** Parsed or fallback type; set by triage. */
  emergencyType?: string;
  /** Set only when triage's lookup succeeded. */
  protocol?: Protocol;
  currentStepIndex: number;
  done: boolean;
  /** Append-only; order is the conversation timeline. */
  events: SessionEvent[];
};

export type SessionState = "unstarted" | "triaged" | "in_progress" | "complete";

export function getSessionState(ctx: SessionContext): SessionState {
  if (!ctx.protocol) return "unstarted";
  if (ctx.done) return "complete";
  return ctx.currentStepIndex > 0 ? "in_progress" : "triaged";
}

export type TriageOutcome = {
  emergencyType: EmergencyType;
  protocol: Protocol;
  triage: TriagePayload;
  /** True when the triage reply could not be decoded. */
  fallback: boolean;
};

export type InstructionResult = {
  instructionMessage: string;
  calmingMessage: string;
  done: boolean;
  stepIndex: number;
  stepCount: number;
};
