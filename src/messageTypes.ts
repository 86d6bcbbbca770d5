import type { EmergencyType } from "./guide/protocols";
import type { SessionState } from "./guide/types";
import type { GuideErrorCode } from "./errors";

export type ClientToServerMessage =
  | { type: "join"; sessionId: string }
  | { type: "triage"; sessionId: string; text: string }
  | { type: "update"; sessionId: string; text: string }
  | { type: "report"; sessionId: string }
  | { type: "ping"; sessionId?: string };

export type ServerToClientMessage =
  | { type: "joined"; sessionId: string; state: SessionState }
  | {
      type: "triage_result";
      sessionId: string;
      emergencyType: EmergencyType;
      protocolTitle: string;
      firstStep: string;
      stepCount: number;
      confidence: number | null;
      redFlags: string[];
    }
  | {
      type: "instruction";
      sessionId: string;
      instructionMessage: string;
      calmingMessage: string;
      done: boolean;
      stepIndex: number;
      stepCount: number;
    }
  | { type: "report"; sessionId: string; text: string }
  | { type: "pong" }
  | { type: "error"; message: string; code?: GuideErrorCode; sessionId?: string };
