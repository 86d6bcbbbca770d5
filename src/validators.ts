import { z } from "zod";
import type { ClientToServerMessage } from "./messageTypes";

const MAX_TEXT_CHARS = 4000;

const sessionId = z.string().trim().min(1).max(128);
const userText = z.string().trim().min(1).max(MAX_TEXT_CHARS);

const joinSchema = z.object({
  type: z.literal("join"),
  sessionId,
});

const triageSchema = z.object({
  type: z.literal("triage"),
  sessionId,
  text: userText,
});

const updateSchema = z.object({
  type: z.literal("update"),
  sessionId,
  text: userText,
});

const reportSchema = z.object({
  type: z.literal("report"),
  sessionId,
});

const pingSchema = z.object({
  type: z.literal("ping"),
  sessionId: z.string().optional(),
});

const messageSchema = z.discriminatedUnion("type", [joinSchema, triageSchema, updateSchema, reportSchema, pingSchema]);

export function validateMessage(msg: unknown): ClientToServerMessage | null {
  const parsed = messageSchema.safeParse(msg);
  if (!parsed.success) return null;
  return parsed.data;
}
