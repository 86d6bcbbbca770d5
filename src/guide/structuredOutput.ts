import { z } from "zod";

export type ParseFailureReason = "empty" | "invalid_json" | "schema_mismatch";

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: ParseFailureReason; detail: string };

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/** Models sometimes wrap JSON in a markdown fence even in JSON mode. */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const match = FENCE_PATTERN.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/**
 * Decode persona output against a schema. Never throws: empty text, bad JSON
 * and schema mismatches all come back as tagged failures.
 */
export function parseStructuredOutput<S extends z.ZodTypeAny>(raw: string, schema: S): ParseResult<z.infer<S>> {
  const text = stripCodeFence(raw);
  if (!text) {
    return { ok: false, reason: "empty", detail: "no output" };
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: "invalid_json", detail: err instanceof Error ? err.message : String(err) };
  }

  const parsed = schema.safeParse(decoded);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    return { ok: false, reason: "schema_mismatch", detail };
  }
  return { ok: true, value: parsed.data };
}
