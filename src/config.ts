import { z } from "zod";
import { logWarn } from "./logger";
import type { PersonaId } from "./guide/personas";

const DEFAULT_MODEL = "gpt-4.1-mini";

export type GuideConfig = {
  openaiApiKey?: string;
  model: string;
  /** Per-persona model overrides; personas without one use `model`. */
  personaModels: Partial<Record<PersonaId, string>>;
  generationTimeoutMs: number;
  generationMaxRetries: number;
  sessionLockTimeoutMs: number;
  port: number;
  maxWsPayloadBytes: number;
  isProduction: boolean;
  hasFirestoreCredentials: boolean;
};

type Env = Record<string, string | undefined>;

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val ? val : undefined));

function readInt(env: Env, name: string, schema: z.ZodNumber, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logWarn(`[config] ${name}=${JSON.stringify(raw)} is invalid; using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}

function readText(env: Env, name: string): string | undefined {
  return optionalText.parse(env[name]);
}

export function loadConfig(env: Env = process.env): GuideConfig {
  const personaModels: Partial<Record<PersonaId, string>> = {};
  const overrides: [PersonaId, string][] = [
    ["triage", "OPENAI_TRIAGE_MODEL"],
    ["instructor", "OPENAI_INSTRUCTOR_MODEL"],
    ["calmer", "OPENAI_CALMER_MODEL"],
    ["reporter", "OPENAI_REPORT_MODEL"],
  ];
  for (const [persona, name] of overrides) {
    const model = readText(env, name);
    if (model) personaModels[persona] = model;
  }

  return {
    openaiApiKey: readText(env, "OPENAI_API_KEY"),
    model: readText(env, "OPENAI_MODEL") ?? DEFAULT_MODEL,
    personaModels,
    generationTimeoutMs: readInt(env, "GENERATION_TIMEOUT_MS", positiveInt, 15000),
    generationMaxRetries: readInt(env, "GENERATION_MAX_RETRIES", nonNegativeInt, 1),
    sessionLockTimeoutMs: readInt(env, "SESSION_LOCK_TIMEOUT_MS", positiveInt, 60000),
    port: readInt(env, "PORT", positiveInt, 8081),
    maxWsPayloadBytes: readInt(env, "MAX_WS_PAYLOAD_BYTES", positiveInt, 65536),
    isProduction: env.NODE_ENV === "production",
    hasFirestoreCredentials: Boolean(
      readText(env, "FIREBASE_SERVICE_ACCOUNT") ?? readText(env, "GOOGLE_APPLICATION_CREDENTIALS")
    ),
  };
}

let cached: GuideConfig | null = null;

export function getConfig(): GuideConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
