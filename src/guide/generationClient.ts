import { getOpenAIClient } from "../openaiClient";
import { getConfig } from "../config";
import { log, logError } from "../logger";
import type { Persona, PersonaId } from "./personas";

export type GenerationRequest = {
  persona: Persona;
  sessionId: string;
  input: string;
};

/**
 * The text-generation boundary. Implementations resolve to "" instead of
 * rejecting when the model is unavailable, slow or returns nothing.
 */
export interface GenerationClient {
  generate(request: GenerationRequest): Promise<string>;
}

type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

/** The slice of the OpenAI chat completions API the guide uses. */
export interface ChatCompletionsApi {
  create(
    body: {
      model: string;
      messages: ChatMessage[];
      response_format?: { type: "json_object" };
      user?: string;
    },
    options?: { timeout?: number; maxRetries?: number }
  ): Promise<{ choices: { message: { content: string | null } }[] }>;
}

export type OpenAIGenerationOptions = {
  /** Defaults to the shared OpenAI client; null disables generation. */
  completions?: ChatCompletionsApi | null;
  model?: string;
  personaModels?: Partial<Record<PersonaId, string>>;
  timeoutMs?: number;
  maxRetries?: number;
};

const TIMED_OUT = Symbol("timed-out");

export class OpenAIGenerationClient implements GenerationClient {
  private readonly completions: ChatCompletionsApi | null;
  private readonly model: string;
  private readonly personaModels: Partial<Record<PersonaId, string>>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(opts: OpenAIGenerationOptions = {}) {
    const config = getConfig();
    this.completions =
      opts.completions !== undefined ? opts.completions : getOpenAIClient()?.chat.completions ?? null;
    this.model = opts.model ?? config.model;
    this.personaModels = opts.personaModels ?? config.personaModels;
    this.timeoutMs = opts.timeoutMs ?? config.generationTimeoutMs;
    this.maxRetries = opts.maxRetries ?? config.generationMaxRetries;
  }

  modelFor(persona: PersonaId): string {
    return this.personaModels[persona] ?? this.model;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const { persona, sessionId, input } = request;
    if (!this.completions) {
      log(`[generation] ${persona.name} skipped: OPENAI_API_KEY not set`);
      return "";
    }

    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.timeoutMs);
    });

    try {
      const call = this.completions.create(
        {
          model: this.modelFor(persona.id),
          messages: [
            { role: "system", content: persona.instruction },
            { role: "user", content: input },
          ],
          ...(persona.outputSchema ? { response_format: { type: "json_object" as const } } : {}),
          user: sessionId,
        },
        { timeout: this.timeoutMs, maxRetries: this.maxRetries }
      );
      const completion = await Promise.race([call, deadline]);
      if (completion === TIMED_OUT) {
        // The SDK call may still settle later; its outcome no longer matters.
        void call.catch((err: unknown) => logError(`[generation] ${persona.name} late failure after timeout`, err));
        logError(`[generation] ${persona.name} timed out after ${this.timeoutMs}ms`, { sessionId });
        return "";
      }
      const text = completion.choices[0]?.message.content ?? "";
      log(`[generation] ${persona.name} responded in ${Date.now() - started}ms`, { sessionId, chars: text.length });
      return text;
    } catch (err) {
      logError(`[generation] ${persona.name} failed`, err);
      return "";
    } finally {
      clearTimeout(timer);
    }
  }
}
