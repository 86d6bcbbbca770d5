import type { GenerationClient, GenerationRequest } from "../generationClient";
import type { PersonaId } from "../personas";

type Reply = string | Error;
export type FakeScript = { [K in PersonaId]?: Reply | Reply[] };

/**
 * Scripted generation client. A single reply repeats forever; a list is
 * consumed in order and then yields "".
 */
export class FakeGenerationClient implements GenerationClient {
  readonly calls: GenerationRequest[] = [];

  constructor(private readonly script: FakeScript = {}) {}

  generate(request: GenerationRequest): Promise<string> {
    this.calls.push(request);
    const entry = this.script[request.persona.id];
    const reply = Array.isArray(entry) ? entry.shift() ?? "" : entry ?? "";
    return reply instanceof Error ? Promise.reject(reply) : Promise.resolve(reply);
  }

  personasCalled(): PersonaId[] {
    return this.calls.map((call) => call.persona.id);
  }
}

export function triageJson(emergencyType: string | null, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    emergency_type: emergencyType,
    confidence: 0.9,
    summary: "Adult collapsed and is not breathing",
    red_flags: ["not breathing"],
    ...extra,
  });
}
