import OpenAI from "openai";
import { getConfig } from "./config";
import { logWarn } from "./logger";

let warned = false;
let client: OpenAI | null = null;

export function getOpenAIClient(): OpenAI | null {
  if (client) return client;
  const { openaiApiKey } = getConfig();
  if (!openaiApiKey) {
    if (!warned) {
      logWarn("[guide] OPENAI_API_KEY is not set. Personas will return empty output and fallbacks apply.");
      warned = true;
    }
    return null;
  }
  client = new OpenAI({ apiKey: openaiApiKey });
  return client;
}
