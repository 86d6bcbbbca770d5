#!/usr/bin/env ts-node
import "dotenv/config";
import { GuideOrchestrator } from "../src/guide/orchestrator";
import { OpenAIGenerationClient } from "../src/guide/generationClient";
import { generateSessionId } from "../src/idGenerator";

const FIRST_MESSAGE = "My dad just collapsed and he's not breathing.";
const USER_UPDATES = [
  "I'm on the floor next to him.",
  "I'm doing chest compressions like you said.",
  "The ambulance just arrived.",
];

async function main() {
  const orchestrator = new GuideOrchestrator({ generation: new OpenAIGenerationClient() });
  const ctx = orchestrator.start(generateSessionId("demo"));

  console.log("=== First-Aid Guide Demo ===");
  console.log(`User: ${FIRST_MESSAGE}`);
  const outcome = await orchestrator.triage(ctx, FIRST_MESSAGE);
  console.log(`Triage: ${outcome.emergencyType} (${outcome.protocol.title})${outcome.fallback ? " [fallback]" : ""}`);
  console.log(`First step: ${outcome.protocol.steps[0]}`);

  for (const update of USER_UPDATES) {
    const result = await orchestrator.advanceInstruction(ctx, update);
    console.log(`\nUser: ${update}`);
    console.log(`Instruction: ${result.instructionMessage}`);
    console.log(`Calming: ${result.calmingMessage}`);
    if (result.done) {
      console.log("\n[Protocol complete]");
      break;
    }
  }

  const report = await orchestrator.generateReport(ctx);
  console.log("\n=== EMT Report ===");
  console.log(report || "(no report generated)");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
