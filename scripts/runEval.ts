#!/usr/bin/env ts-node
import "dotenv/config";
import { GuideOrchestrator } from "../src/guide/orchestrator";
import { OpenAIGenerationClient } from "../src/guide/generationClient";
import { formatSummary, loadScenarios, runScenario, type ScenarioResult } from "../src/eval/scenarioRunner";

async function main() {
  const scenarios = loadScenarios(process.argv[2]);
  const orchestrator = new GuideOrchestrator({ generation: new OpenAIGenerationClient() });

  const results: ScenarioResult[] = [];
  for (const scenario of scenarios) {
    results.push(await runScenario(orchestrator, scenario, (line) => console.log(line)));
  }

  console.log("");
  formatSummary(results).forEach((line) => console.log(line));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
