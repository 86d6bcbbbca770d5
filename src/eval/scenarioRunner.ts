import fs from "fs";
import { z } from "zod";
import bundledScenarios from "./scenarios.json";
import type { GuideOrchestrator } from "../guide/orchestrator";
import { isGuideError } from "../errors";
import { generateSessionId } from "../idGenerator";

const REPORT_PREVIEW_CHARS = 500;

const scenarioSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional(),
  first_message: z.string().min(1),
  expected_emergency_type: z.string().min(1),
  user_updates: z.array(z.string()).default([]),
  expected_actions_include: z.array(z.string()).default([]),
});

export type EvalScenario = z.infer<typeof scenarioSchema>;

export type ScenarioResult = {
  scenarioId: string;
  expectedType: string;
  predictedType: string;
  classificationOk: boolean;
  expectedPhrases: string[];
  missingPhrases: string[];
  stepsTaken: number;
  /** Set when the run stopped on a guide error (for example an unknown emergency type). */
  error?: string;
};

export type EvalSummary = {
  total: number;
  correctClassifications: number;
  fullyCoveredReports: number;
  failedRuns: number;
};

type Print = (line: string) => void;

/** Scenarios from a JSON file, or the bundled set when no path is given. */
export function loadScenarios(filePath?: string): EvalScenario[] {
  const raw: unknown = filePath ? JSON.parse(fs.readFileSync(filePath, "utf8")) : bundledScenarios;
  return z.array(scenarioSchema).parse(raw);
}

export function findMissingPhrases(report: string, phrases: string[]): string[] {
  const haystack = report.toLowerCase();
  return phrases.filter((phrase) => !haystack.includes(phrase.toLowerCase()));
}

export function truncateForDisplay(text: string, max = REPORT_PREVIEW_CHARS): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Replay one scenario: triage, one advance per scripted update (stopping once
 * the protocol is done), then the report, scored against the expectations.
 */
export async function runScenario(
  orchestrator: GuideOrchestrator,
  scenario: EvalScenario,
  print: Print = () => undefined
): Promise<ScenarioResult> {
  const ctx = orchestrator.start(generateSessionId("eval"));
  const expectedPhrases = scenario.expected_actions_include;
  const base = {
    scenarioId: scenario.id,
    expectedType: scenario.expected_emergency_type,
    expectedPhrases,
  };

  print("=".repeat(70));
  print(`Scenario: ${scenario.id}`);
  if (scenario.description) print(`Description: ${scenario.description}`);
  print(`User first message: ${scenario.first_message}`);

  let stepsTaken = 0;
  try {
    await orchestrator.triage(ctx, scenario.first_message);
  } catch (err) {
    if (!isGuideError(err)) throw err;
    const predictedType = ctx.emergencyType ?? "unknown";
    print(`Triage failed: ${err.message}`);
    return {
      ...base,
      predictedType,
      classificationOk: predictedType === scenario.expected_emergency_type,
      missingPhrases: [...expectedPhrases],
      stepsTaken,
      error: err.message,
    };
  }

  const predictedType = ctx.emergencyType ?? "unknown";
  const classificationOk = predictedType === scenario.expected_emergency_type;
  print(`Predicted emergency_type: ${predictedType}`);
  print(`Expected emergency_type:  ${scenario.expected_emergency_type}`);
  print(`Classification OK?       ${classificationOk}`);

  for (const update of scenario.user_updates) {
    print(`\nUser update: ${update}`);
    const result = await orchestrator.advanceInstruction(ctx, update);
    stepsTaken++;
    print(`Instruction: ${result.instructionMessage}`);
    print(`Calming:     ${result.calmingMessage}`);
    if (result.done) {
      print("[Protocol complete]");
      break;
    }
  }

  const report = await orchestrator.generateReport(ctx);
  print("\n=== EMT Report (truncated for console) ===");
  print(truncateForDisplay(report));

  const missingPhrases = findMissingPhrases(report, expectedPhrases);
  if (missingPhrases.length > 0) {
    print("\nMissing expected phrases in EMT report:");
    missingPhrases.forEach((phrase) => print(` - ${phrase}`));
  } else {
    print("\nAll expected phrases found in EMT report.");
  }

  return { ...base, predictedType, classificationOk, missingPhrases, stepsTaken };
}

export function summarizeResults(results: ScenarioResult[]): EvalSummary {
  return {
    total: results.length,
    correctClassifications: results.filter((r) => r.classificationOk).length,
    fullyCoveredReports: results.filter((r) => !r.error && r.missingPhrases.length === 0).length,
    failedRuns: results.filter((r) => r.error !== undefined).length,
  };
}

export function formatSummary(results: ScenarioResult[]): string[] {
  const summary = summarizeResults(results);
  const lines = [
    "#".repeat(70),
    "EVALUATION SUMMARY",
    "#".repeat(70),
    `Total scenarios:         ${summary.total}`,
    `Correct classifications: ${summary.correctClassifications}/${summary.total}`,
    `Reports with all expected phrases: ${summary.fullyCoveredReports}/${summary.total}`,
  ];
  if (summary.failedRuns > 0) lines.push(`Runs stopped by errors:  ${summary.failedRuns}`);
  lines.push("", "Detailed results:");
  for (const r of results) {
    lines.push("-".repeat(70), `Scenario: ${r.scenarioId}`);
    lines.push(`  Classification OK? ${r.classificationOk}`);
    lines.push(`  Expected type:     ${r.expectedType}`);
    lines.push(`  Predicted type:    ${r.predictedType}`);
    if (r.error) lines.push(`  Error:             ${r.error}`);
    if (r.missingPhrases.length > 0) {
      lines.push("  Missing phrases in EMT report:");
      r.missingPhrases.forEach((phrase) => lines.push(`    - ${phrase}`));
    } else {
      lines.push("  EMT report includes all expected phrases.");
    }
  }
  return lines;
}
