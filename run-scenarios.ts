import * as fs from "fs";
import { ScenarioPlanner } from "./src/planner/scenarioPlanner";
import { MaxGrowthInput } from "./src/models/ScenarioInput";
import { loadConfig } from "./src/utils/config";
import { readScenarioRequestFile } from "./src/utils/requestFile";

/**
 * Run all three scenarios and write results to net-zero-output.json,
 * min-time-output.json, and max-growth-output.json (generated in project root).
 * Usage: npx ts-node run-scenarios.ts [input-file]
 * Default input: example-request.json
 */
const inputPath = process.argv[2] ?? "example-request.json";

function runScenarios(input: MaxGrowthInput): void {
  const { loanAssumptions } = loadConfig();
  const planner = new ScenarioPlanner(loanAssumptions);
  console.log(
    `Loan assumptions: ${loanAssumptions.annualInterestRatePct}% over ${loanAssumptions.tenureYears} years\n`
  );

  console.log("Running Net Zero interest...");
  const netZeroResult = planner.netZeroInterest(input);
  fs.writeFileSync("net-zero-output.json", JSON.stringify(netZeroResult, null, 2));
  console.log(`Status: ${netZeroResult.status}. Output saved to net-zero-output.json`);

  console.log("Running minimum time to Net Zero...");
  const minTimeResult = planner.minTimeToNetZero(input);
  fs.writeFileSync("min-time-output.json", JSON.stringify(minTimeResult, null, 2));
  console.log(`Status: ${minTimeResult.status}. Output saved to min-time-output.json`);

  console.log("Running max growth...");
  const maxGrowthResult = planner.maxGrowth(input);
  fs.writeFileSync("max-growth-output.json", JSON.stringify(maxGrowthResult, null, 2));
  console.log(`Status: ${maxGrowthResult.status}. Output saved to max-growth-output.json`);

  console.log("\nScenarios complete!");
}

try {
  runScenarios(readScenarioRequestFile(inputPath));
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
