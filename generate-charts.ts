import * as path from "path";
import { ScenarioPlanner } from "./src/planner/scenarioPlanner";
import { MaxGrowthInput } from "./src/models/ScenarioInput";
import { ScenarioResult } from "./src/models/ScenarioResult";
import { loadConfig } from "./src/utils/config";
import { readScenarioRequestFile } from "./src/utils/requestFile";
import { generateScenarioChartHTML } from "./src/utils/chartGenerator";

/**
 * Write a Chart.js page per scenario into charts/.
 * Usage: npx ts-node generate-charts.ts [input-file]
 */
const inputPath = process.argv[2] ?? "example-request.json";
const outputDir = path.join(process.cwd(), "charts");

function generateCharts(input: MaxGrowthInput): void {
  console.log(`Using input: ${path.resolve(inputPath)}\n`);
  const planner = new ScenarioPlanner(loadConfig().loanAssumptions);

  const scenarios: Array<{ title: string; file: string; result: ScenarioResult }> = [
    { title: "Net Zero Interest", file: "net-zero.html", result: planner.netZeroInterest(input) },
    { title: "Minimum Time to Net Zero", file: "min-time.html", result: planner.minTimeToNetZero(input) },
    {
      title: `Max Growth over ${input.optimizationPeriodYears} Years`,
      file: "max-growth.html",
      result: planner.maxGrowth(input),
    },
  ];

  for (const { title, file, result } of scenarios) {
    if (result.status === "error") {
      console.error(`${title}: ${result.message}`);
      continue;
    }
    generateScenarioChartHTML(title, result, path.join(outputDir, file));
  }
}

try {
  generateCharts(readScenarioRequestFile(inputPath));
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
