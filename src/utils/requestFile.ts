import * as fs from "fs";
import * as path from "path";
import { MaxGrowthInput } from "../models/ScenarioInput";
import { MaxGrowthRequestSchema, toMaxGrowthInput, describeIssues } from "./validation";

/**
 * Read a scenario request from a JSON file, as used by the command-line runners.
 * The file holds one max growth request; the other scenarios ignore its horizon.
 */
export function readScenarioRequestFile(inputPath: string): MaxGrowthInput {
  let inputData: unknown;
  try {
    const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
    inputData = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read or parse input file "${inputPath}": ${message}`);
  }

  const parsed = MaxGrowthRequestSchema.safeParse(inputData);
  if (!parsed.success) {
    throw new Error(`Invalid input file "${inputPath}": ${describeIssues(parsed.error).join("; ")}`);
  }
  return toMaxGrowthInput(parsed.data);
}
