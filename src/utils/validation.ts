import { z } from "zod";
import { ScenarioInput, MaxGrowthInput } from "../models/ScenarioInput";
import { resolveExpectedReturnRate } from "../models/RiskAppetite";

/**
 * Zod validation schemas for scenario requests.
 *
 * Loan amount, budget and horizon are checked here. The return rate is only
 * narrowed to a number: anything unusable becomes NaN and is turned into an
 * `error` outcome by the planner, so every endpoint reports a bad rate the same way.
 */

/**
 * Schema for the risk appetite shorthand for an expected return.
 */
export const RiskAppetiteSchema = z.enum(["low", "moderate", "high"]);

/**
 * Schema for the fields shared by every scenario request.
 * An unrecognised riskAppetite is rejected; a non-numeric rate becomes NaN.
 */
export const ScenarioRequestSchema = z.object({
  loanAmount: z.number().positive().finite(),
  monthlyBudget: z.number().positive().finite(),
  expectedAnnualReturnRate: z.number().optional().catch(Number.NaN),
  riskAppetite: RiskAppetiteSchema.optional(),
});

/**
 * Schema for the max growth request, which adds the projection horizon.
 */
export const MaxGrowthRequestSchema = ScenarioRequestSchema.extend({
  optimizationPeriodYears: z.number().int().positive(),
});

export type ScenarioRequest = z.infer<typeof ScenarioRequestSchema>;
export type MaxGrowthRequest = z.infer<typeof MaxGrowthRequestSchema>;

/**
 * Build planner input from a validated request.
 * A request with neither a rate nor a risk appetite gets a NaN rate.
 */
export function toScenarioInput(request: ScenarioRequest): ScenarioInput {
  return {
    loanAmount: request.loanAmount,
    monthlyBudget: request.monthlyBudget,
    expectedAnnualReturnRate:
      resolveExpectedReturnRate(request.expectedAnnualReturnRate, request.riskAppetite) ?? Number.NaN,
  };
}

export function toMaxGrowthInput(request: MaxGrowthRequest): MaxGrowthInput {
  return {
    ...toScenarioInput(request),
    optimizationPeriodYears: request.optimizationPeriodYears,
  };
}

/**
 * Flatten zod issues into "path: message" strings for error responses.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
