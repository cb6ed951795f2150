import { z } from "zod";
import { LoanAssumptions } from "../models/LoanAssumptions";
import { DEFAULT_LOAN_ASSUMPTIONS, DEFAULT_PORT } from "./constants";
import { describeIssues } from "./validation";

/**
 * Environment variables read at start-up. Unset variables take the defaults.
 */
const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  LOAN_INTEREST_RATE_PCT: z.coerce.number().min(0).finite().default(DEFAULT_LOAN_ASSUMPTIONS.annualInterestRatePct),
  LOAN_TENURE_YEARS: z.coerce.number().int().positive().default(DEFAULT_LOAN_ASSUMPTIONS.tenureYears),
});

export interface AppConfig {
  port: number;
  loanAssumptions: LoanAssumptions;
}

/**
 * Load application configuration from environment variables.
 * Throws when a variable is set to an unusable value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${describeIssues(result.error).join("; ")}`);
  }

  return {
    port: result.data.PORT,
    loanAssumptions: {
      annualInterestRatePct: result.data.LOAN_INTEREST_RATE_PCT,
      tenureYears: result.data.LOAN_TENURE_YEARS,
    },
  };
}
