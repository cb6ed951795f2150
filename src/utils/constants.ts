import { LoanAssumptions } from "../models/LoanAssumptions";
import { RiskAppetite } from "../models/RiskAppetite";

/**
 * Shared constants for loan and investment planning.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Fixed loan terms every scenario is evaluated against unless configured otherwise. */
export const DEFAULT_LOAN_ASSUMPTIONS: LoanAssumptions = {
  annualInterestRatePct: 8,
  tenureYears: 30,
};

/** Expected annual return (%) implied by each risk appetite. */
export const RISK_APPETITE_RETURNS: Record<RiskAppetite, number> = {
  low: 6,
  moderate: 9,
  high: 12,
};

/** Shortest tenure (years) tried when searching for the minimum time to net zero. */
export const MIN_SEARCH_TENURE_YEARS = 1;

/** Default HTTP port. */
export const DEFAULT_PORT = 3000;
