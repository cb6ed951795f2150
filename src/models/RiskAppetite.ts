import { RISK_APPETITE_RETURNS } from "../utils/constants";

/**
 * Risk appetite data structures
 */

export type RiskAppetite = "low" | "moderate" | "high";

export const RISK_APPETITES: readonly RiskAppetite[] = ["low", "moderate", "high"];

/**
 * Get the expected annual return (%) implied by a risk appetite
 */
export function getRiskAppetiteReturn(riskAppetite: RiskAppetite): number {
  return RISK_APPETITE_RETURNS[riskAppetite];
}

/**
 * Resolve the annual return rate for a request.
 * An explicit rate wins over a risk appetite; returns undefined when neither is given.
 */
export function resolveExpectedReturnRate(
  expectedAnnualReturnRate: number | undefined,
  riskAppetite: RiskAppetite | undefined
): number | undefined {
  if (expectedAnnualReturnRate !== undefined) {
    return expectedAnnualReturnRate;
  }
  if (riskAppetite !== undefined) {
    return getRiskAppetiteReturn(riskAppetite);
  }
  return undefined;
}
