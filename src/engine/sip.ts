import { annualPctToMonthlyRate, annuityFactor } from "../utils/math";
import { yearsToMonths } from "../utils/time";

/**
 * Future value of a monthly SIP invested at the start of each month (annuity due).
 * Formula: FV = M × [(1 + r)^n - 1] / r × (1 + r)
 *
 * @param monthlyInvestment - Monthly SIP contribution
 * @param annualReturnPct - Expected annual return in percent
 * @param tenureYears - Investment tenure in years
 * @returns Future value of all contributions (0 for a non-positive contribution or tenure)
 */
export function calculateSIPFutureValue(
  monthlyInvestment: number,
  annualReturnPct: number,
  tenureYears: number
): number {
  if (monthlyInvestment <= 0 || tenureYears <= 0) {
    return 0;
  }

  const monthlyRate = annualPctToMonthlyRate(annualReturnPct);
  const months = yearsToMonths(tenureYears);

  if (monthlyRate === 0) {
    return monthlyInvestment * months;
  }

  return monthlyInvestment * annuityFactor(monthlyRate, months) * (1 + monthlyRate);
}

/**
 * Monthly SIP needed to reach a target future value. Exact inverse of
 * {@link calculateSIPFutureValue} for the same rate and tenure.
 * Formula: M = F × r / ([(1 + r)^n - 1] × (1 + r))
 *
 * @param targetFutureValue - Amount to accumulate
 * @param annualReturnPct - Expected annual return in percent
 * @param tenureYears - Investment tenure in years
 * @returns Required monthly SIP (0 for a non-positive target or tenure)
 */
export function calculateRequiredSIP(
  targetFutureValue: number,
  annualReturnPct: number,
  tenureYears: number
): number {
  if (targetFutureValue <= 0 || tenureYears <= 0) {
    return 0;
  }

  const monthlyRate = annualPctToMonthlyRate(annualReturnPct);
  const months = yearsToMonths(tenureYears);

  if (monthlyRate === 0) {
    return targetFutureValue / months;
  }

  return targetFutureValue / (annuityFactor(monthlyRate, months) * (1 + monthlyRate));
}
