import { annualPctToMonthlyRate, compoundFactor, annuityFactor } from "../utils/math";
import { yearsToMonths } from "../utils/time";

/**
 * Calculates the equated monthly installment (EMI) that fully amortizes a loan.
 * Formula: EMI = P × r / (1 - (1 + r)^-n)
 *
 * Returns 0 for a non-positive principal or tenure, and falls back to
 * straight-line repayment (P / n) when the rate is 0.
 *
 * @param principal - Loan amount
 * @param annualRatePct - Annual interest rate in percent (e.g., 8 for 8%)
 * @param tenureYears - Loan tenure in years
 * @returns Monthly installment
 *
 * @example
 * ```ts
 * calculateEMI(1000000, 8, 30) // returns ≈ 7337.65
 * ```
 */
export function calculateEMI(
  principal: number,
  annualRatePct: number,
  tenureYears: number
): number {
  if (principal <= 0 || tenureYears <= 0) {
    return 0;
  }

  const monthlyRate = annualPctToMonthlyRate(annualRatePct);
  const payments = yearsToMonths(tenureYears);

  if (monthlyRate === 0) {
    return principal / payments;
  }

  return (principal * monthlyRate) / (1 - Math.pow(1 + monthlyRate, -payments));
}

/**
 * Total interest paid over the tenure: EMI × n - P.
 * Only negative when the EMI was 0 for a degenerate principal.
 */
export function calculateTotalInterest(
  principal: number,
  emi: number,
  tenureYears: number
): number {
  return emi * yearsToMonths(tenureYears) - principal;
}

/**
 * Outstanding principal after a number of years of EMI payments.
 * Formula: B = P(1+r)^m - EMI × [(1+r)^m - 1] / r
 *
 * Out-of-range inputs (non-positive principal or tenure, elapsed time outside
 * [0, originalTenureYears]) return the principal unchanged. The balance is
 * floored at 0 since rounding can overshoot near full payoff.
 *
 * @param principal - Original loan amount
 * @param annualRatePct - Annual interest rate in percent
 * @param originalTenureYears - Tenure the EMI was computed for
 * @param elapsedYears - Years of payments already made
 */
export function calculateRemainingBalance(
  principal: number,
  annualRatePct: number,
  originalTenureYears: number,
  elapsedYears: number
): number {
  if (
    principal <= 0 ||
    originalTenureYears <= 0 ||
    elapsedYears < 0 ||
    elapsedYears > originalTenureYears
  ) {
    return principal;
  }

  if (elapsedYears === 0) {
    return principal;
  }

  const monthlyRate = annualPctToMonthlyRate(annualRatePct);
  const paymentsMade = yearsToMonths(elapsedYears);

  if (monthlyRate === 0) {
    return principal * (1 - elapsedYears / originalTenureYears);
  }

  const emi = calculateEMI(principal, annualRatePct, originalTenureYears);
  const balance =
    principal * compoundFactor(monthlyRate, paymentsMade) -
    emi * annuityFactor(monthlyRate, paymentsMade);
  return Math.max(0, balance);
}
