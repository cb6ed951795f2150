/**
 * Financial calculation utilities shared by the loan and SIP engines.
 * All calculations use monthly compounding periods.
 */

/**
 * Converts an annual rate in percent to the equivalent monthly rate as a decimal.
 *
 * @param annualRatePct - Annual rate in percent (e.g., 12 for 12%)
 * @returns Monthly rate as a decimal
 *
 * @example
 * ```ts
 * annualPctToMonthlyRate(12) // returns 0.01 (1% per month)
 * ```
 */
export function annualPctToMonthlyRate(annualRatePct: number): number {
  return annualRatePct / 100 / 12;
}

/**
 * Growth factor of a single sum over a number of periods.
 * Formula: (1 + r)^n
 */
export function compoundFactor(monthlyRate: number, periods: number): number {
  return Math.pow(1 + monthlyRate, periods);
}

/**
 * Future value factor of an ordinary annuity of 1 per period.
 * Formula: [(1 + r)^n - 1] / r, falling back to n when r is 0.
 *
 * @param monthlyRate - Monthly rate as a decimal
 * @param periods - Number of monthly periods
 */
export function annuityFactor(monthlyRate: number, periods: number): number {
  if (monthlyRate === 0) {
    return periods;
  }
  return (compoundFactor(monthlyRate, periods) - 1) / monthlyRate;
}

/**
 * Checks that a value is a finite number strictly greater than zero.
 * Used for rates and amounts arriving from outside the engine.
 */
export function isFinitePositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Formats an amount with no decimal places for guidance messages.
 *
 * @example
 * ```ts
 * formatAmount(12345.67) // returns "12346"
 * ```
 */
export function formatAmount(value: number): string {
  return value.toFixed(0);
}
