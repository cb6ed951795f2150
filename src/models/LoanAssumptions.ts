/**
 * Fixed loan terms scenarios are evaluated against.
 *
 * @property annualInterestRatePct - Annual loan interest rate in percent (e.g., 8 for 8%)
 * @property tenureYears - Full loan tenure in years; also the upper bound of the minimum-tenure search
 */
export interface LoanAssumptions {
  annualInterestRatePct: number;
  tenureYears: number;
}
