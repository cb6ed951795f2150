import { LoanAssumptions } from "../models/LoanAssumptions";
import { ScenarioInput, MaxGrowthInput } from "../models/ScenarioInput";
import {
  NetZeroInterestResult,
  MinTimeToNetZeroResult,
  MaxGrowthResult,
  invalidReturnRateError,
} from "../models/ScenarioResult";
import { calculateEMI, calculateTotalInterest, calculateRemainingBalance } from "../engine/loan";
import { calculateSIPFutureValue, calculateRequiredSIP } from "../engine/sip";
import { DEFAULT_LOAN_ASSUMPTIONS, MIN_SEARCH_TENURE_YEARS } from "../utils/constants";
import { isFinitePositive, formatAmount } from "../utils/math";
import { tenureRange } from "../utils/time";

/**
 * Loan and investment figures for one candidate tenure.
 */
interface TenureEvaluation {
  monthlyEMI: number;
  monthlyInvestment: number;
  totalLoanInterestPayable: number;
  estimatedInvestmentFutureValue: number;
}

/**
 * Share of total loan interest (0-100) offset by an investment's future value.
 * A loan with no interest counts as fully offset.
 */
export function calculateInterestCoveragePercent(
  investmentFutureValue: number,
  totalInterest: number
): number {
  if (totalInterest <= 0) {
    return 100;
  }
  return Math.min(100, (investmentFutureValue / totalInterest) * 100);
}

/**
 * Evaluates loan-versus-investment scenarios against a fixed set of loan terms.
 *
 * Every scenario splits a monthly budget between the loan EMI and a SIP, and
 * reports the outcome as a tagged result. An unusable return rate yields the
 * `error` outcome before anything is computed; infeasible budgets are reported
 * as `warning` or `not_achievable` with best-effort figures.
 */
export class ScenarioPlanner {
  private readonly loanAssumptions: LoanAssumptions;

  constructor(loanAssumptions: LoanAssumptions = DEFAULT_LOAN_ASSUMPTIONS) {
    this.loanAssumptions = { ...loanAssumptions };
  }

  getLoanAssumptions(): LoanAssumptions {
    return { ...this.loanAssumptions };
  }

  /**
   * Net Zero interest: the monthly SIP that grows to the loan's total interest by maturity.
   *
   * - Budget below EMI: not_achievable, nothing invested.
   * - Budget covers EMI but not the required SIP: warning, the leftover is invested.
   * - Otherwise: success, exactly the required SIP is invested.
   */
  netZeroInterest(input: ScenarioInput): NetZeroInterestResult {
    const { loanAmount, monthlyBudget, expectedAnnualReturnRate } = input;
    if (!isFinitePositive(expectedAnnualReturnRate)) {
      return invalidReturnRateError();
    }

    const { tenureYears } = this.loanAssumptions;
    const monthlyEMI = this.emiFor(loanAmount, tenureYears);
    const totalInterest = this.interestFor(loanAmount, monthlyEMI, tenureYears);
    const requiredInvestment = calculateRequiredSIP(totalInterest, expectedAnnualReturnRate, tenureYears);
    const availableForInvestment = monthlyBudget - monthlyEMI;

    if (availableForInvestment < 0) {
      return {
        status: "not_achievable",
        monthlyEMI,
        monthlyInvestment: 0,
        totalLoanInterestPayable: totalInterest,
        estimatedInvestmentFutureValue: 0,
        interestCoveragePercent: calculateInterestCoveragePercent(0, totalInterest),
        guidanceMessage: `The monthly EMI of ${formatAmount(monthlyEMI)} exceeds your monthly budget of ${formatAmount(monthlyBudget)} by ${formatAmount(-availableForInvestment)}. Nothing is left to invest.`,
        recommendation: "Increase budget or reduce loan so the EMI fits within the budget.",
        chartData: { loanInterest: totalInterest, investmentGain: 0 },
      };
    }

    if (requiredInvestment > availableForInvestment) {
      const achievableFutureValue = calculateSIPFutureValue(
        availableForInvestment,
        expectedAnnualReturnRate,
        tenureYears
      );
      const coverage = calculateInterestCoveragePercent(achievableFutureValue, totalInterest);
      return {
        status: "warning",
        monthlyEMI,
        monthlyInvestment: availableForInvestment,
        totalLoanInterestPayable: totalInterest,
        estimatedInvestmentFutureValue: achievableFutureValue,
        interestCoveragePercent: coverage,
        guidanceMessage: `Net Zero interest is only partially achievable. You need to invest ${formatAmount(requiredInvestment)} monthly, but only ${formatAmount(availableForInvestment)} is available after EMI, offsetting ${coverage.toFixed(1)}% of loan interest.`,
        recommendation: "Increase budget, reduce loan, or choose a higher expected return to fully offset interest.",
        chartData: { loanInterest: totalInterest, investmentGain: achievableFutureValue },
      };
    }

    return {
      status: "success",
      monthlyEMI,
      monthlyInvestment: requiredInvestment,
      totalLoanInterestPayable: totalInterest,
      estimatedInvestmentFutureValue: totalInterest, // The target is hit by construction
      interestCoveragePercent: 100,
      guidanceMessage: `To achieve Net Zero interest, allocate ${formatAmount(requiredInvestment)} monthly to investments.`,
      recommendation: "Achievable. Your investment strategy is aligned to offset loan interest.",
      chartData: { loanInterest: totalInterest, investmentGain: totalInterest },
    };
  }

  /**
   * Shortest whole-year tenure at which investing the whole leftover budget
   * grows to at least that tenure's total interest. Tenures are tried in
   * ascending order and the first match wins.
   */
  minTimeToNetZero(input: ScenarioInput): MinTimeToNetZeroResult {
    const { loanAmount, monthlyBudget, expectedAnnualReturnRate } = input;
    if (!isFinitePositive(expectedAnnualReturnRate)) {
      return invalidReturnRateError();
    }

    const maxTenureYears = this.loanAssumptions.tenureYears;

    for (const tenure of tenureRange(MIN_SEARCH_TENURE_YEARS, maxTenureYears)) {
      const monthlyEMI = this.emiFor(loanAmount, tenure);
      const availableForInvestment = monthlyBudget - monthlyEMI;
      if (availableForInvestment < 0) {
        continue; // EMI alone exceeds the budget at this tenure
      }

      const evaluation = this.evaluateTenure(loanAmount, monthlyEMI, availableForInvestment, expectedAnnualReturnRate, tenure);
      if (evaluation.estimatedInvestmentFutureValue >= evaluation.totalLoanInterestPayable) {
        return {
          status: "success",
          minTimeYears: tenure,
          ...evaluation,
          guidanceMessage: `Achieve Net Zero interest in ${tenure} years by allocating ${formatAmount(evaluation.monthlyInvestment)} monthly.`,
          recommendation: "Optimal tenure found for offsetting interest.",
          chartData: {
            loanInterest: evaluation.totalLoanInterestPayable,
            investmentGain: evaluation.estimatedInvestmentFutureValue,
          },
        };
      }
    }

    // Nothing matched: report the state at the maximum tenure
    const monthlyEMI = this.emiFor(loanAmount, maxTenureYears);
    const fallback = this.evaluateTenure(
      loanAmount,
      monthlyEMI,
      Math.max(0, monthlyBudget - monthlyEMI),
      expectedAnnualReturnRate,
      maxTenureYears
    );

    return {
      status: "not_achievable",
      minTimeYears: maxTenureYears,
      ...fallback,
      guidanceMessage: `Cannot achieve Net Zero interest within ${maxTenureYears} years with current budget and investment strategy.`,
      recommendation: "Increase budget, reduce loan, or increase risk appetite.",
      chartData: {
        loanInterest: fallback.totalLoanInterestPayable,
        investmentGain: fallback.estimatedInvestmentFutureValue,
      },
    };
  }

  /**
   * Net wealth after `optimizationPeriodYears`: the SIP's future value minus the
   * loan balance still outstanding at that point. Net wealth may be negative.
   */
  maxGrowth(input: MaxGrowthInput): MaxGrowthResult {
    const { loanAmount, monthlyBudget, expectedAnnualReturnRate, optimizationPeriodYears } = input;
    if (!isFinitePositive(expectedAnnualReturnRate)) {
      return invalidReturnRateError();
    }

    const { annualInterestRatePct, tenureYears } = this.loanAssumptions;
    const monthlyEMI = this.emiFor(loanAmount, tenureYears);
    const monthlyInvestment = monthlyBudget - monthlyEMI;
    const remainingLoanBalance = calculateRemainingBalance(
      loanAmount,
      annualInterestRatePct,
      tenureYears,
      optimizationPeriodYears
    );

    if (monthlyInvestment <= 0) {
      const noInvestmentValue = 0;
      return {
        status: "not_achievable",
        monthlyEMI,
        monthlyInvestment: 0,
        optimizationPeriodYears,
        estimatedInvestmentFutureValue: noInvestmentValue,
        remainingLoanBalance,
        netWealthAtPeriodEnd: noInvestmentValue - remainingLoanBalance,
        guidanceMessage: `No funds available for investment to maximize growth. The EMI of ${formatAmount(monthlyEMI)} uses the whole monthly budget of ${formatAmount(monthlyBudget)}.`,
        recommendation: "Increase budget or reduce loan to enable investment.",
        chartData: { investmentFV: noInvestmentValue, remainingLoan: remainingLoanBalance },
      };
    }

    const investmentFutureValue = calculateSIPFutureValue(
      monthlyInvestment,
      expectedAnnualReturnRate,
      optimizationPeriodYears
    );
    const netWealth = investmentFutureValue - remainingLoanBalance;

    return {
      status: "success",
      monthlyEMI,
      monthlyInvestment,
      optimizationPeriodYears,
      estimatedInvestmentFutureValue: investmentFutureValue,
      remainingLoanBalance,
      netWealthAtPeriodEnd: netWealth,
      guidanceMessage: `Maximize growth: Your estimated Net Wealth in ${optimizationPeriodYears} years is ${formatAmount(netWealth)}.`,
      recommendation: "Focus on wealth accumulation while managing loan.",
      chartData: { investmentFV: investmentFutureValue, remainingLoan: remainingLoanBalance },
    };
  }

  private emiFor(loanAmount: number, tenureYears: number): number {
    return calculateEMI(loanAmount, this.loanAssumptions.annualInterestRatePct, tenureYears);
  }

  /**
   * Total interest, floored at 0 so a degenerate principal reads as "no interest".
   */
  private interestFor(loanAmount: number, monthlyEMI: number, tenureYears: number): number {
    return Math.max(0, calculateTotalInterest(loanAmount, monthlyEMI, tenureYears));
  }

  private evaluateTenure(
    loanAmount: number,
    monthlyEMI: number,
    monthlyInvestment: number,
    annualReturnPct: number,
    tenureYears: number
  ): TenureEvaluation {
    return {
      monthlyEMI,
      monthlyInvestment,
      totalLoanInterestPayable: this.interestFor(loanAmount, monthlyEMI, tenureYears),
      estimatedInvestmentFutureValue: calculateSIPFutureValue(monthlyInvestment, annualReturnPct, tenureYears),
    };
  }
}
