/**
 * Scenario result data structures
 */

export type ScenarioStatus = "success" | "warning" | "not_achievable" | "error";

/**
 * Returned instead of any figures when the input cannot be evaluated.
 */
export interface ScenarioError {
  status: "error";
  message: string;
  rejected: true;
}

/**
 * Text attached to every evaluated scenario.
 */
export interface ScenarioGuidance {
  guidanceMessage: string;
  recommendation: string;
}

/**
 * Tagged outcome shared by all scenarios. `Figures` is the mode-specific payload.
 */
export type ScenarioOutcome<Figures> =
  | ({ status: "success" } & Figures & ScenarioGuidance)
  | ({ status: "warning" } & Figures & ScenarioGuidance)
  | ({ status: "not_achievable" } & Figures & ScenarioGuidance)
  | ScenarioError;

export interface InterestChartData {
  loanInterest: number;
  investmentGain: number;
}

export interface GrowthChartData {
  investmentFV: number;
  remainingLoan: number;
}

export interface NetZeroInterestFigures {
  monthlyEMI: number;
  monthlyInvestment: number;
  totalLoanInterestPayable: number;
  estimatedInvestmentFutureValue: number;
  interestCoveragePercent: number;
  chartData: InterestChartData;
}

export interface MinTimeToNetZeroFigures {
  minTimeYears: number;
  monthlyEMI: number;
  monthlyInvestment: number;
  totalLoanInterestPayable: number;
  estimatedInvestmentFutureValue: number;
  chartData: InterestChartData;
}

export interface MaxGrowthFigures {
  monthlyEMI: number;
  monthlyInvestment: number;
  optimizationPeriodYears: number;
  estimatedInvestmentFutureValue: number;
  remainingLoanBalance: number;
  netWealthAtPeriodEnd: number; // Always estimatedInvestmentFutureValue - remainingLoanBalance
  chartData: GrowthChartData;
}

export type NetZeroInterestResult = ScenarioOutcome<NetZeroInterestFigures>;
export type MinTimeToNetZeroResult = ScenarioOutcome<MinTimeToNetZeroFigures>;
export type MaxGrowthResult = ScenarioOutcome<MaxGrowthFigures>;

export type ScenarioResult = NetZeroInterestResult | MinTimeToNetZeroResult | MaxGrowthResult;

/**
 * Build the error outcome for an unusable return rate
 */
export function invalidReturnRateError(): ScenarioError {
  return {
    status: "error",
    message: "Invalid expected annual return rate: provide a positive number (or a valid riskAppetite).",
    rejected: true,
  };
}

/**
 * Map a scenario status to the HTTP status code the API answers with
 */
export function getHttpStatus(status: ScenarioStatus): number {
  switch (status) {
    case "success":
    case "warning":
    case "not_achievable":
      return 200;
    case "error":
      return 400;
    default: {
      const unhandled: never = status;
      throw new Error(`Unhandled scenario status: ${String(unhandled)}`);
    }
  }
}
