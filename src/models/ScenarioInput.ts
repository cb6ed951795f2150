/**
 * Scenario input data structures
 */

export interface ScenarioInput {
  loanAmount: number;
  monthlyBudget: number; // Total monthly outflow available for EMI + investment
  expectedAnnualReturnRate: number; // Percent, e.g. 12 for 12%
}

export interface MaxGrowthInput extends ScenarioInput {
  optimizationPeriodYears: number;
}
