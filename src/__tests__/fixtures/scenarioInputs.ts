import { ScenarioInput, MaxGrowthInput } from '../../models/ScenarioInput';

// 50 lakh loan, budget leaves room for the full Net Zero SIP at 12%
export const comfortableBudget: ScenarioInput = {
  loanAmount: 5000000,
  monthlyBudget: 60000,
  expectedAnnualReturnRate: 12,
};

// Budget covers the EMI but not the full Net Zero SIP at 12%
export const tightBudget: ScenarioInput = {
  loanAmount: 5000000,
  monthlyBudget: 38000,
  expectedAnnualReturnRate: 12,
};

// Budget below the 30-year EMI
export const unaffordableBudget: ScenarioInput = {
  loanAmount: 5000000,
  monthlyBudget: 30000,
  expectedAnnualReturnRate: 12,
};

export const smallLoan: ScenarioInput = {
  loanAmount: 1000000,
  monthlyBudget: 20000,
  expectedAnnualReturnRate: 12,
};

export const tenYearGrowth: MaxGrowthInput = {
  ...comfortableBudget,
  optimizationPeriodYears: 10,
};
