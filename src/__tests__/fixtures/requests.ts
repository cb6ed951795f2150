export const netZeroRequest = {
  loanAmount: 5000000,
  monthlyBudget: 60000,
  expectedAnnualReturnRate: 12,
};

export const riskAppetiteRequest = {
  loanAmount: 5000000,
  monthlyBudget: 60000,
  riskAppetite: 'high',
};

export const maxGrowthRequest = {
  ...netZeroRequest,
  optimizationPeriodYears: 10,
};
