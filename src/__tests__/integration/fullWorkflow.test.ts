import { ScenarioPlanner } from '../../planner/scenarioPlanner';
import { calculateEMI, calculateTotalInterest } from '../../engine/loan';
import { calculateRequiredSIP, calculateSIPFutureValue } from '../../engine/sip';
import { ScenarioRequestSchema, MaxGrowthRequestSchema, toScenarioInput, toMaxGrowthInput } from '../../utils/validation';
import { renderScenarioChartHTML } from '../../utils/chartGenerator';
import { RISK_APPETITES } from '../../models/RiskAppetite';
import { riskAppetiteRequest } from '../fixtures/requests';
import { evaluated } from '../utils/testHelpers';

describe('Full scenario workflow', () => {
  const planner = new ScenarioPlanner();

  it('should pick success or warning from the required SIP versus the leftover budget', () => {
    for (const monthlyBudget of [37000, 38000, 39000, 40000, 60000]) {
      const result = evaluated(
        planner.netZeroInterest({ loanAmount: 5000000, monthlyBudget, expectedAnnualReturnRate: 12 })
      );

      const emi = calculateEMI(5000000, 8, 30);
      const required = calculateRequiredSIP(calculateTotalInterest(5000000, emi, 30), 12, 30);
      expect(result.status).toBe(required <= monthlyBudget - emi ? 'success' : 'warning');
    }
  });

  it('should keep minimum-tenure figures consistent with the engine', () => {
    const input = { loanAmount: 5000000, monthlyBudget: 60000, expectedAnnualReturnRate: 9 };
    const result = evaluated(planner.minTimeToNetZero(input));
    const years = result.minTimeYears;

    const emi = calculateEMI(5000000, 8, years);
    expect(result.monthlyEMI).toBe(emi);
    expect(result.monthlyInvestment).toBe(60000 - emi);
    expect(result.totalLoanInterestPayable).toBe(calculateTotalInterest(5000000, emi, years));
    expect(result.estimatedInvestmentFutureValue).toBe(calculateSIPFutureValue(60000 - emi, 9, years));
  });

  it('should reach Net Zero sooner than the full tenure whenever the full-tenure plan succeeds', () => {
    for (const appetite of RISK_APPETITES) {
      const input = toScenarioInput(ScenarioRequestSchema.parse({ ...riskAppetiteRequest, riskAppetite: appetite }));
      const netZero = evaluated(planner.netZeroInterest(input));
      const minTime = evaluated(planner.minTimeToNetZero(input));

      expect(netZero.status).toBe('success');
      expect(minTime.status).toBe('success');
      expect(minTime.minTimeYears).toBeLessThanOrEqual(30);
    }
  });

  it('should run a request through validation, planning and chart rendering', () => {
    const input = toMaxGrowthInput(
      MaxGrowthRequestSchema.parse({ ...riskAppetiteRequest, optimizationPeriodYears: 15 })
    );
    const result = evaluated(planner.maxGrowth(input));
    const html = renderScenarioChartHTML('Max Growth', result);

    expect(result.status).toBe('success');
    expect(html).toContain('labels: ["Investment Future Value","Remaining Loan Balance"]');
    expect(html).toContain(
      `data: [${Math.round(result.estimatedInvestmentFutureValue)},${Math.round(result.remainingLoanBalance)}]`
    );
  });
});
