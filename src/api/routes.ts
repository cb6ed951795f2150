import { Router, Request, Response } from "express";
import { ScenarioPlanner } from "../planner/scenarioPlanner";
import { getHttpStatus } from "../models/ScenarioResult";
import { MIN_SEARCH_TENURE_YEARS } from "../utils/constants";
import {
  ScenarioRequestSchema,
  MaxGrowthRequestSchema,
  toScenarioInput,
  toMaxGrowthInput,
  describeIssues,
} from "../utils/validation";

const SCENARIO_FIELDS = [
  "loanAmount",
  "monthlyBudget",
  "expectedAnnualReturnRate (or riskAppetite: low | moderate | high)",
];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the API router around a planner.
 * The planner carries the loan assumptions every endpoint evaluates against.
 */
export function createRouter(planner: ScenarioPlanner): Router {
  const router = Router();

  /**
   * GET /api/calculate-net-zero-interest
   * Get information about the Net Zero interest endpoint
   */
  router.get("/calculate-net-zero-interest", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Monthly SIP needed for investment growth to offset total loan interest by loan maturity",
      endpoint: "/api/calculate-net-zero-interest",
      requiredFields: SCENARIO_FIELDS,
      note: "This endpoint requires a POST request with JSON body.",
    });
  });

  /**
   * POST /api/calculate-net-zero-interest
   * Net Zero interest: required SIP vs. budget left after EMI
   */
  router.post("/calculate-net-zero-interest", (req: Request, res: Response) => {
    try {
      const parsed = ScenarioRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({
          error: "Invalid request: loanAmount and monthlyBudget must be positive numbers",
          details: describeIssues(parsed.error),
        });
      }

      const result = planner.netZeroInterest(toScenarioInput(parsed.data));
      res.status(getHttpStatus(result.status)).json(result);
    } catch (error: unknown) {
      console.error("Error in Net Zero interest calculation:", error);
      res.status(500).json({
        error: "Internal server error",
        message: errorMessage(error),
      });
    }
  });

  /**
   * GET /api/calculate-min-time-net-zero
   * Get information about the minimum time endpoint
   */
  router.get("/calculate-min-time-net-zero", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Shortest loan tenure at which investing the leftover budget offsets total loan interest",
      endpoint: "/api/calculate-min-time-net-zero",
      requiredFields: SCENARIO_FIELDS,
      note: `Tenures from ${MIN_SEARCH_TENURE_YEARS} to ${planner.getLoanAssumptions().tenureYears} years are searched.`,
    });
  });

  /**
   * POST /api/calculate-min-time-net-zero
   * Minimum tenure to reach Net Zero interest
   */
  router.post("/calculate-min-time-net-zero", (req: Request, res: Response) => {
    try {
      const parsed = ScenarioRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({
          error: "Invalid request: loanAmount and monthlyBudget must be positive numbers",
          details: describeIssues(parsed.error),
        });
      }

      const result = planner.minTimeToNetZero(toScenarioInput(parsed.data));
      res.status(getHttpStatus(result.status)).json(result);
    } catch (error: unknown) {
      console.error("Error in minimum time calculation:", error);
      res.status(500).json({
        error: "Internal server error",
        message: errorMessage(error),
      });
    }
  });

  /**
   * GET /api/calculate-max-growth
   * Get information about the max growth endpoint
   */
  router.get("/calculate-max-growth", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Net wealth (investment value minus outstanding loan) after an optimization period",
      endpoint: "/api/calculate-max-growth",
      requiredFields: [...SCENARIO_FIELDS, "optimizationPeriodYears"],
      note: "This endpoint requires a POST request with JSON body.",
    });
  });

  /**
   * POST /api/calculate-max-growth
   * Net wealth at the end of the optimization period
   */
  router.post("/calculate-max-growth", (req: Request, res: Response) => {
    try {
      const parsed = MaxGrowthRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({
          error: "Invalid request: loanAmount and monthlyBudget must be positive numbers and optimizationPeriodYears a positive integer",
          details: describeIssues(parsed.error),
        });
      }

      const result = planner.maxGrowth(toMaxGrowthInput(parsed.data));
      res.status(getHttpStatus(result.status)).json(result);
    } catch (error: unknown) {
      console.error("Error in max growth calculation:", error);
      res.status(500).json({
        error: "Internal server error",
        message: errorMessage(error),
      });
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Loan vs. Investment Planning API",
      version: "1.0.0",
      loanAssumptions: planner.getLoanAssumptions(),
      endpoints: {
        netZeroInterest: "POST /api/calculate-net-zero-interest - SIP needed to offset total loan interest",
        minTimeNetZero: "POST /api/calculate-min-time-net-zero - Shortest tenure that offsets loan interest",
        maxGrowth: "POST /api/calculate-max-growth - Net wealth after an optimization period",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
