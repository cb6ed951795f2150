import express from "express";
import { createRouter } from "./routes";
import { ScenarioPlanner } from "../planner/scenarioPlanner";
import { AppConfig, loadConfig } from "../utils/config";

/**
 * Build the Express app. Exported separately from the default app so tests
 * can run it against synthetic loan assumptions.
 */
export function createApp(config: AppConfig): express.Express {
  const app = express();
  const planner = new ScenarioPlanner(config.loanAssumptions);

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for all routes
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(planner));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Loan vs. Investment Planning API",
      version: "1.0.0",
      endpoints: {
        netZeroInterest: "POST /api/calculate-net-zero-interest",
        minTimeNetZero: "POST /api/calculate-min-time-net-zero",
        maxGrowth: "POST /api/calculate-max-growth",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      // Raised by express.json() for a malformed body
      res.status(400).json({
        error: "Malformed JSON body",
        message: err.message,
      });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

const config = loadConfig();
const app = createApp(config);

// Start server
if (require.main === module) {
  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`API available at http://localhost:${config.port}/api`);
    console.log(
      `Loan assumptions: ${config.loanAssumptions.annualInterestRatePct}% over ${config.loanAssumptions.tenureYears} years`
    );
  });
}

export default app;
