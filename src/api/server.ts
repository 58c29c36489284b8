import express from "express";
import { createRoutes } from "./routes";
import { PlanningError, EmptyCatalogError } from "../models/errors";
import { PlannerConfig, loadPlannerConfig } from "../utils/config";

export function createApp(config: PlannerConfig = loadPlannerConfig()): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: "5mb" }));
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
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
  app.use(
    "/api",
    createRoutes({ currencyDecimals: config.currencyDecimals, maxDpCells: config.maxDpCells })
  );

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Bicycle Acquisition Planner API",
      version: "1.0.0",
      endpoints: {
        plan: "POST /api/plan",
        score: "POST /api/score",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof PlanningError) {
      res.status(err.status).json({
        error: err.code,
        message: err.message,
        ...(err instanceof EmptyCatalogError && err.diagnostics ? { diagnostics: err.diagnostics } : {}),
      });
      return;
    }

    // body-parser marks malformed JSON with a 400 status
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      res.status(400).json({ error: "Invalid JSON body", message: err.message });
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

const app = createApp();

// Start server
if (require.main === module) {
  const { port } = loadPlannerConfig();
  app.listen(port, () => {
    console.log(`Server running on port ${port}`);
    console.log(`API available at http://localhost:${port}/api`);
  });
}

export default app;
