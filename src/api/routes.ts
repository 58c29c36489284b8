import { Router, Request, Response, NextFunction } from "express";
import { PurchasePlanner } from "../planner/purchasePlanner";
import { PlanningError } from "../models/errors";
import { SelectorOptions } from "../engine/selector";
import { PlanRequestSchema, ScoreRequestSchema, formatIssues } from "../utils/validation";

/**
 * Server-wide selector defaults; request options override them field by field.
 */
export interface RouteDefaults {
  currencyDecimals?: number;
  maxDpCells?: number;
}

/**
 * Forward planner validation errors to the error middleware, log anything else.
 */
function handleRouteError(label: string, error: unknown, next: NextFunction): void {
  if (!(error instanceof PlanningError)) {
    console.error(`Error in ${label}:`, error);
  }
  next(error);
}

export function createRoutes(defaults: RouteDefaults = {}): Router {
  const router = Router();

  /**
   * GET /api/plan
   * Get information about the planning endpoint
   */
  router.get("/plan", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Score available bicycles and select a purchase within budget",
      endpoint: "/api/plan",
      requiredFields: ["catalog", "weights", "budget", "filters (optional)", "options (optional)"],
      example: "See example-request.json file in the project root",
      note: "Selection is exact (dynamic programming) when prices are whole currency units and the table stays small, greedy otherwise; the plan's strategy field says which.",
    });
  });

  /**
   * POST /api/plan
   * Filter, score and select; returns the purchase plan with summary and diagnostics
   */
  router.post("/plan", (req: Request, res: Response, next: NextFunction) => {
    const parsed = PlanRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid planning request",
        issues: formatIssues(parsed.error),
      });
      return;
    }

    try {
      const { catalog, weights, budget, filters, options } = parsed.data;
      const selectorOptions: SelectorOptions = { ...defaults, ...options };
      const planner = new PurchasePlanner({ catalog, weights, budget, filters, options: selectorOptions });
      res.json(planner.plan());
    } catch (error: unknown) {
      handleRouteError("planning", error, next);
    }
  });

  /**
   * POST /api/score
   * Rank available bicycles without selecting a purchase
   */
  router.post("/score", (req: Request, res: Response, next: NextFunction) => {
    const parsed = ScoreRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid scoring request",
        issues: formatIssues(parsed.error),
      });
      return;
    }

    try {
      const { catalog, weights, filters } = parsed.data;
      const planner = new PurchasePlanner({ catalog, weights, budget: 0, filters });
      res.json({ scores: planner.score() });
    } catch (error: unknown) {
      handleRouteError("scoring", error, next);
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Bicycle Acquisition Planner API",
      version: "1.0.0",
      endpoints: {
        plan: "POST /api/plan - Select bicycles to purchase within budget",
        score: "POST /api/score - Rank available bicycles by recommendation score",
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
