import { Router, Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppConfig } from "../config";
import { DepositStore } from "../store/depositStore";
import { SavingsPlanner } from "../planner/savingsPlanner";
import { forecast } from "../engine/forecast";
import { EmptyInputError, SavingsError } from "../utils/errors";
import {
  ForecastRequest,
  ForecastRequestSchema,
  GrowthRateQuerySchema,
  NewDepositInput,
  NewDepositSchema,
  StatelessForecastSchema,
} from "../utils/validation";

/**
 * Map an error raised while handling a request to a JSON response.
 * Input problems are 400, missing history is 404, everything else is 500.
 */
function sendError(res: Response, context: string, error: unknown): void {
  if (error instanceof ZodError) {
    const message = error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "body"}: ${issue.message}`)
      .join("; ");
    res.status(400).json({ error: "Invalid request", message, issues: error.issues });
    return;
  }
  if (error instanceof EmptyInputError) {
    res.status(404).json({ error: "No deposit history", message: error.message });
    return;
  }
  if (error instanceof SavingsError) {
    res.status(400).json({ error: error.name, message: error.message });
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error in ${context}:`, error);
  res.status(500).json({ error: "Internal server error", message });
}

/**
 * Build the API router around a deposit store.
 */
export function createRouter(store: DepositStore, config: AppConfig): Router {
  const router = Router();

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Savings Projection API",
      version: "1.0.0",
      endpoints: {
        deposits: "GET|POST|DELETE /api/users/:user/deposits - Deposit history",
        deleteDeposit: "DELETE /api/users/:user/deposits/:id - Remove one deposit record",
        history: "GET /api/users/:user/history - Balance curve with assumed market growth",
        projection: "POST /api/users/:user/forecast - History plus 0%, 4% and 8% forecasts",
        forecast: "POST /api/forecast - Single-rate forecast from an explicit seed",
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

  /**
   * GET /api/users/:user/deposits
   * Deposit records of a user, oldest first
   */
  router.get("/users/:user/deposits", (req: Request, res: Response) => {
    res.json({ deposits: store.listRecords(req.params.user) });
  });

  /**
   * POST /api/users/:user/deposits
   * Add a deposit, or a current-total snapshot when currentTotal is positive
   */
  router.post("/users/:user/deposits", (req: Request, res: Response) => {
    try {
      const input: NewDepositInput = NewDepositSchema.parse(req.body);
      const record = store.addRecord({ user: req.params.user, ...input });
      console.log(`Deposit ${record.id} added for ${record.user} on ${record.date}`);
      res.status(201).json(record);
    } catch (error) {
      sendError(res, "adding deposit", error);
    }
  });

  /**
   * DELETE /api/users/:user/deposits/:id
   * Remove a single record owned by the user
   */
  router.delete("/users/:user/deposits/:id", (req: Request, res: Response) => {
    const id = Number(req.params.id);
    const owned = store.listRecords(req.params.user).some((record) => record.id === id);
    if (!owned || !store.deleteRecord(id)) {
      res.status(404).json({ error: `Deposit ${req.params.id} not found` });
      return;
    }
    res.status(204).end();
  });

  /**
   * DELETE /api/users/:user/deposits
   * Remove every record of the user
   */
  router.delete("/users/:user/deposits", (req: Request, res: Response) => {
    const deleted = store.deleteAllRecords(req.params.user);
    res.json({ deleted });
  });

  /**
   * GET /api/users/:user/history
   * Reconstructed balance curve; growthRate query overrides the configured rate
   */
  router.get("/users/:user/history", (req: Request, res: Response) => {
    try {
      const { growthRate } = GrowthRateQuerySchema.parse(req.query);
      const planner = new SavingsPlanner({
        records: store.listRecords(req.params.user),
        historyGrowthRate: growthRate ?? config.historyGrowthRate,
      });
      const points = planner.reconstructHistory();
      res.json({ points, latest: points.length > 0 ? points[points.length - 1] : null });
    } catch (error) {
      sendError(res, "history reconstruction", error);
    }
  });

  /**
   * POST /api/users/:user/forecast
   * History plus one forecast per scenario rate, seeded with the last total
   */
  router.post("/users/:user/forecast", (req: Request, res: Response) => {
    try {
      const body: ForecastRequest = ForecastRequestSchema.parse(req.body ?? {});
      const planner = new SavingsPlanner({
        records: store.listRecords(req.params.user),
        historyGrowthRate: config.historyGrowthRate,
      });
      const projection = planner.project({
        monthlyContribution: body.monthlyContribution ?? config.defaultMonthlyContribution,
        years: body.years ?? config.defaultForecastYears,
        rates: body.rates,
      });
      res.json(projection);
    } catch (error) {
      sendError(res, "forecast", error);
    }
  });

  /**
   * POST /api/forecast
   * Stateless single-rate forecast
   */
  router.post("/forecast", (req: Request, res: Response) => {
    try {
      const { initial, monthlyContribution, years, annualRate } = StatelessForecastSchema.parse(req.body);
      res.json({ values: forecast(initial, monthlyContribution, years, annualRate) });
    } catch (error) {
      sendError(res, "stateless forecast", error);
    }
  });

  return router;
}

/**
 * Client error status carried by body-parser errors (400 bad JSON, 413 too large).
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

/**
 * Fallback for errors that escape a handler, such as malformed or oversized bodies.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "Invalid JSON body", message: err.message });
    return;
  }
  const status = clientErrorStatus(err);
  if (status !== undefined) {
    const message = err instanceof Error ? err.message : String(err);
    res.status(status).json({ error: "Request rejected", message });
    return;
  }
  sendError(res, `${req.method} ${req.path}`, err);
}
