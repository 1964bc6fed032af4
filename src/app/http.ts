/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import type { AppContext } from "./context";
import { AuthError, errorMessage } from "../domain/errors";

import { registerHealthRoutes } from "../routes/health";
import { registerInferenceRoutes } from "../routes/inference";
import { registerLocalCallbackRoutes } from "../routes/localCallback";
import { registerMetricsRoutes } from "../routes/metrics";

const hasStatus = (error: unknown): error is { status: number; type?: string } =>
  typeof error === "object" && error !== null && "status" in error && typeof error.status === "number";

export function createApp(ctx: AppContext): Express {
  const app = express();
  const { logger } = ctx;

  app.disable("x-powered-by");

  // Body parsers are mounted per route: /callback needs the unparsed body to
  // verify signatures, and the job routes parse only after bearer auth passes

  registerHealthRoutes(app, ctx);
  registerInferenceRoutes(app, ctx);
  registerLocalCallbackRoutes(app, ctx);
  registerMetricsRoutes(app, ctx);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` });
  });

  // Express recognizes error handlers by arity, so `_next` must stay
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AuthError) {
      res.status(401).json({ error: "UNAUTHORIZED", message: error.message });
      return;
    }
    if (error instanceof ZodError) {
      res.status(400).json({
        error: "INVALID_REQUEST",
        issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      });
      return;
    }
    // body-parser errors (malformed JSON, oversized body)
    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
      res.status(error.status).json({ error: "INVALID_REQUEST", message: errorMessage(error) });
      return;
    }

    logger.error({ err: error, path: req.path, method: req.method }, "Unhandled request error");
    res.status(500).json({ error: "INTERNAL_ERROR", message: "Internal server error" });
  });

  return app;
}
