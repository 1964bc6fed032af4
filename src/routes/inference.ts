/**
 * Inference Router
 *
 * POST /infer       accept a batch, run it in the background, post the result to callback_url
 * POST /infer_sync  run a batch and return it inline (local mode only)
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "../app/context";
import { createBearerAuth } from "../middleware/bearerAuth";
import { asyncInferBodySchema, syncInferBodySchema, toInferenceRequest } from "./schemas";

export function registerInferenceRoutes(app: Express, ctx: AppContext): void {
  const { config, logger, jobs } = ctx;
  const requireToken = createBearerAuth(config.inboundToken, logger);
  // After requireToken, so unauthenticated bodies are never parsed
  const jsonBody = express.json({ limit: "1mb" });

  app.post("/infer", requireToken, jsonBody, (req: Request, res: Response, next: NextFunction) => {
    const parsed = asyncInferBodySchema.safeParse(req.body);
    if (!parsed.success) {
      next(parsed.error);
      return;
    }

    const request = toInferenceRequest(parsed.data, config.defaults);
    jobs.submit({ ...request, callback_url: parsed.data.callback_url });
    res.status(202).json({ request_id: request.request_id, status: "accepted" });
  });

  if (!config.localMode) {
    return;
  }

  app.post("/infer_sync", requireToken, jsonBody, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = syncInferBodySchema.safeParse(req.body);
    if (!parsed.success) {
      next(parsed.error);
      return;
    }

    try {
      const result = await jobs.runSync(toInferenceRequest(parsed.data, config.defaults));
      res.json(result);
    } catch (error) {
      next(error);
    }
  });
}
