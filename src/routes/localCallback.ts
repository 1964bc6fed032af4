/**
 * Local-mode routes for exercising the callback loop against ourselves.
 *
 * POST /callback              receive a signed BatchResult and track it
 * GET  /last/:request_id      last tracked BatchResult for a request
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "../app/context";
import { SIGNATURE_HEADER, verifySignature } from "../services/callback/signing";
import { batchResultSchema } from "./schemas";

export function registerLocalCallbackRoutes(app: Express, ctx: AppContext): void {
  const { config, logger, jobs } = ctx;
  if (!config.localMode) {
    return;
  }
  const log = logger.child({ component: "local-callback" });

  // Signatures are verified over the unparsed body
  const rawBody = express.raw({ type: "application/json", limit: "10mb" });

  app.post("/callback", rawBody, async (req: Request, res: Response, next: NextFunction) => {
    const raw: unknown = req.body;
    if (!Buffer.isBuffer(raw)) {
      res.status(400).json({ error: "INVALID_REQUEST", message: "Expected an application/json body" });
      return;
    }

    const signature = req.get(SIGNATURE_HEADER);
    if (config.sharedSecret && signature && !verifySignature(raw, signature, config.sharedSecret)) {
      log.warn({ ip: req.ip }, "Callback rejected: bad signature");
      res.status(400).json({ error: "BAD_SIGNATURE", message: "Signature does not match payload" });
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw.toString("utf8"));
    } catch {
      res.status(400).json({ error: "INVALID_JSON", message: "Body is not valid JSON" });
      return;
    }

    const parsed = batchResultSchema.safeParse(json);
    if (!parsed.success) {
      next(parsed.error);
      return;
    }

    try {
      await jobs.track(parsed.data);
      log.info({ requestId: parsed.data.request_id, results: parsed.data.results.length }, "Callback received");
      res.json({ ok: true });
    } catch (error) {
      next(error);
    }
  });

  app.get("/last/:request_id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await jobs.lookup(req.params.request_id);
      if (!result) {
        res.status(404).json({ error: "NOT_FOUND", message: `No result tracked for ${req.params.request_id}` });
        return;
      }
      res.json(result);
    } catch (error) {
      next(error);
    }
  });
}
