import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";

/**
 * Liveness probe. The context only exists once the model manifest loaded, so
 * reaching this handler means the model capability is ready.
 */
export function registerHealthRoutes(app: Express, _ctx: AppContext): void {
  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });
}
