/**
 * Metrics Router
 *
 * Operational counters for monitoring and debugging (JSON, not Prometheus text).
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";

export function registerMetricsRoutes(app: Express, ctx: AppContext): void {
  const { metricsCollector, executor, tasks, tracker, model, config } = ctx;

  app.get("/metrics", (_req: Request, res: Response) => {
    res.json({
      model: model.name,
      maxInflight: executor.maxInflight,
      localMode: config.localMode,
      trackedRequests: tracker?.size ?? 0,
      ...metricsCollector.getMetrics(),
      live: {
        inference_in_flight: executor.inFlight,
        inference_waiting: executor.waiting,
        background_tasks_in_flight: tasks.size,
      },
    });
  });
}
