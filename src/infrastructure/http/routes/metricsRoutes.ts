import { Router } from "express";
import type { RelayMetrics } from "../../metrics/RelayMetrics";

export const createMetricsRouter = (metrics: RelayMetrics): Router => {
  const metricsRouter = Router();
  metricsRouter.get("/metrics", (_req, res, next) => {
    metrics
      .render()
      .then((body) => {
        res.setHeader("Content-Type", metrics.contentType);
        res.end(body);
      })
      .catch(next);
  });
  return metricsRouter;
};
