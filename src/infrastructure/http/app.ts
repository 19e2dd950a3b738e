/**
 * Express app for the relay, without listen().
 *
 * Route order matters: fixed routes (/health, /ready, /metrics, /debug) are
 * mounted before the dispatch catch-all.
 */

import express from "express";
import helmet from "helmet";
import pinoHttp from "pino-http";
import type { DispatchWebhook } from "../../application/useCases/DispatchWebhook";
import { getPinoLogger } from "../logger";
import type { RelayMetrics } from "../metrics/RelayMetrics";
import { DispatchController } from "./controllers/DispatchController";
import { HealthController } from "./controllers/HealthController";
import { errorHandler } from "./middlewares/errorHandler";
import { debugRouter } from "./routes/debugRoutes";
import { createDispatchRouter } from "./routes/dispatchRoutes";
import { createHealthRouter } from "./routes/healthRoutes";
import { createMetricsRouter } from "./routes/metricsRoutes";

export interface AppDependencies {
  dispatchWebhook: DispatchWebhook;
  healthCheckEnabled: boolean;
  service: { name: string; version: string };
  metrics?: RelayMetrics;
  bodyLimit?: string;
}

export const createApp = (deps: AppDependencies): express.Express => {
  const app = express();
  app.disable("x-powered-by");
  app.use(helmet());

  app.use(
    pinoHttp({
      logger: getPinoLogger(),
      serializers: {
        req: (req: express.Request) => ({ id: req.id, method: req.method, url: req.url?.split("?")[0] }),
        res: (res: express.Response) => ({ statusCode: res.statusCode }),
      },
      customLogLevel: (_req, res, err) => {
        if (err || res.statusCode >= 500) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
      customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
    }),
  );

  // Every body is read as raw text: the dispatch path owns JSON parsing and its errors
  app.use(express.text({ type: () => true, limit: deps.bodyLimit ?? "10mb" }));

  if (deps.healthCheckEnabled) {
    app.use(createHealthRouter(new HealthController(deps.service)));
  }
  if (deps.metrics) {
    app.use(createMetricsRouter(deps.metrics));
  }
  app.use(debugRouter);
  app.use(createDispatchRouter(new DispatchController(deps.dispatchWebhook, deps.metrics)));

  app.use(errorHandler);

  return app;
};
