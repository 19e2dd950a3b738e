import { Router } from "express";
import type { HealthController } from "../controllers/HealthController";

export const createHealthRouter = (controller: HealthController): Router => {
  const healthRouter = Router();
  healthRouter.get("/health", controller.health.bind(controller));
  healthRouter.get("/ready", controller.ready.bind(controller));
  return healthRouter;
};
