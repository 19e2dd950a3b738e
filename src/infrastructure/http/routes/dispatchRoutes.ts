import { Router } from "express";
import type { DispatchController } from "../controllers/DispatchController";

// Catch-all: must be mounted after every fixed route
export const createDispatchRouter = (controller: DispatchController): Router => {
  const dispatchRouter = Router();
  dispatchRouter.all("*", controller.handle.bind(controller));
  return dispatchRouter;
};
