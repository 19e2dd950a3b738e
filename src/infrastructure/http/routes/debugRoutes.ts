import { Router } from "express";
import { DebugController } from "../controllers/DebugController";

const debugRouter = Router();
const controller = new DebugController();

debugRouter.post("/debug", controller.handle.bind(controller));

export { debugRouter };
