import { Request, Response } from "express";
import { logger } from "../../logger";

export class DebugController {
  // Accepts any body, JSON or not; never touches the registry
  handle(req: Request, res: Response) {
    const body = typeof req.body === "string" ? req.body : "";
    logger.info({ type: "DEBUG_PAYLOAD", message: "Debug request payload", payload: { body } });
    return res.status(200).json({ status: "success", message: "Payload logged" });
  }
}
