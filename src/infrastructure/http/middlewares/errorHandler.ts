import type { NextFunction, Request, Response } from "express";
import { logger } from "../../logger";

const statusOf = (err: unknown): number | undefined => {
  if (err && typeof err === "object" && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
};

/**
 * Last middleware. Body-parser failures (oversized or badly encoded bodies)
 * arrive here with a 4xx `status`; everything else is an unexpected 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    res.status(status).json({ error: err instanceof Error ? err.message : "Bad request" });
    return;
  }

  logger.error({
    type: "UNHANDLED_ERROR",
    message: "Unhandled error in request pipeline",
    payload: { method: req.method, path: req.path },
    error: err,
  });
  res.status(500).json({ error: "Internal server error" });
}
