import { Request, Response } from "express";
import type { DispatchWebhook } from "../../../application/useCases/DispatchWebhook";
import { stringifyJson } from "../../../domain/entities/JsonValue";
import { EndpointNotFoundError, RelayError } from "../../../domain/errors/RelayErrors";
import { logger } from "../../logger";
import type { RelayMetrics } from "../../metrics/RelayMetrics";

// Shared metrics label for paths that match no rule
const UNMATCHED_ENDPOINT = "unmatched";

export class DispatchController {
  constructor(
    private readonly dispatchWebhook: DispatchWebhook,
    private readonly metrics?: RelayMetrics,
  ) {}

  async handle(req: Request, res: Response) {
    const record = this.metrics?.startRequest();
    const rawBody = typeof req.body === "string" ? req.body : "";

    try {
      const result = await this.dispatchWebhook.execute({ path: req.path, rawBody });
      record?.(req.path, 200);
      // res.json() cannot serialize the bigint values of 64-bit integers
      return res
        .status(200)
        .type("application/json")
        .send(stringifyJson({ status: result.status, target_response: result.target_response }));
    } catch (error) {
      if (error instanceof RelayError) {
        const endpoint = error instanceof EndpointNotFoundError ? UNMATCHED_ENDPOINT : req.path;
        record?.(endpoint, error.statusCode);

        const log = error.statusCode >= 500 ? logger.error : logger.warn;
        log({
          type: error.code,
          message: "Webhook dispatch failed",
          payload: { method: req.method, path: req.path, status: error.statusCode },
          error: error.message,
        });
        return res.status(error.statusCode).json({ error: error.message });
      }

      record?.(req.path, 500);
      logger.error({
        type: "DISPATCH_UNEXPECTED_ERROR",
        message: "Unexpected error while dispatching webhook",
        payload: { method: req.method, path: req.path },
        error,
      });
      return res.status(500).json({ error: "Internal server error" });
    }
  }
}
