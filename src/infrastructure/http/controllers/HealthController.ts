import { Request, Response } from "express";

export class HealthController {
  constructor(
    private readonly service: { name: string; version: string },
    private readonly now: () => number = Date.now,
  ) {}

  health(_req: Request, res: Response) {
    return res.status(200).json({
      status: "healthy",
      timestamp: Math.floor(this.now() / 1000),
      service: this.service.name,
      version: this.service.version,
    });
  }

  // Configuration is loaded and validated before the server listens
  ready(_req: Request, res: Response) {
    return res.status(200).json({ status: "ready", checks: { config: "ok" } });
  }
}
