// ============================================================================
// HEALTH CONTROLLER
// ============================================================================

import type { Request, Response } from "express";
import { config } from "../config/index.js";
import { metrics } from "../utils/metrics.js";
import type { LoungeAdvisorService } from "../services/lounge-advisor.service.js";
import type { StatusResponse } from "../types/api.types.js";

export class HealthController {
  private readonly startTime = Date.now();

  constructor(private readonly advisor: LoungeAdvisorService) {}

  health = (_req: Request, res: Response): void => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: this.uptime(),
      version: config.app.version,
      environment: config.app.env,
    });
  };

  ready = (_req: Request, res: Response): void => {
    res.json({ ready: true, timestamp: new Date().toISOString() });
  };

  status = (_req: Request, res: Response): void => {
    const body: StatusResponse = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: this.uptime(),
      version: config.app.version,
      environment: config.app.env,
      services: {
        tokenCache: this.advisor.getTokenStats(),
      },
    };
    res.json(body);
  };

  index = (_req: Request, res: Response): void => {
    res.json({
      name: config.app.name,
      version: config.app.version,
      endpoints: {
        health: "GET /api/health",
        ready: "GET /api/ready",
        status: "GET /api/status",
        recommendations: "POST /api/recommendations",
        layoverStrategy: "POST /api/layover-strategy",
        lounges: "GET /api/lounges/:airport?memberships=a,b",
        users: "GET /api/users/:userId",
        flights: "GET /api/flights/:flightNumber?date=YYYY-MM-DD&suffix=X",
        metrics: `GET ${config.metrics.path}`,
      },
    });
  };

  metrics = (_req: Request, res: Response): void => {
    res.set("Content-Type", metrics.getContentType());
    res.send(metrics.getMetrics());
  };

  private uptime(): string {
    return `${Math.floor((Date.now() - this.startTime) / 1000)}s`;
  }
}
