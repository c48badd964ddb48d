// ============================================================================
// TIMEOUT MIDDLEWARE
// Fails requests that have not responded within the configured budget
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { config } from "../config/index.js";
import { TimeoutError } from "../errors/index.js";
import { logger } from "../utils/logger.js";

const SKIP_PATHS = new Set(["/api/health", "/api/ready", config.metrics.path]);

export function timeoutMiddleware(timeoutMs?: number) {
  const timeout = timeoutMs || config.resilience.timeouts.request;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (SKIP_PATHS.has(req.path)) {
      return next();
    }

    const timer = setTimeout(() => {
      logger.error(
        { type: "request_timeout", path: req.path, method: req.method, timeout },
        `Request timed out after ${timeout}ms`
      );

      if (!res.headersSent) {
        next(new TimeoutError(`${req.method} ${req.path}`, timeout));
      }
    }, timeout);

    const clear = (): void => clearTimeout(timer);
    res.on("finish", clear);
    res.on("close", clear);

    next();
  };
}
