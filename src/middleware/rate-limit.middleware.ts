// ============================================================================
// RATE LIMITING MIDDLEWARE
// ============================================================================

import rateLimit from "express-rate-limit";
import type { Request, Response } from "express";
import { config } from "../config/index.js";
import { logger } from "../utils/logger.js";
import { RateLimitedError } from "../errors/index.js";
import { buildMeta } from "./response.js";
import type { ApiResponse } from "../types/api.types.js";

const SKIP_PATHS = new Set(["/api/health", "/api/ready", config.metrics.path]);

function clientKey(req: Request): string {
  return req.ip || req.socket.remoteAddress || "unknown";
}

function rateLimitHandler(req: Request, res: Response): void {
  const error = new RateLimitedError(config.resilience.rateLimit.windowMs);

  logger.warn(
    { type: "rate_limited", ip: clientKey(req), path: req.path },
    "Rate limit exceeded"
  );

  const response: ApiResponse = {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      details: error.details,
    },
    meta: buildMeta(req),
  };

  res.status(error.statusCode).json(response);
}

/**
 * One limiter per app instance, so separate apps never share counters
 */
export function createRateLimiter(options?: { windowMs?: number; limit?: number }) {
  return rateLimit({
    windowMs: options?.windowMs ?? config.resilience.rateLimit.windowMs,
    limit: options?.limit ?? config.resilience.rateLimit.maxRequests,
    keyGenerator: clientKey,
    handler: rateLimitHandler,
    skip: (req) => SKIP_PATHS.has(req.path),
    standardHeaders: true,
    legacyHeaders: false,
  });
}
