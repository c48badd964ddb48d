// ============================================================================
// REQUEST LOGGING MIDDLEWARE
// Logs HTTP requests with timing and response details
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import onFinished from "on-finished";
import { config } from "../config/index.js";
import { logger } from "../utils/logger.js";
import { context } from "../utils/context.js";
import { metrics } from "../utils/metrics.js";

// Probes and scrapes
const SKIP_PATHS = new Set(["/api/health", "/api/ready", config.metrics.path, "/favicon.ico"]);

/**
 * Middleware to log HTTP requests with timing
 */
export function requestLoggingMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (SKIP_PATHS.has(req.path)) {
      return next();
    }

    const startTime = Date.now();
    metrics.httpRequestsInFlight.inc();

    if (config.logging.enableRequestLogging) {
      logger.debug(
        {
          type: "request_start",
          method: req.method,
          url: req.originalUrl,
          contentLength: req.headers["content-length"],
          contentType: req.headers["content-type"],
        },
        "Request started"
      );
    }

    onFinished(res, (_err, response) => {
      const duration = Date.now() - startTime;

      metrics.httpRequestsInFlight.dec();
      // Route templates keep label cardinality bounded
      const route = req.route?.path ? `${req.baseUrl}${String(req.route.path)}` : "unmatched";
      metrics.recordHttpRequest(req.method, route, response.statusCode, duration);

      if (!config.logging.enableRequestLogging) return;

      const ctx = context.get();
      const logData = {
        type: "request_complete",
        method: req.method,
        url: req.originalUrl,
        statusCode: response.statusCode,
        duration,
        correlationId: ctx?.correlationId,
        transactionId: ctx?.transactionId,
        clientIp: ctx?.clientIp,
        userAgent: ctx?.userAgent?.substring(0, 100),
      };
      const summary = `${req.method} ${req.originalUrl} ${response.statusCode} ${duration}ms`;

      if (response.statusCode >= 500) {
        logger.error(logData, summary);
      } else if (response.statusCode >= 400) {
        logger.warn(logData, summary);
      } else {
        logger.info(logData, summary);
      }
    });

    next();
  };
}
