// ============================================================================
// SECURITY MIDDLEWARE
// Helmet, CORS, and request sanitization
// ============================================================================

import helmet from "helmet";
import cors from "cors";
import type { Request, Response, NextFunction } from "express";
import { config } from "../config/index.js";
import { logger } from "../utils/logger.js";

// ----------------------------------------------------------------------------
// HELMET CONFIGURATION
// ----------------------------------------------------------------------------

// JSON-only API: nothing may be framed, scripted or embedded
export const helmetMiddleware = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: "same-site" },
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: "no-referrer" },
});

// ----------------------------------------------------------------------------
// CORS CONFIGURATION
// ----------------------------------------------------------------------------

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Server-to-server callers send no Origin
    if (!origin) {
      return callback(null, true);
    }

    if (config.security.corsOrigins.includes(origin)) {
      return callback(null, true);
    }

    if (config.app.isDev && (origin.includes("localhost") || origin.includes("127.0.0.1"))) {
      return callback(null, true);
    }

    logger.warn({ origin }, "CORS request blocked");
    callback(null, false);
  },
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type", "X-Correlation-ID", "X-Request-ID"],
  exposedHeaders: [
    "X-Correlation-ID",
    "X-Request-ID",
    "RateLimit-Limit",
    "RateLimit-Remaining",
    "RateLimit-Reset",
  ],
  maxAge: 86400,
});

// ----------------------------------------------------------------------------
// REQUEST SANITIZATION
// ----------------------------------------------------------------------------

/**
 * Strips angle brackets from string query parameters
 */
export function sanitizeMiddleware() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    for (const key of Object.keys(req.query)) {
      const value = req.query[key];
      if (typeof value === "string") {
        req.query[key] = value.replace(/[<>]/g, "");
      }
    }
    next();
  };
}
