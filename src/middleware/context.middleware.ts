// ============================================================================
// REQUEST CONTEXT MIDDLEWARE
// Initializes async local storage context for each request
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { context } from "../utils/context.js";

// Header names for correlation
const CORRELATION_ID_HEADER = "x-correlation-id";
const REQUEST_ID_HEADER = "x-request-id";

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Middleware to initialize request context with correlation tracking
 */
export function contextMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = firstHeader(req.headers[CORRELATION_ID_HEADER]) || uuidv4();
    const transactionId = uuidv4();

    const clientIp =
      firstHeader(req.headers["x-forwarded-for"])?.split(",")[0]?.trim() ||
      req.socket.remoteAddress ||
      "unknown";
    const userAgent = req.headers["user-agent"] || "unknown";

    res.setHeader(CORRELATION_ID_HEADER, correlationId);
    res.setHeader(REQUEST_ID_HEADER, transactionId);

    context.run(
      {
        correlationId,
        transactionId,
        startTime: Date.now(),
        clientIp,
        userAgent,
        operation: `${req.method} ${req.path}`,
      },
      () => next()
    );
  };
}
