// ============================================================================
// ERROR HANDLER MIDDLEWARE
// Centralized error handling with structured responses
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError, ErrorCode, NotFoundError, ValidationError } from "../errors/index.js";
import { logger } from "../utils/logger.js";
import { config } from "../config/index.js";
import type { ApiResponse, ApiError } from "../types/api.types.js";
import { buildMeta } from "./response.js";

function send(req: Request, res: Response, statusCode: number, error: ApiError): void {
  const response: ApiResponse = { success: false, error, meta: buildMeta(req) };
  res.status(statusCode).json(response);
}

/**
 * Global error handler middleware
 */
export function errorHandlerMiddleware() {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      return next(err);
    }

    const appError = err instanceof ZodError ? ValidationError.fromZod(err) : err;

    if (appError instanceof AppError) {
      if (appError.isServerError()) {
        logger.error(
          { type: "app_error", error: appError.toJSON(), stack: appError.stack },
          appError.message
        );
      } else {
        logger.warn({ type: "app_error", error: appError.toJSON() }, appError.message);
      }

      send(req, res, appError.statusCode, {
        code: appError.code,
        message: appError.message,
        retryable: appError.retryable,
        details: appError.details,
      });
      return;
    }

    // Malformed JSON body from express.json()
    if (appError instanceof SyntaxError && "body" in appError) {
      logger.warn({ type: "parse_error", error: appError.message }, "Invalid JSON in request");
      send(req, res, 400, {
        code: ErrorCode.INVALID_REQUEST,
        message: "Invalid JSON in request body",
        retryable: false,
      });
      return;
    }

    const error = appError instanceof Error ? appError : new Error(String(appError));
    logger.error(
      {
        type: "unhandled_error",
        error: { name: error.name, message: error.message, stack: error.stack },
      },
      "Unhandled error"
    );

    send(req, res, 500, {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.app.isProd ? "An unexpected error occurred" : error.message,
      retryable: false,
      details: config.app.isDev ? { stack: error.stack } : undefined,
    });
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  };
}
