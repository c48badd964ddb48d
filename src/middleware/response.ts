// ============================================================================
// RESPONSE HELPERS
// ApiResponse metadata and Envelope -> HTTP mapping
// ============================================================================

import type { Request, Response } from "express";
import { context } from "../utils/context.js";
import { ErrorCode } from "../errors/index.js";
import type { Envelope } from "../types/result.types.js";
import type { ApiResponse, ResponseMeta } from "../types/api.types.js";

export function buildMeta(req: Request): ResponseMeta {
  const ctx = context.get();
  return {
    transactionId: ctx?.transactionId || "unknown",
    correlationId: ctx?.correlationId || "unknown",
    timestamp: new Date().toISOString(),
    duration: ctx ? Date.now() - ctx.startTime : 0,
    operation: ctx?.operation || `${req.method} ${req.path}`,
  };
}

/**
 * success -> 200, not_found -> 404, error -> the error's own status
 */
export function sendEnvelope<T>(req: Request, res: Response, envelope: Envelope<T>): void {
  const meta = buildMeta(req);

  switch (envelope.status) {
    case "success": {
      const response: ApiResponse<T> = { success: true, data: envelope.data, meta };
      if (envelope.message !== undefined) response.message = envelope.message;
      res.status(200).json(response);
      return;
    }
    case "not_found": {
      const response: ApiResponse<T> = {
        success: false,
        error: {
          code: ErrorCode.RESOURCE_NOT_FOUND,
          message: envelope.message,
          retryable: false,
          details: envelope.details,
        },
        message: envelope.message,
        meta,
      };
      res.status(404).json(response);
      return;
    }
    case "error": {
      const response: ApiResponse<T> = {
        success: false,
        error: {
          code: envelope.error.code,
          message: envelope.error.message,
          retryable: envelope.error.retryable,
          details: envelope.error.details,
        },
        meta,
      };
      res.status(envelope.error.statusCode).json(response);
      return;
    }
  }
}

export function sendData<T>(req: Request, res: Response, data: T): void {
  const response: ApiResponse<T> = { success: true, data, meta: buildMeta(req) };
  res.json(response);
}
