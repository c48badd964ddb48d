// ============================================================================
// RESULT TYPES
// Typed success/failure variants passed across component boundaries
// ============================================================================

import type { AppError, ErrorCode } from "../errors/base.error.js";

export type Result<T, E extends AppError = AppError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends AppError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ----------------------------------------------------------------------------
// PUBLIC OPERATION ENVELOPE
// ----------------------------------------------------------------------------

export interface EnvelopeError {
  code: ErrorCode;
  message: string;
  statusCode: number;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export type Envelope<T> =
  | { status: "success"; data: T; message?: string }
  | { status: "not_found"; message: string; details?: Record<string, unknown> }
  | { status: "error"; error: EnvelopeError };

export function success<T>(data: T, message?: string): Envelope<T> {
  return message === undefined ? { status: "success", data } : { status: "success", data, message };
}

export function notFound<T>(message: string, details?: Record<string, unknown>): Envelope<T> {
  return details === undefined ? { status: "not_found", message } : { status: "not_found", message, details };
}

export function failure<T>(error: AppError): Envelope<T> {
  return {
    status: "error",
    error: {
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      retryable: error.retryable,
      ...(error.details !== undefined ? { details: error.details } : {}),
    },
  };
}
