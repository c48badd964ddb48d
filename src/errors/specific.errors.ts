// ============================================================================
// SPECIFIC ERROR CLASSES
// Domain-specific error types for cleaner error handling
// ============================================================================

import { AppError, ErrorCode } from "./base.error.js";
import type { ZodError } from "zod";

// ----------------------------------------------------------------------------
// VALIDATION ERRORS
// ----------------------------------------------------------------------------

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      retryable: false,
      details,
    });
  }

  static fromZod(error: ZodError, target = "request"): ValidationError {
    const fields = error.errors.reduce<Record<string, string>>((acc, issue) => {
      const path = issue.path.join(".") || "root";
      acc[path] = issue.message;
      return acc;
    }, {});

    return new ValidationError(`Validation failed for ${target}`, { fields });
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message,
      statusCode: 404,
      retryable: false,
      details,
    });
  }
}

export class RateLimitedError extends AppError {
  constructor(retryAfterMs?: number) {
    super({
      code: ErrorCode.RATE_LIMITED,
      message: "Rate limit exceeded. Please slow down.",
      statusCode: 429,
      retryable: true,
      details: retryAfterMs ? { retryAfterMs } : undefined,
    });
  }
}

// ----------------------------------------------------------------------------
// CREDENTIAL ERRORS
// ----------------------------------------------------------------------------

export class AuthError extends AppError {
  constructor(message = "Flight data provider authentication failed", cause?: unknown) {
    super({
      code: ErrorCode.AUTH_FAILED,
      message,
      statusCode: 502,
      retryable: true,
      cause,
    });
  }
}

export class SecretNotFoundError extends AppError {
  constructor(secretName: string) {
    super({
      code: ErrorCode.SECRET_NOT_FOUND,
      message: `Secret ${secretName} was not found`,
      statusCode: 500,
      retryable: false,
      details: { secretName },
    });
  }
}

export class AccessDeniedError extends AppError {
  constructor(secretName: string, reason?: string) {
    super({
      code: ErrorCode.SECRET_ACCESS_DENIED,
      message: `Access to secret ${secretName} was denied${reason ? `: ${reason}` : ""}`,
      statusCode: 500,
      retryable: false,
      details: { secretName },
    });
  }
}

// ----------------------------------------------------------------------------
// FLIGHT DATA PROVIDER ERRORS
// ----------------------------------------------------------------------------

export class ProviderError extends AppError {
  public readonly providerStatus?: number;

  constructor(
    message: string,
    options?: { providerStatus?: number; code?: ErrorCode; statusCode?: number; cause?: unknown; details?: Record<string, unknown> }
  ) {
    super({
      code: options?.code ?? ErrorCode.PROVIDER_ERROR,
      message,
      statusCode: options?.statusCode ?? 502,
      retryable: false,
      cause: options?.cause,
      details: {
        ...(options?.providerStatus !== undefined ? { providerStatus: options.providerStatus } : {}),
        ...options?.details,
      },
    });
    this.providerStatus = options?.providerStatus;
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(url: string, timeoutMs: number) {
    super(`Flight data provider timed out after ${timeoutMs}ms`, {
      code: ErrorCode.PROVIDER_TIMEOUT,
      statusCode: 504,
      details: { url, timeoutMs },
    });
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(message: string, cause?: unknown) {
    super(`Connection to flight data provider failed: ${message}`, {
      code: ErrorCode.PROVIDER_UNAVAILABLE,
      cause,
    });
  }
}

export class ProviderResponseError extends ProviderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Unexpected flight data provider response: ${message}`, {
      code: ErrorCode.PROVIDER_INVALID_RESPONSE,
      details,
    });
  }
}

// ----------------------------------------------------------------------------
// SYSTEM ERRORS
// ----------------------------------------------------------------------------

export class CatalogUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super({
      code: ErrorCode.CATALOG_UNAVAILABLE,
      message,
      statusCode: 503,
      retryable: true,
      cause,
    });
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super({
      code: ErrorCode.TIMEOUT,
      message: `Operation ${operation} timed out after ${timeoutMs}ms`,
      statusCode: 504,
      retryable: true,
      details: { operation, timeoutMs },
    });
  }
}

export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred", cause?: unknown) {
    super({
      code: ErrorCode.INTERNAL_ERROR,
      message,
      statusCode: 500,
      retryable: false,
      cause,
    });
  }
}

/**
 * Wrap anything thrown into an AppError, keeping AppErrors as they are.
 * Unknown failures get the generic message; the original stays on `cause`.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  return new InternalError(undefined, error);
}
