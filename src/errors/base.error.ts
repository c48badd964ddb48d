// ============================================================================
// BASE ERROR CLASSES
// Structured error hierarchy for the application
// ============================================================================

// ----------------------------------------------------------------------------
// ERROR CODES ENUM
// ----------------------------------------------------------------------------

export enum ErrorCode {
  // Client Errors (4xx)
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INVALID_REQUEST = "INVALID_REQUEST",
  RESOURCE_NOT_FOUND = "RESOURCE_NOT_FOUND",
  RATE_LIMITED = "RATE_LIMITED",

  // Credential Errors
  AUTH_FAILED = "AUTH_FAILED",
  SECRET_NOT_FOUND = "SECRET_NOT_FOUND",
  SECRET_ACCESS_DENIED = "SECRET_ACCESS_DENIED",

  // Flight Data Provider Errors
  PROVIDER_ERROR = "PROVIDER_ERROR",
  PROVIDER_TIMEOUT = "PROVIDER_TIMEOUT",
  PROVIDER_UNAVAILABLE = "PROVIDER_UNAVAILABLE",
  PROVIDER_INVALID_RESPONSE = "PROVIDER_INVALID_RESPONSE",

  // System Errors (5xx)
  INTERNAL_ERROR = "INTERNAL_ERROR",
  TIMEOUT = "TIMEOUT",
  CATALOG_UNAVAILABLE = "CATALOG_UNAVAILABLE",
}

// ----------------------------------------------------------------------------
// ERROR OPTIONS INTERFACE
// ----------------------------------------------------------------------------

export interface ErrorOptions {
  code: ErrorCode;
  message: string;
  statusCode?: number;
  retryable?: boolean;
  cause?: unknown;
  details?: Record<string, unknown>;
}

// ----------------------------------------------------------------------------
// BASE APPLICATION ERROR
// ----------------------------------------------------------------------------

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(options: ErrorOptions) {
    super(options.message);

    this.name = this.constructor.name;
    this.code = options.code;
    this.statusCode = options.statusCode || 500;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
      timestamp: this.timestamp,
    };
  }

  isRetryable(): boolean {
    return this.retryable;
  }

  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  isServerError(): boolean {
    return this.statusCode >= 500;
  }
}
