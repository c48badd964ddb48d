// ============================================================================
// ERROR EXPORTS
// ============================================================================

export { AppError, ErrorCode, type ErrorOptions } from "./base.error.js";
export {
  // Validation
  ValidationError,
  NotFoundError,
  RateLimitedError,
  // Credentials
  AuthError,
  SecretNotFoundError,
  AccessDeniedError,
  // Provider
  ProviderError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  ProviderResponseError,
  // System
  CatalogUnavailableError,
  TimeoutError,
  InternalError,
  toAppError,
} from "./specific.errors.js";
