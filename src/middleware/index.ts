// ============================================================================
// MIDDLEWARE EXPORTS
// ============================================================================

// Context and logging
export { contextMiddleware } from "./context.middleware.js";
export { requestLoggingMiddleware } from "./logging.middleware.js";

// Validation
export { parseRequest, type ValidationTarget } from "./validation.middleware.js";

// Rate limiting
export { createRateLimiter } from "./rate-limit.middleware.js";

// Error handling
export { errorHandlerMiddleware, notFoundHandler } from "./error-handler.middleware.js";

// Security
export { helmetMiddleware, corsMiddleware, sanitizeMiddleware } from "./security.middleware.js";

// Timeout
export { timeoutMiddleware } from "./timeout.middleware.js";

// Compression
export { compressionMiddleware } from "./compression.middleware.js";

// Responses
export { buildMeta, sendEnvelope, sendData } from "./response.js";
