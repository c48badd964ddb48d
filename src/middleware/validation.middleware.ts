// ============================================================================
// REQUEST VALIDATION
// Zod parsing of request bodies, query params, and path params
// ============================================================================

import type { ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "../errors/index.js";
import { logger } from "../utils/logger.js";

export type ValidationTarget = "body" | "query" | "params";

/**
 * Parse request input, throwing ValidationError with per-field messages
 */
export function parseRequest<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  target: ValidationTarget
): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const error = ValidationError.fromZod(result.error, target);
  logger.warn(
    { type: "validation_error", target, errors: error.details },
    `Request ${target} validation failed`
  );
  throw error;
}
