// ============================================================================
// FLIGHT IDENTIFIER PARSING
// ============================================================================

import { ValidationError } from "../errors/index.js";
import { ok, err, type Result } from "../types/result.types.js";
import type { FlightIdentifier } from "../types/lounge.types.js";
import { isCalendarDate } from "../utils/time.js";

/**
 * "AA123", "aal123" and "AA 123" all parse to { carrierCode: "AA", flightNumber: "123" }.
 * Three-letter ICAO prefixes are truncated to their first two letters.
 */
export function parseFlightIdentifier(identifier: string): Result<FlightIdentifier, ValidationError> {
  const normalized = identifier.trim().toUpperCase();
  const alpha = /^[A-Z]*/.exec(normalized)?.[0] ?? "";

  if (alpha.length < 2) {
    return err(
      new ValidationError("Flight identifier must start with a 2 letter carrier code", {
        identifier,
      })
    );
  }

  const flightNumber = normalized.slice(alpha.length).replace(/\D/g, "");
  if (flightNumber.length === 0) {
    return err(
      new ValidationError("Flight identifier has no flight number", { identifier })
    );
  }

  return ok({ carrierCode: alpha.slice(0, 2), flightNumber });
}

export function validateFlightDate(date: string): Result<string, ValidationError> {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || !isCalendarDate(date)) {
    return err(new ValidationError("Flight date must be a calendar date in YYYY-MM-DD format", { date }));
  }
  return ok(date);
}

export function validateOperationalSuffix(
  suffix: string | undefined
): Result<string | undefined, ValidationError> {
  if (suffix === undefined || suffix === "") return ok(undefined);
  if (!/^[A-Za-z]$/.test(suffix)) {
    return err(new ValidationError("Operational suffix must be a single letter", { suffix }));
  }
  return ok(suffix.toUpperCase());
}
