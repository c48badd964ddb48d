// ============================================================================
// COMMON VALIDATION SCHEMAS
// Reusable schema components
// ============================================================================

import { z } from "zod";
import { isCalendarDate } from "../utils/time.js";

// ----------------------------------------------------------------------------
// PRIMITIVE SCHEMAS
// ----------------------------------------------------------------------------

export const airportCodeSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{3}$/, "Airport code must be 3 letters")
  .toUpperCase();

export const dateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD")
  .refine(isCalendarDate, "Date is not a real calendar date");

export const operationalSuffixSchema = z
  .string()
  .regex(/^[A-Za-z]$/, "Operational suffix must be a single letter")
  .toUpperCase();

export const flightNumberSchema = z.string().trim().min(2).max(12);

export const userIdSchema = z.string().trim().min(1).max(64);

// ----------------------------------------------------------------------------
// TRAVELER
// ----------------------------------------------------------------------------

export const membershipsSchema = z.array(z.string().trim().min(1).max(120)).max(50);

export const preferencesSchema = z
  .object({
    quiet: z.boolean().optional(),
    food: z.boolean().optional(),
    wifi: z.boolean().optional(),
    showers: z.boolean().optional(),
  })
  .strict();

/**
 * Comma separated query list: "a,b" -> ["a", "b"]
 */
export const csvListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

// ----------------------------------------------------------------------------
// FLIGHT LEG
// ----------------------------------------------------------------------------

export const flightLegSchema = z.object({
  flightNumber: flightNumberSchema,
  date: dateSchema,
  operationalSuffix: operationalSuffixSchema.optional(),
});
