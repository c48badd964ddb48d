// ============================================================================
// REQUEST VALIDATION SCHEMAS
// Zod schemas for API request bodies, params and queries
// ============================================================================

import { z } from "zod";
import {
  airportCodeSchema,
  csvListSchema,
  dateSchema,
  flightLegSchema,
  flightNumberSchema,
  membershipsSchema,
  operationalSuffixSchema,
  preferencesSchema,
  userIdSchema,
} from "./common.schema.js";

// ----------------------------------------------------------------------------
// FLIGHT-AWARE RECOMMENDATIONS
// ----------------------------------------------------------------------------

export const recommendationRequestSchema = z.object({
  flightNumber: flightNumberSchema,
  date: dateSchema,
  operationalSuffix: operationalSuffixSchema.optional(),
  memberships: membershipsSchema.optional(),
  userId: userIdSchema.optional(),
  preferences: preferencesSchema.optional(),
});

export type RecommendationRequestInput = z.infer<typeof recommendationRequestSchema>;

// ----------------------------------------------------------------------------
// LAYOVER STRATEGY
// ----------------------------------------------------------------------------

export const layoverStrategyRequestSchema = z.object({
  legs: z.array(flightLegSchema).min(2, "At least two legs are required").max(8),
  memberships: membershipsSchema.optional(),
  userId: userIdSchema.optional(),
  preferences: preferencesSchema.optional(),
});

export type LayoverStrategyRequestInput = z.infer<typeof layoverStrategyRequestSchema>;

// ----------------------------------------------------------------------------
// CATALOG LOOKUPS
// ----------------------------------------------------------------------------

export const airportParamsSchema = z.object({
  airport: airportCodeSchema,
});

export const loungeSearchQuerySchema = z.object({
  memberships: csvListSchema.optional(),
});

export type LoungeSearchQueryInput = z.infer<typeof loungeSearchQuerySchema>;

export const userParamsSchema = z.object({
  userId: userIdSchema,
});

// ----------------------------------------------------------------------------
// FLIGHT SCHEDULE
// ----------------------------------------------------------------------------

export const flightParamsSchema = z.object({
  flightNumber: flightNumberSchema,
});

export const flightQuerySchema = z.object({
  date: dateSchema,
  suffix: operationalSuffixSchema.optional(),
});

export type FlightQueryInput = z.infer<typeof flightQuerySchema>;
