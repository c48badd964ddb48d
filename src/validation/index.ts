// ============================================================================
// VALIDATION EXPORTS
// ============================================================================

// Common schemas
export * from "./common.schema.js";

// Request schemas
export {
  recommendationRequestSchema,
  layoverStrategyRequestSchema,
  airportParamsSchema,
  loungeSearchQuerySchema,
  userParamsSchema,
  flightParamsSchema,
  flightQuerySchema,
  type RecommendationRequestInput,
  type LayoverStrategyRequestInput,
  type LoungeSearchQueryInput,
  type FlightQueryInput,
} from "./requests.schema.js";

// Catalog file
export {
  catalogFileSchema,
  catalogLoungeSchema,
  providerPolicySchema,
  catalogUserSchema,
  type CatalogFile,
  type CatalogLoungeInput,
} from "./catalog.schema.js";

// Flight identifiers
export {
  parseFlightIdentifier,
  validateFlightDate,
  validateOperationalSuffix,
} from "./flight-identifier.js";
