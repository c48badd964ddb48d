// ============================================================================
// SERVICES EXPORTS
// ============================================================================

export { EnvSecretStore, StaticSecretStore, type SecretStore } from "./secret-store.service.js";
export { HttpClientService, type HttpClientConfig } from "./http-client.service.js";
export { CredentialCache, type CredentialCacheOptions } from "./credential-cache.service.js";
export { RetryService, type RetryConfig } from "./retry.service.js";
export {
  FlightDataClient,
  type FlightDataClientOptions,
  type FlightDataError,
} from "./flight-data.service.js";
export {
  JsonCatalogGateway,
  type LoungeCatalogGateway,
  type UserProfileGateway,
} from "./catalog-gateway.service.js";
export { isCompatible } from "./access-matcher.js";
export {
  scoreLounges,
  computeTimingWindow,
  compareRecommendations,
  SCORE,
  type ScoringOptions,
} from "./recommendation-scorer.js";
export {
  LayoverPlanner,
  classifyLayover,
  type FlightStatusSource,
  type LayoverPlannerOptions,
} from "./layover-planner.js";
export {
  LoungeAdvisorService,
  type LoungeAdvisorDeps,
  type TokenStatsSource,
} from "./lounge-advisor.service.js";
