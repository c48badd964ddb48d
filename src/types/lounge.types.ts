// ============================================================================
// LOUNGE ADVISOR DOMAIN TYPES
// ============================================================================

// ----------------------------------------------------------------------------
// CREDENTIALS & TOKENS
// ----------------------------------------------------------------------------

export interface ProviderCredentials {
  clientId: string;
  clientSecret: string;
}

export interface AccessToken {
  value: string;
  /** Epoch milliseconds at which the provider considers the token expired */
  expiresAt: number;
}

export type TokenStatus = "VALID" | "EXPIRED" | "NONE";

export interface TokenCacheStats {
  status: TokenStatus;
  expiresIn: number;
  hasCredentials: boolean;
  hits: number;
  misses: number;
  refreshes: number;
  invalidations: number;
}

// ----------------------------------------------------------------------------
// FLIGHTS
// ----------------------------------------------------------------------------

export interface FlightIdentifier {
  carrierCode: string;
  flightNumber: string;
}

export interface FlightEndpoint {
  airport: string | null;
  terminal: string | null;
  gate: string | null;
  scheduledTime: string | null;
  estimatedTime: string | null;
  actualTime: string | null;
}

export interface FlightStatus {
  carrierCode: string;
  flightNumber: string;
  date: string;
  operationalSuffix: string | null;
  departure: FlightEndpoint;
  arrival: FlightEndpoint;
  aircraft: string | null;
  operatingCarrier: string | null;
}

export type FlightLookup =
  | { found: true; flight: FlightStatus }
  | { found: false; carrierCode: string; flightNumber: string; date: string };

// ----------------------------------------------------------------------------
// CATALOG
// ----------------------------------------------------------------------------

export interface AccessProviderPolicy {
  providerName: string;
  guestPolicy: string | null;
  conditions: string | null;
  notes: string | null;
}

export interface Lounge {
  airport: string;
  loungeId: string;
  name: string;
  terminal: string | null;
  accessProviders: string[];
  amenities: string[];
  hours: string | null;
  avgWaitMinutes: number | null;
  crowdLevel: string | null;
  rating: number | null;
  accessDetails: AccessProviderPolicy[];
}

export interface AirportLounges {
  airport: string;
  lounges: Lounge[];
}

export interface UserProfile {
  userId: string;
  name: string | null;
  homeAirport: string | null;
  memberships: string[];
}

// ----------------------------------------------------------------------------
// TRAVELER
// ----------------------------------------------------------------------------

export interface TravelerPreferences {
  quiet?: boolean;
  food?: boolean;
  wifi?: boolean;
  showers?: boolean;
}

export interface TravelerContext {
  memberships: string[];
  preferences?: TravelerPreferences;
}

// ----------------------------------------------------------------------------
// ACCESS MATCHING
// ----------------------------------------------------------------------------

export interface AccessMatch {
  membership: string;
  provider: string;
}

export interface AccessCompatibility {
  hasAccess: boolean;
  matches: AccessMatch[];
}

// ----------------------------------------------------------------------------
// RECOMMENDATIONS
// ----------------------------------------------------------------------------

export interface TimingWindow {
  latestEntry: string | null;
  latestExit: string | null;
  recommendedDurationMinutes: number | null;
}

export interface Recommendation {
  lounge: Lounge;
  accessMethods: string[];
  score: number;
  reasons: string[];
  timing: TimingWindow;
}

export interface RecommendationResult {
  flight: FlightStatus;
  airport: string;
  recommendations: Recommendation[];
  totalLounges: number;
  accessibleLounges: number;
}

// ----------------------------------------------------------------------------
// LAYOVERS
// ----------------------------------------------------------------------------

export interface FlightLeg {
  identifier: string;
  date: string;
  suffix?: string;
}

export type LayoverRecommendation = "no_lounge" | "quick_visit" | "full_experience";

export interface LayoverStrategy {
  connectionAirport: string;
  arrivalFlight: FlightStatus;
  departureFlight: FlightStatus;
  layoverMinutes: number;
  recommendation: LayoverRecommendation;
  advice: string;
  suggestedLounges: Recommendation[];
}

// ----------------------------------------------------------------------------
// CATALOG SEARCH
// ----------------------------------------------------------------------------

export interface LoungeListing {
  lounge: Lounge;
  /** Null when no memberships were supplied */
  access: AccessCompatibility | null;
}

export interface LoungeSearchResult {
  airport: string;
  lounges: LoungeListing[];
  accessibleLounges: number | null;
}

// ----------------------------------------------------------------------------
// FLIGHT SCHEDULE
// ----------------------------------------------------------------------------

export interface FlightScheduleResult {
  flight: FlightStatus;
  /** Null when the airport is unknown or the catalog could not be read */
  departureLoungesAvailable: boolean | null;
  arrivalLoungesAvailable: boolean | null;
}
