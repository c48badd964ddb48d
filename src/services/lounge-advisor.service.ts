// ============================================================================
// LOUNGE ADVISOR SERVICE
// Public operations of the recommendation core; every outcome is an Envelope
// ============================================================================

import { logger } from "../utils/logger.js";
import { metrics } from "../utils/metrics.js";
import { context } from "../utils/context.js";
import { AuthError, ProviderResponseError, ValidationError, toAppError } from "../errors/index.js";
import {
  success,
  notFound,
  failure,
  type Envelope,
  type Result,
} from "../types/result.types.js";
import type {
  FlightLeg,
  FlightLookup,
  FlightScheduleResult,
  LayoverStrategy,
  LoungeSearchResult,
  RecommendationResult,
  TokenCacheStats,
  TravelerPreferences,
  UserProfile,
} from "../types/index.js";
import { airportCodeSchema } from "../validation/index.js";
import { isCompatible } from "./access-matcher.js";
import { scoreLounges } from "./recommendation-scorer.js";
import { LayoverPlanner, type FlightStatusSource } from "./layover-planner.js";
import { RetryService } from "./retry.service.js";
import type { FlightDataError } from "./flight-data.service.js";
import type { LoungeCatalogGateway, UserProfileGateway } from "./catalog-gateway.service.js";

export interface TokenStatsSource {
  getStats(): TokenCacheStats;
}

export interface LoungeAdvisorDeps {
  flights: FlightStatusSource;
  catalog: LoungeCatalogGateway;
  users: UserProfileGateway;
  layoverConcurrency: number;
  tokens?: TokenStatsSource;
}

export class LoungeAdvisorService {
  private readonly planner: LayoverPlanner;

  // The flight client has already invalidated the token when it reports AuthError
  private readonly authRetry = new RetryService({
    shouldRetry: (error) => error instanceof AuthError,
  });

  constructor(private readonly deps: LoungeAdvisorDeps) {
    this.planner = new LayoverPlanner({
      flights: { getFlightStatus: (identifier, date, suffix) => this.lookupFlight(identifier, date, suffix) },
      catalog: deps.catalog,
      concurrency: deps.layoverConcurrency,
    });
  }

  // --------------------------------------------------------------------------
  // FLIGHT-AWARE RECOMMENDATIONS
  // --------------------------------------------------------------------------

  async getFlightAwareRecommendations(
    identifier: string,
    date: string,
    memberships: readonly string[],
    preferences?: TravelerPreferences,
    suffix?: string
  ): Promise<Envelope<RecommendationResult>> {
    return this.guard<RecommendationResult>("getFlightAwareRecommendations", async () => {
      const lookup = await this.lookupFlight(identifier, date, suffix);
      if (!lookup.ok) return failure(lookup.error);

      if (!lookup.value.found) {
        const { carrierCode, flightNumber } = lookup.value;
        return notFound(`Flight ${carrierCode}${flightNumber} on ${date} was not found`, {
          carrierCode,
          flightNumber,
          date,
        });
      }

      const flight = lookup.value.flight;
      const airport = flight.departure.airport;
      if (!airport) {
        return failure(new ProviderResponseError("flight has no departure airport"));
      }

      const { lounges } = await this.deps.catalog.getLounges(airport);
      const recommendations = scoreLounges(flight, lounges, memberships, preferences);
      const accessibleLounges = lounges.filter(
        (lounge) => isCompatible(memberships, lounge.accessProviders).hasAccess
      ).length;

      metrics.recordRecommendations("flight", recommendations.length);
      logger.info(
        {
          flight: `${flight.carrierCode}${flight.flightNumber}`,
          airport,
          totalLounges: lounges.length,
          accessibleLounges,
          returned: recommendations.length,
        },
        "Flight-aware recommendations built"
      );

      return success(
        { flight, airport, recommendations, totalLounges: lounges.length, accessibleLounges },
        recommendations.length > 0
          ? `${recommendations.length} lounge recommendation(s) at ${airport}`
          : `No accessible lounges at ${airport} for the given memberships`
      );
    });
  }

  // --------------------------------------------------------------------------
  // LAYOVER STRATEGY
  // --------------------------------------------------------------------------

  async planLayoverStrategy(
    legs: readonly FlightLeg[],
    memberships: readonly string[],
    preferences?: TravelerPreferences
  ): Promise<Envelope<LayoverStrategy[]>> {
    return this.guard<LayoverStrategy[]>("planLayoverStrategy", async () => {
      const strategies = await this.planner.plan(legs, memberships, preferences);
      const suggested = strategies.reduce((sum, strategy) => sum + strategy.suggestedLounges.length, 0);
      metrics.recordRecommendations("layover", suggested);

      logger.info(
        { legs: legs.length, connections: Math.max(0, legs.length - 1), planned: strategies.length },
        "Layover strategy planned"
      );

      return success(strategies);
    });
  }

  // --------------------------------------------------------------------------
  // CATALOG & PROFILE LOOKUPS
  // --------------------------------------------------------------------------

  async searchLounges(airport: string, memberships?: readonly string[]): Promise<Envelope<LoungeSearchResult>> {
    return this.guard<LoungeSearchResult>("searchLounges", async () => {
      const code = airportCodeSchema.safeParse(airport);
      if (!code.success) {
        return failure(ValidationError.fromZod(code.error, "airport"));
      }

      const { lounges } = await this.deps.catalog.getLounges(code.data);
      const filterBy = memberships && memberships.length > 0 ? memberships : null;

      const listings = lounges.map((lounge) => ({
        lounge,
        access: filterBy ? isCompatible(filterBy, lounge.accessProviders) : null,
      }));

      return success({
        airport: code.data,
        lounges: listings,
        accessibleLounges: filterBy
          ? listings.filter((listing) => listing.access?.hasAccess).length
          : null,
      });
    });
  }

  async getUser(userId: string): Promise<Envelope<UserProfile>> {
    return this.guard<UserProfile>("getUser", async () => {
      const user = await this.deps.users.getUser(userId);
      return user ? success(user) : notFound(`User ${userId} was not found`, { userId });
    });
  }

  async getFlightSchedule(
    identifier: string,
    date: string,
    suffix?: string
  ): Promise<Envelope<FlightScheduleResult>> {
    return this.guard<FlightScheduleResult>("getFlightSchedule", async () => {
      const lookup = await this.lookupFlight(identifier, date, suffix);
      if (!lookup.ok) return failure(lookup.error);

      if (!lookup.value.found) {
        const { carrierCode, flightNumber } = lookup.value;
        return notFound(`Flight ${carrierCode}${flightNumber} on ${date} was not found`, {
          carrierCode,
          flightNumber,
          date,
        });
      }

      const flight = lookup.value.flight;
      const [departureLoungesAvailable, arrivalLoungesAvailable] = await Promise.all([
        this.hasLounges(flight.departure.airport),
        this.hasLounges(flight.arrival.airport),
      ]);

      return success({ flight, departureLoungesAvailable, arrivalLoungesAvailable });
    });
  }

  getTokenStats(): TokenCacheStats | null {
    return this.deps.tokens ? this.deps.tokens.getStats() : null;
  }

  // --------------------------------------------------------------------------
  // INTERNALS
  // --------------------------------------------------------------------------

  private async hasLounges(airport: string | null): Promise<boolean | null> {
    if (!airport) return null;
    try {
      const { lounges } = await this.deps.catalog.getLounges(airport);
      return lounges.length > 0;
    } catch (error) {
      logger.warn(
        { airport, error: error instanceof Error ? error.message : String(error) },
        "Lounge availability unknown"
      );
      return null;
    }
  }

  private lookupFlight(
    identifier: string,
    date: string,
    suffix?: string
  ): Promise<Result<FlightLookup, FlightDataError>> {
    return this.authRetry.execute(
      () => this.deps.flights.getFlightStatus(identifier, date, suffix),
      "flight_status"
    );
  }

  private async guard<T>(operation: string, fn: () => Promise<Envelope<T>>): Promise<Envelope<T>> {
    context.setOperation(operation);
    try {
      return await fn();
    } catch (error) {
      const appError = toAppError(error);
      logger.error(
        {
          operation,
          errorCode: appError.code,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        "Operation failed unexpectedly"
      );
      return failure(appError);
    }
  }
}
