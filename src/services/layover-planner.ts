// ============================================================================
// LAYOVER STRATEGY PLANNER
// Per-connection dwell time, bucket classification and lounge suggestions
// ============================================================================

import { logger } from "../utils/logger.js";
import { metrics } from "../utils/metrics.js";
import { pool } from "../utils/pool.js";
import { minutesBetween } from "../utils/time.js";
import type { Result } from "../types/result.types.js";
import type {
  FlightLeg,
  FlightLookup,
  FlightStatus,
  LayoverRecommendation,
  LayoverStrategy,
  Recommendation,
  TravelerPreferences,
} from "../types/lounge.types.js";
import type { FlightDataError } from "./flight-data.service.js";
import type { LoungeCatalogGateway } from "./catalog-gateway.service.js";
import { scoreLounges, type ScoringOptions } from "./recommendation-scorer.js";

export interface FlightStatusSource {
  getFlightStatus(
    identifier: string,
    date: string,
    suffix?: string
  ): Promise<Result<FlightLookup, FlightDataError>>;
}

export interface LayoverPlannerOptions {
  flights: FlightStatusSource;
  catalog: LoungeCatalogGateway;
  concurrency: number;
}

// ----------------------------------------------------------------------------
// BUCKETS
// ----------------------------------------------------------------------------

export const QUICK_VISIT_MIN_MINUTES = 90;
export const FULL_EXPERIENCE_MIN_MINUTES = 180;

const CONNECTION_BUFFER_MINUTES = 60;
const MAX_LOUNGE_MINUTES = 180;
const QUICK_VISIT_LIMIT = 3;
const FULL_EXPERIENCE_LIMIT = 5;

export function classifyLayover(layoverMinutes: number): LayoverRecommendation {
  if (layoverMinutes < QUICK_VISIT_MIN_MINUTES) return "no_lounge";
  if (layoverMinutes < FULL_EXPERIENCE_MIN_MINUTES) return "quick_visit";
  return "full_experience";
}

function scoringFor(recommendation: LayoverRecommendation, layoverMinutes: number): ScoringOptions {
  const available = layoverMinutes - CONNECTION_BUFFER_MINUTES;

  if (recommendation === "quick_visit") {
    return {
      limit: QUICK_VISIT_LIMIT,
      sameTerminalOnly: true,
      waitWeight: 2,
      includeTimingWindow: false,
      recommendedDurationMinutes: available,
    };
  }

  return {
    limit: FULL_EXPERIENCE_LIMIT,
    includeTimingWindow: false,
    recommendedDurationMinutes: Math.min(available, MAX_LOUNGE_MINUTES),
  };
}

function adviceFor(
  recommendation: LayoverRecommendation,
  layoverMinutes: number,
  airport: string,
  suggestions: number
): string {
  switch (recommendation) {
    case "no_lounge":
      return `${layoverMinutes} minute connection at ${airport}: go straight to your departure gate.`;
    case "quick_visit": {
      const minutes = layoverMinutes - CONNECTION_BUFFER_MINUTES;
      return suggestions > 0
        ? `${layoverMinutes} minute connection at ${airport}: a quick lounge visit of up to ${minutes} minutes near your departure terminal.`
        : `${layoverMinutes} minute connection at ${airport}: no accessible lounge near your departure terminal.`;
    }
    case "full_experience": {
      const minutes = Math.min(layoverMinutes - CONNECTION_BUFFER_MINUTES, MAX_LOUNGE_MINUTES);
      return suggestions > 0
        ? `${layoverMinutes} minute connection at ${airport}: plenty of time to relax for up to ${minutes} minutes.`
        : `${layoverMinutes} minute connection at ${airport}: no accessible lounge found at this airport.`;
    }
  }
}

// ----------------------------------------------------------------------------
// PLANNER
// ----------------------------------------------------------------------------

export class LayoverPlanner {
  constructor(private readonly options: LayoverPlannerOptions) {}

  async plan(
    legs: readonly FlightLeg[],
    memberships: readonly string[],
    preferences?: TravelerPreferences
  ): Promise<LayoverStrategy[]> {
    if (legs.length < 2) return [];

    const flights = await pool(
      legs.map((leg, index) => () => this.resolveLeg(leg, index)),
      this.options.concurrency
    );

    const strategies: LayoverStrategy[] = [];

    for (let index = 0; index < legs.length - 1; index++) {
      const arrivalFlight = flights[index];
      const departureFlight = flights[index + 1];

      if (!arrivalFlight || !departureFlight) {
        this.skip(index, "flight could not be resolved");
        continue;
      }

      const arrivalTime = arrivalFlight.arrival.estimatedTime;
      const departureTime = departureFlight.departure.estimatedTime;
      const layoverMinutes =
        arrivalTime && departureTime ? minutesBetween(arrivalTime, departureTime) : null;

      if (layoverMinutes === null) {
        this.skip(index, "arrival or departure time unknown");
        continue;
      }

      if (layoverMinutes < 0) {
        this.skip(index, "departure is before arrival");
        continue;
      }

      const connectionAirport = departureFlight.departure.airport ?? arrivalFlight.arrival.airport;
      if (!connectionAirport) {
        this.skip(index, "connection airport unknown");
        continue;
      }

      strategies.push(
        await this.planConnection({
          connectionAirport,
          arrivalFlight,
          departureFlight,
          layoverMinutes,
          memberships,
          preferences,
        })
      );
    }

    return strategies;
  }

  private async planConnection(input: {
    connectionAirport: string;
    arrivalFlight: FlightStatus;
    departureFlight: FlightStatus;
    layoverMinutes: number;
    memberships: readonly string[];
    preferences?: TravelerPreferences;
  }): Promise<LayoverStrategy> {
    const { connectionAirport, arrivalFlight, departureFlight, layoverMinutes } = input;
    const recommendation = classifyLayover(layoverMinutes);
    metrics.recordLayoverConnection(recommendation);

    const base = { connectionAirport, arrivalFlight, departureFlight, layoverMinutes, recommendation };

    if (recommendation === "no_lounge") {
      return {
        ...base,
        advice: adviceFor(recommendation, layoverMinutes, connectionAirport, 0),
        suggestedLounges: [],
      };
    }

    let suggestedLounges: Recommendation[];
    try {
      const { lounges } = await this.options.catalog.getLounges(connectionAirport);
      suggestedLounges = scoreLounges(
        departureFlight,
        lounges,
        input.memberships,
        input.preferences,
        scoringFor(recommendation, layoverMinutes)
      );
    } catch (error) {
      logger.warn(
        {
          connectionAirport,
          error: error instanceof Error ? error.message : String(error),
        },
        "Lounge catalog unavailable for connection"
      );
      return {
        ...base,
        advice: `Lounge information for ${connectionAirport} is unavailable right now; allow ${layoverMinutes} minutes to connect.`,
        suggestedLounges: [],
      };
    }

    return {
      ...base,
      advice: adviceFor(recommendation, layoverMinutes, connectionAirport, suggestedLounges.length),
      suggestedLounges,
    };
  }

  private async resolveLeg(leg: FlightLeg, index: number): Promise<FlightStatus | null> {
    try {
      const result = await this.options.flights.getFlightStatus(leg.identifier, leg.date, leg.suffix);

      if (!result.ok) {
        logger.warn(
          { leg: index, identifier: leg.identifier, date: leg.date, errorCode: result.error.code },
          "Layover leg lookup failed"
        );
        return null;
      }

      if (!result.value.found) {
        logger.warn({ leg: index, identifier: leg.identifier, date: leg.date }, "Layover leg not found");
        return null;
      }

      return result.value.flight;
    } catch (error) {
      logger.warn(
        {
          leg: index,
          identifier: leg.identifier,
          error: error instanceof Error ? error.message : String(error),
        },
        "Layover leg lookup threw"
      );
      return null;
    }
  }

  private skip(connection: number, reason: string): void {
    metrics.recordLayoverConnection("skipped");
    logger.warn({ connection, reason }, "Skipping layover connection");
  }
}
