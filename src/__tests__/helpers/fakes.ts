import { AuthError, CatalogUnavailableError, ProviderError } from "../../errors/index.js";
import { ok, err, type Result } from "../../types/result.types.js";
import type {
  AirportLounges,
  FlightLookup,
  FlightStatus,
  Lounge,
  UserProfile,
} from "../../types/lounge.types.js";
import type { FlightDataError } from "../../services/flight-data.service.js";
import type { FlightStatusSource } from "../../services/layover-planner.js";
import type { LoungeCatalogGateway, UserProfileGateway } from "../../services/catalog-gateway.service.js";

// ----------------------------------------------------------------------------
// FLIGHTS
// ----------------------------------------------------------------------------

export type FlightOutcome = FlightStatus | "not_found" | "auth" | "provider" | "throw";

/**
 * Answers lookups by identifier. A list of outcomes is consumed one call at a
 * time, the last one repeating.
 */
export class FakeFlightSource implements FlightStatusSource {
  readonly calls: string[] = [];
  private readonly outcomes: Map<string, FlightOutcome[]>;

  constructor(
    outcomes: Record<string, FlightOutcome | FlightOutcome[]>,
    private readonly delays: Record<string, number> = {}
  ) {
    this.outcomes = new Map(
      Object.entries(outcomes).map(([identifier, outcome]) => [
        identifier,
        Array.isArray(outcome) ? [...outcome] : [outcome],
      ])
    );
  }

  async getFlightStatus(identifier: string, date: string): Promise<Result<FlightLookup, FlightDataError>> {
    this.calls.push(identifier);

    const delay = this.delays[identifier];
    if (delay) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    const queue = this.outcomes.get(identifier) ?? ["not_found"];
    const outcome = queue.length > 1 ? queue.shift() : queue[0];

    switch (outcome) {
      case undefined:
      case "not_found": {
        const lookup: FlightLookup = {
          found: false,
          carrierCode: identifier.slice(0, 2),
          flightNumber: identifier.slice(2),
          date,
        };
        return ok(lookup);
      }
      case "auth":
        return err(new AuthError("Flight data provider rejected the access token"));
      case "provider":
        return err(new ProviderError("Flight data provider returned 500", { providerStatus: 500 }));
      case "throw":
        throw new Error("socket hang up");
      default: {
        const lookup: FlightLookup = { found: true, flight: outcome };
        return ok(lookup);
      }
    }
  }
}

// ----------------------------------------------------------------------------
// CATALOG & USERS
// ----------------------------------------------------------------------------

export class FakeCatalog implements LoungeCatalogGateway {
  readonly calls: string[] = [];

  constructor(
    private readonly lounges: Record<string, Lounge[]>,
    private readonly unavailable = false
  ) {}

  async getLounges(airport: string): Promise<AirportLounges> {
    this.calls.push(airport);
    if (this.unavailable) {
      throw new CatalogUnavailableError("Lounge catalog could not be read");
    }
    return { airport, lounges: this.lounges[airport] ?? [] };
  }
}

export class FakeUsers implements UserProfileGateway {
  constructor(private readonly users: UserProfile[]) {}

  async getUser(userId: string): Promise<UserProfile | null> {
    return this.users.find((user) => user.userId === userId) ?? null;
  }
}
