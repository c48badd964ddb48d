// ============================================================================
// LOUNGE CATALOG & USER PROFILE GATEWAYS
// Read-only access to lounges, provider policies and traveler profiles
// ============================================================================

import { readFile } from "node:fs/promises";
import { logger } from "../utils/logger.js";
import { CatalogUnavailableError, ValidationError } from "../errors/index.js";
import { catalogFileSchema, type CatalogFile } from "../validation/catalog.schema.js";
import type {
  AccessProviderPolicy,
  AirportLounges,
  Lounge,
  UserProfile,
} from "../types/lounge.types.js";

export interface LoungeCatalogGateway {
  /** Unknown airports resolve to an empty lounge list */
  getLounges(airport: string): Promise<AirportLounges>;
}

export interface UserProfileGateway {
  getUser(userId: string): Promise<UserProfile | null>;
}

// ----------------------------------------------------------------------------
// JSON FILE IMPLEMENTATION
// ----------------------------------------------------------------------------

export class JsonCatalogGateway implements LoungeCatalogGateway, UserProfileGateway {
  private readonly lounges = new Map<string, Lounge[]>();
  private readonly users = new Map<string, UserProfile>();

  constructor(catalog: CatalogFile) {
    const policies = new Map<string, AccessProviderPolicy>();
    for (const policy of catalog.providerPolicies) {
      policies.set(policy.providerName.toLowerCase(), policy);
    }

    for (const [code, entries] of Object.entries(catalog.airports)) {
      const airport = code.toUpperCase();
      this.lounges.set(
        airport,
        entries.map((entry) => ({
          airport,
          ...entry,
          accessDetails: entry.accessProviders.map((providerName) => ({
            guestPolicy: null,
            conditions: null,
            notes: null,
            ...policies.get(providerName.toLowerCase()),
            providerName,
          })),
        }))
      );
    }

    for (const user of catalog.users) {
      this.users.set(user.userId, {
        ...user,
        homeAirport: user.homeAirport ? user.homeAirport.toUpperCase() : null,
      });
    }
  }

  /**
   * Load and validate a catalog file
   */
  static async fromFile(path: string): Promise<JsonCatalogGateway> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      throw new CatalogUnavailableError(`Lounge catalog could not be read from ${path}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CatalogUnavailableError(`Lounge catalog at ${path} is not valid JSON`, error);
    }

    const parsed = catalogFileSchema.safeParse(json);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, "lounge catalog");
    }

    const gateway = new JsonCatalogGateway(parsed.data);
    logger.info(
      { path, airports: gateway.lounges.size, users: gateway.users.size },
      "Lounge catalog loaded"
    );
    return gateway;
  }

  async getLounges(airport: string): Promise<AirportLounges> {
    const code = airport.trim().toUpperCase();
    return {
      airport: code,
      lounges: (this.lounges.get(code) ?? []).map((lounge) => ({ ...lounge })),
    };
  }

  async getUser(userId: string): Promise<UserProfile | null> {
    const user = this.users.get(userId.trim());
    return user ? { ...user, memberships: [...user.memberships] } : null;
  }

  get airportCount(): number {
    return this.lounges.size;
  }
}
