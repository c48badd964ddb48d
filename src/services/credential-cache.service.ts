// ============================================================================
// CREDENTIAL CACHE SERVICE
// Provider credentials and OAuth2 bearer token with proactive refresh
// ============================================================================

import axios from "axios";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { metrics } from "../utils/metrics.js";
import type { Clock } from "../utils/clock.js";
import { AuthError } from "../errors/index.js";
import { ok, err, type Result } from "../types/result.types.js";
import type {
  AccessToken,
  ProviderCredentials,
  TokenCacheStats,
} from "../types/lounge.types.js";
import type { SecretStore } from "./secret-store.service.js";
import type { HttpClientService } from "./http-client.service.js";

// ----------------------------------------------------------------------------
// TOKEN ENDPOINT RESPONSE
// ----------------------------------------------------------------------------

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().optional(),
  token_type: z.string().optional(),
});

const tokenErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

// ----------------------------------------------------------------------------
// OPTIONS
// ----------------------------------------------------------------------------

export interface CredentialCacheOptions {
  secretStore: SecretStore;
  http: HttpClientService;
  clock: Clock;
  secretName: string;
  tokenPath: string;
  credentialsTtlMs: number;
  safetyMarginMs: number;
  defaultLifetimeMs: number;
}

interface CachedToken {
  token: AccessToken;
  /** Token is served while now < refreshAt */
  refreshAt: number;
}

interface CachedCredentials {
  credentials: ProviderCredentials;
  fetchedAt: number;
}

export class CredentialCache {
  private credentials: CachedCredentials | null = null;
  private cached: CachedToken | null = null;
  private inflight: Promise<Result<AccessToken, AuthError>> | null = null;

  private hits = 0;
  private misses = 0;
  private refreshes = 0;
  private invalidations = 0;

  constructor(private readonly options: CredentialCacheOptions) {}

  /**
   * Get a bearer token, refreshing it when the cached one is inside the safety margin
   */
  async getToken(): Promise<Result<AccessToken, AuthError>> {
    const now = this.options.clock.now();

    if (this.cached && now < this.cached.refreshAt) {
      this.hits++;
      metrics.recordTokenCache("hit");
      return ok(this.cached.token);
    }

    this.misses++;

    if (this.inflight) {
      metrics.recordTokenCache("shared_refresh");
      logger.debug("Joining in-flight token refresh");
      return this.inflight;
    }

    metrics.recordTokenCache("miss");
    if (this.cached) {
      logger.tokenEvent({ event: "expired" });
    }

    this.inflight = this.refresh().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  /**
   * Drop the cached token so the next getToken() fetches a fresh one.
   * A rejection of an older token leaves a newer cached token in place.
   */
  invalidate(rejectedValue: string, reason = "provider rejected token"): void {
    if (!this.cached || this.cached.token.value !== rejectedValue) return;

    this.cached = null;
    this.invalidations++;
    metrics.recordTokenCache("invalidate");
    logger.tokenEvent({ event: "invalidated", reason });
  }

  getStats(): TokenCacheStats {
    const now = this.options.clock.now();
    const cached = this.cached;

    return {
      status: cached ? (now < cached.refreshAt ? "VALID" : "EXPIRED") : "NONE",
      expiresIn: cached ? Math.max(0, Math.floor((cached.token.expiresAt - now) / 1000)) : 0,
      hasCredentials: this.credentials !== null,
      hits: this.hits,
      misses: this.misses,
      refreshes: this.refreshes,
      invalidations: this.invalidations,
    };
  }

  // --------------------------------------------------------------------------
  // INTERNALS
  // --------------------------------------------------------------------------

  private async refresh(): Promise<Result<AccessToken, AuthError>> {
    const credentials = await this.loadCredentials();
    if (!credentials.ok) {
      logger.tokenEvent({ event: "refresh_failed", reason: credentials.error.message });
      return credentials;
    }

    try {
      const response = await this.options.http.postForm<unknown>(this.options.tokenPath, {
        grant_type: "client_credentials",
        client_id: credentials.value.clientId,
        client_secret: credentials.value.clientSecret,
      });

      const parsed = tokenResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        const error = new AuthError("Token endpoint returned no access token");
        logger.tokenEvent({ event: "refresh_failed", reason: error.message });
        return err(error);
      }

      const fetchedAt = this.options.clock.now();
      const lifetimeMs =
        parsed.data.expires_in !== undefined
          ? parsed.data.expires_in * 1000
          : this.options.defaultLifetimeMs;
      const marginMs = Math.min(this.options.safetyMarginMs, lifetimeMs / 2);

      const token: AccessToken = {
        value: parsed.data.access_token,
        expiresAt: fetchedAt + lifetimeMs,
      };
      this.cached = { token, refreshAt: token.expiresAt - marginMs };
      this.refreshes++;

      metrics.recordTokenCache("refresh");
      logger.tokenEvent({ event: "created", expiresIn: Math.floor(lifetimeMs / 1000) });

      return ok(token);
    } catch (error) {
      const authError = new AuthError(
        `Token request failed: ${this.describeTokenError(error)}`,
        error
      );
      logger.tokenEvent({ event: "refresh_failed", reason: authError.message });
      return err(authError);
    }
  }

  private async loadCredentials(): Promise<Result<ProviderCredentials, AuthError>> {
    const now = this.options.clock.now();

    if (this.credentials && now - this.credentials.fetchedAt < this.options.credentialsTtlMs) {
      return ok(this.credentials.credentials);
    }

    try {
      const credentials = await this.options.secretStore.getSecret(this.options.secretName);
      this.credentials = { credentials, fetchedAt: now };
      logger.tokenEvent({ event: "credentials_fetched" });
      return ok(credentials);
    } catch (error) {
      this.credentials = null;
      const message = error instanceof Error ? error.message : String(error);
      return err(new AuthError(`Unable to load provider credentials: ${message}`, error));
    }
  }

  private describeTokenError(error: unknown): string {
    if (axios.isAxiosError(error) && error.response) {
      const body = tokenErrorSchema.safeParse(error.response.data);
      const detail = body.success ? body.data.error_description || body.data.error : undefined;
      return detail
        ? `HTTP ${error.response.status}: ${detail}`
        : `HTTP ${error.response.status}`;
    }
    return error instanceof Error ? error.message : String(error);
  }
}
