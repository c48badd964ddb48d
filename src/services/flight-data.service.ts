// ============================================================================
// FLIGHT DATA CLIENT
// Authenticated flight schedule lookups against the flight data provider
// ============================================================================

import axios from "axios";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { metrics } from "../utils/metrics.js";
import { AuthError, ProviderError, type ValidationError } from "../errors/index.js";
import { ok, err, type Result } from "../types/result.types.js";
import type { FlightLookup } from "../types/lounge.types.js";
import {
  parseFlightIdentifier,
  validateFlightDate,
  validateOperationalSuffix,
} from "../validation/index.js";
import { flightScheduleParser, type FlightScheduleParser } from "../parsers/index.js";
import type { CredentialCache } from "./credential-cache.service.js";
import type { HttpClientService } from "./http-client.service.js";

export type FlightDataError = ValidationError | AuthError | ProviderError;

export interface FlightDataClientOptions {
  http: HttpClientService;
  credentials: CredentialCache;
  schedulePath: string;
  parser?: FlightScheduleParser;
}

const providerErrorBodySchema = z.object({
  errors: z
    .array(
      z.object({
        status: z.number().optional(),
        code: z.number().optional(),
        title: z.string().optional(),
        detail: z.string().optional(),
      })
    )
    .optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

const OPERATION = "flight_schedule";

export class FlightDataClient {
  private readonly parser: FlightScheduleParser;

  constructor(private readonly options: FlightDataClientOptions) {
    this.parser = options.parser ?? flightScheduleParser;
  }

  /**
   * Look up one dated flight. A flight the provider does not know is
   * { found: false }, not an error.
   */
  async getFlightStatus(
    identifier: string,
    date: string,
    suffix?: string
  ): Promise<Result<FlightLookup, FlightDataError>> {
    const parsed = parseFlightIdentifier(identifier);
    if (!parsed.ok) return parsed;

    const validDate = validateFlightDate(date);
    if (!validDate.ok) return validDate;

    const validSuffix = validateOperationalSuffix(suffix);
    if (!validSuffix.ok) return validSuffix;

    const { carrierCode, flightNumber } = parsed.value;
    const operationalSuffix = validSuffix.value;

    const token = await this.options.credentials.getToken();
    if (!token.ok) return token;

    const params: Record<string, string> = {
      carrierCode,
      flightNumber,
      scheduledDepartureDate: date,
    };
    if (operationalSuffix) {
      params.operationalSuffix = operationalSuffix;
    }

    const startTime = Date.now();

    try {
      const response = await this.options.http.get<unknown>(this.options.schedulePath, {
        params,
        headers: { Authorization: `Bearer ${token.value.value}` },
      });
      const duration = Date.now() - startTime;

      const flight = this.parser.parse(response.data, {
        carrierCode,
        flightNumber,
        date,
        operationalSuffix,
      });

      if (!flight.ok) {
        this.recordFailure(duration, flight.error);
        return flight;
      }

      if (flight.value === null) {
        metrics.recordProviderRequest(OPERATION, "not_found", duration);
        logger.providerCall({ operation: OPERATION, success: true, duration, status: response.status });
        logger.info({ carrierCode, flightNumber, date }, "Flight not found");
        return ok({ found: false, carrierCode, flightNumber, date });
      }

      metrics.recordProviderRequest(OPERATION, "success", duration);
      logger.providerCall({ operation: OPERATION, success: true, duration, status: response.status });
      return ok({ found: true, flight: flight.value });
    } catch (error) {
      const mapped = this.mapError(error, token.value.value);
      this.recordFailure(Date.now() - startTime, mapped);
      return err(mapped);
    }
  }

  private mapError(error: unknown, tokenValue: string): AuthError | ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    if (axios.isAxiosError(error) && error.response) {
      const status = error.response.status;

      if (status === 401) {
        this.options.credentials.invalidate(tokenValue, "flight schedule request returned 401");
        return new AuthError("Flight data provider rejected the access token", error);
      }

      const detail = this.providerMessage(error.response.data);
      return new ProviderError(
        detail ? `Flight data provider returned ${status}: ${detail}` : `Flight data provider returned ${status}`,
        { providerStatus: status, cause: error }
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(`Flight schedule request failed: ${message}`, { cause: error });
  }

  private providerMessage(body: unknown): string | undefined {
    const parsed = providerErrorBodySchema.safeParse(body);
    if (!parsed.success) return undefined;
    const first = parsed.data.errors?.[0];
    return first?.detail ?? first?.title ?? parsed.data.error_description ?? parsed.data.error;
  }

  private recordFailure(duration: number, error: AuthError | ProviderError): void {
    metrics.recordProviderRequest(OPERATION, "error", duration);
    logger.providerCall({
      operation: OPERATION,
      success: false,
      duration,
      status: error instanceof ProviderError ? error.providerStatus : undefined,
      errorCode: error.code,
      errorMessage: error.message,
    });
  }
}
