// ============================================================================
// FLIGHT SCHEDULE RESPONSE PARSER
// Maps provider schedule payloads onto the canonical FlightStatus
// ============================================================================

import { z } from "zod";
import { ProviderResponseError } from "../errors/index.js";
import { ok, err, type Result } from "../types/result.types.js";
import type { FlightEndpoint, FlightStatus } from "../types/lounge.types.js";

// ----------------------------------------------------------------------------
// PAYLOAD SCHEMAS
// ----------------------------------------------------------------------------

const text = z.union([z.string(), z.number()]).transform(String);

const terminalSchema = z
  .union([text, z.object({ code: text.optional() })])
  .transform((value) => (typeof value === "string" ? value : value.code));

const gateSchema = z
  .union([text, z.object({ mainGate: text.optional() })])
  .transform((value) => (typeof value === "string" ? value : value.mainGate));

const timingSchema = z.object({
  qualifier: z.string(),
  value: z.string(),
});

const pointTimesSchema = z.object({
  timings: z.array(timingSchema).optional(),
  terminal: terminalSchema.optional(),
  gate: gateSchema.optional(),
});

const flightPointSchema = z.object({
  iataCode: z.string().optional(),
  departure: pointTimesSchema.optional(),
  arrival: pointTimesSchema.optional(),
});

const flatEndpointSchema = z.object({
  iataCode: z.string().optional(),
  terminal: terminalSchema.optional(),
  gate: gateSchema.optional(),
  scheduledTime: z.string().optional(),
  estimatedTime: z.string().optional(),
  actualTime: z.string().optional(),
});

const flightRecordSchema = z.object({
  scheduledDepartureDate: z.string().optional(),
  flightDesignator: z
    .object({
      carrierCode: z.string().optional(),
      flightNumber: text.optional(),
      operationalSuffix: z.string().optional(),
      departure: flatEndpointSchema.optional(),
      arrival: flatEndpointSchema.optional(),
    })
    .optional(),
  flightPoints: z.array(flightPointSchema).optional(),
  legs: z
    .array(
      z.object({
        aircraftEquipment: z.object({ aircraftType: z.string().optional() }).optional(),
      })
    )
    .optional(),
  segments: z
    .array(
      z.object({
        partnership: z
          .object({
            operatingFlight: z.object({ carrierCode: z.string().optional() }).optional(),
          })
          .optional(),
      })
    )
    .optional(),
  departure: flatEndpointSchema.optional(),
  arrival: flatEndpointSchema.optional(),
  aircraft: z.union([z.string(), z.object({ code: z.string().optional() })]).optional(),
  operatingCarrier: z
    .union([z.string(), z.object({ carrierCode: z.string().optional() })])
    .optional(),
});

const envelopeSchema = z.object({
  data: z.array(z.unknown()).optional(),
});

type FlightRecord = z.infer<typeof flightRecordSchema>;
type FlatEndpoint = z.infer<typeof flatEndpointSchema>;
type FlightPoint = z.infer<typeof flightPointSchema>;

// ----------------------------------------------------------------------------
// PARSER
// ----------------------------------------------------------------------------

export interface ScheduleQuery {
  carrierCode: string;
  flightNumber: string;
  date: string;
  operationalSuffix?: string;
}

const TIMING_QUALIFIERS = {
  departure: { scheduled: "STD", estimated: "ETD", actual: "ATD" },
  arrival: { scheduled: "STA", estimated: "ETA", actual: "ATA" },
} as const;

export class FlightScheduleParser {
  /**
   * Returns ok(null) when the provider reports no matching flight
   */
  parse(body: unknown, query: ScheduleQuery): Result<FlightStatus | null, ProviderResponseError> {
    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      return err(new ProviderResponseError("schedule payload is not an object"));
    }

    const first = envelope.data.data?.[0];
    if (first === undefined) {
      return ok(null);
    }

    const record = flightRecordSchema.safeParse(first);
    if (!record.success) {
      return err(
        new ProviderResponseError("schedule record has an unexpected shape", {
          issues: record.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        })
      );
    }

    const departure = this.parseEndpoint(record.data, "departure");
    const arrival = this.parseEndpoint(record.data, "arrival");

    if (!departure.airport && !arrival.airport) {
      return err(new ProviderResponseError("schedule record names no airports"));
    }

    const designator = record.data.flightDesignator;

    return ok(
      Object.freeze({
        carrierCode: (designator?.carrierCode ?? query.carrierCode).toUpperCase(),
        flightNumber: designator?.flightNumber ?? query.flightNumber,
        date: record.data.scheduledDepartureDate ?? query.date,
        operationalSuffix: designator?.operationalSuffix ?? query.operationalSuffix ?? null,
        departure: Object.freeze(departure),
        arrival: Object.freeze(arrival),
        aircraft: this.parseAircraft(record.data),
        operatingCarrier: this.parseOperatingCarrier(record.data),
      })
    );
  }

  private parseEndpoint(record: FlightRecord, side: "departure" | "arrival"): FlightEndpoint {
    const point = this.findFlightPoint(record.flightPoints, side);
    const times = point?.[side];
    const flat = this.mergeFlat(record[side], record.flightDesignator?.[side]);
    const qualifiers = TIMING_QUALIFIERS[side];

    const scheduledTime = this.timing(times?.timings, qualifiers.scheduled) ?? flat.scheduledTime ?? null;
    const estimatedTime = this.timing(times?.timings, qualifiers.estimated) ?? flat.estimatedTime ?? scheduledTime;
    const actualTime = this.timing(times?.timings, qualifiers.actual) ?? flat.actualTime ?? scheduledTime;

    const airport = point?.iataCode ?? flat.iataCode;

    return {
      airport: airport ? airport.toUpperCase() : null,
      terminal: times?.terminal ?? flat.terminal ?? null,
      gate: times?.gate ?? flat.gate ?? null,
      scheduledTime,
      estimatedTime,
      actualTime,
    };
  }

  /**
   * Departure comes from the first point that departs, arrival from the last that arrives
   */
  private findFlightPoint(
    points: FlightPoint[] | undefined,
    side: "departure" | "arrival"
  ): FlightPoint | undefined {
    if (!points) return undefined;
    const candidates = points.filter((point) => point[side] !== undefined);
    return side === "departure" ? candidates[0] : candidates[candidates.length - 1];
  }

  private mergeFlat(operational?: FlatEndpoint, scheduled?: FlatEndpoint): FlatEndpoint {
    return {
      iataCode: operational?.iataCode ?? scheduled?.iataCode,
      terminal: operational?.terminal ?? scheduled?.terminal,
      gate: operational?.gate ?? scheduled?.gate,
      scheduledTime: scheduled?.scheduledTime ?? operational?.scheduledTime,
      estimatedTime: operational?.estimatedTime ?? scheduled?.estimatedTime,
      actualTime: operational?.actualTime ?? scheduled?.actualTime,
    };
  }

  private timing(timings: Array<{ qualifier: string; value: string }> | undefined, qualifier: string): string | undefined {
    return timings?.find((timing) => timing.qualifier.toUpperCase() === qualifier)?.value;
  }

  private parseAircraft(record: FlightRecord): string | null {
    const fromLegs = record.legs?.find((leg) => leg.aircraftEquipment?.aircraftType)?.aircraftEquipment?.aircraftType;
    if (fromLegs) return fromLegs;
    if (typeof record.aircraft === "string") return record.aircraft || null;
    return record.aircraft?.code ?? null;
  }

  private parseOperatingCarrier(record: FlightRecord): string | null {
    const fromSegments = record.segments?.find(
      (segment) => segment.partnership?.operatingFlight?.carrierCode
    )?.partnership?.operatingFlight?.carrierCode;
    if (fromSegments) return fromSegments.toUpperCase();
    if (typeof record.operatingCarrier === "string") return record.operatingCarrier.toUpperCase() || null;
    return record.operatingCarrier?.carrierCode?.toUpperCase() ?? null;
  }
}

export const flightScheduleParser = new FlightScheduleParser();
