import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import type { Clock } from "../../utils/clock.js";
import type { FlightEndpoint, FlightStatus, Lounge } from "../../types/lounge.types.js";

// ----------------------------------------------------------------------------
// CLOCK
// ----------------------------------------------------------------------------

export class ManualClock implements Clock {
  constructor(public current = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

// ----------------------------------------------------------------------------
// DOMAIN BUILDERS
// ----------------------------------------------------------------------------

export function makeEndpoint(overrides: Partial<FlightEndpoint> = {}): FlightEndpoint {
  return {
    airport: null,
    terminal: null,
    gate: null,
    scheduledTime: null,
    estimatedTime: null,
    actualTime: null,
    ...overrides,
  };
}

export function makeFlight(
  overrides: Partial<Omit<FlightStatus, "departure" | "arrival">> & {
    departure?: Partial<FlightEndpoint>;
    arrival?: Partial<FlightEndpoint>;
  } = {}
): FlightStatus {
  const { departure, arrival, ...rest } = overrides;
  return {
    carrierCode: "AA",
    flightNumber: "123",
    date: "2025-12-25",
    operationalSuffix: null,
    aircraft: null,
    operatingCarrier: null,
    ...rest,
    departure: makeEndpoint({
      airport: "JFK",
      terminal: "4",
      scheduledTime: "2025-12-25T10:00-05:00",
      estimatedTime: "2025-12-25T10:00-05:00",
      actualTime: "2025-12-25T10:00-05:00",
      ...departure,
    }),
    arrival: makeEndpoint({
      airport: "LAX",
      terminal: "4",
      scheduledTime: "2025-12-25T13:30-08:00",
      estimatedTime: "2025-12-25T13:30-08:00",
      actualTime: "2025-12-25T13:30-08:00",
      ...arrival,
    }),
  };
}

export function makeLounge(overrides: Partial<Lounge> = {}): Lounge {
  return {
    airport: "JFK",
    loungeId: "lounge-1",
    name: "Test Lounge",
    terminal: null,
    accessProviders: ["Amex Platinum"],
    amenities: [],
    hours: null,
    avgWaitMinutes: null,
    crowdLevel: null,
    rating: null,
    accessDetails: [],
    ...overrides,
  };
}

// ----------------------------------------------------------------------------
// IN-PROCESS HTTP TRANSPORT
// ----------------------------------------------------------------------------

export type MockReply =
  | { status: number; data?: unknown }
  | { failure: "timeout" | "network" };

export interface MockTransport {
  adapter: AxiosAdapter;
  calls: InternalAxiosRequestConfig[];
}

/**
 * Axios adapter that answers from a handler. Non-2xx replies reject the way
 * axios' own transports do.
 */
export function mockTransport(
  handler: (config: InternalAxiosRequestConfig) => MockReply | Promise<MockReply>
): MockTransport {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = await handler(config);

    if ("failure" in reply) {
      if (reply.failure === "timeout") {
        throw new AxiosError(`timeout of ${config.timeout}ms exceeded`, AxiosError.ECONNABORTED, config);
      }
      throw new AxiosError("connect ECONNREFUSED 127.0.0.1:443", "ECONNREFUSED", config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };

    if (reply.status >= 200 && reply.status < 300) {
      return response;
    }

    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      null,
      response
    );
  };

  return { adapter, calls };
}

// ----------------------------------------------------------------------------
// PROVIDER PAYLOADS
// ----------------------------------------------------------------------------

export function datedFlightPayload(options: {
  carrierCode?: string;
  flightNumber?: number;
  date?: string;
  from?: string;
  to?: string;
  departureTerminal?: string;
  std?: string;
  etd?: string;
  sta?: string;
} = {}): unknown {
  const departureTimings = [{ qualifier: "STD", value: options.std ?? "2025-12-25T10:00-05:00" }];
  if (options.etd) departureTimings.push({ qualifier: "ETD", value: options.etd });

  return {
    data: [
      {
        type: "DatedFlight",
        scheduledDepartureDate: options.date ?? "2025-12-25",
        flightDesignator: {
          carrierCode: options.carrierCode ?? "AA",
          flightNumber: options.flightNumber ?? 123,
        },
        flightPoints: [
          {
            iataCode: options.from ?? "JFK",
            departure: {
              timings: departureTimings,
              terminal: { code: options.departureTerminal ?? "8" },
              gate: { mainGate: "12" },
            },
          },
          {
            iataCode: options.to ?? "LAX",
            arrival: {
              timings: [{ qualifier: "STA", value: options.sta ?? "2025-12-25T13:30-08:00" }],
              terminal: { code: "4" },
            },
          },
        ],
        segments: [
          {
            boardPointIataCode: options.from ?? "JFK",
            offPointIataCode: options.to ?? "LAX",
            scheduledSegmentDuration: "PT6H30M",
          },
        ],
        legs: [
          {
            boardPointIataCode: options.from ?? "JFK",
            offPointIataCode: options.to ?? "LAX",
            aircraftEquipment: { aircraftType: "32Q" },
            scheduledLegDuration: "PT6H30M",
          },
        ],
      },
    ],
    meta: { count: 1 },
  };
}
