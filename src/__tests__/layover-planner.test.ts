import { describe, it, expect } from "vitest";
import { LayoverPlanner, classifyLayover } from "../services/layover-planner.js";
import type { FlightLeg } from "../types/lounge.types.js";
import { makeFlight, makeLounge } from "./helpers/fixtures.js";
import { FakeCatalog, FakeFlightSource, type FlightOutcome } from "./helpers/fakes.js";

const DATE = "2025-12-25";
const memberships = ["Priority Pass"];

function inbound(arrivalTime: string | null = "2025-12-25T12:00-06:00") {
  return makeFlight({
    flightNumber: "100",
    departure: { airport: "JFK", terminal: "8", estimatedTime: "2025-12-25T09:00-05:00" },
    arrival: { airport: "ORD", terminal: "3", estimatedTime: arrivalTime },
  });
}

function outbound(departureTime: string, airport: string | null = "ORD") {
  return makeFlight({
    flightNumber: "200",
    departure: { airport, terminal: "1", scheduledTime: departureTime, estimatedTime: departureTime },
    arrival: { airport: "DFW", terminal: "D", estimatedTime: "2025-12-25T19:00-06:00" },
  });
}

const onward = makeFlight({
  flightNumber: "300",
  departure: { airport: "DFW", terminal: "D", estimatedTime: "2025-12-25T21:00-06:00" },
});

const ordLounges = [
  makeLounge({ airport: "ORD", loungeId: "a", name: "Lakeview", terminal: "1", accessProviders: ["Priority Pass"], avgWaitMinutes: 8, rating: 4.2 }),
  makeLounge({ airport: "ORD", loungeId: "b", name: "Gateway", terminal: "1", accessProviders: ["Priority Pass"], avgWaitMinutes: 15, rating: 4.6 }),
  makeLounge({ airport: "ORD", loungeId: "c", name: "Corner", terminal: "1", accessProviders: ["Priority Pass"], avgWaitMinutes: 25, rating: 3.8 }),
  makeLounge({ airport: "ORD", loungeId: "d", name: "Annex", terminal: "1", accessProviders: ["Priority Pass"] }),
  makeLounge({ airport: "ORD", loungeId: "e", name: "Prairie", terminal: "5", accessProviders: ["Priority Pass"], avgWaitMinutes: 5, rating: 4.9 }),
];

function legs(...identifiers: string[]): FlightLeg[] {
  return identifiers.map((identifier) => ({ identifier, date: DATE }));
}

function createPlanner(
  outcomes: Record<string, FlightOutcome | FlightOutcome[]>,
  options: { catalog?: FakeCatalog; delays?: Record<string, number> } = {}
) {
  const flights = new FakeFlightSource(outcomes, options.delays);
  const catalog = options.catalog ?? new FakeCatalog({ ORD: ordLounges });
  const planner = new LayoverPlanner({ flights, catalog, concurrency: 2 });
  return { planner, flights, catalog };
}

describe("classifyLayover", () => {
  it.each([
    [89, "no_lounge"],
    [90, "quick_visit"],
    [179, "quick_visit"],
    [180, "full_experience"],
  ] as const)("should classify %i minutes as %s", (minutes, expected) => {
    expect(classifyLayover(minutes)).toBe(expected);
  });
});

describe("LayoverPlanner", () => {
  it("should return nothing for a single leg", async () => {
    const { planner, flights } = createPlanner({ AA100: inbound() });

    expect(await planner.plan(legs("AA100"), memberships)).toEqual([]);
    expect(flights.calls).toEqual([]);
  });

  describe("no_lounge", () => {
    it("should send the traveler to the gate without consulting the catalog", async () => {
      const { planner, catalog } = createPlanner({
        AA100: inbound(),
        AA200: outbound("2025-12-25T13:20-06:00"),
      });

      const [strategy] = await planner.plan(legs("AA100", "AA200"), memberships);

      expect(strategy?.connectionAirport).toBe("ORD");
      expect(strategy?.layoverMinutes).toBe(80);
      expect(strategy?.recommendation).toBe("no_lounge");
      expect(strategy?.advice).toBe("80 minute connection at ORD: go straight to your departure gate.");
      expect(strategy?.suggestedLounges).toEqual([]);
      expect(catalog.calls).toEqual([]);
    });

    it("should not round a connection just short of 90 minutes up", async () => {
      const { planner, catalog } = createPlanner({
        AA100: inbound("2025-12-25T12:00:30-06:00"),
        AA200: outbound("2025-12-25T13:30:00-06:00"),
      });

      const [strategy] = await planner.plan(legs("AA100", "AA200"), memberships);

      expect(strategy?.layoverMinutes).toBe(89);
      expect(strategy?.recommendation).toBe("no_lounge");
      expect(catalog.calls).toEqual([]);
    });
  });

  describe("quick_visit", () => {
    it("should suggest up to three lounges in the departure terminal", async () => {
      const { planner } = createPlanner({
        AA100: inbound(),
        AA200: outbound("2025-12-25T14:00-06:00"),
      });

      const [strategy] = await planner.plan(legs("AA100", "AA200"), memberships);

      expect(strategy?.recommendation).toBe("quick_visit");
      expect(strategy?.layoverMinutes).toBe(120);
      expect(strategy?.suggestedLounges.map((suggestion) => suggestion.lounge.loungeId)).toEqual(["a", "b", "d"]);
      expect(strategy?.suggestedLounges.map((suggestion) => suggestion.score)).toEqual([90, 70, 50]);
      expect(strategy?.suggestedLounges[0]?.timing).toEqual({
        latestEntry: null,
        latestExit: null,
        recommendedDurationMinutes: 60,
      });
      expect(strategy?.advice).toBe(
        "120 minute connection at ORD: a quick lounge visit of up to 60 minutes near your departure terminal."
      );
    });

    it("should say so when no lounge is reachable", async () => {
      const { planner } = createPlanner({
        AA100: inbound(),
        AA200: outbound("2025-12-25T14:00-06:00"),
      });

      const [strategy] = await planner.plan(legs("AA100", "AA200"), ["Admirals Club"]);

      expect(strategy?.suggestedLounges).toEqual([]);
      expect(strategy?.advice).toBe("120 minute connection at ORD: no accessible lounge near your departure terminal.");
    });
  });

  describe("full_experience", () => {
    it("should rank lounges across the airport and cap the stay", async () => {
      const { planner } = createPlanner({
        AA100: inbound(),
        AA200: outbound("2025-12-25T17:00-06:00"),
      });

      const [strategy] = await planner.plan(legs("AA100", "AA200"), memberships);

      expect(strategy?.recommendation).toBe("full_experience");
      expect(strategy?.layoverMinutes).toBe(300);
      expect(strategy?.suggestedLounges.map((suggestion) => suggestion.lounge.loungeId)).toEqual([
        "a",
        "b",
        "e",
        "d",
        "c",
      ]);
      expect(strategy?.suggestedLounges[0]?.timing.recommendedDurationMinutes).toBe(180);
      expect(strategy?.advice).toBe("300 minute connection at ORD: plenty of time to relax for up to 180 minutes.");
    });
  });

  it("should still plan the connection when the catalog is unavailable", async () => {
    const { planner } = createPlanner(
      { AA100: inbound(), AA200: outbound("2025-12-25T15:20-06:00") },
      { catalog: new FakeCatalog({}, true) }
    );

    const [strategy] = await planner.plan(legs("AA100", "AA200"), memberships);

    expect(strategy?.recommendation).toBe("full_experience");
    expect(strategy?.suggestedLounges).toEqual([]);
    expect(strategy?.advice).toBe(
      "Lounge information for ORD is unavailable right now; allow 200 minutes to connect."
    );
  });

  describe("unresolved legs", () => {
    it.each(["not_found", "provider", "throw"] as const)(
      "should skip both connections around a middle leg that is %s",
      async (outcome) => {
        const { planner } = createPlanner({ AA100: inbound(), AA404: outcome, AA300: onward });

        expect(await planner.plan(legs("AA100", "AA404", "AA300"), memberships)).toEqual([]);
      }
    );

    it("should keep the connections it can resolve", async () => {
      const { planner } = createPlanner({
        AA100: inbound(),
        AA200: outbound("2025-12-25T14:00-06:00"),
        AA404: "not_found",
      });

      const strategies = await planner.plan(legs("AA100", "AA200", "AA404"), memberships);

      expect(strategies.map((strategy) => strategy.connectionAirport)).toEqual(["ORD"]);
    });

    it("should skip a connection that departs before it arrives", async () => {
      const { planner, catalog } = createPlanner({
        AA100: inbound(),
        AA200: outbound("2025-12-25T11:30-06:00"),
      });

      expect(await planner.plan(legs("AA100", "AA200"), memberships)).toEqual([]);
      expect(catalog.calls).toEqual([]);
    });

    it("should skip a connection without an arrival time", async () => {
      const { planner } = createPlanner({
        AA100: inbound(null),
        AA200: outbound("2025-12-25T14:00-06:00"),
      });

      expect(await planner.plan(legs("AA100", "AA200"), memberships)).toEqual([]);
    });
  });

  it("should fall back to the arrival airport", async () => {
    const { planner } = createPlanner({
      AA100: inbound(),
      AA200: outbound("2025-12-25T13:00-06:00", null),
    });

    const [strategy] = await planner.plan(legs("AA100", "AA200"), memberships);

    expect(strategy?.connectionAirport).toBe("ORD");
  });

  it("should keep connection order when lookups finish out of order", async () => {
    const { planner } = createPlanner(
      { AA100: inbound(), AA200: outbound("2025-12-25T14:00-06:00"), AA300: onward },
      { delays: { AA100: 20 } }
    );

    const strategies = await planner.plan(legs("AA100", "AA200", "AA300"), memberships);

    expect(strategies.map((strategy) => [strategy.connectionAirport, strategy.layoverMinutes])).toEqual([
      ["ORD", 120],
      ["DFW", 120],
    ]);
    expect(strategies[1]?.advice).toBe(
      "120 minute connection at DFW: no accessible lounge near your departure terminal."
    );
  });
});
