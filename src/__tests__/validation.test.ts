import { describe, it, expect } from "vitest";
import {
  parseFlightIdentifier,
  validateFlightDate,
  validateOperationalSuffix,
} from "../validation/flight-identifier.js";
import {
  recommendationRequestSchema,
  layoverStrategyRequestSchema,
  loungeSearchQuerySchema,
  flightQuerySchema,
} from "../validation/requests.schema.js";
import { airportCodeSchema, dateSchema } from "../validation/common.schema.js";
import { ErrorCode } from "../errors/index.js";

describe("Validation", () => {
  describe("parseFlightIdentifier", () => {
    it("should parse a plain IATA identifier", () => {
      const result = parseFlightIdentifier("AA123");
      expect(result).toEqual({ ok: true, value: { carrierCode: "AA", flightNumber: "123" } });
    });

    it("should truncate a lowercase three-letter prefix to two letters", () => {
      const result = parseFlightIdentifier("aal123");
      expect(result).toEqual({ ok: true, value: { carrierCode: "AA", flightNumber: "123" } });
    });

    it("should ignore whitespace between carrier and number", () => {
      const result = parseFlightIdentifier("  AA 123 ");
      expect(result).toEqual({ ok: true, value: { carrierCode: "AA", flightNumber: "123" } });
    });

    it.each(["A1", "", "123"])("should reject %j as lacking a carrier code", (identifier) => {
      const result = parseFlightIdentifier(identifier);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
        expect(result.error.message).toBe("Flight identifier must start with a 2 letter carrier code");
      }
    });

    it("should reject an identifier with no digits", () => {
      const result = parseFlightIdentifier("AAL");
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Flight identifier has no flight number");
      }
    });
  });

  describe("validateFlightDate", () => {
    it("should accept a calendar date", () => {
      expect(validateFlightDate("2025-12-25")).toEqual({ ok: true, value: "2025-12-25" });
    });

    it("should reject impossible dates and other formats", () => {
      expect(validateFlightDate("2025-02-30").ok).toBe(false);
      expect(validateFlightDate("25-12-2025").ok).toBe(false);
    });
  });

  describe("validateOperationalSuffix", () => {
    it("should treat absent and empty suffixes as none", () => {
      expect(validateOperationalSuffix(undefined)).toEqual({ ok: true, value: undefined });
      expect(validateOperationalSuffix("")).toEqual({ ok: true, value: undefined });
    });

    it("should uppercase a single letter", () => {
      expect(validateOperationalSuffix("d")).toEqual({ ok: true, value: "D" });
    });

    it("should reject longer suffixes", () => {
      expect(validateOperationalSuffix("AB").ok).toBe(false);
    });
  });

  describe("common schemas", () => {
    it("should uppercase airport codes", () => {
      expect(airportCodeSchema.parse(" jfk ")).toBe("JFK");
      expect(airportCodeSchema.safeParse("JFKX").success).toBe(false);
    });

    it("should reject a leap day outside a leap year", () => {
      expect(dateSchema.safeParse("2024-02-29").success).toBe(true);
      expect(dateSchema.safeParse("2025-02-29").success).toBe(false);
    });
  });

  describe("recommendationRequestSchema", () => {
    it("should accept a minimal request", () => {
      const result = recommendationRequestSchema.safeParse({
        flightNumber: "AA123",
        date: "2025-12-25",
      });
      expect(result.success).toBe(true);
    });

    it("should accept memberships and preferences", () => {
      const result = recommendationRequestSchema.safeParse({
        flightNumber: "AA123",
        date: "2025-12-25",
        operationalSuffix: "a",
        memberships: ["Priority Pass"],
        preferences: { quiet: true, showers: false },
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.operationalSuffix).toBe("A");
      }
    });

    it("should reject unknown preference keys", () => {
      const result = recommendationRequestSchema.safeParse({
        flightNumber: "AA123",
        date: "2025-12-25",
        preferences: { spa: true },
      });
      expect(result.success).toBe(false);
    });

    it("should reject a missing date", () => {
      const result = recommendationRequestSchema.safeParse({ flightNumber: "AA123" });
      expect(result.success).toBe(false);
    });
  });

  describe("layoverStrategyRequestSchema", () => {
    it("should require at least two legs", () => {
      const result = layoverStrategyRequestSchema.safeParse({
        legs: [{ flightNumber: "AA100", date: "2025-12-25" }],
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.errors[0]?.message).toBe("At least two legs are required");
      }
    });

    it("should accept two legs", () => {
      const result = layoverStrategyRequestSchema.safeParse({
        legs: [
          { flightNumber: "AA100", date: "2025-12-25" },
          { flightNumber: "AA200", date: "2025-12-25" },
        ],
        memberships: ["Amex Platinum"],
      });
      expect(result.success).toBe(true);
    });
  });

  describe("query schemas", () => {
    it("should split comma separated memberships", () => {
      const result = loungeSearchQuerySchema.parse({ memberships: "Priority Pass, ,Amex Platinum" });
      expect(result.memberships).toEqual(["Priority Pass", "Amex Platinum"]);
    });

    it("should require a date for flight lookups", () => {
      expect(flightQuerySchema.safeParse({}).success).toBe(false);
      expect(flightQuerySchema.parse({ date: "2025-12-25", suffix: "b" })).toEqual({
        date: "2025-12-25",
        suffix: "B",
      });
    });
  });
});
