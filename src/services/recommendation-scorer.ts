// ============================================================================
// RECOMMENDATION SCORER
// Additive lounge scoring against access, preferences, crowding and timing
// ============================================================================

import type {
  FlightStatus,
  Lounge,
  Recommendation,
  TimingWindow,
  TravelerPreferences,
} from "../types/lounge.types.js";
import { shiftTimestamp } from "../utils/time.js";
import { isCompatible } from "./access-matcher.js";

// ----------------------------------------------------------------------------
// SCORING TABLE
// ----------------------------------------------------------------------------

export const SCORE = {
  sameTerminal: 50,
  otherTerminal: 20,
  shortWait: 15,
  longWait: -10,
  excellentRating: 20,
  goodRating: 10,
} as const;

const SHORT_WAIT_MINUTES = 10;
const LONG_WAIT_MINUTES = 20;
const EXCELLENT_RATING = 4.5;
const GOOD_RATING = 4.0;

const EXIT_BEFORE_DEPARTURE_MINUTES = 60;
const ENTRY_WINDOW_MINUTES = 30;

interface PreferenceRule {
  points: number;
  keywords: readonly string[];
  reason: string;
}

const PREFERENCE_RULES: Record<keyof TravelerPreferences, PreferenceRule> = {
  quiet: { points: 15, keywords: ["quiet"], reason: "Quiet area available" },
  food: {
    points: 15,
    keywords: ["dining", "food", "buffet", "restaurant"],
    reason: "Food and dining on offer",
  },
  wifi: { points: 10, keywords: ["wifi", "wi-fi"], reason: "Wi-Fi available" },
  showers: { points: 20, keywords: ["shower"], reason: "Showers available" },
};

const PREFERENCE_ORDER: ReadonlyArray<keyof TravelerPreferences> = ["quiet", "food", "wifi", "showers"];

// ----------------------------------------------------------------------------
// OPTIONS
// ----------------------------------------------------------------------------

export interface ScoringOptions {
  /** Maximum recommendations returned (default 5) */
  limit?: number;
  /** Drop lounges outside the departure terminal when it is known */
  sameTerminalOnly?: boolean;
  /** Multiplier on the crowd contribution (default 1) */
  waitWeight?: number;
  /** Attach latestEntry/latestExit derived from the departure time (default true) */
  includeTimingWindow?: boolean;
  recommendedDurationMinutes?: number;
}

export const DEFAULT_RECOMMENDATION_LIMIT = 5;
export const DEFAULT_RECOMMENDED_DURATION_MINUTES = 30;

// ----------------------------------------------------------------------------
// SCORER
// ----------------------------------------------------------------------------

function normalizeTerminal(terminal: string | null): string | null {
  if (terminal === null) return null;
  const trimmed = terminal.trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : null;
}

function scoreTerminal(lounge: Lounge, departureTerminal: string | null, reasons: string[]): number {
  const loungeTerminal = normalizeTerminal(lounge.terminal);
  if (loungeTerminal === null) return 0;

  if (departureTerminal !== null && loungeTerminal === departureTerminal) {
    reasons.push(`Same terminal as departure (${lounge.terminal?.trim()})`);
    return SCORE.sameTerminal;
  }

  reasons.push(`Located in terminal ${lounge.terminal?.trim()}`);
  return SCORE.otherTerminal;
}

function scorePreferences(
  lounge: Lounge,
  preferences: TravelerPreferences | undefined,
  reasons: string[]
): number {
  if (!preferences) return 0;

  const amenities = lounge.amenities.map((amenity) => amenity.toLowerCase());
  let score = 0;

  for (const key of PREFERENCE_ORDER) {
    if (!preferences[key]) continue;
    const rule = PREFERENCE_RULES[key];
    const offered = amenities.some((amenity) => rule.keywords.some((keyword) => amenity.includes(keyword)));
    if (offered) {
      score += rule.points;
      reasons.push(rule.reason);
    }
  }

  return score;
}

function scoreCrowd(lounge: Lounge, weight: number, reasons: string[]): number {
  const wait = lounge.avgWaitMinutes;
  if (wait === null) return 0;

  if (wait < SHORT_WAIT_MINUTES) {
    reasons.push(`Short wait (about ${wait} min)`);
    return SCORE.shortWait * weight;
  }
  if (wait > LONG_WAIT_MINUTES) {
    reasons.push(`Long wait (about ${wait} min)`);
    return SCORE.longWait * weight;
  }
  return 0;
}

function scoreRating(lounge: Lounge, reasons: string[]): number {
  const rating = lounge.rating;
  if (rating === null) return 0;

  if (rating >= EXCELLENT_RATING) {
    reasons.push(`Excellent rating (${rating})`);
    return SCORE.excellentRating;
  }
  if (rating >= GOOD_RATING) {
    reasons.push(`Good rating (${rating})`);
    return SCORE.goodRating;
  }
  return 0;
}

/**
 * Latest exit is an hour before departure; entry should happen in the half hour before that
 */
export function computeTimingWindow(
  flight: FlightStatus,
  includeWindow: boolean,
  recommendedDurationMinutes: number
): TimingWindow {
  if (!includeWindow) {
    return { latestEntry: null, latestExit: null, recommendedDurationMinutes };
  }

  const departure = flight.departure.estimatedTime ?? flight.departure.scheduledTime;
  const latestExit = departure ? shiftTimestamp(departure, -EXIT_BEFORE_DEPARTURE_MINUTES) : null;
  if (latestExit === null) {
    return { latestEntry: null, latestExit: null, recommendedDurationMinutes: null };
  }

  return {
    latestEntry: shiftTimestamp(latestExit, -ENTRY_WINDOW_MINUTES),
    latestExit,
    recommendedDurationMinutes,
  };
}

export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  if (a.score !== b.score) return b.score - a.score;

  const ratingA = a.lounge.rating;
  const ratingB = b.lounge.rating;
  if (ratingA !== ratingB) {
    if (ratingA === null) return 1;
    if (ratingB === null) return -1;
    return ratingB - ratingA;
  }

  if (a.lounge.name === b.lounge.name) return 0;
  return a.lounge.name < b.lounge.name ? -1 : 1;
}

export function scoreLounges(
  flight: FlightStatus,
  lounges: readonly Lounge[],
  memberships: readonly string[],
  preferences?: TravelerPreferences,
  options: ScoringOptions = {}
): Recommendation[] {
  const limit = options.limit ?? DEFAULT_RECOMMENDATION_LIMIT;
  const waitWeight = options.waitWeight ?? 1;
  const departureTerminal = normalizeTerminal(flight.departure.terminal);
  const timing = computeTimingWindow(
    flight,
    options.includeTimingWindow ?? true,
    options.recommendedDurationMinutes ?? DEFAULT_RECOMMENDED_DURATION_MINUTES
  );

  const recommendations: Recommendation[] = [];

  for (const lounge of lounges) {
    const access = isCompatible(memberships, lounge.accessProviders);
    if (!access.hasAccess) continue;

    if (
      options.sameTerminalOnly &&
      departureTerminal !== null &&
      normalizeTerminal(lounge.terminal) !== departureTerminal
    ) {
      continue;
    }

    const reasons: string[] = [];
    const score =
      scoreTerminal(lounge, departureTerminal, reasons) +
      scorePreferences(lounge, preferences, reasons) +
      scoreCrowd(lounge, waitWeight, reasons) +
      scoreRating(lounge, reasons);

    recommendations.push({
      lounge,
      accessMethods: [...new Set(access.matches.map((match) => match.provider))],
      score,
      reasons,
      timing: { ...timing },
    });
  }

  return recommendations.sort(compareRecommendations).slice(0, Math.max(0, limit));
}
