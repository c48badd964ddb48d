// ============================================================================
// ACCESS COMPATIBILITY MATCHER
// Permissive membership <-> lounge access provider matching
// ============================================================================

import type { AccessCompatibility, AccessMatch } from "../types/lounge.types.js";

// Whole-word issuer abbreviations seen in membership names
const ABBREVIATIONS: ReadonlyArray<[RegExp, string]> = [[/\bamex\b/g, "american express"]];

function normalize(value: string): string {
  let normalized = value.toLowerCase().replace(/[_-]+/g, " ").replace(/\s+/g, " ").trim();
  for (const [pattern, expansion] of ABBREVIATIONS) {
    normalized = normalized.replace(pattern, expansion);
  }
  return normalized;
}

function uniqueNonBlank(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (value.trim().length === 0 || seen.has(value)) continue;
    seen.add(value);
    result.push(value);
  }
  return result;
}

function contains(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

/**
 * Two names match when either contains the other, compared case-insensitively
 * as given or after normalization ("Amex_Platinum" ~ "American Express Platinum Card").
 * Substring matching also lets short codes such as "AA" match unrelated names.
 */
export function isCompatible(
  memberships: readonly string[],
  providers: readonly string[]
): AccessCompatibility {
  const matches: AccessMatch[] = [];

  const candidates = uniqueNonBlank(providers).map((provider) => ({
    provider,
    raw: provider.toLowerCase().trim(),
    normalized: normalize(provider),
  }));

  for (const membership of uniqueNonBlank(memberships)) {
    const raw = membership.toLowerCase().trim();
    const normalized = normalize(membership);

    for (const candidate of candidates) {
      const normalizedMatch =
        normalized.length > 0 &&
        candidate.normalized.length > 0 &&
        contains(normalized, candidate.normalized);

      if (contains(raw, candidate.raw) || normalizedMatch) {
        matches.push({ membership, provider: candidate.provider });
      }
    }
  }

  return { hasAccess: matches.length > 0, matches };
}
