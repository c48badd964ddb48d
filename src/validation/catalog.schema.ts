// ============================================================================
// CATALOG DATA SCHEMAS
// Shape of the lounge catalog file loaded at startup
// ============================================================================

import { z } from "zod";

const nullableText = z.string().trim().min(1).nullable().default(null);

export const catalogLoungeSchema = z.object({
  loungeId: z.string().min(1),
  name: z.string().min(1),
  terminal: z
    .union([z.string(), z.number()])
    .transform(String)
    .nullable()
    .default(null),
  accessProviders: z.array(z.string()).default([]),
  amenities: z.array(z.string()).default([]),
  hours: nullableText,
  avgWaitMinutes: z.number().nonnegative().nullable().default(null),
  crowdLevel: nullableText,
  rating: z.number().min(0).max(5).nullable().default(null),
});

export const providerPolicySchema = z.object({
  providerName: z.string().min(1),
  guestPolicy: nullableText,
  conditions: nullableText,
  notes: nullableText,
});

export const catalogUserSchema = z.object({
  userId: z.string().min(1),
  name: nullableText,
  homeAirport: nullableText,
  memberships: z.array(z.string()).default([]),
});

export const catalogFileSchema = z.object({
  airports: z.record(z.string(), z.array(catalogLoungeSchema)),
  providerPolicies: z.array(providerPolicySchema).default([]),
  users: z.array(catalogUserSchema).default([]),
});

export type CatalogLoungeInput = z.infer<typeof catalogLoungeSchema>;
export type CatalogFile = z.infer<typeof catalogFileSchema>;
