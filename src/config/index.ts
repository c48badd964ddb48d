// ============================================================================
// CONFIGURATION MODULE
// Centralized, typed, validated configuration with environment variable support
// ============================================================================

import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

// z.coerce.boolean() treats "false" as true, so flags are parsed explicitly
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(defaultValue ? "true" : "false")
    .transform((value) => value === "true" || value === "1" || value === "yes");

// ----------------------------------------------------------------------------
// ENVIRONMENT SCHEMA
// ----------------------------------------------------------------------------

const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  APP_NAME: z.string().default("lounge-advisor-backend"),
  APP_VERSION: z.string().default("1.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  PRETTY_LOGS: booleanFlag(false),

  // Flight data provider (OAuth2 client-credentials)
  FLIGHT_API_BASE_URL: z.string().url().default("https://test.api.amadeus.com"),
  FLIGHT_API_TOKEN_PATH: z.string().default("/v1/security/oauth2/token"),
  FLIGHT_API_SCHEDULE_PATH: z.string().default("/v2/schedule/flights"),
  FLIGHT_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FLIGHT_API_SECRET_NAME: z.string().default("lounge-advisor/flight-api/credentials"),
  FLIGHT_API_CLIENT_ID: z.string().optional(),
  FLIGHT_API_CLIENT_SECRET: z.string().optional(),

  // Credential lifecycle
  CREDENTIALS_TTL_MS: z.coerce.number().int().positive().default(3600000),
  TOKEN_SAFETY_MARGIN_MS: z.coerce.number().int().nonnegative().default(299000),
  TOKEN_DEFAULT_LIFETIME_MS: z.coerce.number().int().positive().default(1799000),

  // Catalog
  CATALOG_DATA_PATH: z.string().default("./data/catalog.json"),

  // Planner
  LAYOVER_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),

  // Timeouts
  REQUEST_TIMEOUT_MS: z.coerce.number().default(30000),

  // Observability
  ENABLE_METRICS: booleanFlag(true),
  METRICS_PATH: z.string().default("/metrics"),
  ENABLE_REQUEST_LOGGING: booleanFlag(true),
  MASK_SENSITIVE_DATA: booleanFlag(true),

  // Security
  CORS_ORIGINS: z.string().default("http://localhost:5173"),
  TRUST_PROXY: booleanFlag(false),
});

export type Env = z.infer<typeof envSchema>;

// ----------------------------------------------------------------------------
// PARSE AND VALIDATE
// ----------------------------------------------------------------------------

function loadConfig(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("[x] Invalid environment configuration:");
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

const env = loadConfig();

// ----------------------------------------------------------------------------
// STRUCTURED CONFIG EXPORT
// ----------------------------------------------------------------------------

export const config = {
  app: {
    name: env.APP_NAME,
    version: env.APP_VERSION,
    env: env.NODE_ENV,
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",
    isTest: env.NODE_ENV === "test",
  },

  logging: {
    level: env.LOG_LEVEL,
    pretty: env.PRETTY_LOGS,
    enableRequestLogging: env.ENABLE_REQUEST_LOGGING,
    maskSensitiveData: env.MASK_SENSITIVE_DATA,
  },

  flightApi: {
    baseUrl: env.FLIGHT_API_BASE_URL,
    timeoutMs: env.FLIGHT_API_TIMEOUT_MS,
    secretName: env.FLIGHT_API_SECRET_NAME,
    clientId: env.FLIGHT_API_CLIENT_ID,
    clientSecret: env.FLIGHT_API_CLIENT_SECRET,
    endpoints: {
      token: env.FLIGHT_API_TOKEN_PATH,
      schedule: env.FLIGHT_API_SCHEDULE_PATH,
    },
  },

  credentials: {
    ttlMs: env.CREDENTIALS_TTL_MS,
    tokenSafetyMarginMs: env.TOKEN_SAFETY_MARGIN_MS,
    tokenDefaultLifetimeMs: env.TOKEN_DEFAULT_LIFETIME_MS,
  },

  catalog: {
    dataPath: env.CATALOG_DATA_PATH,
  },

  planner: {
    concurrency: env.LAYOVER_CONCURRENCY,
  },

  resilience: {
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
    },
    timeouts: {
      request: env.REQUEST_TIMEOUT_MS,
    },
  },

  metrics: {
    enabled: env.ENABLE_METRICS,
    path: env.METRICS_PATH,
  },

  security: {
    corsOrigins: env.CORS_ORIGINS.split(",").map((s) => s.trim()),
    trustProxy: env.TRUST_PROXY,
  },
} as const;

export type Config = typeof config;
