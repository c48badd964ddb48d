// ============================================================================
// STRUCTURED LOGGER
// Pino-based logger with automatic context injection and secret redaction
// ============================================================================

import pino from "pino";
import { config } from "../config/index.js";
import { context } from "./context.js";

// ----------------------------------------------------------------------------
// SENSITIVE DATA PATTERNS FOR REDACTION
// ----------------------------------------------------------------------------

const redactPaths = [
  "clientSecret",
  "client_secret",
  "credentials.clientSecret",
  "access_token",
  "token.value",
  "authorization",
  "Authorization",
  "headers.Authorization",
  "req.headers.authorization",
  "FLIGHT_API_CLIENT_SECRET",
];

// ----------------------------------------------------------------------------
// PINO CONFIGURATION
// ----------------------------------------------------------------------------

const pinoOptions: pino.LoggerOptions = {
  level: config.logging.level,
  redact: config.logging.maskSensitiveData
    ? {
        paths: redactPaths,
        censor: "[REDACTED]",
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: () => ({}),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  base: {
    service: config.app.name,
    version: config.app.version,
    env: config.app.env,
  },
};

// ----------------------------------------------------------------------------
// TRANSPORT CONFIGURATION
// ----------------------------------------------------------------------------

const transport = config.logging.pretty
  ? pino.transport({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname,service,version,env",
        messageFormat: "{correlationId} | {msg}",
      },
    })
  : undefined;

const baseLogger = transport ? pino(pinoOptions, transport) : pino(pinoOptions);

// ----------------------------------------------------------------------------
// CONTEXT-AWARE LOGGER WRAPPER
// ----------------------------------------------------------------------------

type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

function createLogMethod(level: LogLevel) {
  return (objOrMsg: Record<string, unknown> | string, msg?: string): void => {
    const ctx = context.get();
    const contextData = ctx
      ? {
          correlationId: ctx.correlationId,
          transactionId: ctx.transactionId,
          operation: ctx.operation,
          elapsedMs: Date.now() - ctx.startTime,
        }
      : {};

    if (typeof objOrMsg === "string") {
      baseLogger[level]({ ...contextData }, objOrMsg);
    } else {
      baseLogger[level]({ ...contextData, ...objOrMsg }, msg || "");
    }
  };
}

// ----------------------------------------------------------------------------
// LOGGER EXPORT
// ----------------------------------------------------------------------------

export const logger = {
  fatal: createLogMethod("fatal"),
  error: createLogMethod("error"),
  warn: createLogMethod("warn"),
  info: createLogMethod("info"),
  debug: createLogMethod("debug"),
  trace: createLogMethod("trace"),

  /**
   * Create a child logger with additional bindings
   */
  child(bindings: Record<string, unknown>) {
    return baseLogger.child(bindings);
  },

  /**
   * Log a flight-data provider call with structured data
   */
  providerCall(data: {
    operation: string;
    success: boolean;
    duration: number;
    status?: number;
    errorCode?: string;
    errorMessage?: string;
  }) {
    const ctx = context.get();
    const logData = {
      ...data,
      correlationId: ctx?.correlationId,
      transactionId: ctx?.transactionId,
      type: "provider_call",
    };

    if (data.success) {
      baseLogger.info(logData, `Provider ${data.operation} completed`);
    } else {
      baseLogger.error(logData, `Provider ${data.operation} failed: ${data.errorMessage || "Unknown error"}`);
    }
  },

  /**
   * Log token lifecycle events
   */
  tokenEvent(data: {
    event: "created" | "expired" | "invalidated" | "refresh_failed" | "credentials_fetched";
    expiresIn?: number;
    reason?: string;
  }) {
    const ctx = context.get();
    const logData = {
      ...data,
      correlationId: ctx?.correlationId,
      type: "token_lifecycle",
    };

    const level: LogLevel = data.event === "refresh_failed" ? "error" : data.event === "expired" ? "warn" : "info";
    baseLogger[level](logData, `Token ${data.event}`);
  },
};

export type Logger = typeof logger;
