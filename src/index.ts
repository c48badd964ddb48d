// ============================================================================
// SERVER ENTRY POINT
// Composition root: wires the recommendation core and starts Express
// ============================================================================

import type { Server } from "node:http";
import { config } from "./config/index.js";
import { logger, systemClock } from "./utils/index.js";
import { createApp } from "./app.js";
import {
  CredentialCache,
  EnvSecretStore,
  FlightDataClient,
  HttpClientService,
  JsonCatalogGateway,
  LoungeAdvisorService,
} from "./services/index.js";

const SHUTDOWN_TIMEOUT_MS = 30000;

async function buildAdvisor(): Promise<LoungeAdvisorService> {
  const http = new HttpClientService(
    { baseURL: config.flightApi.baseUrl, timeout: config.flightApi.timeoutMs },
    "flight-api"
  );

  const credentials = new CredentialCache({
    secretStore: new EnvSecretStore({
      secretName: config.flightApi.secretName,
      clientId: config.flightApi.clientId,
      clientSecret: config.flightApi.clientSecret,
    }),
    http,
    clock: systemClock,
    secretName: config.flightApi.secretName,
    tokenPath: config.flightApi.endpoints.token,
    credentialsTtlMs: config.credentials.ttlMs,
    safetyMarginMs: config.credentials.tokenSafetyMarginMs,
    defaultLifetimeMs: config.credentials.tokenDefaultLifetimeMs,
  });

  const flights = new FlightDataClient({
    http,
    credentials,
    schedulePath: config.flightApi.endpoints.schedule,
  });

  const catalog = await JsonCatalogGateway.fromFile(config.catalog.dataPath);

  return new LoungeAdvisorService({
    flights,
    catalog,
    users: catalog,
    layoverConcurrency: config.planner.concurrency,
    tokens: credentials,
  });
}

const startServer = async (): Promise<void> => {
  try {
    const app = createApp({ advisor: await buildAdvisor() });

    const server: Server = app.listen(config.app.port, () => {
      logger.info(
        {
          environment: config.app.env,
          port: config.app.port,
          version: config.app.version,
          flightApi: config.flightApi.baseUrl,
        },
        `${config.app.name} listening`
      );
    });

    const shutdown = (signal: string): void => {
      logger.info(`${signal} received, shutting down gracefully...`);
      server.close(() => {
        logger.info("HTTP server closed");
        process.exit(0);
      });
      setTimeout(() => {
        logger.error("Forced shutdown after timeout");
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (error) {
    logger.fatal(
      { error: error instanceof Error ? error.message : String(error) },
      "Failed to start server"
    );
    process.exit(1);
  }
};

void startServer();
