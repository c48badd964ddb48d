// ============================================================================
// EXPRESS APPLICATION
// Middleware chain and routes around an injected LoungeAdvisorService
// ============================================================================

import express, { type Application } from "express";
import { config } from "./config/index.js";
import {
  contextMiddleware,
  requestLoggingMiddleware,
  helmetMiddleware,
  corsMiddleware,
  compressionMiddleware,
  sanitizeMiddleware,
  timeoutMiddleware,
  createRateLimiter,
  errorHandlerMiddleware,
  notFoundHandler,
} from "./middleware/index.js";
import { createRoutes } from "./routes/index.js";
import type { LoungeAdvisorService } from "./services/lounge-advisor.service.js";

export interface AppOptions {
  advisor: LoungeAdvisorService;
  rateLimit?: { windowMs?: number; limit?: number };
  requestTimeoutMs?: number;
}

export function createApp(options: AppOptions): Application {
  const app = express();

  if (config.security.trustProxy) app.set("trust proxy", 1);

  app.use(helmetMiddleware);
  app.use(corsMiddleware);
  app.use(sanitizeMiddleware());
  app.use(express.json({ limit: "1mb" }));
  app.use(compressionMiddleware());
  app.use(contextMiddleware());
  app.use(requestLoggingMiddleware());
  app.use(timeoutMiddleware(options.requestTimeoutMs));
  app.use(createRateLimiter(options.rateLimit));

  const { api, health } = createRoutes(options.advisor);

  if (config.metrics.enabled) {
    app.get(config.metrics.path, health.metrics);
  }

  app.use("/api", api);
  app.get("/", (_req, res) => res.redirect("/api"));
  app.use(notFoundHandler());
  app.use(errorHandlerMiddleware());

  return app;
}
