import { Router } from "express";
import type { HealthController } from "../controllers/health.controller.js";

export function createHealthRoutes(health: HealthController): Router {
  const router = Router();
  router.get("/health", health.health);
  router.get("/ready", health.ready);
  router.get("/status", health.status);
  return router;
}
