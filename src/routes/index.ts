import { Router } from "express";
import type { LoungeAdvisorService } from "../services/lounge-advisor.service.js";
import { CatalogController, HealthController, RecommendationController } from "../controllers/index.js";
import { createHealthRoutes } from "./health.routes.js";
import { createLoungeRoutes } from "./lounge.routes.js";

export interface ApiRoutes {
  api: Router;
  health: HealthController;
}

export function createRoutes(advisor: LoungeAdvisorService): ApiRoutes {
  const health = new HealthController(advisor);
  const router = Router();

  router.use("/", createHealthRoutes(health));
  router.use("/", createLoungeRoutes(new RecommendationController(advisor), new CatalogController(advisor)));
  router.get("/", health.index);

  return { api: router, health };
}
