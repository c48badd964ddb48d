import { Router } from "express";
import type { RecommendationController } from "../controllers/recommendation.controller.js";
import type { CatalogController } from "../controllers/catalog.controller.js";

export function createLoungeRoutes(
  recommendations: RecommendationController,
  catalog: CatalogController
): Router {
  const router = Router();

  // Flight-aware core
  router.post("/recommendations", recommendations.recommend);
  router.post("/layover-strategy", recommendations.layoverStrategy);

  // Catalog, profiles and schedules
  router.get("/lounges/:airport", catalog.lounges);
  router.get("/users/:userId", catalog.user);
  router.get("/flights/:flightNumber", catalog.flight);

  return router;
}
