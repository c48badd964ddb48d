export { RecommendationController } from "./recommendation.controller.js";
export { CatalogController } from "./catalog.controller.js";
export { HealthController } from "./health.controller.js";
