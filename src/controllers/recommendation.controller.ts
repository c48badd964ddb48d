// ============================================================================
// RECOMMENDATION CONTROLLER
// Flight-aware recommendations and layover strategies
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import type { LoungeAdvisorService } from "../services/lounge-advisor.service.js";
import { success, type Envelope } from "../types/result.types.js";
import type { FlightLeg } from "../types/lounge.types.js";
import { parseRequest, sendEnvelope } from "../middleware/index.js";
import {
  layoverStrategyRequestSchema,
  recommendationRequestSchema,
} from "../validation/index.js";

export class RecommendationController {
  constructor(private readonly advisor: LoungeAdvisorService) {}

  recommend = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseRequest(recommendationRequestSchema, req.body, "body");

      const memberships = await this.resolveMemberships(input.memberships, input.userId);
      if (memberships.status !== "success") {
        sendEnvelope(req, res, memberships);
        return;
      }

      const envelope = await this.advisor.getFlightAwareRecommendations(
        input.flightNumber,
        input.date,
        memberships.data,
        input.preferences,
        input.operationalSuffix
      );
      sendEnvelope(req, res, envelope);
    } catch (error) {
      next(error);
    }
  };

  layoverStrategy = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseRequest(layoverStrategyRequestSchema, req.body, "body");

      const memberships = await this.resolveMemberships(input.memberships, input.userId);
      if (memberships.status !== "success") {
        sendEnvelope(req, res, memberships);
        return;
      }

      const legs: FlightLeg[] = input.legs.map((leg) => ({
        identifier: leg.flightNumber,
        date: leg.date,
        suffix: leg.operationalSuffix,
      }));

      const envelope = await this.advisor.planLayoverStrategy(legs, memberships.data, input.preferences);
      sendEnvelope(req, res, envelope);
    } catch (error) {
      next(error);
    }
  };

  /**
   * Explicit memberships win; otherwise they come from the traveler's profile
   */
  private async resolveMemberships(memberships?: string[], userId?: string): Promise<Envelope<string[]>> {
    if (memberships) return success(memberships);
    if (!userId) return success([]);

    const user = await this.advisor.getUser(userId);
    if (user.status !== "success") return user;
    return success(user.data.memberships);
  }
}
