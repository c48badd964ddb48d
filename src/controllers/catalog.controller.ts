// ============================================================================
// CATALOG CONTROLLER
// Lounge search, traveler profiles and flight schedule lookups
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import type { LoungeAdvisorService } from "../services/lounge-advisor.service.js";
import { parseRequest, sendEnvelope } from "../middleware/index.js";
import {
  airportParamsSchema,
  flightParamsSchema,
  flightQuerySchema,
  loungeSearchQuerySchema,
  userParamsSchema,
} from "../validation/index.js";

export class CatalogController {
  constructor(private readonly advisor: LoungeAdvisorService) {}

  lounges = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { airport } = parseRequest(airportParamsSchema, req.params, "params");
      const { memberships } = parseRequest(loungeSearchQuerySchema, req.query, "query");
      sendEnvelope(req, res, await this.advisor.searchLounges(airport, memberships));
    } catch (error) {
      next(error);
    }
  };

  user = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { userId } = parseRequest(userParamsSchema, req.params, "params");
      sendEnvelope(req, res, await this.advisor.getUser(userId));
    } catch (error) {
      next(error);
    }
  };

  flight = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { flightNumber } = parseRequest(flightParamsSchema, req.params, "params");
      const { date, suffix } = parseRequest(flightQuerySchema, req.query, "query");
      sendEnvelope(req, res, await this.advisor.getFlightSchedule(flightNumber, date, suffix));
    } catch (error) {
      next(error);
    }
  };
}
