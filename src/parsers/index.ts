// ============================================================================
// PARSERS EXPORTS
// ============================================================================

export {
  flightScheduleParser,
  FlightScheduleParser,
  type ScheduleQuery,
} from "./flight-schedule.parser.js";
