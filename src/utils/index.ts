// ============================================================================
// UTILS EXPORTS
// ============================================================================

export { context, type RequestContext } from "./context.js";
export { logger, type Logger } from "./logger.js";
export { metrics } from "./metrics.js";
export { pool } from "./pool.js";
export { systemClock, type Clock } from "./clock.js";
export {
  parseTimestamp,
  toEpochMs,
  shiftTimestamp,
  minutesBetween,
  isCalendarDate,
  type ParsedTimestamp,
} from "./time.js";
