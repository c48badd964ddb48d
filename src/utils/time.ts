// ============================================================================
// TIME HELPERS
// Provider timestamps are local wall-clock times, optionally with a UTC offset
// (e.g. "2025-12-25T10:00-05:00"). Arithmetic keeps the original offset.
// ============================================================================

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MINUTE_MS = 60 * 1000;

export interface ParsedTimestamp {
  /** Wall-clock time expressed as if it were UTC */
  wallClockMs: number;
  /** Offset from UTC in minutes, null when the timestamp carries none */
  offsetMinutes: number | null;
  /** Offset text exactly as received ("Z", "-05:00", "") */
  offsetText: string;
  hasSeconds: boolean;
}

function parseOffset(text: string): number {
  if (text === "Z") return 0;
  const sign = text.startsWith("-") ? -1 : 1;
  const digits = text.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

export function parseTimestamp(value: string): ParsedTimestamp | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second, offset] = match;
  const wallClockMs = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    second ? Number(second) : 0
  );

  return {
    wallClockMs,
    offsetMinutes: offset ? parseOffset(offset) : null,
    offsetText: offset ?? "",
    hasSeconds: second !== undefined,
  };
}

/**
 * Absolute instant of a timestamp. Timestamps without an offset are read as
 * UTC, which keeps differences between two offset-less times exact.
 */
export function toEpochMs(value: string): number | null {
  const parsed = parseTimestamp(value);
  if (!parsed) return null;
  return parsed.wallClockMs - (parsed.offsetMinutes ?? 0) * MINUTE_MS;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Shift a timestamp by a number of minutes, keeping its offset and precision
 */
export function shiftTimestamp(value: string, minutes: number): string | null {
  const parsed = parseTimestamp(value);
  if (!parsed) return null;

  const shifted = new Date(parsed.wallClockMs + minutes * MINUTE_MS);
  const date = `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
  const time = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}`;
  const seconds = parsed.hasSeconds ? `:${pad(shifted.getUTCSeconds())}` : "";

  return `${date}T${time}${seconds}${parsed.offsetText}`;
}

/**
 * Whole minutes from one timestamp to another (negative when `to` is earlier).
 * A partial minute is dropped.
 */
export function minutesBetween(from: string, to: string): number | null {
  const start = toEpochMs(from);
  const end = toEpochMs(to);
  if (start === null || end === null) return null;
  return Math.floor((end - start) / MINUTE_MS);
}

/**
 * True for YYYY-MM-DD strings naming a real calendar day
 */
export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}
