/**
 * Timestamp Service
 * Corrects dashcam timestamps and renders them as ISO 8601
 *
 * The dashcam computes its epoch seconds from a wall clock that is
 * already set to Shanghai time, without recording the offset. Reading
 * the value as a true epoch therefore lands 8 hours early. The fix:
 *
 * 1. Render the epoch in Asia/Shanghai to recover the wall clock the
 *    device intended (e.g. 2023-01-01 00:00:00)
 * 2. Read that wall clock as UTC (2023-01-01T00:00:00Z)
 * 3. Render the corrected instant in the requested zone
 *
 * Output keeps the zone offset: "2023-01-01T01:00:00+01:00".
 */

import { DASHCAM_LOG } from "../config/constants.js";

/** Calendar fields of an instant as seen in some zone */
interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

// ============================================
// Public API
// ============================================

/**
 * Convert a raw dashcam timestamp to ISO 8601 in the given zone
 *
 * @param rawTimestamp - Epoch seconds as logged by the device
 * @param timeZone - IANA zone of the observer (e.g. "Europe/London")
 * @throws TimestampError for a non-integer timestamp or unknown zone
 *
 * @example
 * toLocalTimestamp("1672502400", "UTC");
 * // Returns: "2023-01-01T00:00:00+00:00"
 */
export function toLocalTimestamp(rawTimestamp: string | number, timeZone: string): string {
  const seconds = readEpochSeconds(rawTimestamp);

  const deviceWallClock = getWallClock(seconds * 1000, DASHCAM_LOG.REFERENCE_TIME_ZONE);
  const correctedMs = wallClockToUtcMs(deviceWallClock);

  return formatInZone(correctedMs, timeZone);
}

/**
 * Render an instant as ISO 8601 with the zone's offset at that instant
 */
export function formatInZone(epochMs: number, timeZone: string): string {
  const local = getWallClock(epochMs, timeZone);
  // The wall clock has no milliseconds, so compare it with the whole second
  const offsetSeconds = (wallClockToUtcMs(local) - Math.floor(epochMs / 1000) * 1000) / 1000;

  const date = `${pad(local.year, 4)}-${pad(local.month)}-${pad(local.day)}`;
  const time = `${pad(local.hour)}:${pad(local.minute)}:${pad(local.second)}`;

  return `${date}T${time}${formatOffset(offsetSeconds)}`;
}

/**
 * Check whether Intl knows the zone
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

// ============================================
// Helpers
// ============================================

function readEpochSeconds(rawTimestamp: string | number): number {
  const seconds =
    typeof rawTimestamp === "number"
      ? rawTimestamp
      : /^[+-]?\d+$/.test(rawTimestamp.trim())
        ? Number(rawTimestamp.trim())
        : NaN;

  if (!isSupportedTimestamp(seconds)) {
    throw new TimestampError(`Invalid dashcam timestamp "${rawTimestamp}"`);
  }

  return seconds;
}

/**
 * Whether raw epoch seconds fall in the range the localizer renders
 * (four-digit years after the reference-zone shift)
 */
export function isSupportedTimestamp(seconds: number): boolean {
  return (
    Number.isSafeInteger(seconds) &&
    seconds >= DASHCAM_LOG.MIN_TIMESTAMP &&
    seconds <= DASHCAM_LOG.MAX_TIMESTAMP
  );
}

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = formatters.get(timeZone);
  if (cached) {
    return cached;
  }

  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
  } catch {
    throw new TimestampError(`Unknown time zone "${timeZone}"`);
  }

  formatters.set(timeZone, formatter);
  return formatter;
}

function getWallClock(epochMs: number, timeZone: string): WallClock {
  const clock: WallClock = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };

  for (const part of getFormatter(timeZone).formatToParts(new Date(epochMs))) {
    switch (part.type) {
      case "year":
      case "month":
      case "day":
      case "hour":
      case "minute":
      case "second":
        clock[part.type] = Number(part.value);
        break;
    }
  }

  return clock;
}

function wallClockToUtcMs(clock: WallClock): number {
  // Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not
  const date = new Date(Date.UTC(2000, 0, 1, clock.hour, clock.minute, clock.second));
  return date.setUTCFullYear(clock.year, clock.month - 1, clock.day);
}

// ±HH:MM, with :SS appended for historical offsets that are not whole minutes
function formatOffset(offsetSeconds: number): string {
  const sign = offsetSeconds < 0 ? "-" : "+";
  const absolute = Math.abs(offsetSeconds);
  const hours = Math.floor(absolute / 3600);
  const minutes = Math.floor((absolute % 3600) / 60);
  const seconds = absolute % 60;

  const offset = `${sign}${pad(hours)}:${pad(minutes)}`;
  return seconds === 0 ? offset : `${offset}:${pad(seconds)}`;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

// ============================================
// Custom Error Class
// ============================================

export class TimestampError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimestampError";
  }
}
