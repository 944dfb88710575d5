/**
 * Application Constants
 * Centralized configuration values
 */

// ============================================
// API Configuration
// ============================================

export const API = {
  VERSION: "v1",
  PREFIX: "/api/v1",
} as const;

// ============================================
// Frontend URL (CORS origin)
// ============================================

export const FRONTEND_URL = process.env.FRONTEND_URL ?? "http://localhost:5173";

// ============================================
// Time Zone
// ============================================

/**
 * Zone that GPX timestamps are rendered in.
 *
 * Resolved once here from TIME_ZONE (IANA name, e.g. "Europe/Berlin"),
 * falling back to the zone of the running process. Services never look
 * this up themselves; callers pass it in.
 */
export const DEFAULT_TIME_ZONE: string =
  process.env.TIME_ZONE || Intl.DateTimeFormat().resolvedOptions().timeZone;

// ============================================
// Dashcam Log Format
// ============================================

/**
 * Layout of the dashcam GPS log.
 *
 * Each line is either the segment delimiter or a comma-separated record:
 *   timestamp, status, latitude, longitude, <unused>, speed
 *
 * Example:
 *   $V02
 *   1672502400,A,31.230416,121.473701,0,1250
 *   1672502401,A,31.230420,121.473710,0,1275
 *   $V02
 */
export const DASHCAM_LOG = {
  // Marks the boundary between two recording segments
  SEGMENT_DELIMITER: "$V02",

  // Status flag of a valid fix
  VALID_STATUS: "A",

  // Coordinate the device writes before it has a fix (compared as text)
  ZERO_COORDINATE: "0.000000",

  // Zone the device clock is (wrongly) stamped in
  REFERENCE_TIME_ZONE: "Asia/Shanghai",

  // Speed field is hundredths of m/s
  SPEED_DIVISOR: 100,

  // Records need at least timestamp, status, lat, lon
  MIN_FIELDS: 4,

  // Accepted raw timestamps (epoch seconds): 0001-01-02 to 9999-12-31 UTC,
  // one day inside the four-digit-year range so the Shanghai shift stays in it
  MIN_TIMESTAMP: -62135510400,
  MAX_TIMESTAMP: 253402214400,

  FIELD: {
    TIMESTAMP: 0,
    STATUS: 1,
    LATITUDE: 2,
    LONGITUDE: 3,
    SPEED: 5,
  },
} as const;

// ============================================
// GPX Output
// ============================================

export const GPX = {
  VERSION: "1.1",
  CREATOR: "dashcam2gpx",
  NAMESPACE: "http://www.topografix.com/GPX/1/1",
  SCHEMA_LOCATION: "http://www.topografix.com/GPX/1/1/gpx.xsd",
  XSI_NAMESPACE: "http://www.w3.org/2001/XMLSchema-instance",

  // Garmin TrackPointExtension v2 (carries <gpxtpx:speed> in m/s)
  TPX_PREFIX: "gpxtpx",
  TPX_NAMESPACE: "http://www.garmin.com/xmlschemas/TrackPointExtension/v2",
  TPX_SCHEMA_LOCATION: "http://www.garmin.com/xmlschemas/TrackPointExtensionv2.xsd",

  FILE_EXTENSION: ".gpx",
  MIME_TYPE: "application/gpx+xml",
} as const;

// ============================================
// Log Upload Constants
// ============================================

export const LOG_UPLOAD = {
  FIELD_NAME: "log",
  ALLOWED_EXTENSIONS: [".txt"],
  MAX_FILE_SIZE_BYTES: 10 * 1024 * 1024,
} as const;

// ============================================
// Error Codes
// ============================================

export const ERROR_CODES = {
  // General errors
  INTERNAL_ERROR: "INTERNAL_ERROR",
  NOT_FOUND: "NOT_FOUND",
  VALIDATION_ERROR: "VALIDATION_ERROR",

  // Log errors
  LOG_FILE_REQUIRED: "LOG_FILE_REQUIRED",
  LOG_INVALID_FORMAT: "LOG_INVALID_FORMAT",
  LOG_FILE_TOO_LARGE: "LOG_FILE_TOO_LARGE",
  LOG_PARSE_ERROR: "LOG_PARSE_ERROR",
  LOG_NO_TRACKS: "LOG_NO_TRACKS",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
