/**
 * Track Parser Service
 * Reads a dashcam GPS log and splits it into tracks
 *
 * The dashcam writes every trip into the same log file. Trips are
 * separated by the device's own segment marker ($V02):
 *
 *   $V02                                      <- leading marker, ignored
 *   1672502400,A,31.230416,121.473701,0,1250
 *   1672502401,A,31.230420,121.473710,0,1275
 *   $V02                                      <- closes track 1
 *   1672506000,A,31.240000,121.480000,0,0
 *                                             <- EOF closes track 2
 *
 * Points are dropped (not errors) when:
 * - the timestamp does not advance past the previous accepted point
 * - the status flag is not "A"
 * - latitude or longitude is the device's "0.000000" placeholder
 *
 * Lines that cannot be read at all throw TrackLogParseError. That
 * includes blank lines, except the empty one after a final newline.
 */

import fs from "node:fs";
import { DASHCAM_LOG } from "../config/constants.js";
import { logger } from "../lib/logger.js";
import { isSupportedTimestamp } from "./timestamp.service.js";
import type { Track, TrackPoint } from "../types/track.types.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Fields of a record line before the point is accepted */
interface RawRecord {
  timestamp: number;
  status: string;
  latText: string;
  lonText: string;
  speedText: string | undefined;
}

// ============================================
// Main Parse Functions
// ============================================

/**
 * Parse a dashcam log file from disk
 *
 * @param logPath - Path to the log (e.g. GPSData000001.txt)
 * @returns Tracks in file order
 * @throws TrackLogParseError on a malformed line
 * @throws the underlying fs error if the file cannot be read
 */
export function parseTracks(logPath: string): Track[] {
  const content = fs.readFileSync(logPath, "utf-8");
  return parseTrackLog(content, logPath);
}

/**
 * Parse a dashcam log held in memory (e.g. a Multer upload)
 */
export function parseTrackBuffer(buffer: Buffer, source = "upload"): Track[] {
  return parseTrackLog(buffer.toString("utf-8"), source);
}

/**
 * Split log text into tracks
 *
 * @param content - Full log text
 * @param source - Label used in log messages and errors
 * @returns Non-empty tracks in file order
 */
export function parseTrackLog(content: string, source = "log"): Track[] {
  const tracks: Track[] = [];
  let current: TrackPoint[] = [];
  let previous: TrackPoint | null = null;
  let leadingDelimiterSeen = false;

  const lines = content.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index].trim();

    if (line === "" && index === lines.length - 1) {
      continue;
    }

    if (line === DASHCAM_LOG.SEGMENT_DELIMITER) {
      // The first marker in the file opens the first segment
      if (!leadingDelimiterSeen) {
        leadingDelimiterSeen = true;
        continue;
      }

      if (current.length > 0) {
        tracks.push(current);
      }
      current = [];
      previous = null;
      continue;
    }

    const lineNumber = index + 1;
    const record = readRecord(line, lineNumber, source);

    if (previous && record.timestamp <= previous.timestamp) {
      continue;
    }
    if (!isValidFix(record)) {
      continue;
    }

    const point = toTrackPoint(record, line, lineNumber, source);
    current.push(point);
    previous = point;
  }

  if (current.length > 0) {
    tracks.push(current);
  }

  logger.debug(`[TrackParser] Parsed ${tracks.length} tracks from ${source}`);

  return tracks;
}

// ============================================
// Record Handling
// ============================================

/**
 * Split a record line into trimmed fields and read the timestamp
 */
function readRecord(line: string, lineNumber: number, source: string): RawRecord {
  const fields = line.split(",").map((field) => field.trim());

  if (fields.length < DASHCAM_LOG.MIN_FIELDS) {
    throw new TrackLogParseError(
      `Expected at least ${DASHCAM_LOG.MIN_FIELDS} fields, got ${fields.length}`,
      lineNumber,
      line,
      source
    );
  }

  const timestampText = fields[DASHCAM_LOG.FIELD.TIMESTAMP];
  if (!INTEGER_PATTERN.test(timestampText)) {
    throw new TrackLogParseError(
      `Invalid timestamp "${timestampText}"`,
      lineNumber,
      line,
      source
    );
  }

  const timestamp = Number(timestampText);
  if (!isSupportedTimestamp(timestamp)) {
    throw new TrackLogParseError(
      `Timestamp "${timestampText}" out of range`,
      lineNumber,
      line,
      source
    );
  }

  return {
    timestamp,
    status: fields[DASHCAM_LOG.FIELD.STATUS],
    latText: fields[DASHCAM_LOG.FIELD.LATITUDE],
    lonText: fields[DASHCAM_LOG.FIELD.LONGITUDE],
    speedText: fields[DASHCAM_LOG.FIELD.SPEED],
  };
}

function isValidFix(record: RawRecord): boolean {
  return (
    record.status === DASHCAM_LOG.VALID_STATUS &&
    record.latText !== DASHCAM_LOG.ZERO_COORDINATE &&
    record.lonText !== DASHCAM_LOG.ZERO_COORDINATE
  );
}

/**
 * Build an accepted point, parsing coordinates and speed
 *
 * Only accepted fixes are parsed this far; rejected lines may carry
 * empty or placeholder coordinates.
 */
function toTrackPoint(
  record: RawRecord,
  line: string,
  lineNumber: number,
  source: string
): TrackPoint {
  const lat = parseCoordinate(record.latText);
  const lon = parseCoordinate(record.lonText);

  if (lat === null || lon === null) {
    throw new TrackLogParseError(
      `Invalid coordinates "${record.latText}", "${record.lonText}"`,
      lineNumber,
      line,
      source
    );
  }

  const point: TrackPoint = {
    timestamp: record.timestamp,
    status: record.status,
    lat,
    lon,
    latText: record.latText,
    lonText: record.lonText,
  };

  if (record.speedText === undefined || record.speedText === "") {
    return point;
  }

  if (!INTEGER_PATTERN.test(record.speedText)) {
    throw new TrackLogParseError(
      `Invalid speed "${record.speedText}"`,
      lineNumber,
      line,
      source
    );
  }

  return { ...point, speed: Number(record.speedText) };
}

function parseCoordinate(text: string): number | null {
  if (text === "") return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

// ============================================
// Custom Error Class
// ============================================

/**
 * Thrown when a log line is not a delimiter and cannot be read as a record
 *
 * @example
 * try {
 *   const tracks = parseTracks("GPSData000001.txt");
 * } catch (error) {
 *   if (error instanceof TrackLogParseError) {
 *     console.error(`Line ${error.lineNumber}: ${error.message}`);
 *   }
 * }
 */
export class TrackLogParseError extends Error {
  constructor(
    message: string,
    public readonly lineNumber: number,
    public readonly line: string,
    public readonly source: string
  ) {
    super(`${message} (${source}, line ${lineNumber})`);
    this.name = "TrackLogParseError";
  }
}
