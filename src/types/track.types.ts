/**
 * Track Types
 * Types for dashcam log parsing, GPX output and track summaries
 */

import type { ErrorCode } from "../config/constants.js";

// ============================================
// Parsed Log Data
// ============================================

/** Single GPS fix read from a dashcam log line */
export interface TrackPoint {
  /** Raw device timestamp (epoch seconds, shifted to Shanghai wall clock) */
  readonly timestamp: number;
  /** Fix status ("A" = valid) */
  readonly status: string;
  readonly lat: number;
  readonly lon: number;
  /** Latitude exactly as written in the log (echoed into GPX) */
  readonly latText: string;
  /** Longitude exactly as written in the log (echoed into GPX) */
  readonly lonText: string;
  /** Speed in hundredths of m/s, when the record has one */
  readonly speed?: number;
}

/** One recording segment between two delimiters. Never empty. */
export type Track = readonly TrackPoint[];

// ============================================
// GPX Output
// ============================================

/** Group of consecutive tracks destined for one GPX file */
export interface GpxChunk {
  path: string;
  tracks: readonly Track[];
}

/** A GPX file that has been written to disk */
export interface WrittenGpxFile {
  path: string;
  trackCount: number;
  pointCount: number;
}

export interface GpxRenderOptions {
  /** IANA zone for <time> values (defaults to DEFAULT_TIME_ZONE) */
  timeZone?: string;
  /** Value of the gpx creator attribute */
  creator?: string;
}

// ============================================
// Summary
// ============================================

/** Number of tracks that started in a calendar month */
export interface MonthBucket {
  /** "YYYY-MM" */
  month: string;
  trackCount: number;
}

export interface TrackSummary {
  trackCount: number;
  pointCount: number;
  /** Localized time of the first point of the first track */
  startTime: string | null;
  /** Localized time of the last point of the last track */
  endTime: string | null;
  /** Tracks per month, in the order the months first appear */
  months: MonthBucket[];
}

// ============================================
// Conversion
// ============================================

export interface ConvertOptions {
  inputPath: string;
  /** Defaults to the input path with a .gpx extension */
  outputPath?: string;
  /** Max tracks per output file; 0 means no limit */
  segmentsLimit?: number;
  timeZone?: string;
}

export interface ConversionResult {
  trackCount: number;
  pointCount: number;
  files: WrittenGpxFile[];
}

// ============================================
// API Responses
// ============================================

/** GPX document returned by POST /convert */
export interface ConvertedGpxFile {
  fileName: string;
  trackCount: number;
  pointCount: number;
  gpx: string;
}

export interface ConvertLogResponse {
  success: true;
  trackCount: number;
  pointCount: number;
  files: ConvertedGpxFile[];
}

export interface LogInfoResponse {
  success: true;
  summary: TrackSummary;
}

export interface LogErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
  /** 1-based line number, for parse errors */
  line?: number;
}
