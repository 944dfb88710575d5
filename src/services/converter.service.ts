/**
 * Converter Service
 * Log file in, GPX file(s) out
 *
 * 1. Parse the dashcam log into tracks (track-parser.service)
 * 2. Skip writing if nothing survived the filters
 * 3. Write one GPX file, or several when a segment limit is set
 */

import path from "node:path";
import { DEFAULT_TIME_ZONE, GPX } from "../config/constants.js";
import { logger } from "../lib/logger.js";
import { parseTracks } from "./track-parser.service.js";
import { countPoints, writeGpx } from "./gpx-writer.service.js";
import type { ConversionResult, ConvertOptions } from "../types/track.types.js";

/**
 * Default output path: the input with its extension replaced by .gpx
 *
 * @example
 * defaultOutputPath("logs/GPSData000001.txt"); // "logs/GPSData000001.gpx"
 */
export function defaultOutputPath(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.format({ dir, name, ext: GPX.FILE_EXTENSION });
}

/**
 * Convert a dashcam log file to GPX on disk
 *
 * A log with no valid tracks is not an error: a warning is logged and
 * no file is written.
 *
 * @throws TrackLogParseError on a malformed log line
 * @throws the underlying fs error for unreadable input or unwritable output
 */
export function convertLogFile(options: ConvertOptions): ConversionResult {
  const outputPath = options.outputPath ?? defaultOutputPath(options.inputPath);
  const tracks = parseTracks(options.inputPath);

  if (tracks.length === 0) {
    logger.warn(`⚠️  No valid tracks found in ${options.inputPath}`);
    return { trackCount: 0, pointCount: 0, files: [] };
  }

  const files = writeGpx(tracks, outputPath, options.segmentsLimit ?? 0, {
    timeZone: options.timeZone ?? DEFAULT_TIME_ZONE,
  });

  return {
    trackCount: tracks.length,
    pointCount: countPoints(tracks),
    files,
  };
}
