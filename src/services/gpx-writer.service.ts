/**
 * GPX Writer Service
 * Renders parsed dashcam tracks as GPX 1.1 and writes them to disk
 *
 * All tracks go into a single <trk>, one <trkseg> per dashcam track:
 *
 * <gpx version="1.1" ...>
 *   <trk>
 *     <trkseg>
 *       <trkpt lat="31.230416" lon="121.473701">
 *         <time>2023-01-01T00:00:00+00:00</time>
 *         <extensions>
 *           <gpxtpx:TrackPointExtension>
 *             <gpxtpx:speed>12.5</gpxtpx:speed>
 *           </gpxtpx:TrackPointExtension>
 *         </extensions>
 *       </trkpt>
 *     </trkseg>
 *   </trk>
 * </gpx>
 *
 * Large logs can be split across several files with a segment limit;
 * chunk k of "trip.gpx" is written to "trip_k.gpx".
 */

import fs from "node:fs";
import path from "node:path";
import { DASHCAM_LOG, DEFAULT_TIME_ZONE, GPX } from "../config/constants.js";
import { logger } from "../lib/logger.js";
import { toLocalTimestamp } from "./timestamp.service.js";
import type {
  GpxChunk,
  GpxRenderOptions,
  Track,
  TrackPoint,
  WrittenGpxFile,
} from "../types/track.types.js";

// ============================================
// Rendering
// ============================================

/**
 * Render tracks as a GPX 1.1 document
 *
 * Coordinates are copied from the log text unchanged. The
 * TrackPointExtension namespace is declared only when at least one
 * point carries a speed.
 */
export function renderGpx(tracks: readonly Track[], options: GpxRenderOptions = {}): string {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  const creator = options.creator ?? GPX.CREATOR;
  const withSpeed = tracks.some((track) => track.some((point) => point.speed !== undefined));

  const lines: string[] = ['<?xml version="1.0" encoding="UTF-8"?>', renderGpxOpenTag(creator, withSpeed), "\t<trk>"];

  for (const track of tracks) {
    lines.push("\t\t<trkseg>");
    for (const point of track) {
      lines.push(...renderTrackPoint(point, timeZone));
    }
    lines.push("\t\t</trkseg>");
  }

  lines.push("\t</trk>", "</gpx>");

  return lines.join("\n") + "\n";
}

function renderGpxOpenTag(creator: string, withSpeed: boolean): string {
  const schemaLocations: string[] = [GPX.NAMESPACE, GPX.SCHEMA_LOCATION];
  const attributes = [
    `xmlns="${GPX.NAMESPACE}"`,
    `version="${GPX.VERSION}"`,
    `creator="${escapeXml(creator)}"`,
    `xmlns:xsi="${GPX.XSI_NAMESPACE}"`,
  ];

  if (withSpeed) {
    attributes.push(`xmlns:${GPX.TPX_PREFIX}="${GPX.TPX_NAMESPACE}"`);
    schemaLocations.push(GPX.TPX_NAMESPACE, GPX.TPX_SCHEMA_LOCATION);
  }

  attributes.push(`xsi:schemaLocation="${schemaLocations.join(" ")}"`);

  return `<gpx\n\t${attributes.join("\n\t")}>`;
}

function renderTrackPoint(point: TrackPoint, timeZone: string): string[] {
  const lines = [
    `\t\t\t<trkpt lat="${point.latText}" lon="${point.lonText}">`,
    `\t\t\t\t<time>${toLocalTimestamp(point.timestamp, timeZone)}</time>`,
  ];

  if (point.speed !== undefined) {
    const tpx = GPX.TPX_PREFIX;
    lines.push(
      "\t\t\t\t<extensions>",
      `\t\t\t\t\t<${tpx}:TrackPointExtension>`,
      `\t\t\t\t\t\t<${tpx}:speed>${toMetersPerSecond(point.speed)}</${tpx}:speed>`,
      `\t\t\t\t\t</${tpx}:TrackPointExtension>`,
      "\t\t\t\t</extensions>"
    );
  }

  lines.push("\t\t\t</trkpt>");
  return lines;
}

/**
 * Convert the log's speed field (hundredths of m/s) to m/s
 *
 * @example
 * toMetersPerSecond(1250); // 12.5
 */
export function toMetersPerSecond(rawSpeed: number): number {
  return rawSpeed / DASHCAM_LOG.SPEED_DIVISOR;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

// ============================================
// Chunking
// ============================================

/**
 * Decide which tracks go into which output file
 *
 * A limit of 0 (or one at least as large as the track count) keeps
 * everything in outputPath. Otherwise tracks are grouped into
 * consecutive chunks of at most `segmentsLimit`; a track is never split.
 *
 * @example
 * planGpxChunks(tenTracks, "out/trip.gpx", 3).map((c) => c.path);
 * // Returns: ["out/trip_1.gpx", "out/trip_2.gpx", "out/trip_3.gpx", "out/trip_4.gpx"]
 */
export function planGpxChunks(
  tracks: readonly Track[],
  outputPath: string,
  segmentsLimit = 0
): GpxChunk[] {
  if (segmentsLimit <= 0 || segmentsLimit >= tracks.length) {
    return [{ path: outputPath, tracks }];
  }

  const chunks: GpxChunk[] = [];
  for (let start = 0; start < tracks.length; start += segmentsLimit) {
    const chunkNumber = start / segmentsLimit + 1;
    chunks.push({
      path: chunkPath(outputPath, chunkNumber),
      tracks: tracks.slice(start, start + segmentsLimit),
    });
  }

  return chunks;
}

/**
 * Path of chunk k: extension removed, "_k.gpx" appended
 */
export function chunkPath(outputPath: string, chunkNumber: number): string {
  const { dir, name } = path.parse(outputPath);
  return path.format({ dir, name: `${name}_${chunkNumber}`, ext: GPX.FILE_EXTENSION });
}

// ============================================
// Writing
// ============================================

/**
 * Write tracks as one or more GPX files
 *
 * @param tracks - Tracks from parseTracks()
 * @param outputPath - Destination .gpx path
 * @param segmentsLimit - Max tracks per file (0 = no limit)
 * @returns The files written, in order
 * @throws the underlying fs error if a file cannot be written
 */
export function writeGpx(
  tracks: readonly Track[],
  outputPath: string,
  segmentsLimit = 0,
  options: GpxRenderOptions = {}
): WrittenGpxFile[] {
  const written: WrittenGpxFile[] = [];

  for (const chunk of planGpxChunks(tracks, outputPath, segmentsLimit)) {
    const pointCount = countPoints(chunk.tracks);

    fs.writeFileSync(chunk.path, renderGpx(chunk.tracks, options), "utf-8");

    logger.info(`[GPX] Wrote ${pointCount} points (${chunk.tracks.length} tracks) to ${chunk.path}`);

    written.push({
      path: chunk.path,
      trackCount: chunk.tracks.length,
      pointCount,
    });
  }

  return written;
}

export function countPoints(tracks: readonly Track[]): number {
  return tracks.reduce((total, track) => total + track.length, 0);
}
