/**
 * Logs Routes
 * API endpoints for converting uploaded dashcam logs
 *
 * Every endpoint takes a multipart upload with the log in the "log" field:
 *
 * 1. Receive log upload (Multer middleware)
 * 2. Parse the log into tracks (track-parser.service)
 * 3. Render GPX (gpx-writer.service) or summarize (track-summary.service)
 *
 * Endpoints:
 * - POST /api/v1/logs/convert     - GPX documents as JSON (chunked by segmentsLimit)
 * - POST /api/v1/logs/convert/gpx - Single GPX document as a download
 * - POST /api/v1/logs/info        - Track count, time span, tracks per month
 *
 * Optional parameters (query string or form field):
 * - segmentsLimit: max tracks per GPX document (0 = no limit)
 * - timeZone: IANA zone for timestamps (default: server zone)
 */

import path from "node:path";
import { Router, Request, Response } from "express";
import { uploadLog, handleMulterError } from "../middleware/upload.middleware.js";
import { parseTrackBuffer, TrackLogParseError } from "../services/track-parser.service.js";
import { countPoints, planGpxChunks, renderGpx } from "../services/gpx-writer.service.js";
import { isValidTimeZone, TimestampError } from "../services/timestamp.service.js";
import { summarizeTracks } from "../services/track-summary.service.js";
import { DEFAULT_TIME_ZONE, ERROR_CODES, GPX, LOG_UPLOAD } from "../config/constants.js";
import type { ErrorCode } from "../config/constants.js";
import type {
  ConvertLogResponse,
  LogErrorResponse,
  LogInfoResponse,
  Track,
} from "../types/track.types.js";

const router = Router();

/** Upload parsed and validated, ready for rendering */
interface UploadedLog {
  stem: string;
  tracks: Track[];
  timeZone: string;
  segmentsLimit: number;
}

// ============================================
// POST /api/v1/logs/convert
// ============================================

/**
 * Convert a log into one or more GPX documents
 *
 * Success Response (200): ConvertLogResponse
 * - files[].fileName follows the CLI naming ("trip.gpx" or "trip_1.gpx", ...)
 *
 * Error Responses:
 * - 400: Missing file, invalid format, bad parameter, parse error
 * - 422: No valid tracks in the log
 * - 500: Internal server error
 */
router.post(
  "/convert",
  uploadLog.single(LOG_UPLOAD.FIELD_NAME),
  handleMulterError,
  (req: Request, res: Response) => {
    handleUpload(req, res, (upload) => {
      const chunks = planGpxChunks(upload.tracks, `${upload.stem}${GPX.FILE_EXTENSION}`, upload.segmentsLimit);

      const response: ConvertLogResponse = {
        success: true,
        trackCount: upload.tracks.length,
        pointCount: countPoints(upload.tracks),
        files: chunks.map((chunk) => ({
          fileName: chunk.path,
          trackCount: chunk.tracks.length,
          pointCount: countPoints(chunk.tracks),
          gpx: renderGpx(chunk.tracks, { timeZone: upload.timeZone }),
        })),
      };

      console.log(`[Convert] Rendered ${response.files.length} GPX document(s) for "${upload.stem}"`);

      res.json(response);
    });
  }
);

// ============================================
// POST /api/v1/logs/convert/gpx
// ============================================

/**
 * Convert a log into a single GPX download (segmentsLimit is ignored)
 */
router.post(
  "/convert/gpx",
  uploadLog.single(LOG_UPLOAD.FIELD_NAME),
  handleMulterError,
  (req: Request, res: Response) => {
    handleUpload(req, res, (upload) => {
      res.attachment(`${upload.stem}${GPX.FILE_EXTENSION}`);
      res.type(GPX.MIME_TYPE);
      res.send(renderGpx(upload.tracks, { timeZone: upload.timeZone }));
    });
  }
);

// ============================================
// POST /api/v1/logs/info
// ============================================

/**
 * Summarize a log without converting it
 */
router.post(
  "/info",
  uploadLog.single(LOG_UPLOAD.FIELD_NAME),
  handleMulterError,
  (req: Request, res: Response) => {
    handleUpload(req, res, (upload) => {
      const response: LogInfoResponse = {
        success: true,
        summary: summarizeTracks(upload.tracks, upload.timeZone),
      };
      res.json(response);
    });
  }
);

// ============================================
// Shared Upload Handling
// ============================================

/**
 * Validate the upload and parameters, parse the log, then hand the
 * tracks to `render`. Errors from parsing or rendering become JSON
 * error responses.
 */
function handleUpload(req: Request, res: Response, render: (upload: UploadedLog) => void): void {
  if (!req.file) {
    sendError(res, 400, "No log file provided. Upload a file in the 'log' field.", ERROR_CODES.LOG_FILE_REQUIRED);
    return;
  }

  const segmentsLimit = parseSegmentsLimit(readParam(req, "segmentsLimit"));
  if (segmentsLimit === null) {
    sendError(res, 400, "segmentsLimit must be a non-negative integer", ERROR_CODES.VALIDATION_ERROR);
    return;
  }

  const timeZoneParam = readParam(req, "timeZone");
  const timeZone = typeof timeZoneParam === "string" && timeZoneParam !== "" ? timeZoneParam : DEFAULT_TIME_ZONE;
  if (!isValidTimeZone(timeZone)) {
    sendError(res, 400, `Unknown time zone "${timeZone}"`, ERROR_CODES.VALIDATION_ERROR);
    return;
  }

  const fileName = req.file.originalname;
  const stem = path.parse(fileName).name || "track";

  try {
    const tracks = parseTrackBuffer(req.file.buffer, fileName);

    console.log(`[Convert] Parsed ${tracks.length} tracks (${countPoints(tracks)} points) from "${fileName}"`);

    if (tracks.length === 0) {
      sendError(res, 422, `No valid tracks found in ${fileName}`, ERROR_CODES.LOG_NO_TRACKS);
      return;
    }

    render({ stem, tracks, timeZone, segmentsLimit });
  } catch (error) {
    if (error instanceof TrackLogParseError) {
      sendError(res, 400, error.message, ERROR_CODES.LOG_PARSE_ERROR, error.lineNumber);
      return;
    }
    if (error instanceof TimestampError) {
      sendError(res, 400, error.message, ERROR_CODES.LOG_PARSE_ERROR);
      return;
    }

    console.error("[Convert] Unexpected error:", error);
    sendError(res, 500, "Failed to convert log", ERROR_CODES.INTERNAL_ERROR);
  }
}

function sendError(res: Response, status: number, message: string, code: ErrorCode, line?: number): void {
  const body: LogErrorResponse = { success: false, error: message, code };
  if (line !== undefined) {
    body.line = line;
  }
  res.status(status).json(body);
}

/** Query string first, then multipart form fields */
function readParam(req: Request, name: string): unknown {
  const fromQuery = req.query[name];
  if (fromQuery !== undefined) {
    return fromQuery;
  }
  const body: unknown = req.body;
  return isRecord(body) ? body[name] : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * @returns the limit, 0 when absent, or null when invalid
 */
export function parseSegmentsLimit(value: unknown): number | null {
  if (value === undefined || value === "") {
    return 0;
  }
  if (typeof value !== "string" || !/^\d+$/.test(value.trim())) {
    return null;
  }
  return Number(value.trim());
}

export default router;
