/**
 * File Upload Middleware
 * Handles dashcam log uploads using memory storage (no disk persistence)
 *
 * This middleware uses Multer to:
 * - Accept multipart/form-data file uploads
 * - Store files in memory (Buffer) for processing
 * - Validate file extension (.txt only)
 * - Enforce file size limits (10MB max)
 *
 * Usage in routes:
 *   router.post("/convert", uploadLog.single("log"), handleMulterError, handler)
 */

import multer from "multer";
import path from "node:path";
import { Request, Response, NextFunction } from "express";
import { LOG_UPLOAD, ERROR_CODES } from "../config/constants.js";
import type { LogErrorResponse } from "../types/track.types.js";

const INVALID_EXTENSION_MESSAGE = `Only ${LOG_UPLOAD.ALLOWED_EXTENSIONS.join(", ")} log files are allowed`;

// ============================================
// File Filter
// ============================================

/**
 * Rejects anything that is not a dashcam log by extension
 */
const fileFilter: multer.Options["fileFilter"] = (req, file, cb) => {
  const ext = path.extname(file.originalname).toLowerCase();

  if (!LOG_UPLOAD.ALLOWED_EXTENSIONS.some((allowed) => allowed === ext)) {
    // Reject file - handleMulterError turns this into a 400
    cb(new Error(INVALID_EXTENSION_MESSAGE));
    return;
  }

  cb(null, true);
};

// ============================================
// Multer Instance
// ============================================

/**
 * Configured Multer instance for log uploads
 *
 * Usage:
 *   uploadLog.single(LOG_UPLOAD.FIELD_NAME) - single file in the "log" field
 */
export const uploadLog = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: LOG_UPLOAD.MAX_FILE_SIZE_BYTES,
  },
});

// ============================================
// Error Handler Middleware
// ============================================

/**
 * Formats Multer errors into consistent API responses
 *
 * Must be placed AFTER uploadLog middleware in the route chain.
 *
 * Handles:
 * - LIMIT_FILE_SIZE: File exceeds 10MB limit
 * - Filter rejection: Non-.txt file
 * - Other errors: Passed to next error handler
 */
export function handleMulterError(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (error instanceof multer.MulterError) {
    const body: LogErrorResponse =
      error.code === "LIMIT_FILE_SIZE"
        ? {
            success: false,
            error: "File too large. Maximum size is 10MB.",
            code: ERROR_CODES.LOG_FILE_TOO_LARGE,
          }
        : {
            success: false,
            error: `Upload error: ${error.message}`,
            code: ERROR_CODES.LOG_INVALID_FORMAT,
          };
    res.status(400).json(body);
    return;
  }

  if (error.message === INVALID_EXTENSION_MESSAGE) {
    const body: LogErrorResponse = {
      success: false,
      error: error.message,
      code: ERROR_CODES.LOG_INVALID_FORMAT,
    };
    res.status(400).json(body);
    return;
  }

  next(error);
}
