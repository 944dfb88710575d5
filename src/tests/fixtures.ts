/**
 * Shared test data builders for dashcam logs
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const SHANGHAI_OFFSET_SECONDS = 8 * 3600;

/**
 * Raw timestamp the dashcam writes for a wall-clock reading
 *
 * @example
 * deviceTimestamp("2023-01-01T00:00:00"); // 1672502400
 */
export function deviceTimestamp(wallClock: string): number {
  return Date.parse(`${wallClock}Z`) / 1000 - SHANGHAI_OFFSET_SECONDS;
}

interface RecordOptions {
  status?: string;
  lat?: string;
  lon?: string;
  speed?: string;
}

/** One comma-separated log record */
export function record(timestamp: number | string, options: RecordOptions = {}): string {
  const fields = [
    String(timestamp),
    options.status ?? "A",
    options.lat ?? "31.230416",
    options.lon ?? "121.473701",
    "0",
  ];
  if (options.speed !== undefined) {
    fields.push(options.speed);
  }
  return fields.join(",");
}

export const DELIMITER = "$V02";

/** Join log lines the way the device writes them */
export function logText(lines: string[]): string {
  return lines.join("\n") + "\n";
}

/** Log with `count` single-point tracks, one per day from 2023-01-01 */
export function multiTrackLog(count: number): string {
  const lines = [DELIMITER];
  for (let i = 0; i < count; i++) {
    const day = String(i + 1).padStart(2, "0");
    lines.push(record(deviceTimestamp(`2023-01-${day}T08:00:00`)), DELIMITER);
  }
  return logText(lines);
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "dashcam2gpx-"));
}
