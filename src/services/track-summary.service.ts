/**
 * Track Summary Service
 * Counts, time span and tracks-per-month for a parsed log
 */

import { toLocalTimestamp } from "./timestamp.service.js";
import { countPoints } from "./gpx-writer.service.js";
import type { MonthBucket, Track, TrackSummary } from "../types/track.types.js";

/**
 * Summarize parsed tracks
 *
 * Tracks come out of the parser in chronological order, so the month
 * histogram is built in a single pass: a bucket is flushed whenever the
 * "YYYY-MM" of a track's first point differs from the running one.
 *
 * @param tracks - Tracks from parseTracks()
 * @param timeZone - Zone used for start/end times and month boundaries
 */
export function summarizeTracks(tracks: readonly Track[], timeZone: string): TrackSummary {
  const months: MonthBucket[] = [];
  let currentMonth: string | null = null;
  let currentCount = 0;

  for (const track of tracks) {
    const month = toLocalTimestamp(track[0].timestamp, timeZone).slice(0, 7);

    if (month !== currentMonth) {
      if (currentMonth !== null) {
        months.push({ month: currentMonth, trackCount: currentCount });
      }
      currentMonth = month;
      currentCount = 0;
    }
    currentCount++;
  }

  if (currentMonth !== null) {
    months.push({ month: currentMonth, trackCount: currentCount });
  }

  const firstTrack = tracks[0];
  const lastTrack = tracks[tracks.length - 1];

  return {
    trackCount: tracks.length,
    pointCount: countPoints(tracks),
    startTime: firstTrack ? toLocalTimestamp(firstTrack[0].timestamp, timeZone) : null,
    endTime: lastTrack ? toLocalTimestamp(lastTrack[lastTrack.length - 1].timestamp, timeZone) : null,
    months,
  };
}

/**
 * Render a summary as printable lines
 */
export function formatTrackSummary(summary: TrackSummary): string[] {
  const lines = [
    `Tracks: ${summary.trackCount}`,
    `Points: ${summary.pointCount}`,
    `Start: ${summary.startTime ?? "-"}`,
    `End: ${summary.endTime ?? "-"}`,
  ];

  if (summary.months.length > 0) {
    lines.push("Tracks per month:");
    for (const bucket of summary.months) {
      lines.push(`  ${bucket.month}: ${bucket.trackCount}`);
    }
  }

  return lines;
}
