/**
 * Track Parser Tests
 * Segmentation at $V02 markers and filtering of bad fixes
 */

import fs from "node:fs";
import path from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import {
  parseTrackLog,
  parseTrackBuffer,
  parseTracks,
  TrackLogParseError,
} from "../services/track-parser.service.js";
import { DELIMITER, logText, makeTempDir, record } from "./fixtures.js";
import type { Track } from "../types/track.types.js";

const timestamps = (track: Track) => track.map((point) => point.timestamp);

describe("parseTrackLog", () => {
  describe("Segment delimiters", () => {
    it("ignores the leading delimiter and closes a track at each later one", () => {
      const tracks = parseTrackLog(
        logText([DELIMITER, record(10), record(11), DELIMITER, record(20), DELIMITER])
      );

      expect(tracks.map(timestamps)).toEqual([[10, 11], [20]]);
    });

    it("turns the remainder after the last delimiter into one more track", () => {
      const tracks = parseTrackLog(
        logText([DELIMITER, record(10), DELIMITER, record(20), DELIMITER, record(30), record(31)])
      );

      expect(tracks.map(timestamps)).toEqual([[10], [20], [30, 31]]);
    });

    it("returns a single track when the log has no delimiters", () => {
      const tracks = parseTrackLog(logText([record(1), record(2), record(3)]));

      expect(tracks.map(timestamps)).toEqual([[1, 2, 3]]);
    });

    it("does not close a track at the first delimiter even if points precede it", () => {
      const tracks = parseTrackLog(logText([record(1), DELIMITER, record(2), DELIMITER, record(3)]));

      expect(tracks.map(timestamps)).toEqual([[1, 2], [3]]);
    });

    it("drops segments with no surviving points", () => {
      const tracks = parseTrackLog(
        logText([
          DELIMITER,
          record(10),
          DELIMITER,
          DELIMITER,
          record(20, { status: "V" }),
          DELIMITER,
          record(30),
        ])
      );

      expect(tracks.map(timestamps)).toEqual([[10], [30]]);
    });

    it("returns no tracks for a log with only delimiters", () => {
      expect(parseTrackLog(logText([DELIMITER, DELIMITER, DELIMITER]))).toEqual([]);
    });

    it("accepts delimiters with surrounding whitespace", () => {
      const tracks = parseTrackLog(logText([" $V02 ", record(1), "$V02\t", record(2)]));

      expect(tracks.map(timestamps)).toEqual([[1], [2]]);
    });
  });

  describe("Monotonic timestamps", () => {
    it("keeps only strictly increasing timestamps", () => {
      const tracks = parseTrackLog(logText([record(10), record(10), record(9), record(11)]));

      expect(tracks.map(timestamps)).toEqual([[10, 11]]);
    });

    it("compares against the previous accepted point only", () => {
      // 20 is rejected (status V), so 15 is compared with 10
      const tracks = parseTrackLog(
        logText([record(10), record(20, { status: "V" }), record(15)])
      );

      expect(tracks.map(timestamps)).toEqual([[10, 15]]);
    });

    it("resets the comparison at each segment boundary", () => {
      const tracks = parseTrackLog(logText([DELIMITER, record(100), DELIMITER, record(50)]));

      expect(tracks.map(timestamps)).toEqual([[100], [50]]);
    });
  });

  describe("Fix filters", () => {
    it("drops points whose status is not A", () => {
      const tracks = parseTrackLog(
        logText([record(1), record(2, { status: "V" }), record(3, { status: "a" }), record(4)])
      );

      expect(tracks.map(timestamps)).toEqual([[1, 4]]);
    });

    it("drops points with a zero latitude or longitude", () => {
      const tracks = parseTrackLog(
        logText([
          record(1, { lat: "0.000000" }),
          record(2, { lon: "0.000000" }),
          record(3, { status: "V", lat: "0.000000", lon: "0.000000" }),
          record(4),
        ])
      );

      expect(tracks.map(timestamps)).toEqual([[4]]);
    });

    it("compares the zero placeholder as text", () => {
      const tracks = parseTrackLog(logText([record(1, { lat: "0.0" })]));

      expect(tracks).toHaveLength(1);
      expect(tracks[0][0].lat).toBe(0);
    });

    it("does not read coordinates of rejected points", () => {
      const tracks = parseTrackLog(logText([record(1, { status: "V", lat: "", lon: "" }), record(2)]));

      expect(tracks.map(timestamps)).toEqual([[2]]);
    });
  });

  describe("Point fields", () => {
    it("trims fields and keeps the coordinate text", () => {
      const [[point]] = parseTrackLog(" 1672502400 , A , 31.2300 , 121.473700 , 0 , 1250 \n");

      expect(point).toEqual({
        timestamp: 1672502400,
        status: "A",
        lat: 31.23,
        lon: 121.4737,
        latText: "31.2300",
        lonText: "121.473700",
        speed: 1250,
      });
    });

    it("leaves speed out when the field is missing or empty", () => {
      const [track] = parseTrackLog(logText(["1,A,31.1,121.1", "2,A,31.1,121.1,0,", record(3)]));

      expect(track.map((point) => point.speed)).toEqual([undefined, undefined, undefined]);
      expect("speed" in track[0]).toBe(false);
    });

    it("handles CRLF line endings", () => {
      const tracks = parseTrackLog(["$V02", record(1), record(2), "$V02", record(3)].join("\r\n"));

      expect(tracks.map(timestamps)).toEqual([[1, 2], [3]]);
    });
  });

  describe("Malformed lines", () => {
    it("throws on a record with too few fields", () => {
      expect(() => parseTrackLog(logText([DELIMITER, record(1), "2,A,31.1"]))).toThrow(
        TrackLogParseError
      );
    });

    it("reports the 1-based line number", () => {
      try {
        parseTrackLog(logText([DELIMITER, record(1), "abc,A,31.1,121.1,0,0"]), "trip.txt");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TrackLogParseError);
        if (error instanceof TrackLogParseError) {
          expect(error.lineNumber).toBe(3);
          expect(error.line).toBe("abc,A,31.1,121.1,0,0");
          expect(error.message).toBe('Invalid timestamp "abc" (trip.txt, line 3)');
        }
      }
    });

    it("throws on a timestamp beyond the supported range", () => {
      try {
        parseTrackLog(
          logText([DELIMITER, record(1672502400), DELIMITER, record("99999999999999999"), DELIMITER]),
          "trip.txt"
        );
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TrackLogParseError);
        if (error instanceof TrackLogParseError) {
          expect(error.lineNumber).toBe(4);
          expect(error.message).toBe('Timestamp "99999999999999999" out of range (trip.txt, line 4)');
        }
      }
    });

    it("throws on a blank line inside the log", () => {
      try {
        parseTrackLog(logText([DELIMITER, record(1), "", record(2)]), "trip.txt");
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TrackLogParseError);
        if (error instanceof TrackLogParseError) {
          expect(error.lineNumber).toBe(3);
          expect(error.message).toBe("Expected at least 4 fields, got 1 (trip.txt, line 3)");
        }
      }
    });

    it("accepts a log with or without a final newline", () => {
      expect(parseTrackLog(`${record(1)}\n`).map(timestamps)).toEqual([[1]]);
      expect(parseTrackLog(record(1)).map(timestamps)).toEqual([[1]]);
      expect(parseTrackLog("")).toEqual([]);
    });

    it("throws on a non-integer timestamp even for an invalid fix", () => {
      expect(() => parseTrackLog("12.5,V,0.000000,0.000000,0,0\n")).toThrow(/Invalid timestamp/);
    });

    it("throws on a non-numeric coordinate of an accepted fix", () => {
      expect(() => parseTrackLog("1,A,north,121.1,0,0\n")).toThrow(/Invalid coordinates/);
    });

    it("throws on a non-integer speed", () => {
      expect(() => parseTrackLog(record(1, { speed: "fast" }))).toThrow(/Invalid speed "fast"/);
    });
  });
});

describe("parseTrackBuffer", () => {
  it("decodes an uploaded buffer", () => {
    const tracks = parseTrackBuffer(Buffer.from(logText([DELIMITER, record(5), record(6)])));

    expect(tracks.map(timestamps)).toEqual([[5, 6]]);
  });
});

describe("parseTracks", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("reads a log file from disk", () => {
    dir = makeTempDir();
    const logPath = path.join(dir, "GPSData000001.txt");
    fs.writeFileSync(logPath, logText([DELIMITER, record(1), DELIMITER, record(2)]));

    expect(parseTracks(logPath).map(timestamps)).toEqual([[1], [2]]);
  });

  it("propagates the fs error for a missing file", () => {
    dir = makeTempDir();

    expect(() => parseTracks(path.join(dir ?? "", "missing.txt"))).toThrow(/ENOENT/);
  });
});
