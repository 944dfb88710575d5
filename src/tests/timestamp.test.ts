/**
 * Timestamp Correction Tests
 * The device stamps Shanghai wall-clock time as if it were UTC epoch
 */

import { describe, it, expect } from "vitest";
import {
  formatInZone,
  isValidTimeZone,
  toLocalTimestamp,
  TimestampError,
} from "../services/timestamp.service.js";
import { deviceTimestamp } from "./fixtures.js";

// Epoch second of 2023-01-01 00:00:00 on a Shanghai wall clock
const NEW_YEAR_2023 = 1672502400;

describe("toLocalTimestamp", () => {
  it("reinterprets the Shanghai wall clock as UTC", () => {
    expect(toLocalTimestamp(String(NEW_YEAR_2023), "UTC")).toBe("2023-01-01T00:00:00+00:00");
  });

  it("differs from a naive epoch conversion by the Shanghai offset", () => {
    const naive = new Date(NEW_YEAR_2023 * 1000).toISOString();

    expect(naive).toBe("2022-12-31T16:00:00.000Z");
    expect(toLocalTimestamp(NEW_YEAR_2023, "UTC")).not.toBe("2022-12-31T16:00:00+00:00");
  });

  it("converts the corrected instant to the observer zone", () => {
    expect(toLocalTimestamp(NEW_YEAR_2023, "Europe/Berlin")).toBe("2023-01-01T01:00:00+01:00");
    expect(toLocalTimestamp(NEW_YEAR_2023, "America/New_York")).toBe("2022-12-31T19:00:00-05:00");
    expect(toLocalTimestamp(NEW_YEAR_2023, "Asia/Kolkata")).toBe("2023-01-01T05:30:00+05:30");
    expect(toLocalTimestamp(NEW_YEAR_2023, "Asia/Shanghai")).toBe("2023-01-01T08:00:00+08:00");
  });

  it("applies daylight saving time of the observer zone", () => {
    const midsummer = deviceTimestamp("2023-07-01T00:00:00");

    expect(midsummer).toBe(1688140800);
    expect(toLocalTimestamp(midsummer, "Europe/Berlin")).toBe("2023-07-01T02:00:00+02:00");
  });

  it("accepts the raw string with surrounding whitespace", () => {
    expect(toLocalTimestamp(" 1672502401 ", "UTC")).toBe("2023-01-01T00:00:01+00:00");
  });

  it("throws TimestampError for a non-integer timestamp", () => {
    expect(() => toLocalTimestamp("16725.5", "UTC")).toThrow(TimestampError);
    expect(() => toLocalTimestamp("", "UTC")).toThrow(TimestampError);
    expect(() => toLocalTimestamp(1.5, "UTC")).toThrow(TimestampError);
  });

  it("throws TimestampError for a timestamp out of Date range", () => {
    expect(() => toLocalTimestamp("99999999999999999", "UTC")).toThrow(TimestampError);
  });

  it("accepts timestamps up to the last day of year 9999 and no further", () => {
    expect(toLocalTimestamp(253402214400, "UTC")).toBe("9999-12-31T08:00:00+00:00");
    expect(() => toLocalTimestamp(253402214401, "UTC")).toThrow(TimestampError);
    expect(() => toLocalTimestamp(-62135510401, "UTC")).toThrow(TimestampError);
  });

  it("throws TimestampError for an unknown zone", () => {
    expect(() => toLocalTimestamp(NEW_YEAR_2023, "Mars/Olympus_Mons")).toThrow(
      'Unknown time zone "Mars/Olympus_Mons"'
    );
  });
});

describe("formatInZone", () => {
  it("renders midnight as 00, not 24", () => {
    expect(formatInZone(Date.UTC(2023, 5, 15, 0, 0, 0), "UTC")).toBe("2023-06-15T00:00:00+00:00");
  });

  it("ignores milliseconds when computing the offset", () => {
    expect(formatInZone(Date.UTC(2023, 0, 1, 0, 0, 0, 750), "Asia/Kolkata")).toBe(
      "2023-01-01T05:30:00+05:30"
    );
  });

  it("keeps two-digit years in the first century", () => {
    expect(formatInZone(new Date("0050-06-15T12:00:00Z").getTime(), "UTC")).toBe(
      "0050-06-15T12:00:00+00:00"
    );
  });

  it("renders local mean time offsets to the second", () => {
    // Shanghai kept LMT (+08:05:43) until 1901
    expect(formatInZone(Date.UTC(1900, 0, 1), "Asia/Shanghai")).toBe(
      "1900-01-01T08:05:43+08:05:43"
    );
  });
});

describe("isValidTimeZone", () => {
  it("recognises IANA zones", () => {
    expect(isValidTimeZone("Europe/London")).toBe(true);
    expect(isValidTimeZone("UTC")).toBe(true);
    expect(isValidTimeZone("Not/AZone")).toBe(false);
  });
});
