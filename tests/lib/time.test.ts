/**
 * Countdown Bot — tests/lib/time.test.ts
 * WHAT: Unit tests for time zone arithmetic and command-facing date parsing.
 * WHY: Every countdown decision is a calendar-day comparison in the guild's zone.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  dateKeyInZone,
  daysBetweenDateKeys,
  formatShortInZone,
  isValidDateKey,
  isValidTimeZone,
  nowUtc,
  parseLocalDateTime,
  toDateKey,
  zonedDateTimeToEpoch,
  zonedParts,
} from "../../src/lib/time.js";

const CHICAGO = "America/Chicago";
// 2026-04-12 09:00 CDT
const LAUNCH = 1776002400;

describe("time", () => {
  describe("nowUtc", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("returns whole Unix seconds, floored", () => {
      vi.setSystemTime(new Date("2024-10-20T20:00:00.999Z"));
      expect(nowUtc()).toBe(1729454400);
    });
  });

  describe("isValidTimeZone", () => {
    it("accepts IANA names and rejects junk", () => {
      expect(isValidTimeZone("America/Chicago")).toBe(true);
      expect(isValidTimeZone("UTC")).toBe(true);
      expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
      expect(isValidTimeZone("")).toBe(false);
    });
  });

  describe("zonedParts", () => {
    it("reads wall-clock fields in the given zone", () => {
      expect(zonedParts(LAUNCH, CHICAGO)).toEqual({
        year: 2026,
        month: 4,
        day: 12,
        hour: 9,
        minute: 0,
        second: 0,
      });
      expect(zonedParts(LAUNCH, "UTC").hour).toBe(14);
    });
  });

  describe("date keys", () => {
    it("pads keys", () => {
      expect(toDateKey(2026, 4, 2)).toBe("2026-04-02");
    });

    it("takes the calendar date in the zone, not in UTC", () => {
      // 23:59 on the 11th in Chicago is already the 12th in UTC
      expect(dateKeyInZone(1775969940, CHICAGO)).toBe("2026-04-11");
      expect(dateKeyInZone(1775969940, "UTC")).toBe("2026-04-12");
    });

    it("validates real calendar dates", () => {
      expect(isValidDateKey("2028-02-29")).toBe(true);
      expect(isValidDateKey("2026-02-29")).toBe(false);
      expect(isValidDateKey("2026-4-1")).toBe(false);
    });

    it("counts whole days across a DST change", () => {
      expect(daysBetweenDateKeys("2026-03-07", "2026-03-09")).toBe(2);
      expect(daysBetweenDateKeys("2026-04-12", "2026-04-11")).toBe(-1);
      expect(daysBetweenDateKeys("2025-12-31", "2026-01-01")).toBe(1);
    });
  });

  describe("zonedDateTimeToEpoch", () => {
    it("converts a daylight-time wall clock", () => {
      expect(zonedDateTimeToEpoch({ year: 2026, month: 4, day: 12, hour: 9, minute: 0 }, CHICAGO)).toBe(LAUNCH);
    });

    it("converts a standard-time wall clock", () => {
      expect(zonedDateTimeToEpoch({ year: 2026, month: 1, day: 15, hour: 9, minute: 0 }, CHICAGO)).toBe(1768489200);
    });

    it("converts in a zone east of UTC", () => {
      expect(zonedDateTimeToEpoch({ year: 2026, month: 7, day: 1, hour: 12, minute: 0 }, "Europe/London")).toBe(
        1782903600
      );
    });

    it("moves a wall time inside the spring-forward gap one hour earlier", () => {
      // 02:30 does not exist on 2026-03-08 in Chicago; 01:30 CST is 07:30Z
      expect(zonedDateTimeToEpoch({ year: 2026, month: 3, day: 8, hour: 2, minute: 30 }, CHICAGO)).toBe(1772955000);
    });
  });

  describe("parseLocalDateTime", () => {
    it("parses MM/DD/YYYY and 24-hour HH:MM", () => {
      expect(parseLocalDateTime("04/12/2026", "09:00")).toEqual({
        year: 2026,
        month: 4,
        day: 12,
        hour: 9,
        minute: 0,
      });
      expect(parseLocalDateTime(" 4/2/2026 ", "7:05")).toEqual({
        year: 2026,
        month: 4,
        day: 2,
        hour: 7,
        minute: 5,
      });
    });

    it("rejects malformed or impossible input", () => {
      expect(parseLocalDateTime("2026-04-12", "09:00")).toBeNull();
      expect(parseLocalDateTime("02/30/2026", "09:00")).toBeNull();
      expect(parseLocalDateTime("13/01/2026", "09:00")).toBeNull();
      expect(parseLocalDateTime("04/12/2026", "24:00")).toBeNull();
      expect(parseLocalDateTime("04/12/2026", "9am")).toBeNull();
    });
  });

  describe("formatShortInZone", () => {
    it("renders MM/DD/YYYY HH:MM in the zone", () => {
      expect(formatShortInZone(LAUNCH, CHICAGO)).toBe("04/12/2026 09:00");
      expect(formatShortInZone(LAUNCH, "UTC")).toBe("04/12/2026 14:00");
    });
  });
});
