/**
 * Countdown Bot — tests/features/countdown/temporal.test.ts
 * WHAT: Tests for notification classification and time-remaining text.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  calendarDaysLeft,
  classify,
  DEFAULT_WINDOWS,
  isPrunable,
  makeWindows,
  PASSED_DESCRIPTION,
  timeRemaining,
} from "../../../src/features/countdown/temporal.js";
import { CHICAGO, LAUNCH, LAUNCH_EVE, makeEvent } from "../../helpers/events.js";

describe("timeRemaining", () => {
  it("truncates to days, hours and minutes", () => {
    expect(timeRemaining(0, 90_061)).toEqual({
      description: "1 day • 1 hour • 1 minute",
      daysFloor: 1,
      hasPassed: false,
    });
  });

  it("skips zero units and pluralizes", () => {
    expect(timeRemaining(0, 2 * 86_400 + 120).description).toBe("2 days • 2 minutes");
    expect(timeRemaining(0, 7200).description).toBe("2 hours");
  });

  it("falls back to seconds under a minute", () => {
    expect(timeRemaining(100, 145).description).toBe("45 seconds");
    expect(timeRemaining(100, 101).description).toBe("1 second");
  });

  it("reports a passed event", () => {
    expect(timeRemaining(LAUNCH, LAUNCH)).toEqual({ description: PASSED_DESCRIPTION, daysFloor: 0, hasPassed: true });
  });
});

describe("calendarDaysLeft", () => {
  it("counts calendar days in the zone, not 24h blocks", () => {
    // 9h01m remain, but the event is tomorrow
    expect(calendarDaysLeft(LAUNCH_EVE, LAUNCH, CHICAGO)).toBe(1);
    expect(calendarDaysLeft(LAUNCH - 3600, LAUNCH, CHICAGO)).toBe(0);
  });

  it("depends on the zone", () => {
    // Same instants, but in UTC both fall on 2026-04-12
    expect(calendarDaysLeft(LAUNCH_EVE, LAUNCH, "UTC")).toBe(0);
  });
});

describe("classify", () => {
  it("returns the milestone for today's day count", () => {
    const event = makeEvent({ milestones: [7, 1] });
    expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "milestone", daysLeft: 1 });
  });

  it("does not repeat an announced milestone", () => {
    const event = makeEvent({ milestones: [1], announcedMilestones: [1] });
    expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "none" });
  });

  it("ignores days that are not milestones", () => {
    const event = makeEvent({ milestones: [7] });
    expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "none" });
  });

  it("prefers the start announcement over a day-0 milestone", () => {
    const event = makeEvent({ milestones: [0] });
    expect(classify(LAUNCH, event, CHICAGO)).toEqual({ kind: "start" });
  });

  it("still announces the start late, within the grace window", () => {
    const event = makeEvent();
    expect(classify(LAUNCH + 30 * 60, event, CHICAGO)).toEqual({ kind: "start" });
    expect(classify(LAUNCH + 30 * 60, { ...event, startAnnounced: true }, CHICAGO)).toEqual({ kind: "none" });
  });

  it("expires an event past the keep window whether or not it was announced", () => {
    const event = makeEvent();
    expect(classify(LAUNCH + 3601, event, CHICAGO)).toEqual({ kind: "expired" });
    expect(classify(LAUNCH + 3601, { ...event, startAnnounced: true }, CHICAGO)).toEqual({ kind: "expired" });
  });

  it("misses a start that is past grace but inside keep", () => {
    const windows = makeWindows(10, 120);
    expect(classify(LAUNCH + 30 * 60, makeEvent(), CHICAGO, windows)).toEqual({ kind: "none" });
  });

  it("says nothing for a silenced event", () => {
    const event = makeEvent({ silenced: true, milestones: [1] });
    expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "none" });
    expect(classify(LAUNCH, event, CHICAGO)).toEqual({ kind: "none" });
  });

  it("gives the same answer when called twice", () => {
    const event = makeEvent({ milestones: [1] });
    expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual(classify(LAUNCH_EVE, event, CHICAGO));
  });

  describe("repeat reminders", () => {
    it("fires on multiples of the interval after the anchor", () => {
      const event = makeEvent({ repeatEveryDays: 3, repeatAnchorDate: "2026-04-05" });
      expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "repeat", dateKey: "2026-04-11" });
    });

    it("skips days off the interval", () => {
      const event = makeEvent({ repeatEveryDays: 3, repeatAnchorDate: "2026-04-06" });
      expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "none" });
    });

    it("never fires on the anchor day", () => {
      const event = makeEvent({ repeatEveryDays: 1, repeatAnchorDate: "2026-04-11" });
      expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "none" });
    });

    it("fires once per day", () => {
      const event = makeEvent({
        repeatEveryDays: 1,
        repeatAnchorDate: "2026-04-01",
        announcedRepeatDates: ["2026-04-11"],
      });
      expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "none" });
    });

    it("yields to a milestone on the same day", () => {
      const event = makeEvent({ milestones: [1], repeatEveryDays: 1, repeatAnchorDate: "2026-04-01" });
      expect(classify(LAUNCH_EVE, event, CHICAGO)).toEqual({ kind: "milestone", daysLeft: 1 });
    });
  });
});

describe("windows", () => {
  it("defaults grace and keep to one hour", () => {
    expect(DEFAULT_WINDOWS).toEqual({ graceSeconds: 3600, keepSeconds: 3600 });
  });

  it("converts minutes and rejects keep shorter than grace", () => {
    expect(makeWindows(30, 90)).toEqual({ graceSeconds: 1800, keepSeconds: 5400 });
    expect(() => makeWindows(60, 30)).toThrow(RangeError);
  });

  it("prunes strictly after the keep window", () => {
    expect(isPrunable(LAUNCH + 3600, { timestamp: LAUNCH })).toBe(false);
    expect(isPrunable(LAUNCH + 3601, { timestamp: LAUNCH })).toBe(true);
  });
});
