/**
 * Countdown Bot — src/features/countdown/temporal.ts
 * WHAT: Decides which notification, if any, an event is due at a given instant.
 * WHY: Kept pure (no clock, no I/O) so every branch is testable with fixed instants.
 * FLOWS:
 *  - classify(now, event, tz, windows) → none | start | milestone | repeat | expired
 *  - timeRemaining(now, eventSec) → human description for status/announcement text
 *  - isPrunable(now, event, windows) → true once the keep window has elapsed
 *
 * Milestones match CALENDAR days in the guild's zone: an event at 09:00
 * tomorrow is "1 day left" at 23:59 today even though < 24h remain.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { EventRecord } from "../../store/schema.js";
import { dateKeyInZone, daysBetweenDateKeys, SECONDS_PER_DAY } from "../../lib/time.js";

export interface TemporalWindows {
  /** Seconds after start during which a late start announcement still goes out */
  graceSeconds: number;
  /** Seconds after start after which the event is pruned. Always >= graceSeconds. */
  keepSeconds: number;
}

export const DEFAULT_WINDOWS: TemporalWindows = {
  graceSeconds: 60 * 60,
  keepSeconds: 60 * 60,
};

export function makeWindows(graceMinutes: number, keepMinutes: number): TemporalWindows {
  if (keepMinutes < graceMinutes) {
    throw new RangeError(`keep window (${keepMinutes}m) must be >= grace window (${graceMinutes}m)`);
  }
  return { graceSeconds: graceMinutes * 60, keepSeconds: keepMinutes * 60 };
}

export type Classification =
  | { kind: "none" }
  | { kind: "start" }
  | { kind: "milestone"; daysLeft: number }
  | { kind: "repeat"; dateKey: string }
  | { kind: "expired" };

/** The classifications that produce a channel post */
export type Notification = Extract<Classification, { kind: "start" | "milestone" | "repeat" }>;

type EventTiming = Pick<
  EventRecord,
  | "timestamp"
  | "silenced"
  | "startAnnounced"
  | "milestones"
  | "announcedMilestones"
  | "repeatEveryDays"
  | "repeatAnchorDate"
  | "announcedRepeatDates"
>;

export const PASSED_DESCRIPTION = "The event is happening now or has already started!";

export interface TimeRemaining {
  description: string;
  daysFloor: number;
  hasPassed: boolean;
}

const plural = (n: number, unit: string): string => `${n} ${unit}${n === 1 ? "" : "s"}`;

/**
 * Truncating breakdown of the time until `eventSec`. Seconds only appear when
 * nothing larger is left.
 */
export function timeRemaining(nowSec: number, eventSec: number): TimeRemaining {
  const delta = eventSec - nowSec;
  if (delta <= 0) {
    return { description: PASSED_DESCRIPTION, daysFloor: 0, hasPassed: true };
  }

  const days = Math.floor(delta / SECONDS_PER_DAY);
  const hours = Math.floor((delta % SECONDS_PER_DAY) / 3600);
  const minutes = Math.floor((delta % 3600) / 60);
  const seconds = delta % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(plural(days, "day"));
  if (hours > 0) parts.push(plural(hours, "hour"));
  if (minutes > 0) parts.push(plural(minutes, "minute"));
  if (parts.length === 0) parts.push(plural(seconds, "second"));

  return { description: parts.join(" • "), daysFloor: days, hasPassed: false };
}

export function calendarDaysLeft(nowSec: number, eventSec: number, timeZone: string): number {
  return daysBetweenDateKeys(dateKeyInZone(nowSec, timeZone), dateKeyInZone(eventSec, timeZone));
}

export function classify(
  nowSec: number,
  event: EventTiming,
  timeZone: string,
  windows: TemporalWindows = DEFAULT_WINDOWS
): Classification {
  if (event.silenced) return { kind: "none" };

  if (event.timestamp <= nowSec) {
    const elapsed = nowSec - event.timestamp;
    if (!event.startAnnounced && elapsed <= windows.graceSeconds) {
      return { kind: "start" };
    }
    if (elapsed > windows.keepSeconds) {
      return { kind: "expired" };
    }
    return { kind: "none" };
  }

  const daysLeft = calendarDaysLeft(nowSec, event.timestamp, timeZone);
  // DST shifts can briefly put "today" past the event's date; nothing to send.
  if (daysLeft < 0) return { kind: "none" };

  if (event.milestones.includes(daysLeft) && !event.announcedMilestones.includes(daysLeft)) {
    return { kind: "milestone", daysLeft };
  }

  const repeatDate = dueRepeatDate(nowSec, event, timeZone);
  if (repeatDate) return { kind: "repeat", dateKey: repeatDate };

  return { kind: "none" };
}

/**
 * Today's date key when a repeat reminder is owed today, else null. The anchor
 * day itself never fires; the first reminder is `repeatEveryDays` after it.
 */
function dueRepeatDate(nowSec: number, event: EventTiming, timeZone: string): string | null {
  const every = event.repeatEveryDays;
  const anchor = event.repeatAnchorDate;
  if (!every || !anchor) return null;

  const today = dateKeyInZone(nowSec, timeZone);
  const sinceAnchor = daysBetweenDateKeys(anchor, today);
  if (sinceAnchor <= 0 || sinceAnchor % every !== 0) return null;
  if (event.announcedRepeatDates.includes(today)) return null;
  return today;
}

/**
 * Expiry is purely time based: silenced events are cleaned up too.
 */
export function isPrunable(
  nowSec: number,
  event: Pick<EventRecord, "timestamp">,
  windows: TemporalWindows = DEFAULT_WINDOWS
): boolean {
  return nowSec - event.timestamp > windows.keepSeconds;
}
