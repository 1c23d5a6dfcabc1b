/**
 * Countdown Bot — src/lib/time.ts
 * WHAT: Epoch-second helpers and time zone arithmetic on top of Intl.DateTimeFormat.
 * WHY: Milestones are matched on calendar days in the guild's zone, not on elapsed 24h blocks.
 * FLOWS:
 *  - nowUtc() → current Unix seconds
 *  - dateKeyInZone(sec, tz) → "YYYY-MM-DD" as seen on a wall clock in tz
 *  - zonedDateTimeToEpoch(local, tz) → Unix seconds for a wall-clock time in tz (DST aware)
 * DOCS:
 *  - Intl.DateTimeFormat: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Intl/DateTimeFormat
 *
 * NOTE: every timestamp in this codebase is Unix SECONDS, not milliseconds.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const SECONDS_PER_DAY = 86_400;

// Floor, not round, so "X seconds left" never rounds up past the real value.
export const nowUtc = (): number => Math.floor(Date.now() / 1000);

export interface LocalDateTime {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second?: number;
}

// Formatter construction is the slow part of Intl; one per zone is enough.
const formatterCache = new Map<string, Intl.DateTimeFormat>();

function partsFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatterCache.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatterCache.set(timeZone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) return false;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Wall-clock fields of an instant as seen in `timeZone`.
 */
export function zonedParts(epochSec: number, timeZone: string): Required<LocalDateTime> {
  const parts = partsFormatter(timeZone).formatToParts(new Date(epochSec * 1000));
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number(part.value) : 0;
  };
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    // Some ICU builds still print midnight as "24" even with h23
    hour: get("hour") % 24,
    minute: get("minute"),
    second: get("second"),
  };
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

export function toDateKey(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Calendar date of an instant in `timeZone`, as "YYYY-MM-DD".
 */
export function dateKeyInZone(epochSec: number, timeZone: string): string {
  const p = zonedParts(epochSec, timeZone);
  return toDateKey(p.year, p.month, p.day);
}

const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isValidDateKey(key: string): boolean {
  const m = DATE_KEY_RE.exec(key);
  if (!m) return false;
  return isRealDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

function dateKeyToUtcMs(key: string): number {
  const m = DATE_KEY_RE.exec(key);
  if (!m) {
    throw new RangeError(`Invalid date key: ${key}`);
  }
  return Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 * Date keys carry no zone, so this is plain date arithmetic with no DST effects.
 */
export function daysBetweenDateKeys(from: string, to: string): number {
  return Math.round((dateKeyToUtcMs(to) - dateKeyToUtcMs(from)) / (SECONDS_PER_DAY * 1000));
}

function isRealDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * Offset of `timeZone` from UTC at a given instant, in seconds (east positive).
 */
function zoneOffsetSeconds(epochSec: number, timeZone: string): number {
  const p = zonedParts(epochSec, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second) / 1000;
  return asUtc - Math.floor(epochSec);
}

/**
 * Converts a wall-clock time in `timeZone` to Unix seconds.
 *
 * Two passes: the first guess uses the offset at the naive UTC reading, the
 * second corrects it with the offset at the guessed instant. That settles DST
 * transitions; a wall time inside a spring-forward gap lands one hour earlier.
 */
export function zonedDateTimeToEpoch(local: LocalDateTime, timeZone: string): number {
  const wall =
    Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second ?? 0) / 1000;
  const guess = wall - zoneOffsetSeconds(wall, timeZone);
  return wall - zoneOffsetSeconds(guess, timeZone);
}

const DATE_INPUT_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const TIME_INPUT_RE = /^(\d{1,2}):(\d{2})$/;

/**
 * Parses the command-facing "MM/DD/YYYY" + "HH:MM" (24-hour) pair.
 * Returns null when either half is malformed or names a date that does not exist.
 */
export function parseLocalDateTime(date: string, time: string): LocalDateTime | null {
  const d = DATE_INPUT_RE.exec(date.trim());
  const t = TIME_INPUT_RE.exec(time.trim());
  if (!d || !t) return null;

  const month = Number(d[1]);
  const day = Number(d[2]);
  const year = Number(d[3]);
  const hour = Number(t[1]);
  const minute = Number(t[2]);

  if (!isRealDate(year, month, day)) return null;
  if (hour > 23 || minute > 59) return null;

  return { year, month, day, hour, minute };
}

/**
 * Short wall-clock rendering used in listings: "04/12/2026 09:00".
 */
export function formatShortInZone(epochSec: number, timeZone: string): string {
  const p = zonedParts(epochSec, timeZone);
  return `${pad2(p.month)}/${pad2(p.day)}/${p.year} ${pad2(p.hour)}:${pad2(p.minute)}`;
}
