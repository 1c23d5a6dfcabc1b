/**
 * Countdown Bot — src/features/countdown/eventOps.ts
 * WHAT: Validated mutations behind every command, applied to a store draft.
 * WHY: Each operation checks all of its input before touching the draft, so a
 *      rejected command leaves nothing half-applied.
 * FLOWS:
 *  - service.ts: store.mutate((draft) => addEvent(draft, ...)) → refresh pinned status
 *  - reconcile.ts: markStartAnnounced / markMilestoneAnnounced / markRepeatAnnounced
 *
 * Events are addressed by their 1-based position in the sorted listing, the
 * same numbers /event list prints.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ulid } from "ulid";
import { InputError } from "../../lib/errors.js";
import { isValidTimeZone } from "../../lib/time.js";
import { ensureGuild } from "../../store/stateStore.js";
import {
  MAX_ANNOUNCED_REPEAT_DATES,
  MAX_MILESTONE_DAYS,
  MAX_REPEAT_EVERY_DAYS,
  sortEvents,
  type AppState,
  type EventRecord,
  type GuildConfig,
} from "../../store/schema.js";
import { isTheme, THEMES } from "./presentation.js";

export const MAX_EVENT_NAME_LENGTH = 100;
export const MAX_MILESTONES = 20;
export const MAX_EVENTS_PER_GUILD = 100;

export interface UserRef {
  id: string;
  name: string;
}

// ===== Validation helpers =====

function cleanName(raw: string): string {
  const name = raw.trim();
  if (name.length === 0) {
    throw new InputError("name", "Event name can't be empty.");
  }
  if (name.length > MAX_EVENT_NAME_LENGTH) {
    throw new InputError("name", `Event name must be at most ${MAX_EVENT_NAME_LENGTH} characters.`, name);
  }
  return name;
}

function requireFuture(timestamp: number, nowSec: number): void {
  if (!Number.isInteger(timestamp)) {
    throw new InputError("timestamp", "Event time must be a whole number of seconds.", timestamp);
  }
  if (timestamp <= nowSec) {
    throw new InputError("timestamp", "That date and time is already in the past.", timestamp);
  }
}

/**
 * Validates a milestone list: whole days between 0 and MAX_MILESTONE_DAYS,
 * duplicates dropped, sorted largest first.
 */
export function normalizeMilestones(values: readonly number[]): number[] {
  for (const v of values) {
    if (!Number.isInteger(v) || v < 0 || v > MAX_MILESTONE_DAYS) {
      throw new InputError(
        "milestones",
        `Milestones must be whole numbers of days between 0 and ${MAX_MILESTONE_DAYS}.`,
        v
      );
    }
  }
  const unique = [...new Set(values)].sort((a, b) => b - a);
  if (unique.length > MAX_MILESTONES) {
    throw new InputError("milestones", `At most ${MAX_MILESTONES} milestones per event.`, unique.length);
  }
  return unique;
}

/** "100, 30 7" → [100, 30, 7]. Commas and whitespace both separate. */
export function parseMilestoneList(text: string): number[] {
  const tokens = text.split(/[\s,]+/).filter((t) => t.length > 0);
  if (tokens.length === 0) {
    throw new InputError("milestones", "Give at least one milestone, e.g. `30, 14, 7, 1, 0`.");
  }
  const values = tokens.map((t) => {
    if (!/^\d+$/.test(t)) {
      throw new InputError("milestones", `"${t}" is not a whole number of days.`, t);
    }
    return Number(t);
  });
  return normalizeMilestones(values);
}

/** Resolves a 1-based listing position to the event it names */
export function eventAt(guild: GuildConfig, index: number): EventRecord {
  sortEvents(guild.events);
  const count = guild.events.length;
  if (count === 0) {
    throw new InputError("index", "There are no events yet.");
  }
  const event = Number.isInteger(index) ? guild.events[index - 1] : undefined;
  if (!event) {
    throw new InputError("index", `Index must be between 1 and ${count}.`, index);
  }
  return event;
}

function findById(guild: GuildConfig, eventId: string): EventRecord | undefined {
  return guild.events.find((e) => e.id === eventId);
}

// ===== Event operations =====

export interface NewEventInput {
  name: string;
  timestamp: number;
  /** Defaults to `createdBy`, so whoever adds an event can manage it. */
  owner?: UserRef | null;
  createdBy?: UserRef | null;
  milestones?: readonly number[];
  bannerUrl?: string | null;
}

export function addEvent(draft: AppState, guildId: string, input: NewEventInput, nowSec: number): EventRecord {
  const name = cleanName(input.name);
  requireFuture(input.timestamp, nowSec);
  const guild = ensureGuild(draft, guildId);
  if (guild.events.length >= MAX_EVENTS_PER_GUILD) {
    throw new InputError("events", `This server already has ${MAX_EVENTS_PER_GUILD} events. Remove some first.`);
  }
  const milestones = normalizeMilestones(input.milestones ?? guild.defaultMilestones);
  const owner = input.owner ?? input.createdBy ?? null;

  const event: EventRecord = {
    id: ulid(),
    name,
    timestamp: input.timestamp,
    milestones,
    announcedMilestones: [],
    repeatEveryDays: null,
    repeatAnchorDate: null,
    announcedRepeatDates: [],
    silenced: false,
    startAnnounced: false,
    ownerUserId: owner?.id ?? null,
    ownerName: owner?.name ?? null,
    createdByUserId: input.createdBy?.id ?? null,
    createdByName: input.createdBy?.name ?? null,
    bannerUrl: input.bannerUrl ?? null,
  };
  guild.events.push(event);
  sortEvents(guild.events);
  return structuredClone(event);
}

export interface EventPatch {
  name?: string;
  timestamp?: number;
  bannerUrl?: string | null;
}

/**
 * A new timestamp is a new occurrence: announcement history and the start
 * flag reset with it.
 */
export function editEvent(
  draft: AppState,
  guildId: string,
  index: number,
  patch: EventPatch,
  nowSec: number
): EventRecord {
  const name = patch.name !== undefined ? cleanName(patch.name) : undefined;
  if (patch.timestamp !== undefined) requireFuture(patch.timestamp, nowSec);
  if (name === undefined && patch.timestamp === undefined && patch.bannerUrl === undefined) {
    throw new InputError("patch", "Nothing to change. Give a new name, date/time, or banner.");
  }

  const event = eventAt(ensureGuild(draft, guildId), index);
  if (name !== undefined) event.name = name;
  if (patch.bannerUrl !== undefined) event.bannerUrl = patch.bannerUrl;
  if (patch.timestamp !== undefined && patch.timestamp !== event.timestamp) {
    event.timestamp = patch.timestamp;
    event.announcedMilestones = [];
    event.announcedRepeatDates = [];
    event.startAnnounced = false;
  }
  return structuredClone(event);
}

export function removeEvent(draft: AppState, guildId: string, index: number): EventRecord {
  const guild = ensureGuild(draft, guildId);
  const event = eventAt(guild, index);
  guild.events = guild.events.filter((e) => e.id !== event.id);
  return event;
}

/** Replaces the milestone list and drops announced entries no longer in it */
export function setMilestones(
  draft: AppState,
  guildId: string,
  index: number,
  milestones: readonly number[]
): EventRecord {
  const next = normalizeMilestones(milestones);
  const event = eventAt(ensureGuild(draft, guildId), index);
  event.milestones = next;
  event.announcedMilestones = event.announcedMilestones.filter((m) => next.includes(m));
  return structuredClone(event);
}

/**
 * Starts a repeat cycle anchored on `todayKey`; the first reminder goes out
 * `everyDays` days later.
 */
export function setRepeat(
  draft: AppState,
  guildId: string,
  index: number,
  everyDays: number,
  todayKey: string
): EventRecord {
  if (!Number.isInteger(everyDays) || everyDays < 1 || everyDays > MAX_REPEAT_EVERY_DAYS) {
    throw new InputError("every", `Repeat interval must be between 1 and ${MAX_REPEAT_EVERY_DAYS} days.`, everyDays);
  }
  const event = eventAt(ensureGuild(draft, guildId), index);
  event.repeatEveryDays = everyDays;
  event.repeatAnchorDate = todayKey;
  event.announcedRepeatDates = [];
  return structuredClone(event);
}

export function clearRepeat(draft: AppState, guildId: string, index: number): EventRecord {
  const event = eventAt(ensureGuild(draft, guildId), index);
  event.repeatEveryDays = null;
  event.repeatAnchorDate = null;
  event.announcedRepeatDates = [];
  return structuredClone(event);
}

/** Toggles when `silenced` is omitted */
export function setSilenced(draft: AppState, guildId: string, index: number, silenced?: boolean): EventRecord {
  const event = eventAt(ensureGuild(draft, guildId), index);
  event.silenced = silenced ?? !event.silenced;
  return structuredClone(event);
}

export function setOwner(draft: AppState, guildId: string, index: number, owner: UserRef | null): EventRecord {
  const event = eventAt(ensureGuild(draft, guildId), index);
  event.ownerUserId = owner?.id ?? null;
  event.ownerName = owner?.name ?? null;
  return structuredClone(event);
}

// ===== Guild configuration =====

/** Moving the channel orphans the old status message; the next refresh creates one */
export function setEventChannel(draft: AppState, guildId: string, channelId: string): void {
  const guild = ensureGuild(draft, guildId);
  if (guild.eventChannelId !== channelId) {
    guild.pinnedMessageId = null;
  }
  guild.eventChannelId = channelId;
}

/** The @everyone role shares the guild's id and is never accepted */
export function setMentionRole(draft: AppState, guildId: string, roleId: string | null): void {
  if (roleId !== null && roleId === guildId) {
    throw new InputError("role", "I won't ping @everyone. Pick a specific role instead.", roleId);
  }
  ensureGuild(draft, guildId).mentionRoleId = roleId;
}

export function setTimezone(draft: AppState, guildId: string, timeZone: string): void {
  const tz = timeZone.trim();
  if (!isValidTimeZone(tz)) {
    throw new InputError("timezone", `"${tz}" isn't a time zone I know. Use an IANA name like America/Chicago.`, tz);
  }
  ensureGuild(draft, guildId).timezone = tz;
}

export function setDefaultMilestones(draft: AppState, guildId: string, milestones: readonly number[]): number[] {
  const next = normalizeMilestones(milestones);
  ensureGuild(draft, guildId).defaultMilestones = next;
  return next;
}

export function setTheme(draft: AppState, guildId: string, theme: string): void {
  if (!isTheme(theme)) {
    throw new InputError("theme", `Theme must be one of: ${THEMES.join(", ")}.`, theme);
  }
  ensureGuild(draft, guildId).theme = theme;
}

export function setDigest(
  draft: AppState,
  guildId: string,
  settings: { enabled: boolean; channelId?: string | null }
): void {
  const guild = ensureGuild(draft, guildId);
  guild.digest.enabled = settings.enabled;
  if (settings.channelId !== undefined) {
    guild.digest.channelId = settings.channelId;
  }
}

export function addAdminRole(draft: AppState, guildId: string, roleId: string): string[] {
  if (roleId === guildId) {
    throw new InputError("role", "Use a specific role; @everyone can't be an event admin role.", roleId);
  }
  const guild = ensureGuild(draft, guildId);
  guild.eventAdminRoleIds = [...new Set([...guild.eventAdminRoleIds, roleId])].sort();
  return guild.eventAdminRoleIds;
}

export function removeAdminRole(draft: AppState, guildId: string, roleId: string): string[] {
  const guild = ensureGuild(draft, guildId);
  if (!guild.eventAdminRoleIds.includes(roleId)) {
    throw new InputError("role", "That role isn't an event admin role.", roleId);
  }
  guild.eventAdminRoleIds = guild.eventAdminRoleIds.filter((id) => id !== roleId);
  return guild.eventAdminRoleIds;
}

export function setAllowMemberCreation(draft: AppState, guildId: string, enabled: boolean): void {
  ensureGuild(draft, guildId).allowMemberEventCreation = enabled;
}

/** Removes every event; returns how many were dropped */
export function purgeEvents(draft: AppState, guildId: string): number {
  const guild = ensureGuild(draft, guildId);
  const count = guild.events.length;
  guild.events = [];
  return count;
}

export function setWelcomed(draft: AppState, guildId: string, welcomed: boolean): void {
  ensureGuild(draft, guildId).welcomed = welcomed;
}

/** DM control: `/event add` sent in DMs targets the linked guild */
export function linkUser(draft: AppState, userId: string, guildId: string): void {
  ensureGuild(draft, guildId);
  draft.userLinks[userId] = guildId;
}

// ===== Reconciliation bookkeeping =====

/** The occurrence the loop classified: which event, and when it was due */
export type OccurrenceRef = Pick<EventRecord, "id" | "timestamp">;

/**
 * WHAT: Re-finds a classified event inside the write critical section.
 * WHY: The send happens outside the lock. A command that commits during that
 *      await may remove or reschedule the event, and a reschedule resets its
 *      history; writing the old occurrence's bookkeeping onto the new one
 *      would swallow its start blast.
 * RETURNS: undefined when the event is gone or now has a different timestamp.
 */
function findOccurrence(draft: AppState, guildId: string, ref: OccurrenceRef): EventRecord | undefined {
  const guild = draft.guilds[guildId];
  const event = guild ? findById(guild, ref.id) : undefined;
  return event && event.timestamp === ref.timestamp ? event : undefined;
}

// Each mark* returns false when nothing was recorded because the occurrence
// changed under the send. The post already went out; the next tick classifies
// the event afresh.

export function markStartAnnounced(draft: AppState, guildId: string, ref: OccurrenceRef): boolean {
  const event = findOccurrence(draft, guildId, ref);
  if (!event) return false;
  event.startAnnounced = true;
  return true;
}

/** GOTCHA: a milestone edited out of the list mid-send stays out; announced must remain a subset */
export function markMilestoneAnnounced(
  draft: AppState,
  guildId: string,
  ref: OccurrenceRef,
  daysLeft: number
): boolean {
  const event = findOccurrence(draft, guildId, ref);
  if (!event || !event.milestones.includes(daysLeft)) return false;
  if (!event.announcedMilestones.includes(daysLeft)) {
    event.announcedMilestones = [...event.announcedMilestones, daysLeft].sort((a, b) => b - a);
  }
  return true;
}

/** Skipped when the repeat was cleared mid-send; re-anchoring already wiped the history */
export function markRepeatAnnounced(
  draft: AppState,
  guildId: string,
  ref: OccurrenceRef,
  dateKey: string
): boolean {
  const event = findOccurrence(draft, guildId, ref);
  if (!event?.repeatEveryDays) return false;
  if (!event.announcedRepeatDates.includes(dateKey)) {
    event.announcedRepeatDates = [...event.announcedRepeatDates, dateKey].slice(-MAX_ANNOUNCED_REPEAT_DATES);
  }
  return true;
}

/**
 * Drops expired events; returns the names removed. The predicate runs against
 * the draft, so an event rescheduled since the snapshot survives.
 */
export function pruneEvents(
  draft: AppState,
  guildId: string,
  isExpired: (event: EventRecord) => boolean
): string[] {
  const guild = draft.guilds[guildId];
  if (!guild) return [];
  const removed = guild.events.filter(isExpired).map((e) => e.name);
  guild.events = guild.events.filter((e) => !isExpired(e));
  return removed;
}

export function markDigestSent(draft: AppState, guildId: string, dateKey: string): void {
  const guild = draft.guilds[guildId];
  if (guild) guild.digest.lastSentDate = dateKey;
}
