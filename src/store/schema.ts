/**
 * Countdown Bot — src/store/schema.ts
 * WHAT: zod schema for the persisted state document, and the types inferred from it.
 * WHY: The state file is hand-editable and survives across versions; loading
 *      validates it and fills defaults for fields older files lack.
 *
 * Document layout:
 *   { guilds: { [guildId]: GuildConfig }, userLinks: { [userId]: guildId } }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";

export const DEFAULT_MILESTONES: readonly number[] = [100, 60, 30, 14, 7, 2, 1, 0];

/** Most recent repeat dates kept per event; older ones can never match "today" again */
export const MAX_ANNOUNCED_REPEAT_DATES = 180;

export const MAX_MILESTONE_DAYS = 3650;
export const MAX_REPEAT_EVERY_DAYS = 365;

const snowflake = z.string().min(1);
const dateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const milestoneDay = z.number().int().min(0).max(MAX_MILESTONE_DAYS);

export const eventRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  timestamp: z.number().int(),
  milestones: z.array(milestoneDay).default([]),
  announcedMilestones: z.array(milestoneDay).default([]),
  repeatEveryDays: z.number().int().min(1).max(MAX_REPEAT_EVERY_DAYS).nullable().optional(),
  repeatAnchorDate: dateKey.nullable().optional(),
  announcedRepeatDates: z.array(dateKey).default([]),
  silenced: z.boolean().default(false),
  startAnnounced: z.boolean().default(false),
  ownerUserId: snowflake.nullable().optional(),
  ownerName: z.string().nullable().optional(),
  createdByUserId: snowflake.nullable().optional(),
  createdByName: z.string().nullable().optional(),
  bannerUrl: z.string().url().nullable().optional(),
});

export const digestConfigSchema = z.object({
  enabled: z.boolean().default(false),
  channelId: snowflake.nullable().optional(),
  lastSentDate: dateKey.nullable().optional(),
});

export const guildConfigSchema = z.object({
  eventChannelId: snowflake.nullable().optional(),
  pinnedMessageId: snowflake.nullable().optional(),
  mentionRoleId: snowflake.nullable().optional(),
  timezone: z.string().nullable().optional(),
  events: z.array(eventRecordSchema).default([]),
  defaultMilestones: z.array(milestoneDay).default([...DEFAULT_MILESTONES]),
  digest: digestConfigSchema.default({ enabled: false }),
  theme: z.string().default("classic"),
  welcomed: z.boolean().default(false),
  eventAdminRoleIds: z.array(snowflake).default([]),
  allowMemberEventCreation: z.boolean().default(false),
});

export const appStateSchema = z.object({
  guilds: z.record(z.string(), guildConfigSchema).default({}),
  userLinks: z.record(z.string(), z.string()).default({}),
});

export type EventRecord = z.infer<typeof eventRecordSchema>;
export type DigestConfig = z.infer<typeof digestConfigSchema>;
export type GuildConfig = z.infer<typeof guildConfigSchema>;
export type AppState = z.infer<typeof appStateSchema>;

export function emptyState(): AppState {
  return { guilds: {}, userLinks: {} };
}

export function defaultGuildConfig(): GuildConfig {
  return {
    eventChannelId: null,
    pinnedMessageId: null,
    mentionRoleId: null,
    timezone: null,
    events: [],
    defaultMilestones: [...DEFAULT_MILESTONES],
    digest: { enabled: false, channelId: null, lastSentDate: null },
    theme: "classic",
    welcomed: false,
    eventAdminRoleIds: [],
    allowMemberEventCreation: false,
  };
}

/**
 * Soonest first. Ties fall back to name then id so two reads of the same
 * state always list events in the same order (command indexes depend on it).
 */
export function sortEvents(events: EventRecord[]): EventRecord[] {
  return events.sort(
    (a, b) => a.timestamp - b.timestamp || a.name.localeCompare(b.name) || a.id.localeCompare(b.id)
  );
}
