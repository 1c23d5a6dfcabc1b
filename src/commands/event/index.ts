/**
 * Countdown Bot — src/commands/event/index.ts
 * WHAT: /event subcommands: add, edit, remove, list, info, and per-event reminder settings.
 * WHY: Every change goes through CountdownService.update so it is saved atomically and
 *      the pinned countdown is refreshed before we reply.
 * FLOWS:
 *  - resolve target guild (interaction guild or /linkserver link) → resolve actor
 *  - check access inside the write → apply eventOps change → reply ephemerally
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction, User } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../../lib/cmdWrap.js";
import { InputError } from "../../lib/errors.js";
import {
  dateKeyInZone,
  formatShortInZone,
  parseLocalDateTime,
  zonedDateTimeToEpoch,
  zonedParts,
} from "../../lib/time.js";
import {
  addEvent,
  clearRepeat,
  editEvent,
  eventAt,
  parseMilestoneList,
  removeEvent,
  setMilestones,
  setOwner,
  setRepeat,
  setSilenced,
  type UserRef,
} from "../../features/countdown/eventOps.js";
import { canCreateEvent, canEditEvent, type Actor } from "../../features/countdown/permissions.js";
import { eventDetails, eventListing } from "../../features/countdown/presentation.js";
import { defaultGuildConfig, type AppState, type EventRecord } from "../../store/schema.js";
import { ensureGuild } from "../../store/stateStore.js";
import { resolveActor, targetGuildId } from "../access.js";
import type { CommandDeps } from "../types.js";
import { data } from "./data.js";

export { data };

interface EventCommandScope {
  interaction: ChatInputCommandInteraction;
  deps: CommandDeps;
  guildId: string;
  actor: Actor;
}

function userRef(user: User): UserRef {
  return { id: user.id, name: user.globalName ?? user.username };
}

/** MM/DD/YYYY + HH:MM in the guild's zone → Unix seconds */
export function parseEventTime(date: string, time: string, timeZone: string): number {
  const local = parseLocalDateTime(date, time);
  if (!local) {
    throw new InputError(
      "date",
      "Invalid date/time format. Use `MM/DD/YYYY` for date and `HH:MM` (24-hour) for time.",
      `${date} ${time}`
    );
  }
  return zonedDateTimeToEpoch(local, timeZone);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Reschedule input where either half may be missing; the missing half keeps
 * the event's current local date or time.
 */
function rescheduledTime(
  event: EventRecord,
  date: string | null,
  time: string | null,
  timeZone: string
): number | undefined {
  if (date === null && time === null) return undefined;
  const current = zonedParts(event.timestamp, timeZone);
  const dateText = date ?? `${pad2(current.month)}/${pad2(current.day)}/${current.year}`;
  const timeText = time ?? `${pad2(current.hour)}:${pad2(current.minute)}`;
  return parseEventTime(dateText, timeText, timeZone);
}

function describeWhen(event: EventRecord, timeZone: string): string {
  return `<t:${event.timestamp}:F> (${formatShortInZone(event.timestamp, timeZone)} ${timeZone})`;
}

/**
 * Runs a per-event change inside the store write, after checking the actor may
 * edit the event the index names right now.
 */
async function updateEvent<T>(
  scope: EventCommandScope,
  index: number,
  fn: (draft: AppState, nowSec: number, event: EventRecord) => T
): Promise<T> {
  const { deps, guildId, actor } = scope;
  return deps.service.update(guildId, (draft, nowSec) => {
    const guild = ensureGuild(draft, guildId);
    const event = eventAt(guild, index);
    if (!canEditEvent(actor, guild, event, deps.ownerIds)) {
      throw new InputError("permission", "You can only change events you own, unless you're an event manager.");
    }
    return fn(draft, nowSec, event);
  });
}

async function handleAdd(scope: EventCommandScope): Promise<void> {
  const { interaction, deps, guildId, actor } = scope;
  const timeZone = deps.service.timeZoneFor(guildId);
  const timestamp = parseEventTime(
    interaction.options.getString("date", true),
    interaction.options.getString("time", true),
    timeZone
  );
  const milestonesText = interaction.options.getString("milestones");
  const milestones = milestonesText ? parseMilestoneList(milestonesText) : undefined;
  const owner = interaction.options.getUser("owner");

  const event = await deps.service.update(guildId, (draft, nowSec) => {
    if (!canCreateEvent(actor, ensureGuild(draft, guildId), deps.ownerIds)) {
      throw new InputError("permission", "Only event managers can add events in this server.");
    }
    return addEvent(
      draft,
      guildId,
      {
        name: interaction.options.getString("name", true),
        timestamp,
        owner: owner ? userRef(owner) : null,
        createdBy: userRef(interaction.user),
        milestones,
      },
      nowSec
    );
  });

  const lines = [`✅ Added **${event.name}** on ${describeWhen(event, timeZone)}.`];
  if (!deps.service.guild(guildId)?.eventChannelId) {
    lines.push("Set an events channel with `/countdown channel` so the countdown shows up.");
  }
  await replyOrEdit(interaction, { content: lines.join("\n") });
}

async function handleEdit(scope: EventCommandScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const index = interaction.options.getInteger("index", true);
  const name = interaction.options.getString("name");
  const date = interaction.options.getString("date");
  const time = interaction.options.getString("time");
  const timeZone = deps.service.timeZoneFor(guildId);

  const event = await updateEvent(scope, index, (draft, nowSec, current) =>
    editEvent(
      draft,
      guildId,
      index,
      { name: name ?? undefined, timestamp: rescheduledTime(current, date, time, timeZone) },
      nowSec
    )
  );
  await replyOrEdit(interaction, {
    content: `✏️ Updated **${event.name}**: ${describeWhen(event, timeZone)}.`,
  });
}

async function handleRemove(scope: EventCommandScope): Promise<void> {
  const { interaction, guildId } = scope;
  const index = interaction.options.getInteger("index", true);
  const removed = await updateEvent(scope, index, (draft) => removeEvent(draft, guildId, index));
  await replyOrEdit(interaction, { content: `🗑 Removed **${removed.name}**.` });
}

async function handleList(scope: EventCommandScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const guild = deps.service.guild(guildId) ?? defaultGuildConfig();
  const content = eventListing(guild.events, {
    nowSec: deps.service.nowSec(),
    timeZone: deps.service.timeZoneFor(guildId),
    theme: guild.theme,
  });
  await replyOrEdit(interaction, { content });
}

async function handleInfo(scope: EventCommandScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const guild = deps.service.guild(guildId) ?? defaultGuildConfig();
  const event = eventAt(guild, interaction.options.getInteger("index", true));
  const content = eventDetails(event, {
    nowSec: deps.service.nowSec(),
    timeZone: deps.service.timeZoneFor(guildId),
    theme: guild.theme,
  });
  await replyOrEdit(interaction, { content });
}

async function handleSilence(scope: EventCommandScope): Promise<void> {
  const { interaction, guildId } = scope;
  const index = interaction.options.getInteger("index", true);
  const silenced = interaction.options.getBoolean("silenced") ?? undefined;
  const event = await updateEvent(scope, index, (draft) => setSilenced(draft, guildId, index, silenced));
  await replyOrEdit(interaction, {
    content: event.silenced
      ? `🔕 **${event.name}** is silenced. It stays on the countdown but won't post reminders.`
      : `🔔 Reminders for **${event.name}** are back on.`,
  });
}

async function handleMilestones(scope: EventCommandScope, clear: boolean): Promise<void> {
  const { interaction, guildId } = scope;
  const index = interaction.options.getInteger("index", true);
  const milestones = clear ? [] : parseMilestoneList(interaction.options.getString("days", true));
  const event = await updateEvent(scope, index, (draft) => setMilestones(draft, guildId, index, milestones));
  await replyOrEdit(interaction, {
    content:
      event.milestones.length > 0
        ? `📌 **${event.name}** will remind at: ${event.milestones.join(", ")} days before.`
        : `📌 Milestone reminders for **${event.name}** are off.`,
  });
}

async function handleRepeat(scope: EventCommandScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const index = interaction.options.getInteger("index", true);
  const every = interaction.options.getInteger("every", true);
  const todayKey = dateKeyInZone(deps.service.nowSec(), deps.service.timeZoneFor(guildId));
  const event = await updateEvent(scope, index, (draft) => setRepeat(draft, guildId, index, every, todayKey));
  await replyOrEdit(interaction, {
    content: `🔁 **${event.name}** will get a reminder every ${every} day(s), starting ${every} day(s) from today.`,
  });
}

async function handleClearRepeat(scope: EventCommandScope): Promise<void> {
  const { interaction, guildId } = scope;
  const index = interaction.options.getInteger("index", true);
  const event = await updateEvent(scope, index, (draft) => clearRepeat(draft, guildId, index));
  await replyOrEdit(interaction, { content: `🔁 Repeating reminders for **${event.name}** are off.` });
}

async function handleOwner(scope: EventCommandScope, clear: boolean): Promise<void> {
  const { interaction, guildId } = scope;
  const index = interaction.options.getInteger("index", true);
  const owner = clear ? null : userRef(interaction.options.getUser("user", true));
  const event = await updateEvent(scope, index, (draft) => setOwner(draft, guildId, index, owner));
  await replyOrEdit(interaction, {
    content: event.ownerUserId
      ? `👤 <@${event.ownerUserId}> now owns **${event.name}** and will get a DM at each reminder.`
      : `👤 **${event.name}** no longer has an owner.`,
  });
}

export async function execute(ctx: CommandContext, deps: CommandDeps): Promise<void> {
  const { interaction } = ctx;
  const subcommand = interaction.options.getSubcommand(true);

  await ensureDeferred(interaction);
  const guildId = await withStep(ctx, "resolve_guild", () => targetGuildId(interaction, deps.service));
  const actor = await withStep(ctx, "resolve_actor", () => resolveActor(interaction, guildId));
  const scope: EventCommandScope = { interaction, deps, guildId, actor };

  ctx.step(subcommand);
  switch (subcommand) {
    case "add":
      return handleAdd(scope);
    case "edit":
      return handleEdit(scope);
    case "remove":
      return handleRemove(scope);
    case "list":
      return handleList(scope);
    case "info":
      return handleInfo(scope);
    case "silence":
      return handleSilence(scope);
    case "milestones":
      return handleMilestones(scope, false);
    case "clearmilestones":
      return handleMilestones(scope, true);
    case "repeat":
      return handleRepeat(scope);
    case "clearrepeat":
      return handleClearRepeat(scope);
    case "owner":
      return handleOwner(scope, false);
    case "clearowner":
      return handleOwner(scope, true);
    default:
      await replyOrEdit(interaction, { content: "Unknown subcommand." });
  }
}
