/**
 * Countdown Bot — src/features/countdown/presentation.ts
 * WHAT: Wording and layout for every message the countdown core posts.
 * WHY: The reconciler decides WHAT happened; this module decides how it reads,
 *      per guild theme. Nothing here touches state or the platform.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { EventRecord } from "../../store/schema.js";
import { formatShortInZone } from "../../lib/time.js";
import type { EmbedField, OutgoingMessage } from "./messaging.js";
import { timeRemaining, type Notification } from "./temporal.js";

export const THEMES = ["classic", "party", "minimal"] as const;
export type Theme = (typeof THEMES)[number];

export function isTheme(value: string): value is Theme {
  return THEMES.some((t) => t === value);
}

function themeOf(value: string): Theme {
  return isTheme(value) ? value : "classic";
}

export const STATUS_COLOR = 0x5865f2;
const DIGEST_COLOR = 0x57f287;

// Discord rejects embeds with more than 25 fields
const MAX_STATUS_FIELDS = 25;
// Discord's limits on message content and embed descriptions
export const MAX_CONTENT_LENGTH = 2000;
const MAX_EMBED_DESCRIPTION_LENGTH = 4096;

/**
 * WHAT: Joins `head` and as many `items` as fit in `limit` characters, then a
 *       `more(hidden)` line for the rest.
 * WHY: A guild may hold up to 100 events. An oversized post is rejected
 *      outright, and the status message would then fail on every tick.
 *
 * Each accepted item was checked together with the summary line for the items
 * after it, so the final join is one already measured.
 */
function fitContent(
  head: readonly string[],
  items: readonly string[],
  separator: string,
  more: (hidden: number) => string,
  limit: number = MAX_CONTENT_LENGTH
): string {
  const kept: string[] = [];
  for (const [i, item] of items.entries()) {
    const remaining = items.length - i - 1;
    const tail = remaining > 0 ? [more(remaining)] : [];
    if ([...head, ...kept, item, ...tail].join(separator).length > limit) break;
    kept.push(item);
  }
  const hidden = items.length - kept.length;
  return [...head, ...kept, ...(hidden > 0 ? [more(hidden)] : [])].join(separator);
}

export interface PresentationContext {
  nowSec: number;
  timeZone: string;
  theme: string;
}

type PhraseSet = {
  today: (name: string) => string;
  tomorrow: (name: string) => string;
  daysAway: (name: string, days: number) => string;
  start: (name: string) => string;
  repeat: (name: string, remaining: string) => string;
};

const PHRASES: Record<Theme, PhraseSet> = {
  classic: {
    today: (name) => `📅 **${name}** is **today**!`,
    tomorrow: (name) => `✨ **${name}** is **tomorrow**! ✨`,
    daysAway: (name, days) => `💌 **${name}** is **${days} days** away!`,
    start: (name) => `🎉 **${name}** is starting now!`,
    repeat: (name, remaining) => `🔁 Reminder: **${name}** is ${remaining} away.`,
  },
  party: {
    today: (name) => `🥳 IT'S HAPPENING TODAY: **${name}**! 🎊`,
    tomorrow: (name) => `🎈 Just one more sleep until **${name}**! 🎈`,
    daysAway: (name, days) => `🎊 **${days} days** until **${name}**! Get hyped! 🎊`,
    start: (name) => `🎉🎉 **${name}** has officially started! Let's go! 🎉🎉`,
    repeat: (name, remaining) => `📣 Party check: **${name}** is ${remaining} away!`,
  },
  minimal: {
    today: (name) => `${name}: today.`,
    tomorrow: (name) => `${name}: tomorrow.`,
    daysAway: (name, days) => `${name}: ${days} days.`,
    start: (name) => `${name}: starting now.`,
    repeat: (name, remaining) => `${name}: ${remaining} left.`,
  },
};

/**
 * Channel announcement for one notification. Milestone and start posts lead
 * with the guild's mention role when one is configured.
 */
export function announcementFor(
  notification: Notification,
  event: Pick<EventRecord, "name" | "timestamp">,
  ctx: PresentationContext & { mentionRoleId?: string | null }
): OutgoingMessage {
  const body = phraseFor(notification, event, ctx);
  const mention = notification.kind !== "repeat" && ctx.mentionRoleId ? `<@&${ctx.mentionRoleId}> ` : "";
  return { content: `${mention}${body}` };
}

function phraseFor(
  notification: Notification,
  event: Pick<EventRecord, "name" | "timestamp">,
  ctx: PresentationContext
): string {
  const phrases = PHRASES[themeOf(ctx.theme)];
  switch (notification.kind) {
    case "start":
      return phrases.start(event.name);
    case "milestone":
      if (notification.daysLeft === 0) return phrases.today(event.name);
      if (notification.daysLeft === 1) return phrases.tomorrow(event.name);
      return phrases.daysAway(event.name, notification.daysLeft);
    case "repeat":
      return phrases.repeat(event.name, timeRemaining(ctx.nowSec, event.timestamp).description);
  }
}

/** Courtesy DM to the event owner mirroring a channel post */
export function ownerDirectMessage(
  notification: Notification,
  event: Pick<EventRecord, "name" | "timestamp">,
  guildName: string,
  ctx: PresentationContext
): OutgoingMessage {
  return { content: `${phraseFor(notification, event, ctx)}\n-# From your event in **${guildName}**.` };
}

function statusLine(event: EventRecord, ctx: PresentationContext): string {
  const remaining = timeRemaining(ctx.nowSec, event.timestamp);
  const owner = event.ownerUserId ? `\n👤 <@${event.ownerUserId}>` : "";
  const silenced = event.silenced ? " 🔕" : "";
  const when = `**<t:${event.timestamp}:F>**${silenced}${owner}`;
  return remaining.hasPassed
    ? `${when}\n➡️ Event has started or passed. 🎉`
    : `${when}\n⏱ **${remaining.description}** remaining`;
}

/**
 * The pinned status message. With `useEmbed` false (no Embed Links permission)
 * the same content is rendered as plain text.
 */
export function statusMessage(
  events: EventRecord[],
  ctx: PresentationContext & { useEmbed: boolean }
): OutgoingMessage {
  const title = "Upcoming Event Countdowns";

  if (!ctx.useEmbed) {
    if (events.length === 0) {
      return { content: `**${title}**\nNo events yet. Use \`/event add\` to add one.` };
    }
    const lines = events.map((ev) => `**${ev.name}**\n${statusLine(ev, ctx)}`);
    return { content: fitContent([`**${title}**`], lines, "\n\n", (n) => `+${n} more; see /event list`) };
  }

  const shown = events.slice(0, MAX_STATUS_FIELDS);
  const fields: EmbedField[] =
    shown.length === 0
      ? [{ name: "No events yet", value: "Use `/event add` to add one." }]
      : shown.map((ev) => ({ name: ev.name, value: statusLine(ev, ctx) }));

  let footer: string | undefined;
  if (events.length > shown.length) {
    footer = `+${events.length - shown.length} more; see /event list`;
  } else if (events.length > 0 && events.every((ev) => ev.timestamp <= ctx.nowSec)) {
    footer = "All listed events have already started or passed.";
  }

  const banner = shown.find((ev) => ev.bannerUrl && ev.timestamp > ctx.nowSec)?.bannerUrl ?? undefined;

  return {
    content: "",
    embed: {
      title,
      description: "Live countdowns for this server's events.",
      color: STATUS_COLOR,
      fields,
      footer,
      imageUrl: banner,
    },
  };
}

/** Once-a-day summary of the next week's events */
export function digestMessage(
  events: EventRecord[],
  ctx: PresentationContext & { useEmbed: boolean }
): OutgoingMessage {
  const lines =
    events.length === 0
      ? ["Nothing scheduled in the next 7 days."]
      : events.map((ev) => {
          const remaining = timeRemaining(ctx.nowSec, ev.timestamp).description;
          const flag = ev.silenced ? " (silenced)" : "";
          return `• **${ev.name}**${flag}: ${formatShortInZone(ev.timestamp, ctx.timeZone)} (${remaining})`;
        });

  const more = (n: number) => `…and ${n} more.`;
  if (!ctx.useEmbed) {
    return { content: fitContent(["**This week's events**"], lines, "\n", more) };
  }

  return {
    content: "",
    embed: {
      title: "This week's events",
      description: fitContent([], lines, "\n", more, MAX_EMBED_DESCRIPTION_LENGTH),
      color: DIGEST_COLOR,
      footer: `Times shown in ${ctx.timeZone}`,
    },
  };
}

/**
 * Indexed listing used by /event list. Indexes past the cut-off still work
 * with /event info and the other index-taking commands.
 */
export function eventListing(events: EventRecord[], ctx: PresentationContext): string {
  if (events.length === 0) {
    return "There are no events set for this server yet.\nAdd one with `/event add`.";
  }
  const lines = events.map((ev, i) => {
    const remaining = timeRemaining(ctx.nowSec, ev.timestamp).description;
    const flags = [ev.silenced ? "silenced" : null, ev.repeatEveryDays ? `every ${ev.repeatEveryDays}d` : null]
      .filter((f): f is string => f !== null)
      .join(", ");
    const suffix = flags ? ` [${flags}]` : "";
    return `**${i + 1}.** ${ev.name}: ${formatShortInZone(ev.timestamp, ctx.timeZone)} (${remaining})${suffix}`;
  });
  return fitContent([], lines, "\n", (n) => `+${n} more not shown; use \`/event info\` with a higher index.`);
}

export function eventDetails(event: EventRecord, ctx: PresentationContext): string {
  const remaining = timeRemaining(ctx.nowSec, event.timestamp);
  const milestones = event.milestones.length > 0 ? event.milestones.join(", ") : "none";
  const announced =
    event.announcedMilestones.length > 0 ? event.announcedMilestones.join(", ") : "none yet";
  const lines = [
    `**${event.name}**`,
    `When: <t:${event.timestamp}:F> (${formatShortInZone(event.timestamp, ctx.timeZone)} ${ctx.timeZone})`,
    `Time left: ${remaining.description}`,
    `Milestones: ${milestones}`,
    `Already announced: ${announced}`,
    `Repeat: ${event.repeatEveryDays ? `every ${event.repeatEveryDays} day(s) from ${event.repeatAnchorDate ?? "?"}` : "off"}`,
    `Silenced: ${event.silenced ? "yes" : "no"}`,
    `Owner: ${event.ownerUserId ? `<@${event.ownerUserId}>` : "none"}`,
  ];
  if (event.createdByUserId) lines.push(`Created by: <@${event.createdByUserId}>`);
  return lines.join("\n");
}
