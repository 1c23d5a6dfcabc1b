// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Onboarding: the setup guide sent once when the bot joins a guild.
// The owner gets it by DM; when that fails it goes to the system channel or the
// first channel the bot can post in. The guild is marked welcomed after the first
// attempt either way, so a restart never re-sends it.
import { logger } from "../lib/logger.js";
import { setWelcomed } from "./countdown/eventOps.js";
import type { MessagingPort } from "./countdown/messaging.js";
import type { StateStore } from "../store/stateStore.js";

export type OnboardingOutcome = "already_welcomed" | "dm" | "channel" | "undelivered";

const COMMAND_STEPS = [
  "1️⃣ **Choose your events channel**",
  "   • Run `/countdown channel` and pick the channel for the pinned countdown.",
  "",
  "2️⃣ **Add your first event**",
  "   • Example: `/event add date: 04/12/2026 time: 09:00 name: Game Night`",
  "   • Dates are `MM/DD/YYYY`, times are 24-hour `HH:MM` in the server's time zone (`/countdown timezone`).",
  "",
  "3️⃣ **Manage your events**",
  "   • `/event list` shows every event with its number",
  "   • `/event edit`, `/event remove`, `/event milestones` and `/event repeat` take that number",
  "   • Event owners can edit their own events",
  "   • `/countdown adminrole` lets a role manage every event",
  "   • `/countdown allowmembers` lets members create their own events",
  "   • `/countdown refresh` rebuilds the pinned countdown",
  "",
  "🔁 **Optional: DM control**",
  "   • Run `/linkserver` in the server, then DM me `/event add`.",
];

/** Guide sent to a newly joined guild; `ownerId` is mentioned when known */
export function setupGuide(guildName: string, ownerId?: string): string {
  const greeting = ownerId ? `Hi <@${ownerId}>! ` : "Hi! ";
  return [
    `${greeting}Thanks for adding me to **${guildName}** 🕒`,
    "",
    "I keep a live countdown pinned for your upcoming events and post reminders as they get close: " +
      "by default at **100, 60 and 30 days, 2 weeks, 1 week, 2 days, the day before, and the day of**.",
    "",
    "**Quick setup:**",
    "",
    ...COMMAND_STEPS,
    "",
    "Once an events channel and at least one event are set, everything else runs on its own. ✨",
  ].join("\n");
}

/** Text for /help */
export function helpText(): string {
  return [
    "**Countdown: Setup & Commands**",
    "",
    "Command replies are only visible to you.",
    "",
    ...COMMAND_STEPS,
    "",
    "4️⃣ **Onboarding**",
    "   • `/countdown resendsetup` sends the setup guide to the server owner again.",
  ].join("\n");
}

export interface OnboardingOptions {
  store: StateStore;
  messaging: MessagingPort;
}

export class Onboarding {
  constructor(private readonly opts: OnboardingOptions) {}

  /**
   * Sends the guide unless the guild was already welcomed. `force` is
   * /countdown resendsetup.
   */
  async welcome(guildId: string, force = false): Promise<OnboardingOutcome> {
    const { store, messaging } = this.opts;
    if (!force && store.getGuild(guildId)?.welcomed) {
      return "already_welcomed";
    }

    const guildName = messaging.guildName(guildId) ?? "your server";
    const owner = await messaging.getGuildOwnerId(guildId);
    const message = { content: setupGuide(guildName, owner.ok ? owner.value : undefined) };

    let outcome: OnboardingOutcome = "undelivered";
    if (owner.ok) {
      const dm = await messaging.sendDirectMessage(owner.value, message);
      if (dm.ok) outcome = "dm";
      else logger.info({ guildId, reason: dm.reason }, "[welcome] owner DM failed; trying a guild channel");
    }

    if (outcome === "undelivered") {
      const channel = await messaging.findPostableChannel(guildId);
      if (channel.ok) {
        const sent = await messaging.sendMessage(channel.value, message, {
          roleIds: [],
          userIds: owner.ok ? [owner.value] : [],
        });
        if (sent.ok) outcome = "channel";
        else logger.warn({ guildId, reason: sent.reason }, "[welcome] fallback channel post failed");
      } else {
        logger.warn({ guildId, reason: channel.reason }, "[welcome] no channel to post the setup guide in");
      }
    }

    await store.mutate((draft) => setWelcomed(draft, guildId, true));
    logger.info({ evt: "onboarding", guildId, outcome, force }, "[welcome] setup guide handled");
    return outcome;
  }
}
