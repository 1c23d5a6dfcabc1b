/**
 * Countdown Bot — src/commands/countdown/index.ts
 * WHAT: /countdown subcommands for per-server settings.
 * WHY: Settings changes are guild-wide, so all of them need an event manager;
 *      the ones that decide who is a manager need Manage Server.
 * FLOWS:
 *  - /countdown <setting> → access check → CountdownService.update → ephemeral reply
 *  - /countdown refresh → PinnedStatusReconciler via the service → report outcome
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, type ChatInputCommandInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../../lib/cmdWrap.js";
import { InputError } from "../../lib/errors.js";
import {
  addAdminRole,
  parseMilestoneList,
  purgeEvents,
  removeAdminRole,
  setAllowMemberCreation,
  setDefaultMilestones,
  setDigest,
  setEventChannel,
  setMentionRole,
  setTheme,
  setTimezone,
} from "../../features/countdown/eventOps.js";
import type { Actor } from "../../features/countdown/permissions.js";
import type { RefreshOutcome } from "../../features/countdown/pinnedStatus.js";
import type { OnboardingOutcome } from "../../features/welcome.js";
import { remediationLabel } from "../../features/countdown/capabilities.js";
import { requireGuild, requireManager, requireServerManager, resolveActor } from "../access.js";
import type { CommandDeps } from "../types.js";
import { data } from "./data.js";

export { data };

const STATUS_CHANNEL_TYPES = [ChannelType.GuildText, ChannelType.GuildAnnouncement] as const;
const PURGE_CONFIRMATION = "DELETE";

interface SettingsScope {
  interaction: ChatInputCommandInteraction;
  deps: CommandDeps;
  guildId: string;
  actor: Actor;
}

/** The chosen channel, else the one the command ran in when it can hold the countdown */
function chosenChannelId(interaction: ChatInputCommandInteraction, optionName: string): string | null {
  return interaction.options.getChannel(optionName, false, [...STATUS_CHANNEL_TYPES])?.id ?? null;
}

export function describeRefresh(outcome: RefreshOutcome): string {
  switch (outcome.status) {
    case "created":
    case "adopted":
    case "updated":
      return "⏱ Countdown updated.";
    case "skipped":
      return "There's no events channel yet. Set one with `/countdown channel`.";
    case "gave_up": {
      const missing = outcome.report?.missing ?? [];
      if (missing.length === 0) {
        return "I couldn't update the countdown right now. I'll keep trying every minute.";
      }
      return `I couldn't update the countdown. I'm missing: ${missing.map(remediationLabel).join(", ")}.`;
    }
  }
}

function describeOnboarding(outcome: OnboardingOutcome): string {
  switch (outcome) {
    case "dm":
      return "📨 Setup guide sent to the server owner by DM.";
    case "channel":
      return "📨 The owner's DMs are closed, so I posted the setup guide in a server channel.";
    case "already_welcomed":
    case "undelivered":
      return "I couldn't deliver the setup guide: the owner's DMs are closed and I can't post in any channel.";
  }
}

async function handleChannel(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  let channelId = chosenChannelId(interaction, "channel");
  if (!channelId) {
    const here = interaction.channel;
    if (!here || (here.type !== ChannelType.GuildText && here.type !== ChannelType.GuildAnnouncement)) {
      throw new InputError("channel", "Run this in a text channel, or pick one with the `channel` option.");
    }
    channelId = here.id;
  }
  const target = channelId;
  await deps.service.update(guildId, (draft) => setEventChannel(draft, guildId, target));
  await replyOrEdit(interaction, {
    content: `📍 Countdown and reminders will go to <#${target}>. I'll pin the countdown there.`,
  });
}

async function handleMentionRole(scope: SettingsScope, clear: boolean): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const roleId = clear ? null : interaction.options.getRole("role", true).id;
  await deps.service.update(guildId, (draft) => setMentionRole(draft, guildId, roleId));
  await replyOrEdit(interaction, {
    content: roleId ? `📣 Milestone reminders will mention <@&${roleId}>.` : "📣 Reminders won't mention a role.",
  });
}

async function handleTimezone(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const zone = interaction.options.getString("zone", true);
  await deps.service.update(guildId, (draft) => setTimezone(draft, guildId, zone));
  await replyOrEdit(interaction, {
    content: `🕒 Time zone set to **${deps.service.timeZoneFor(guildId)}**. Existing events keep their moment in time.`,
  });
}

async function handleMilestones(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const milestones = parseMilestoneList(interaction.options.getString("days", true));
  const saved = await deps.service.update(guildId, (draft) => setDefaultMilestones(draft, guildId, milestones));
  await replyOrEdit(interaction, {
    content: `📌 New events will remind at: ${saved.join(", ")} days before. Existing events are unchanged.`,
  });
}

async function handleTheme(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const theme = interaction.options.getString("theme", true);
  await deps.service.update(guildId, (draft) => setTheme(draft, guildId, theme));
  await replyOrEdit(interaction, { content: `🎨 Reminder theme set to **${theme}**.` });
}

async function handleDigest(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const enabled = interaction.options.getBoolean("enabled", true);
  const channelId = chosenChannelId(interaction, "channel");
  await deps.service.update(guildId, (draft) =>
    setDigest(draft, guildId, { enabled, channelId: channelId ?? undefined })
  );
  const target = deps.service.guild(guildId)?.digest.channelId;
  await replyOrEdit(interaction, {
    content: enabled
      ? `🗓 Daily digest on. It posts after 9:00 in ${target ? `<#${target}>` : "the events channel"}.`
      : "🗓 Daily digest off.",
  });
}

async function handleAdminRole(scope: SettingsScope, remove: boolean): Promise<void> {
  const { interaction, deps, guildId, actor } = scope;
  requireServerManager(actor, deps.ownerIds);
  const roleId = interaction.options.getRole("role", true).id;
  await deps.service.update(guildId, (draft) =>
    remove ? removeAdminRole(draft, guildId, roleId) : addAdminRole(draft, guildId, roleId)
  );
  await replyOrEdit(interaction, {
    content: remove
      ? `🔒 <@&${roleId}> can no longer manage every event.`
      : `🔓 <@&${roleId}> can now manage every event.`,
  });
}

async function handleAdminRoles(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const guild = deps.service.guild(guildId);
  const roles = guild?.eventAdminRoleIds ?? [];
  const lines = [
    "**Who can manage events**",
    "• Members with Administrator or Manage Server",
    roles.length > 0 ? `• Event admin roles: ${roles.map((id) => `<@&${id}>`).join(", ")}` : "• No event admin roles",
    guild?.allowMemberEventCreation
      ? "• Any member can create events and edit their own"
      : "• Members can't create events",
  ];
  await replyOrEdit(interaction, { content: lines.join("\n") });
}

async function handleAllowMembers(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId, actor } = scope;
  requireServerManager(actor, deps.ownerIds);
  const enabled = interaction.options.getBoolean("enabled", true);
  await deps.service.update(guildId, (draft) => setAllowMemberCreation(draft, guildId, enabled));
  await replyOrEdit(interaction, {
    content: enabled
      ? "👥 Members can now create events and edit the ones they own."
      : "👥 Only event managers can create events now.",
  });
}

async function handleRefresh(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId } = scope;
  const outcome = await deps.service.refresh(guildId);
  await replyOrEdit(interaction, { content: describeRefresh(outcome) });
}

async function handlePurge(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId, actor } = scope;
  requireServerManager(actor, deps.ownerIds);
  if (interaction.options.getString("confirm", true) !== PURGE_CONFIRMATION) {
    throw new InputError("confirm", `Nothing deleted. Type \`${PURGE_CONFIRMATION}\` to confirm.`);
  }
  const count = await deps.service.update(guildId, (draft) => purgeEvents(draft, guildId));
  await replyOrEdit(interaction, { content: `🧹 Deleted ${count} event(s).` });
}

async function handleResendSetup(scope: SettingsScope): Promise<void> {
  const { interaction, deps, guildId, actor } = scope;
  requireServerManager(actor, deps.ownerIds);
  const outcome = await deps.onboarding.welcome(guildId, true);
  await replyOrEdit(interaction, { content: describeOnboarding(outcome) });
}

export async function execute(ctx: CommandContext, deps: CommandDeps): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuild(interaction);
  const subcommand = interaction.options.getSubcommand(true);

  await ensureDeferred(interaction);
  const actor = await withStep(ctx, "resolve_actor", () => resolveActor(interaction, guildId));
  requireManager(actor, deps.service, guildId, deps.ownerIds);
  const scope: SettingsScope = { interaction, deps, guildId, actor };

  ctx.step(subcommand);
  switch (subcommand) {
    case "channel":
      return handleChannel(scope);
    case "mentionrole":
      return handleMentionRole(scope, false);
    case "clearmentionrole":
      return handleMentionRole(scope, true);
    case "timezone":
      return handleTimezone(scope);
    case "milestones":
      return handleMilestones(scope);
    case "theme":
      return handleTheme(scope);
    case "digest":
      return handleDigest(scope);
    case "adminrole":
      return handleAdminRole(scope, false);
    case "removeadminrole":
      return handleAdminRole(scope, true);
    case "adminroles":
      return handleAdminRoles(scope);
    case "allowmembers":
      return handleAllowMembers(scope);
    case "refresh":
      return handleRefresh(scope);
    case "purge":
      return handlePurge(scope);
    case "resendsetup":
      return handleResendSetup(scope);
    default:
      await replyOrEdit(interaction, { content: "Unknown subcommand." });
  }
}
