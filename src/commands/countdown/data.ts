/**
 * Countdown Bot — src/commands/countdown/data.ts
 * WHAT: SlashCommandBuilder for /countdown (server-level settings)
 * WHY: Channel, mention role, time zone, theme, digest, and access settings in one place.
 *      Hidden from members without Manage Server by default; the handler re-checks
 *      so event admin roles work as well.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, InteractionContextType, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { THEMES } from "../../features/countdown/presentation.js";

const STATUS_CHANNEL_TYPES = [ChannelType.GuildText, ChannelType.GuildAnnouncement] as const;

export const data = new SlashCommandBuilder()
  .setName("countdown")
  .setDescription("Server countdown settings")
  .setContexts(InteractionContextType.Guild)
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)

  .addSubcommand((sub) =>
    sub
      .setName("channel")
      .setDescription("Set the channel for the pinned countdown and reminders")
      .addChannelOption((opt) =>
        opt
          .setName("channel")
          .setDescription("Defaults to this channel")
          .addChannelTypes(...STATUS_CHANNEL_TYPES)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("mentionrole")
      .setDescription("Ping a role with milestone reminders")
      .addRoleOption((opt) => opt.setName("role").setDescription("Role to mention").setRequired(true))
  )
  .addSubcommand((sub) => sub.setName("clearmentionrole").setDescription("Stop pinging a role with reminders"))
  .addSubcommand((sub) =>
    sub
      .setName("timezone")
      .setDescription("Time zone for entering and showing event times")
      .addStringOption((opt) =>
        opt.setName("zone").setDescription("IANA name, e.g. America/Chicago or Europe/London").setRequired(true)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("milestones")
      .setDescription("Default reminder days for new events")
      .addStringOption((opt) =>
        opt.setName("days").setDescription("Days before, e.g. 100, 30, 7, 1, 0").setRequired(true)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("theme")
      .setDescription("Wording style for reminders")
      .addStringOption((opt) =>
        opt
          .setName("theme")
          .setDescription("Reminder style")
          .setRequired(true)
          .addChoices(...THEMES.map((t) => ({ name: t, value: t })))
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("digest")
      .setDescription("Daily morning summary of the next 7 days of events")
      .addBooleanOption((opt) => opt.setName("enabled").setDescription("Turn the digest on or off").setRequired(true))
      .addChannelOption((opt) =>
        opt
          .setName("channel")
          .setDescription("Where to post it; defaults to the events channel")
          .addChannelTypes(...STATUS_CHANNEL_TYPES)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("adminrole")
      .setDescription("Let a role manage every event")
      .addRoleOption((opt) => opt.setName("role").setDescription("Role to allow").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("removeadminrole")
      .setDescription("Stop a role from managing every event")
      .addRoleOption((opt) => opt.setName("role").setDescription("Role to remove").setRequired(true))
  )
  .addSubcommand((sub) => sub.setName("adminroles").setDescription("Show who can manage events"))
  .addSubcommand((sub) =>
    sub
      .setName("allowmembers")
      .setDescription("Let any member create events")
      .addBooleanOption((opt) => opt.setName("enabled").setDescription("Allow member-created events").setRequired(true))
  )
  .addSubcommand((sub) => sub.setName("refresh").setDescription("Rebuild the pinned countdown now"))
  .addSubcommand((sub) =>
    sub
      .setName("purge")
      .setDescription("Delete every event in this server")
      .addStringOption((opt) => opt.setName("confirm").setDescription('Type "DELETE" to confirm').setRequired(true))
  )
  .addSubcommand((sub) => sub.setName("resendsetup").setDescription("Send the setup guide to the server owner again"));
