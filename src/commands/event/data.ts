/**
 * Countdown Bot — src/commands/event/data.ts
 * WHAT: SlashCommandBuilder for /event
 * WHY: One command with subcommands for creating and managing countdown events;
 *      also installable in DMs for users who linked a server.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { InteractionContextType, SlashCommandBuilder } from "discord.js";
import { MAX_EVENT_NAME_LENGTH } from "../../features/countdown/eventOps.js";
import { MAX_REPEAT_EVERY_DAYS } from "../../store/schema.js";

const INDEX_DESCRIPTION = "Event number from /event list";

export const data = new SlashCommandBuilder()
  .setName("event")
  .setDescription("Create and manage countdown events")
  .setContexts(InteractionContextType.Guild, InteractionContextType.BotDM)

  .addSubcommand((sub) =>
    sub
      .setName("add")
      .setDescription("Add a new event")
      .addStringOption((opt) =>
        opt.setName("date").setDescription("Date as MM/DD/YYYY").setRequired(true).setMaxLength(10)
      )
      .addStringOption((opt) =>
        opt.setName("time").setDescription("24-hour time as HH:MM (server time zone)").setRequired(true).setMaxLength(5)
      )
      .addStringOption((opt) =>
        opt.setName("name").setDescription("Event name").setRequired(true).setMaxLength(MAX_EVENT_NAME_LENGTH)
      )
      .addUserOption((opt) =>
        opt.setName("owner").setDescription("Member who gets a DM at each reminder").setRequired(false)
      )
      .addStringOption((opt) =>
        opt.setName("milestones").setDescription("Days before to remind, e.g. 30, 7, 1, 0").setRequired(false)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("edit")
      .setDescription("Rename or reschedule an event")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
      .addStringOption((opt) => opt.setName("name").setDescription("New name").setMaxLength(MAX_EVENT_NAME_LENGTH))
      .addStringOption((opt) => opt.setName("date").setDescription("New date as MM/DD/YYYY").setMaxLength(10))
      .addStringOption((opt) => opt.setName("time").setDescription("New time as HH:MM").setMaxLength(5))
  )
  .addSubcommand((sub) =>
    sub
      .setName("remove")
      .setDescription("Remove an event")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
  )
  .addSubcommand((sub) => sub.setName("list").setDescription("List events, soonest first"))
  .addSubcommand((sub) =>
    sub
      .setName("info")
      .setDescription("Show everything about one event")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
  )
  .addSubcommand((sub) =>
    sub
      .setName("silence")
      .setDescription("Stop or resume reminders for an event")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
      .addBooleanOption((opt) => opt.setName("silenced").setDescription("Leave empty to toggle"))
  )
  .addSubcommand((sub) =>
    sub
      .setName("milestones")
      .setDescription("Set the reminder days for an event")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
      .addStringOption((opt) =>
        opt.setName("days").setDescription("Days before, e.g. 30, 14, 7, 1, 0").setRequired(true)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("clearmilestones")
      .setDescription("Turn off milestone reminders for an event")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
  )
  .addSubcommand((sub) =>
    sub
      .setName("repeat")
      .setDescription("Post a reminder every N days until the event")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
      .addIntegerOption((opt) =>
        opt
          .setName("every")
          .setDescription("Days between reminders")
          .setRequired(true)
          .setMinValue(1)
          .setMaxValue(MAX_REPEAT_EVERY_DAYS)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("clearrepeat")
      .setDescription("Stop repeating reminders for an event")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
  )
  .addSubcommand((sub) =>
    sub
      .setName("owner")
      .setDescription("Set who gets DMed at each reminder")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
      .addUserOption((opt) => opt.setName("user").setDescription("New owner").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("clearowner")
      .setDescription("Remove an event's owner")
      .addIntegerOption((opt) => opt.setName("index").setDescription(INDEX_DESCRIPTION).setRequired(true).setMinValue(1))
  );
