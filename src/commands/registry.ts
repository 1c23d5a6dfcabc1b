/**
 * Countdown Bot — src/commands/registry.ts
 * WHAT: The list of slash commands, their JSON payloads, and the interaction dispatch table.
 * WHY: Single source of truth for both registration (sync, deploy script) and routing.
 * FLOWS:
 *  - getAllSlashCommands() → JSON bodies for REST PUT
 *  - buildCommandTable(deps) → name → wrapped executor
 * DOCS:
 *  - Slash command deployment: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { wrapCommand } from "../lib/cmdWrap.js";
import * as countdown from "./countdown/index.js";
import * as event from "./event/index.js";
import * as health from "./health.js";
import * as help from "./help.js";
import * as linkserver from "./linkserver.js";
import type { CommandDeps, SlashCommand } from "./types.js";

export const COMMANDS: readonly SlashCommand[] = [event, countdown, linkserver, help, health];

export function getAllSlashCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return COMMANDS.map((cmd) => cmd.data.toJSON());
}

export type CommandExecutor = (interaction: ChatInputCommandInteraction) => Promise<void>;

export function buildCommandTable(deps: CommandDeps): Map<string, CommandExecutor> {
  const table = new Map<string, CommandExecutor>();
  for (const cmd of COMMANDS) {
    table.set(cmd.data.name, wrapCommand(cmd.data.name, (ctx) => cmd.execute(ctx, deps)));
  }
  return table;
}
