/**
 * Countdown Bot — src/commands/help.ts
 * WHAT: /help shows setup steps and the command list.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { InteractionContextType, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { helpText } from "../features/welcome.js";

export const data = new SlashCommandBuilder()
  .setName("help")
  .setDescription("Setup guide and command help")
  .setContexts(InteractionContextType.Guild, InteractionContextType.BotDM);

export async function execute(ctx: CommandContext): Promise<void> {
  await replyOrEdit(ctx.interaction, { content: helpText() });
}
