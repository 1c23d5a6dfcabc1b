/**
 * Countdown Bot — src/commands/linkserver.ts
 * WHAT: /linkserver remembers this server as the caller's target for /event in DMs.
 * WHY: DM interactions carry no guild; the link is how we know which server to change.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { InteractionContextType, SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { linkUser } from "../features/countdown/eventOps.js";
import { requireGuild, requireManager, resolveActor } from "./access.js";
import type { CommandDeps } from "./types.js";

export const data = new SlashCommandBuilder()
  .setName("linkserver")
  .setDescription("Manage this server's events from your DMs with me")
  .setContexts(InteractionContextType.Guild);

export async function execute(ctx: CommandContext, deps: CommandDeps): Promise<void> {
  const { interaction } = ctx;
  const guildId = requireGuild(interaction);
  await ensureDeferred(interaction);

  const actor = await withStep(ctx, "resolve_actor", () => resolveActor(interaction, guildId));
  requireManager(actor, deps.service, guildId, deps.ownerIds);

  await withStep(ctx, "persist", () =>
    deps.service.store.mutate((draft) => linkUser(draft, interaction.user.id, guildId))
  );
  await replyOrEdit(interaction, {
    content:
      `🔗 Linked to **${interaction.guild?.name ?? "this server"}**. ` +
      "You can now DM me `/event` commands and they'll apply here.",
  });
}
