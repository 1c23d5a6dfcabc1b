/**
 * Countdown Bot — src/commands/access.ts
 * WHAT: Works out which guild a command targets and who is running it.
 * WHY: /event also runs in DMs against the guild a user linked with /linkserver,
 *      where the interaction carries no member; permissions then come from the
 *      linked guild's member record.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { PermissionFlagsBits, type ChatInputCommandInteraction, type PermissionsBitField } from "discord.js";
import { InputError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { isEventManager, type Actor } from "../features/countdown/permissions.js";
import type { CountdownService } from "../features/countdown/service.js";

function roleIdsOf(member: ChatInputCommandInteraction["member"]): string[] {
  if (!member) return [];
  if (Array.isArray(member.roles)) return member.roles;
  return [...member.roles.cache.keys()];
}

function actorFromPermissions(userId: string, perms: Readonly<PermissionsBitField>, roleIds: string[]): Actor {
  return {
    userId,
    isAdministrator: perms.has(PermissionFlagsBits.Administrator),
    canManageGuild: perms.has(PermissionFlagsBits.ManageGuild),
    roleIds,
  };
}

/** The interaction's guild, else the guild the user linked for DM control */
export function targetGuildId(interaction: ChatInputCommandInteraction, service: CountdownService): string {
  if (interaction.guildId) return interaction.guildId;
  const linked = service.store.getLinkedGuild(interaction.user.id);
  if (!linked) {
    throw new InputError(
      "guild",
      "I don't know which server you mean. Run `/linkserver` in your server first, then try again here."
    );
  }
  return linked;
}

export function requireGuild(interaction: ChatInputCommandInteraction): string {
  if (!interaction.guildId) {
    throw new InputError("guild", "This command can only be used in a server.");
  }
  return interaction.guildId;
}

export async function resolveActor(interaction: ChatInputCommandInteraction, guildId: string): Promise<Actor> {
  const userId = interaction.user.id;
  if (interaction.guildId === guildId && interaction.memberPermissions) {
    return actorFromPermissions(userId, interaction.memberPermissions, roleIdsOf(interaction.member));
  }

  const guild = interaction.client.guilds.cache.get(guildId);
  const member = guild
    ? await guild.members.fetch(userId).catch((err: unknown) => {
        logger.debug({ err, guildId, userId }, "[access] linked guild member lookup failed");
        return null;
      })
    : null;
  if (!member) {
    throw new InputError("guild", "You're no longer a member of the linked server. Run `/linkserver` again.");
  }
  return actorFromPermissions(userId, member.permissions, [...member.roles.cache.keys()]);
}

export function requireManager(actor: Actor, service: CountdownService, guildId: string, ownerIds: readonly string[]): void {
  if (!isEventManager(actor, service.guild(guildId), ownerIds)) {
    throw new InputError(
      "permission",
      "You need Manage Server, Administrator, or an event admin role to do that."
    );
  }
}

/** Settings that change who counts as a manager stay with Manage Server holders */
export function requireServerManager(actor: Actor, ownerIds: readonly string[]): void {
  if (!(actor.isAdministrator || actor.canManageGuild || ownerIds.includes(actor.userId))) {
    throw new InputError("permission", "You need Manage Server to do that.");
  }
}
