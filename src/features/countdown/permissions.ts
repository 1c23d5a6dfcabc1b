/**
 * Countdown Bot — src/features/countdown/permissions.ts
 * WHAT: Who may manage events in a guild.
 * WHY: Kept free of discord.js types so the rules are testable as plain data;
 *      the command layer builds an Actor from the interaction's member.
 *
 * Rules:
 *  - managers: Administrator, Manage Server, a configured event-admin role, or a bot owner id
 *  - event edits: managers, or the event's owner
 *  - event creation: managers, or anyone when member creation is enabled
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { EventRecord, GuildConfig } from "../../store/schema.js";

export interface Actor {
  userId: string;
  isAdministrator: boolean;
  canManageGuild: boolean;
  roleIds: readonly string[];
}

type AccessConfig = Pick<GuildConfig, "eventAdminRoleIds" | "allowMemberEventCreation">;

export function isEventManager(actor: Actor, guild: AccessConfig | undefined, ownerIds: readonly string[]): boolean {
  if (ownerIds.includes(actor.userId)) return true;
  if (actor.isAdministrator || actor.canManageGuild) return true;
  const adminRoles = guild?.eventAdminRoleIds ?? [];
  return actor.roleIds.some((id) => adminRoles.includes(id));
}

export function canEditEvent(
  actor: Actor,
  guild: AccessConfig | undefined,
  event: Pick<EventRecord, "ownerUserId">,
  ownerIds: readonly string[]
): boolean {
  if (isEventManager(actor, guild, ownerIds)) return true;
  return !!event.ownerUserId && event.ownerUserId === actor.userId;
}

export function canCreateEvent(actor: Actor, guild: AccessConfig | undefined, ownerIds: readonly string[]): boolean {
  return (guild?.allowMemberEventCreation ?? false) || isEventManager(actor, guild, ownerIds);
}
