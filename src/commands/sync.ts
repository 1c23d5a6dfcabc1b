/**
 * Countdown Bot — src/commands/sync.ts
 * WHAT: Slash-command registration through bulk overwrite.
 * WHY: /event must also work in DMs, which only global commands reach. Guild sync
 *      is for development, where global updates are too slow to iterate on.
 * FLOWS:
 *  - syncGlobalCommands: serialize → PUT applicationCommands → log
 *  - syncCommandsToGuild: serialize → PUT applicationGuildCommands → log
 * DOCS:
 *  - Bulk overwrite: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { logger } from "../lib/logger.js";
import { getAllSlashCommands } from "./registry.js";

export interface SyncCredentials {
  token: string;
  clientId: string;
}

function restFor(creds: SyncCredentials): REST {
  return new REST({ version: "10" }).setToken(creds.token);
}

/**
 * PUT replaces the whole set in one call: additions, updates, and removals.
 * Global changes can take a while to reach every client.
 */
export async function syncGlobalCommands(creds: SyncCredentials): Promise<number> {
  const body = getAllSlashCommands();
  await restFor(creds).put(Routes.applicationCommands(creds.clientId), { body });
  logger.info({ count: body.length }, "[cmdsync] synced global commands");
  return body.length;
}

/** Guild commands update instantly */
export async function syncCommandsToGuild(creds: SyncCredentials, guildId: string): Promise<number> {
  const body = getAllSlashCommands();
  await restFor(creds).put(Routes.applicationGuildCommands(creds.clientId, guildId), { body });
  logger.info({ guildId, count: body.length }, "[cmdsync] synced commands to guild");
  return body.length;
}
