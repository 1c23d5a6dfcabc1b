/**
 * Countdown Bot — scripts/deploy-commands.ts
 * WHAT: CLI to register slash commands without starting the bot.
 * WHY: Guild registration is instant, which makes it the fast path while developing;
 *      the bot itself syncs global commands on every start.
 * USAGE:
 *  npm run deploy:cmds                 # global
 *  npm run deploy:cmds -- --guild 123  # one guild
 * DOCS:
 *  - Bulk overwrite guild commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Must stay first: populates process.env before anything reads it
import "dotenv/config";
import { z } from "zod";
import { syncCommandsToGuild, syncGlobalCommands } from "../src/commands/sync.js";
import { logger } from "../src/lib/logger.js";

const credsSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
});

function guildArg(argv: readonly string[]): string | undefined {
  const flag = argv.indexOf("--guild");
  if (flag === -1) return undefined;
  const value = argv[flag + 1];
  if (!value || value.startsWith("--")) {
    throw new Error("--guild needs a guild id");
  }
  return value;
}

async function main(): Promise<void> {
  const parsed = credsSchema.safeParse(process.env);
  if (!parsed.success) {
    logger.error({ issues: parsed.error.issues.map((i) => i.message) }, "[deploy] missing credentials");
    process.exitCode = 1;
    return;
  }
  const creds = { token: parsed.data.DISCORD_TOKEN, clientId: parsed.data.CLIENT_ID };
  const guildId = guildArg(process.argv.slice(2));

  const count = guildId ? await syncCommandsToGuild(creds, guildId) : await syncGlobalCommands(creds);
  logger.info({ count, scope: guildId ?? "global" }, "[deploy] commands registered");
}

main().catch((err: unknown) => {
  logger.error({ err }, "[deploy] command registration failed");
  process.exitCode = 1;
});
