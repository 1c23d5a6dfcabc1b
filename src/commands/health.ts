/**
 * Countdown Bot — src/commands/health.ts
 * WHAT: /health check showing uptime, gateway ping, countdown tick health, and store stats.
 * WHY: Quick "is it up and ticking?" answer without shell access to the host.
 * FLOWS:
 *  - Compute uptime/ws.ping → read scheduler health + store → reply with an embed
 * DOCS:
 *  - CommandInteraction: https://discord.js.org/#/docs/discord.js/main/class/CommandInteraction
 *  - Interaction replies: https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, MessageFlags, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { HEALTH_CHECK_TIMEOUT_MS } from "../lib/constants.js";
import { logger } from "../lib/logger.js";
import { getSchedulerHealth, type SchedulerHealth } from "../lib/schedulerHealth.js";
import type { CommandDeps } from "./types.js";

/*
 * client.ws.ping is heartbeat ACK latency to the gateway, not REST latency.
 * Anyone can run /health; it exposes nothing sensitive.
 */

export const data = new SlashCommandBuilder()
  .setName("health")
  .setDescription("Bot health (uptime, latency, countdown ticks).");

const HEALTH_TIMEOUT_MESSAGE = "Health check timeout";

/** Always shows at least "0s" */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(" ");
}

/** "2m ago" style; "never" for null */
export function formatRelativeTime(timestamp: number | null, now = Date.now()): string {
  if (timestamp === null) return "never";

  const diffSec = Math.floor((now - timestamp) / 1000);
  if (diffSec < 60) return `${diffSec}s ago`;
  if (diffSec < 3600) return `${Math.floor(diffSec / 60)}m ago`;
  if (diffSec < 86400) return `${Math.floor(diffSec / 3600)}h ago`;
  return `${Math.floor(diffSec / 86400)}d ago`;
}

export function formatSchedulerStatus(health: SchedulerHealth, now = Date.now()): string {
  const status = health.consecutiveFailures === 0 ? "OK" : `WARN (${health.consecutiveFailures} failures)`;
  const line = `${status} - Last: ${formatRelativeTime(health.lastRunAt, now)}`;
  const counters = Object.entries(health.lastCounters);
  if (counters.length === 0) return line;
  return `${line}\n${counters.map(([k, v]) => `${k}=${v}`).join(" ")}`;
}

export async function execute(ctx: CommandContext, deps: CommandDeps): Promise<void> {
  const { interaction } = ctx;
  let timer: NodeJS.Timeout | undefined;

  const healthCheck = (async () => {
    const metrics = await withStep(ctx, "collect_metrics", () => ({
      uptimeSec: Math.floor(process.uptime()),
      ping: Math.round(interaction.client.ws.ping),
      guilds: deps.service.store.listGuildIds().length,
      events: deps.service.store
        .listGuildIds()
        .reduce((sum, id) => sum + (deps.service.guild(id)?.events.length ?? 0), 0),
    }));
    const schedulers = getSchedulerHealth();

    await withStep(ctx, "reply", async () => {
      const embed = new EmbedBuilder()
        .setTitle("Health Check")
        .setColor(0x57f287)
        .addFields(
          { name: "Status", value: "Healthy", inline: true },
          { name: "Uptime", value: formatUptime(metrics.uptimeSec), inline: true },
          { name: "WS Ping", value: `${metrics.ping}ms`, inline: true },
          { name: "Guilds", value: String(metrics.guilds), inline: true },
          { name: "Events", value: String(metrics.events), inline: true },
          { name: "Store", value: `\`${deps.service.store.filePath}\``, inline: false }
        );

      if (schedulers.size > 0) {
        embed.addFields({
          name: "Schedulers",
          value: [...schedulers.entries()]
            .map(([name, health]) => `**${name}**: ${formatSchedulerStatus(health)}`)
            .join("\n"),
          inline: false,
        });
      }

      embed.setTimestamp();
      await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral });
    });
  })();

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(HEALTH_TIMEOUT_MESSAGE)), HEALTH_CHECK_TIMEOUT_MS);
  });

  try {
    await Promise.race([healthCheck, timeout]);
  } catch (error) {
    if (error instanceof Error && error.message === HEALTH_TIMEOUT_MESSAGE) {
      void healthCheck.catch((err: unknown) => logger.warn({ err }, "[health] late health check failed"));
      await replyOrEdit(interaction, {
        content: `⚠️ Health check timed out after ${HEALTH_CHECK_TIMEOUT_MS / 1000} seconds.`,
      });
      return;
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
