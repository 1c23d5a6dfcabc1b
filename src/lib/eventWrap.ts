/**
 * Countdown Bot — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers (ready, guildCreate, interactionCreate).
 * WHY: A rejected handler would surface as an unhandled rejection; wrapped handlers log,
 *      report, and return instead.
 * USAGE:
 *  client.on(Events.GuildCreate, wrapEvent("guildCreate", async (guild) => { ... }, 20_000));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import { logger } from "./logger.js";
import { runWithCtx } from "./reqctx.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

export const DEFAULT_EVENT_TIMEOUT_MS = 10_000;

export class EventTimeoutError extends Error {
  constructor(eventName: string, ms: number) {
    super(`${eventName} handler timed out after ${ms}ms`);
    this.name = "EventTimeoutError";
  }
}

export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return (...args: T) =>
    runWithCtx({ kind: "event", cmd: eventName }, async () => {
      let timer: NodeJS.Timeout | undefined;
      try {
        await Promise.race([
          handler(...args),
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new EventTimeoutError(eventName, timeoutMs)), timeoutMs);
          }),
        ]);
      } catch (err) {
        const classified = classifyError(err);
        const contextIds = extractEventContext(args);

        // Error-level logs reach Sentry through the logger hook; noise stays at warn
        const level = shouldReportToSentry(classified) ? "error" : "warn";
        logger[level](
          {
            evt: "event_error",
            event: eventName,
            ...errorContext(classified, contextIds),
            err: err instanceof Error ? err : new Error(String(err)),
          },
          `[${eventName}] event handler failed: ${classified.message}`
        );
      } finally {
        clearTimeout(timer);
      }
    });
}

/** guild/user/channel ids from whatever discord.js structure the event carries */
export function extractEventContext(args: readonly unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    if ("guildId" in arg && typeof arg.guildId === "string") {
      context.guildId = arg.guildId;
    }
    if ("guild" in arg && arg.guild && typeof arg.guild === "object" && "id" in arg.guild) {
      if (typeof arg.guild.id === "string") context.guildId = arg.guild.id;
    }
    if ("id" in arg && typeof arg.id === "string" && !context.entityId) {
      context.entityId = arg.id;
    }
    if ("user" in arg && arg.user && typeof arg.user === "object" && "id" in arg.user) {
      if (typeof arg.user.id === "string") context.userId = arg.user.id;
    }
    if ("channelId" in arg && typeof arg.channelId === "string") {
      context.channelId = arg.channelId;
    }
  }

  return context;
}
