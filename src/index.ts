/**
 * Countdown Bot — src/index.ts
 * WHAT: Process entrypoint: builds the countdown services, logs in, routes slash commands,
 *       and runs the reconciliation scheduler.
 * WHY: One place that owns startup order and graceful shutdown.
 * FLOWS:
 *  - env → Sentry → StateStore.load → services → client.login
 *  - ClientReady → sync global commands → start scheduler
 *  - GuildCreate → onboarding
 *  - InteractionCreate → command table (wrapCommand)
 *  - SIGTERM/SIGINT → stop scheduler (awaits in-flight tick) → destroy client → flush Sentry
 * DOCS:
 *  - Client events: https://discord.js.org/#/docs/discord.js/main/class/Client
 *  - Process signals: https://nodejs.org/api/process.html#signal-events
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Client, Events, GatewayIntentBits, type Guild, type Interaction } from "discord.js";
import { env, OWNER_IDS } from "./lib/env.js";
import { logger, redact } from "./lib/logger.js";
import { addBreadcrumb, flushSentry, initializeSentry, setTag } from "./lib/sentry.js";
import { SHUTDOWN_TIMEOUT_MS, UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { InMemoryNotifyLimiter } from "./lib/notifyLimiter.js";
import { StateStore } from "./store/stateStore.js";
import { DiscordMessaging } from "./features/countdown/discordMessaging.js";
import { OwnerAlerter } from "./features/countdown/ownerAlerts.js";
import { PinnedStatusReconciler } from "./features/countdown/pinnedStatus.js";
import { DigestPublisher } from "./features/countdown/digest.js";
import { Reconciler } from "./features/countdown/reconcile.js";
import { CountdownService } from "./features/countdown/service.js";
import { makeWindows } from "./features/countdown/temporal.js";
import { Onboarding } from "./features/welcome.js";
import { CountdownScheduler } from "./scheduler/countdownScheduler.js";
import { buildCommandTable } from "./commands/registry.js";
import { syncGlobalCommands } from "./commands/sync.js";

// ===== Global Error Handlers =====
// Both log at error level with an Error attached; the logger hook reports them to Sentry.

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  // Leave Sentry a moment to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

initializeSentry({
  dsn: env.SENTRY_DSN,
  environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
  release: process.env.npm_package_version ?? "dev",
  tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
});

// ===== Services =====

const store = new StateStore(env.DATA_PATH);
const loaded = store.load();
logger.info({ ...loaded, path: env.DATA_PATH }, "[startup] state loaded");

// Guilds is the only intent needed: slash commands arrive as interactions regardless
const client = new Client({ intents: [GatewayIntentBits.Guilds] });

const messaging = new DiscordMessaging(client, env.PLATFORM_TIMEOUT_MS);
const limiter = new InMemoryNotifyLimiter();
const alerter = new OwnerAlerter(messaging, limiter);
const pinned = new PinnedStatusReconciler({ store, messaging, alerter, defaultTimeZone: env.DEFAULT_TZ });
const digest = new DigestPublisher({ store, messaging, alerter, defaultTimeZone: env.DEFAULT_TZ });
const reconciler = new Reconciler({
  store,
  messaging,
  pinned,
  alerter,
  digest,
  windows: makeWindows(env.GRACE_WINDOW_MINUTES, env.KEEP_WINDOW_MINUTES),
  defaultTimeZone: env.DEFAULT_TZ,
});
const service = new CountdownService({ store, pinned, defaultTimeZone: env.DEFAULT_TZ });
const onboarding = new Onboarding({ store, messaging });
const scheduler = new CountdownScheduler(reconciler, { intervalMs: env.POLL_INTERVAL_SECONDS * 1000 });
const commands = buildCommandTable({ service, onboarding, ownerIds: OWNER_IDS });

// ===== Events =====

client.once(
  Events.ClientReady,
  wrapEvent(
    "ready",
    async (ready: Client<true>) => {
      logger.info({ tag: ready.user.tag, id: ready.user.id, guilds: ready.guilds.cache.size }, "Bot ready");
      setTag("bot_id", ready.user.id);
      addBreadcrumb({ message: "Bot connected to Discord", category: "bot", level: "info" });

      try {
        await syncGlobalCommands({ token: env.DISCORD_TOKEN, clientId: env.CLIENT_ID });
      } catch (err) {
        // Commands registered by an earlier run keep working
        logger.warn({ err }, "[startup] command sync failed; continuing with existing commands");
      }

      scheduler.start();
    },
    60_000
  )
);

client.on(
  Events.GuildCreate,
  wrapEvent(
    "guildCreate",
    async (guild: Guild) => {
      logger.info({ guildId: guild.id, name: redact(guild.name) }, "[guild] joined");
      await onboarding.welcome(guild.id);
    },
    20_000
  )
);

client.on(
  Events.InteractionCreate,
  wrapEvent(
    "interactionCreate",
    async (interaction: Interaction) => {
      if (!interaction.isChatInputCommand()) return;
      const run = commands.get(interaction.commandName);
      if (!run) {
        logger.warn({ cmd: interaction.commandName }, "[interaction] unknown command");
        return;
      }
      await run(interaction);
    },
    // Commands defer first; the rest is bounded by the platform timeout per call
    60_000
  )
);

// ===== Shutdown =====

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  const forceExit = setTimeout(() => {
    logger.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, "[shutdown] Timed out; forcing exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  try {
    // In-flight tick finishes its writes before anything else goes away
    await scheduler.stop();
    limiter.destroy();
    client.removeAllListeners();
    await client.destroy();
    await flushSentry();
    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] Error during graceful shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

client.login(env.DISCORD_TOKEN).catch((err: unknown) => {
  logger.fatal({ err }, "[startup] Discord login failed");
  process.exit(1);
});
