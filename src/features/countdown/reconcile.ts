/**
 * Countdown Bot — src/features/countdown/reconcile.ts
 * WHAT: One reconciliation tick across every configured guild.
 * WHY: Announcements, pruning and the pinned status all derive from the same
 *      event list; doing them in one ordered pass keeps them consistent.
 * FLOWS (per guild, isolated):
 *  1. resolve events channel (unreachable → skip guild this tick)
 *  2. per event (isolated): classify → send → persist bookkeeping → owner DM
 *  3. prune expired events (one write)
 *  4. refresh pinned status (post-mutation list)
 *  5. daily digest
 *
 * Send-then-persist: a crash between the two repeats an announcement on the
 * next tick rather than silently losing it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { classifyError, errorContext, shouldReportToSentry } from "../../lib/errors.js";
import { logger, redact } from "../../lib/logger.js";
import { nowUtc } from "../../lib/time.js";
import type { EventRecord, GuildConfig } from "../../store/schema.js";
import type { StateStore } from "../../store/stateStore.js";
import { buildReport, missingCapabilities, requiredFor } from "./capabilities.js";
import type { DigestPublisher } from "./digest.js";
import {
  markMilestoneAnnounced,
  markRepeatAnnounced,
  markStartAnnounced,
  pruneEvents,
} from "./eventOps.js";
import { isPermissionFailure, type ChannelHandle, type MessagingPort } from "./messaging.js";
import type { OwnerAlerter } from "./ownerAlerts.js";
import type { PinnedStatusReconciler } from "./pinnedStatus.js";
import { announcementFor, ownerDirectMessage } from "./presentation.js";
import { classify, isPrunable, type Notification, type TemporalWindows } from "./temporal.js";

export interface ReconcilerOptions {
  store: StateStore;
  messaging: MessagingPort;
  pinned: PinnedStatusReconciler;
  alerter: OwnerAlerter;
  digest?: DigestPublisher;
  windows: TemporalWindows;
  defaultTimeZone: string;
}

/**
 * Counters for one tick. `processed` and `skipped` count guilds; a guild whose
 * channel could not be resolved is skipped, one that threw is failed.
 */
export interface TickSummary {
  guilds: number;
  processed: number;
  skipped: number;
  failed: number;
  notificationsSent: number;
  eventsPruned: number;
}

interface GuildResult {
  skipped: boolean;
  sent: number;
  pruned: number;
}

interface GuildRun {
  guildId: string;
  guild: GuildConfig;
  channel: ChannelHandle;
  timeZone: string;
  nowSec: number;
}

export class Reconciler {
  constructor(private readonly opts: ReconcilerOptions) {}

  /**
   * WHAT: Walks every guild with an events channel and brings it up to date.
   * WHY: Called once per interval by CountdownScheduler; never rejects for a
   *      single guild's failure, so one broken server can't stall the rest.
   * RETURNS: TickSummary for scheduler health and the tick log line.
   *
   * GOTCHA: guilds are read from a snapshot. A guild added mid-tick waits
   * for the next one.
   */
  async runTick(nowSec: number = nowUtc()): Promise<TickSummary> {
    const summary: TickSummary = {
      guilds: 0,
      processed: 0,
      skipped: 0,
      failed: 0,
      notificationsSent: 0,
      eventsPruned: 0,
    };

    for (const guildId of this.opts.store.listGuildIds()) {
      const guild = this.opts.store.getGuild(guildId);
      if (!guild?.eventChannelId) continue;
      summary.guilds++;

      try {
        const result = await this.runGuild(guildId, guild, guild.eventChannelId, nowSec);
        if (result.skipped) {
          summary.skipped++;
        } else {
          summary.processed++;
        }
        summary.notificationsSent += result.sent;
        summary.eventsPruned += result.pruned;
      } catch (err) {
        summary.failed++;
        this.reportFailure(err, "guild_failed", { guildId });
      }
    }

    return summary;
  }

  /**
   * WHAT: One guild's pass: announcements, pruning, pinned status, digest.
   * WHY: Pruning runs after announcements so an event that just started still
   *      gets its start blast before it can expire.
   */
  private async runGuild(
    guildId: string,
    guild: GuildConfig,
    channelId: string,
    nowSec: number
  ): Promise<GuildResult> {
    const { messaging, store, pinned, windows, digest } = this.opts;

    const channel = await messaging.resolveChannel(channelId);
    if (!channel.ok) {
      logger.warn(
        { guildId, channelId, reason: channel.reason },
        "[reconcile] events channel unreachable; skipping guild this tick"
      );
      return { skipped: true, sent: 0, pruned: 0 };
    }

    const run: GuildRun = {
      guildId,
      guild,
      channel: channel.value,
      timeZone: guild.timezone ?? this.opts.defaultTimeZone,
      nowSec,
    };

    // WHY: checked up front so a channel we can't post in costs one owner
    // alert instead of a failed send per due event
    const caps = await messaging.getCapabilities(channel.value);
    const blocked = buildReport(guildId, channelId, "announce", missingCapabilities(caps, requiredFor("announce")));

    // guild.events is our own copy, so removals during the awaits below don't disturb the walk
    let sent = 0;
    for (const event of guild.events) {
      try {
        const result = classify(nowSec, event, run.timeZone, windows);
        if (result.kind !== "start" && result.kind !== "milestone" && result.kind !== "repeat") continue;
        if (blocked) {
          await this.opts.alerter.alert(blocked);
          continue;
        }
        if (await this.announce(run, event, result)) sent++;
      } catch (err) {
        this.reportFailure(err, "event_failed", { guildId, eventId: event.id });
      }
    }

    let pruned: string[] = [];
    if (guild.events.some((ev) => isPrunable(nowSec, ev, windows))) {
      pruned = await store.mutate((draft) =>
        pruneEvents(draft, guildId, (ev) => isPrunable(nowSec, ev, windows))
      );
      if (pruned.length > 0) {
        logger.info(
          { evt: "events_pruned", guildId, names: pruned.map(redact) },
          "[reconcile] pruned expired events"
        );
      }
    }

    await pinned.refresh(guildId, nowSec);

    if (digest) {
      await digest.maybeSend(guildId, nowSec);
    }

    return { skipped: false, sent, pruned: pruned.length };
  }

  /**
   * WHAT: Posts one notification, then records it.
   * WHY: Send-then-persist. A failed post records nothing, so the next tick
   *      tries again.
   * RETURNS: whether the post went out.
   *
   * GOTCHA: the send awaits outside the store lock, so a command may edit the
   * event meanwhile. The mark* helpers check the occurrence (id + timestamp)
   * and skip the write if it changed; `recorded: false` in the log means that
   * happened.
   */
  private async announce(run: GuildRun, event: EventRecord, notification: Notification): Promise<boolean> {
    const { messaging, store, alerter } = this.opts;
    const { guildId, guild, channel, nowSec, timeZone } = run;

    const message = announcementFor(notification, event, {
      nowSec,
      timeZone,
      theme: guild.theme,
      mentionRoleId: guild.mentionRoleId,
    });
    const mentionRoles = notification.kind !== "repeat" && guild.mentionRoleId ? [guild.mentionRoleId] : [];

    const result = await messaging.sendMessage(channel, message, { roleIds: mentionRoles });
    if (!result.ok) {
      logger.warn(
        { guildId, eventId: event.id, kind: notification.kind, reason: result.reason },
        "[reconcile] announcement failed; will retry next tick"
      );
      if (isPermissionFailure(result.reason)) {
        await alerter.alert({ guildId, channelId: channel.id, operation: "announce", missing: ["send"] });
      }
      return false;
    }

    const recorded = await store.mutate((draft) => {
      switch (notification.kind) {
        case "start":
          return markStartAnnounced(draft, guildId, event);
        case "milestone":
          return markMilestoneAnnounced(draft, guildId, event, notification.daysLeft);
        case "repeat":
          return markRepeatAnnounced(draft, guildId, event, notification.dateKey);
      }
    });

    logger.info(
      {
        evt: "countdown_announced",
        guildId,
        eventId: event.id,
        kind: notification.kind,
        daysLeft: notification.kind === "milestone" ? notification.daysLeft : undefined,
        recorded,
      },
      `[reconcile] announced ${notification.kind}`
    );

    if (event.ownerUserId) {
      const dm = ownerDirectMessage(notification, event, messaging.guildName(guildId) ?? "your server", {
        nowSec,
        timeZone,
        theme: guild.theme,
      });
      const dmResult = await messaging.sendDirectMessage(event.ownerUserId, dm);
      if (!dmResult.ok) {
        logger.debug(
          { guildId, eventId: event.id, reason: dmResult.reason },
          "[reconcile] owner DM not delivered"
        );
      }
    }

    return true;
  }

  /**
   * Logs a contained failure. Error level is what the logger hook forwards to
   * Sentry, so transient and permission noise goes out as warn instead.
   */
  private reportFailure(err: unknown, evt: string, context: Record<string, unknown>): void {
    const classified = classifyError(err);
    const level = shouldReportToSentry(classified) ? "error" : "warn";
    logger[level](
      { evt, ...errorContext(classified, context), err: err instanceof Error ? err : new Error(String(err)) },
      `[reconcile] ${evt.replace("_", " ")}: ${classified.message}`
    );
  }
}
