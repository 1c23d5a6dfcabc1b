/**
 * Countdown Bot — src/features/countdown/pinnedStatus.ts
 * WHAT: Keeps exactly one pinned, up-to-date status message per guild.
 * WHY: The status message is edited in place; a human deleting or unpinning it,
 *      or a restart losing track of it, must never leave two copies behind.
 * FLOWS:
 *  - Known id  → fetch → (not found → Unknown) | (unpinned → re-pin) → edit
 *  - Unknown   → adopt newest bot-authored pin → edit
 *              | create → pin → unpin older bot pins
 *  - every path → one merged CapabilityReport → owner alert
 *
 * Refreshes for one guild are serialized with a keyed lock; the tick and a
 * command can both ask for a refresh at the same moment.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { KeyedMutex } from "../../lib/mutex.js";
import { nowUtc } from "../../lib/time.js";
import type { StateStore } from "../../store/stateStore.js";
import type { GuildConfig } from "../../store/schema.js";
import {
  buildReport,
  mergeReports,
  missingCapabilities,
  requiredFor,
  type CapabilityReport,
} from "./capabilities.js";
import {
  isPermissionFailure,
  type Capability,
  type ChannelHandle,
  type FailureReason,
  type MessageHandle,
  type MessagingPort,
  type OutgoingMessage,
} from "./messaging.js";
import type { OwnerAlerter } from "./ownerAlerts.js";
import { statusMessage } from "./presentation.js";

/** Discord's per-channel pin limit */
export const PIN_LIMIT = 50;

export type RefreshStatus = "skipped" | "created" | "adopted" | "updated" | "gave_up";

export interface RefreshOutcome {
  status: RefreshStatus;
  messageId: string | null;
  report?: CapabilityReport;
}

export interface PinnedStatusOptions {
  store: StateStore;
  messaging: MessagingPort;
  alerter: OwnerAlerter;
  defaultTimeZone: string;
}

interface RefreshRun {
  guildId: string;
  guild: GuildConfig;
  channel: ChannelHandle;
  caps: Set<Capability>;
  content: OutgoingMessage;
  report: CapabilityReport | null;
}

export class PinnedStatusReconciler {
  private readonly locks = new KeyedMutex();

  constructor(private readonly opts: PinnedStatusOptions) {}

  /**
   * WHAT: Brings the guild's status message up to date, creating or adopting
   *       one when the tracked id no longer resolves.
   * WHY: Called by the tick and after every command that changes events, so
   *      it must be idempotent: a second call with nothing changed is one edit.
   * RETURNS: the outcome; any capability report has already gone to the owner.
   */
  async refresh(guildId: string, nowSec: number = nowUtc()): Promise<RefreshOutcome> {
    return this.locks.runExclusive(guildId, async () => {
      const outcome = await this.refreshLocked(guildId, nowSec);
      if (outcome.report) {
        await this.opts.alerter.alert(outcome.report);
      }
      logger.debug(
        { guildId, status: outcome.status, messageId: outcome.messageId },
        "[pinnedStatus] refresh finished"
      );
      return outcome;
    });
  }

  /**
   * GOTCHA: only `not_found` on the tracked id leads to recovery. Any other
   * failure gives up for this tick; recovering on a timeout would post a
   * second status message while the first one still exists.
   */
  private async refreshLocked(guildId: string, nowSec: number): Promise<RefreshOutcome> {
    const { store, messaging, defaultTimeZone } = this.opts;
    const guild = store.getGuild(guildId);
    if (!guild?.eventChannelId) {
      return { status: "skipped", messageId: null };
    }

    const channelResult = await messaging.resolveChannel(guild.eventChannelId);
    if (!channelResult.ok) {
      logger.warn(
        { guildId, channelId: guild.eventChannelId, reason: channelResult.reason },
        "[pinnedStatus] events channel unreachable"
      );
      return { status: "gave_up", messageId: guild.pinnedMessageId ?? null };
    }
    const channel = channelResult.value;

    const caps = await messaging.getCapabilities(channel);
    const blocking = missingCapabilities(caps, ["view", "send"]);
    if (blocking.length > 0) {
      return {
        status: "gave_up",
        messageId: guild.pinnedMessageId ?? null,
        report: buildReport(guildId, channel.id, "status", missingCapabilities(caps, requiredFor("status"))) ?? undefined,
      };
    }

    const run: RefreshRun = {
      guildId,
      guild,
      channel,
      caps,
      content: statusMessage(guild.events, {
        nowSec,
        timeZone: guild.timezone ?? defaultTimeZone,
        theme: guild.theme,
        useEmbed: caps.has("embedLinks"),
      }),
      // Missing embed/history degrade the message but do not stop it
      report: buildReport(guildId, channel.id, "status", missingCapabilities(caps, requiredFor("status"))),
    };

    const known = guild.pinnedMessageId;
    if (known) {
      const fetched = await messaging.fetchMessage(channel, known);
      if (fetched.ok) {
        const updated = await this.updateKnown(run, fetched.value);
        if (updated) return updated;
      } else if (fetched.reason !== "not_found") {
        return this.giveUp(run, known, fetched.reason);
      }
      logger.info({ guildId, messageId: known }, "[pinnedStatus] tracked message gone; recovering");
    }

    const outcome = await this.recoverUnknown(run);
    if (outcome.messageId !== (known ?? null)) {
      await this.persistPinnedId(guildId, channel.id, outcome.messageId);
    }
    return outcome;
  }

  /**
   * Edits the tracked message, re-pinning it first if someone unpinned it.
   * Returns null when the message vanished between fetch and edit.
   */
  private async updateKnown(run: RefreshRun, message: MessageHandle): Promise<RefreshOutcome | null> {
    const { messaging } = this.opts;

    if (!message.pinned) {
      await this.tryPin(run, message);
    }

    const edited = await messaging.editMessage(message, run.content);
    if (edited.ok) {
      return this.withReport(run, { status: "updated", messageId: message.id });
    }
    if (edited.reason === "not_found") return null;
    return this.giveUp(run, message.id, edited.reason);
  }

  /**
   * WHAT: Adopt the newest pin we authored, else post and pin a new message.
   * WHY: After a restart or a lost write the stored id can be stale while our
   *      old message is still pinned; adopting it avoids a duplicate.
   */
  private async recoverUnknown(run: RefreshRun): Promise<RefreshOutcome> {
    const { messaging } = this.opts;
    const ours = await this.listOwnPins(run);

    const newest = ours[0];
    if (newest) {
      const edited = await messaging.editMessage(newest, run.content);
      if (edited.ok) {
        logger.info({ guildId: run.guildId, messageId: newest.id }, "[pinnedStatus] adopted existing pin");
        await this.unpinOthers(run, ours, newest.id);
        return this.withReport(run, { status: "adopted", messageId: newest.id });
      }
    }

    const sent = await messaging.sendMessage(run.channel, run.content, { roleIds: [] });
    if (!sent.ok) {
      return this.giveUp(run, null, sent.reason);
    }

    const pinned = await this.tryPin(run, sent.value);
    if (pinned) {
      await this.unpinOthers(run, ours, sent.value.id);
    }
    logger.info(
      { evt: "status_created", guildId: run.guildId, messageId: sent.value.id, pinned },
      "[pinnedStatus] created status message"
    );
    return this.withReport(run, { status: "created", messageId: sent.value.id });
  }

  /** Newest first; empty when history cannot be read */
  private async listOwnPins(run: RefreshRun): Promise<MessageHandle[]> {
    if (!run.caps.has("readHistory")) return [];
    const pins = await this.opts.messaging.listPinned(run.channel);
    if (!pins.ok) {
      logger.warn({ guildId: run.guildId, reason: pins.reason }, "[pinnedStatus] could not list pins");
      return [];
    }
    const self = this.opts.messaging.selfId();
    return pins.value.slice(0, PIN_LIMIT).filter((m) => m.authorId === self);
  }

  /** A missing Manage Messages leaves the message unpinned but still edited; the owner hears about it */
  private async tryPin(run: RefreshRun, message: MessageHandle): Promise<boolean> {
    if (!run.caps.has("manageMessages")) {
      this.addReport(run, ["manageMessages"]);
      return false;
    }
    const pinned = await this.opts.messaging.pinMessage(message);
    if (pinned.ok) return true;

    if (isPermissionFailure(pinned.reason)) {
      this.addReport(run, ["manageMessages"]);
    } else {
      logger.warn(
        { guildId: run.guildId, messageId: message.id, reason: pinned.reason },
        "[pinnedStatus] pin failed"
      );
    }
    return false;
  }

  /** GOTCHA: only called once `keepId` is pinned, so a failed pin never strips the old one */
  private async unpinOthers(run: RefreshRun, ours: MessageHandle[], keepId: string): Promise<void> {
    if (!run.caps.has("manageMessages")) return;
    for (const stale of ours) {
      if (stale.id === keepId) continue;
      const result = await this.opts.messaging.unpinMessage(stale);
      if (!result.ok) {
        logger.warn(
          { guildId: run.guildId, messageId: stale.id, reason: result.reason },
          "[pinnedStatus] failed to unpin duplicate status message"
        );
      }
    }
  }

  private giveUp(run: RefreshRun, messageId: string | null, reason: FailureReason): RefreshOutcome {
    if (isPermissionFailure(reason)) {
      // The capability pre-check passed, so the channel overrides changed under us
      const missing = missingCapabilities(run.caps, requiredFor("status"));
      this.addReport(run, missing.length > 0 ? missing : ["send"]);
    }
    logger.warn({ guildId: run.guildId, messageId, reason }, "[pinnedStatus] giving up for this tick");
    return this.withReport(run, { status: "gave_up", messageId });
  }

  private addReport(run: RefreshRun, caps: Capability[]): void {
    run.report = mergeReports(
      run.report,
      buildReport(run.guildId, run.channel.id, caps.includes("manageMessages") ? "pin" : "status", caps)
    );
  }

  private withReport(run: RefreshRun, outcome: RefreshOutcome): RefreshOutcome {
    return run.report ? { ...outcome, report: run.report } : outcome;
  }

  /**
   * Stores the new id unless the channel changed while we were talking to the
   * platform; a channel change already cleared the id.
   */
  private async persistPinnedId(guildId: string, channelId: string, messageId: string | null): Promise<void> {
    await this.opts.store.mutate((draft) => {
      const guild = draft.guilds[guildId];
      if (guild && guild.eventChannelId === channelId) {
        guild.pinnedMessageId = messageId;
      }
    });
  }
}
