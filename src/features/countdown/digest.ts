/**
 * Countdown Bot — src/features/countdown/digest.ts
 * WHAT: Once-a-day summary of the coming week's events.
 * WHY: Guilds that want fewer pings can silence events and still see them in one daily post.
 * FLOWS:
 *  - maybeSend(guildId, now) → enabled? → not sent today? → past DIGEST_HOUR local? → send → mark lastSentDate
 *
 * Send first, then mark. A crash in between repeats the digest on the next
 * tick, which beats skipping a day.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { DIGEST_HOUR, DIGEST_LOOKAHEAD_DAYS } from "../../lib/constants.js";
import { logger } from "../../lib/logger.js";
import { dateKeyInZone, SECONDS_PER_DAY, zonedParts } from "../../lib/time.js";
import type { StateStore } from "../../store/stateStore.js";
import { buildReport, missingCapabilities, requiredFor } from "./capabilities.js";
import { markDigestSent } from "./eventOps.js";
import { isPermissionFailure, type MessagingPort } from "./messaging.js";
import type { OwnerAlerter } from "./ownerAlerts.js";
import { digestMessage } from "./presentation.js";

export type DigestOutcome =
  | "disabled"
  | "already_sent"
  | "too_early"
  | "no_channel"
  | "unreachable"
  | "failed"
  | "sent";

export interface DigestOptions {
  store: StateStore;
  messaging: MessagingPort;
  alerter: OwnerAlerter;
  defaultTimeZone: string;
}

export class DigestPublisher {
  constructor(private readonly opts: DigestOptions) {}

  async maybeSend(guildId: string, nowSec: number): Promise<DigestOutcome> {
    const { store, messaging, alerter } = this.opts;
    const guild = store.getGuild(guildId);
    if (!guild?.digest.enabled) return "disabled";

    const timeZone = guild.timezone ?? this.opts.defaultTimeZone;
    const today = dateKeyInZone(nowSec, timeZone);
    if (guild.digest.lastSentDate === today) return "already_sent";
    if (zonedParts(nowSec, timeZone).hour < DIGEST_HOUR) return "too_early";

    const channelId = guild.digest.channelId ?? guild.eventChannelId;
    if (!channelId) return "no_channel";

    const channel = await messaging.resolveChannel(channelId);
    if (!channel.ok) {
      logger.warn({ guildId, channelId, reason: channel.reason }, "[digest] channel unreachable");
      return "unreachable";
    }

    const caps = await messaging.getCapabilities(channel.value);
    const missing = missingCapabilities(caps, requiredFor("digest"));
    const report = buildReport(guildId, channelId, "digest", missing);
    if (report) {
      await alerter.alert(report);
      return "failed";
    }

    const horizon = nowSec + DIGEST_LOOKAHEAD_DAYS * SECONDS_PER_DAY;
    const upcoming = guild.events.filter((ev) => ev.timestamp > nowSec && ev.timestamp <= horizon);
    const message = digestMessage(upcoming, {
      nowSec,
      timeZone,
      theme: guild.theme,
      useEmbed: caps.has("embedLinks"),
    });

    const sent = await messaging.sendMessage(channel.value, message, { roleIds: [] });
    if (!sent.ok) {
      if (isPermissionFailure(sent.reason)) {
        await alerter.alert({ guildId, channelId, operation: "digest", missing: ["send"] });
      }
      logger.warn({ guildId, channelId, reason: sent.reason }, "[digest] send failed");
      return "failed";
    }

    await store.mutate((draft) => markDigestSent(draft, guildId, today));
    logger.info({ evt: "digest_sent", guildId, channelId, events: upcoming.length }, "[digest] sent");
    return "sent";
  }
}
