/**
 * Countdown Bot — src/features/countdown/ownerAlerts.ts
 * WHAT: DMs the server owner a remediation checklist when the bot lacks channel permissions.
 * WHY: Permission problems need a human with server settings access; nobody else can fix them.
 * FLOWS:
 *  - alert(report) → limiter check (guild + channel + missing set) → record attempt → owner lookup → DM
 *
 * Never throws. The cooldown starts with the attempt, not the delivery: an
 * owner with DMs closed would otherwise be retried on every tick for every due
 * event. A failed attempt is logged once per cooldown window.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import type { INotifyLimiter } from "../../lib/notifyLimiter.js";
import { remediationChecklist, type CapabilityReport } from "./capabilities.js";
import type { MessagingPort } from "./messaging.js";

export type AlertOutcome = "sent" | "rate_limited" | "no_owner" | "dm_failed";

export function alertKey(report: CapabilityReport): string {
  return `${report.guildId}:${report.channelId}:${[...report.missing].sort().join(",")}`;
}

export class OwnerAlerter {
  constructor(
    private readonly messaging: MessagingPort,
    private readonly limiter: INotifyLimiter
  ) {}

  /**
   * WHAT: One rate-limited attempt to tell the owner what to fix.
   * RETURNS: what happened; callers only log it.
   */
  async alert(report: CapabilityReport): Promise<AlertOutcome> {
    const key = alertKey(report);
    const check = this.limiter.canNotify(key);
    if (!check.ok) {
      logger.debug({ key, reason: check.reason }, "[ownerAlerts] suppressed");
      return "rate_limited";
    }
    this.limiter.recordNotify(key);

    const owner = await this.messaging.getGuildOwnerId(report.guildId);
    if (!owner.ok) {
      logger.warn(
        { guildId: report.guildId, reason: owner.reason },
        "[ownerAlerts] could not resolve guild owner"
      );
      return "no_owner";
    }

    const sent = await this.messaging.sendDirectMessage(owner.value, {
      content: remediationChecklist(report),
    });
    if (!sent.ok) {
      // Owners with DMs closed are common; next attempt after the cooldown
      logger.info(
        { guildId: report.guildId, channelId: report.channelId, reason: sent.reason },
        "[ownerAlerts] owner DM failed"
      );
      return "dm_failed";
    }

    logger.info(
      {
        evt: "owner_alert_sent",
        guildId: report.guildId,
        channelId: report.channelId,
        operation: report.operation,
        missing: report.missing,
      },
      "[ownerAlerts] sent permission checklist to owner"
    );
    return "sent";
  }
}
