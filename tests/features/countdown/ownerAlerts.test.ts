/**
 * Countdown Bot — tests/features/countdown/ownerAlerts.test.ts
 * WHAT: Tests for permission reports and the rate-limited owner checklist DM.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import {
  buildReport,
  mergeReports,
  missingCapabilities,
  remediationChecklist,
  type CapabilityReport,
} from "../../../src/features/countdown/capabilities.js";
import type { Capability } from "../../../src/features/countdown/messaging.js";
import { alertKey, OwnerAlerter } from "../../../src/features/countdown/ownerAlerts.js";
import { InMemoryNotifyLimiter } from "../../../src/lib/notifyLimiter.js";
import { FakeMessaging } from "../../helpers/fakeMessaging.js";

const REPORT: CapabilityReport = {
  guildId: "g1",
  channelId: "c1",
  operation: "status",
  missing: ["embedLinks", "manageMessages"],
};

describe("capability reports", () => {
  it("lists missing capabilities in canonical order", () => {
    expect(missingCapabilities(new Set<Capability>(["view"]), ["readHistory", "send", "view"])).toEqual(["send", "readHistory"]);
  });

  it("builds nothing when nothing is missing", () => {
    expect(buildReport("g1", "c1", "announce", [])).toBeNull();
  });

  it("merges two reports into one set", () => {
    const a = buildReport("g1", "c1", "status", ["readHistory"]);
    const b = buildReport("g1", "c1", "pin", ["manageMessages", "send"]);
    expect(mergeReports(a, b)).toEqual({
      guildId: "g1",
      channelId: "c1",
      operation: "status",
      missing: ["send", "readHistory", "manageMessages"],
    });
    expect(mergeReports(null, b)).toBe(b);
  });

  it("renders a checklist with Discord's permission names", () => {
    expect(remediationChecklist(REPORT)).toBe(
      [
        "I'm missing permissions in <#c1> and can't keep the countdown up to date.",
        "",
        "Open the channel's settings → Permissions, select my role, and allow:",
        "• Embed Links",
        "• Manage Messages (needed to pin)",
        "",
        "Once that's fixed, run `/countdown refresh` or wait for the next update.",
      ].join("\n")
    );
  });
});

describe("OwnerAlerter", () => {
  let messaging: FakeMessaging;
  let limiter: InMemoryNotifyLimiter;
  let alerter: OwnerAlerter;

  beforeEach(() => {
    messaging = new FakeMessaging();
    messaging.setOwner("g1", "owner-1");
    limiter = new InMemoryNotifyLimiter();
    alerter = new OwnerAlerter(messaging, limiter);
  });

  afterEach(() => {
    limiter.destroy();
  });

  it("keys on guild, channel, and the sorted missing set", () => {
    expect(alertKey({ ...REPORT, missing: ["manageMessages", "embedLinks"] })).toBe("g1:c1:embedLinks,manageMessages");
  });

  it("DMs the owner once per cooldown for the same problem", async () => {
    expect(await alerter.alert(REPORT)).toBe("sent");
    expect(await alerter.alert({ ...REPORT, operation: "pin" })).toBe("rate_limited");
    expect(messaging.dms).toHaveLength(1);
    expect(messaging.dms[0]?.message.content).toBe(remediationChecklist(REPORT));
  });

  it("alerts again for a different missing set", async () => {
    await alerter.alert(REPORT);
    expect(await alerter.alert({ ...REPORT, missing: ["send"] })).toBe("sent");
  });

  it("starts the cooldown even when the owner's DMs are closed", async () => {
    messaging.closeDms("owner-1");
    expect(await alerter.alert(REPORT)).toBe("dm_failed");
    expect(await alerter.alert(REPORT)).toBe("rate_limited");
    expect(messaging.calls.filter((c) => c === "sendDirectMessage")).toHaveLength(1);
    expect(messaging.calls.filter((c) => c === "getGuildOwnerId")).toHaveLength(1);
  });

  it("tries again once the cooldown has passed", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(Date.UTC(2026, 3, 1));
    const shortLimiter = new InMemoryNotifyLimiter(60_000);
    const shortAlerter = new OwnerAlerter(messaging, shortLimiter);
    messaging.closeDms("owner-1");

    expect(await shortAlerter.alert(REPORT)).toBe("dm_failed");
    vi.setSystemTime(Date.UTC(2026, 3, 1) + 60_000);
    expect(await shortAlerter.alert(REPORT)).toBe("dm_failed");
    shortLimiter.destroy();
  });

  it("reports a guild whose owner cannot be found", async () => {
    expect(await alerter.alert({ ...REPORT, guildId: "g-unknown" })).toBe("no_owner");
  });
});
