/**
 * Countdown Bot — tests/features/welcome.test.ts
 * WHAT: Tests for the one-time setup guide sent when the bot joins a guild.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { helpText, Onboarding, setupGuide } from "../../src/features/welcome.js";
import { FakeMessaging } from "../helpers/fakeMessaging.js";
import { createTempStore, type TempStore } from "../helpers/tempStore.js";

describe("setupGuide", () => {
  it("greets the owner by mention and names the guild", () => {
    const guide = setupGuide("Board Game Club", "owner-1");
    expect(guide.split("\n")[0]).toBe("Hi <@owner-1>! Thanks for adding me to **Board Game Club** 🕒");
  });

  it("falls back to a plain greeting", () => {
    expect(setupGuide("Board Game Club").startsWith("Hi! Thanks")).toBe(true);
  });

  it("shares the command steps with /help", () => {
    expect(helpText()).toContain("   • Run `/countdown channel` and pick the channel for the pinned countdown.");
    expect(helpText().split("\n")[0]).toBe("**Countdown: Setup & Commands**");
  });
});

describe("Onboarding.welcome", () => {
  let temp: TempStore;
  let messaging: FakeMessaging;
  let onboarding: Onboarding;

  beforeEach(() => {
    temp = createTempStore();
    messaging = new FakeMessaging();
    messaging.guildNames.set("g1", "Board Game Club");
    messaging.setOwner("g1", "owner-1");
    messaging.addChannel("general", "g1");
    messaging.postable.set("g1", "general");
    onboarding = new Onboarding({ store: temp.store, messaging });
  });

  afterEach(() => {
    temp.cleanup();
  });

  it("DMs the owner and marks the guild welcomed", async () => {
    expect(await onboarding.welcome("g1")).toBe("dm");
    expect(messaging.dms).toEqual([{ userId: "owner-1", message: { content: setupGuide("Board Game Club", "owner-1") } }]);
    expect(temp.store.getGuild("g1")?.welcomed).toBe(true);
  });

  it("posts in a guild channel when the owner's DMs are closed", async () => {
    messaging.closeDms("owner-1");

    expect(await onboarding.welcome("g1")).toBe("channel");
    const [post] = messaging.messagesIn("general");
    expect(post?.mentions).toEqual({ roleIds: [], userIds: ["owner-1"] });
    expect(post?.content.content).toBe(setupGuide("Board Game Club", "owner-1"));
  });

  it("still marks the guild welcomed when nothing could be delivered", async () => {
    messaging.closeDms("owner-1");
    messaging.postable.delete("g1");

    expect(await onboarding.welcome("g1")).toBe("undelivered");
    expect(temp.store.getGuild("g1")?.welcomed).toBe(true);
  });

  it("sends only once unless forced", async () => {
    await onboarding.welcome("g1");
    expect(await onboarding.welcome("g1")).toBe("already_welcomed");
    expect(await onboarding.welcome("g1", true)).toBe("dm");
    expect(messaging.dms).toHaveLength(2);
  });
});
