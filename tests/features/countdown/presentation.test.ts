/**
 * Countdown Bot — tests/features/countdown/presentation.test.ts
 * WHAT: Tests for announcement wording, the status message layout, and listings.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  announcementFor,
  eventDetails,
  eventListing,
  MAX_CONTENT_LENGTH,
  STATUS_COLOR,
  statusMessage,
} from "../../../src/features/countdown/presentation.js";
import { CHICAGO, LAUNCH, LAUNCH_EVE, makeEvent } from "../../helpers/events.js";

const ctx = { nowSec: LAUNCH_EVE, timeZone: CHICAGO, theme: "classic" };
const event = makeEvent();

/** Fifty-character names, so line lengths are easy to reason about */
function manyEvents(count: number) {
  return Array.from({ length: count }, (_, i) =>
    makeEvent({ name: `Event ${String(i).padStart(2, "0")} ${"x".repeat(41)}` })
  );
}

describe("announcementFor", () => {
  it("leads milestone posts with the mention role", () => {
    expect(announcementFor({ kind: "milestone", daysLeft: 1 }, event, { ...ctx, mentionRoleId: "r1" })).toEqual({
      content: "<@&r1> ✨ **Launch Party** is **tomorrow**! ✨",
    });
  });

  it("words day 0 and larger counts differently", () => {
    expect(announcementFor({ kind: "milestone", daysLeft: 0 }, event, ctx).content).toBe("📅 **Launch Party** is **today**!");
    expect(announcementFor({ kind: "milestone", daysLeft: 30 }, event, ctx).content).toBe(
      "💌 **Launch Party** is **30 days** away!"
    );
  });

  it("follows the guild theme, defaulting unknown themes to classic", () => {
    expect(announcementFor({ kind: "milestone", daysLeft: 30 }, event, { ...ctx, theme: "party" }).content).toBe(
      "🎊 **30 days** until **Launch Party**! Get hyped! 🎊"
    );
    expect(announcementFor({ kind: "start" }, event, { ...ctx, theme: "minimal" }).content).toBe(
      "Launch Party: starting now."
    );
    expect(announcementFor({ kind: "start" }, event, { ...ctx, theme: "retro" }).content).toBe(
      "🎉 **Launch Party** is starting now!"
    );
  });

  it("never pings for repeat reminders", () => {
    expect(
      announcementFor({ kind: "repeat", dateKey: "2026-04-11" }, event, { ...ctx, mentionRoleId: "r1" }).content
    ).toBe("🔁 Reminder: **Launch Party** is 9 hours • 1 minute away.");
  });
});

describe("statusMessage", () => {
  it("renders one field per event", () => {
    const owned = makeEvent({ ownerUserId: "u9", silenced: true });
    expect(statusMessage([owned], { ...ctx, useEmbed: true })).toEqual({
      content: "",
      embed: {
        title: "Upcoming Event Countdowns",
        description: "Live countdowns for this server's events.",
        color: STATUS_COLOR,
        fields: [
          {
            name: "Launch Party",
            value: `**<t:${LAUNCH}:F>** 🔕\n👤 <@u9>\n⏱ **9 hours • 1 minute** remaining`,
          },
        ],
        footer: undefined,
        imageUrl: undefined,
      },
    });
  });

  it("notes when every event has already started", () => {
    const message = statusMessage([event], { ...ctx, nowSec: LAUNCH + 60, useEmbed: true });
    expect(message.embed?.fields?.[0]?.value).toBe(`**<t:${LAUNCH}:F>**\n➡️ Event has started or passed. 🎉`);
    expect(message.embed?.footer).toBe("All listed events have already started or passed.");
  });

  it("caps the embed at 25 fields", () => {
    const many = Array.from({ length: 26 }, (_, i) => makeEvent({ name: `Event ${i}` }));
    const message = statusMessage(many, { ...ctx, useEmbed: true });
    expect(message.embed?.fields).toHaveLength(25);
    expect(message.embed?.footer).toBe("+1 more; see /event list");
  });

  it("keeps the plain-text fallback under Discord's content limit", () => {
    const message = statusMessage(manyEvents(30), { ...ctx, useEmbed: false });
    const blocks = message.content.split("\n\n");

    // 29-char title, then 110-char blocks joined by blank lines
    expect(message.content).toHaveLength(1960);
    expect(message.content.length).toBeLessThanOrEqual(MAX_CONTENT_LENGTH);
    expect(blocks).toHaveLength(19);
    expect(blocks[17]).toBe(`**Event 16 ${"x".repeat(41)}**\n**<t:${LAUNCH}:F>**\n⏱ **9 hours • 1 minute** remaining`);
    expect(blocks[18]).toBe("+13 more; see /event list");
  });

  it("shows the banner of the first upcoming event that has one", () => {
    const events = [
      makeEvent({ timestamp: LAUNCH_EVE - 60, bannerUrl: "https://example.com/past.png" }),
      makeEvent({ bannerUrl: "https://example.com/next.png" }),
    ];
    expect(statusMessage(events, { ...ctx, useEmbed: true }).embed?.imageUrl).toBe("https://example.com/next.png");
  });
});

describe("eventListing", () => {
  it("numbers events and flags silenced and repeating ones", () => {
    const later = makeEvent({ name: "Later", timestamp: LAUNCH + 86_400, silenced: true, repeatEveryDays: 3 });
    expect(eventListing([event, later], ctx)).toBe(
      [
        "**1.** Launch Party: 04/12/2026 09:00 (9 hours • 1 minute)",
        "**2.** Later: 04/13/2026 09:00 (1 day • 9 hours • 1 minute) [silenced, every 3d]",
      ].join("\n")
    );
  });

  it("cuts a long listing short and says how many were left out", () => {
    const lines = eventListing(manyEvents(100), ctx).split("\n");

    expect(lines.join("\n")).toHaveLength(1911);
    expect(lines).toHaveLength(20);
    expect(lines[18]).toBe(`**19.** Event 18 ${"x".repeat(41)}: 04/12/2026 09:00 (9 hours • 1 minute)`);
    expect(lines[19]).toBe("+81 more not shown; use `/event info` with a higher index.");
  });

  it("points at /event add when empty", () => {
    expect(eventListing([], ctx)).toBe("There are no events set for this server yet.\nAdd one with `/event add`.");
  });
});

describe("eventDetails", () => {
  it("summarises schedule, milestones, and ownership", () => {
    const detailed = makeEvent({ milestones: [7, 1], announcedMilestones: [7], ownerUserId: "u9" });
    expect(eventDetails(detailed, ctx).split("\n")).toEqual([
      "**Launch Party**",
      `When: <t:${LAUNCH}:F> (04/12/2026 09:00 America/Chicago)`,
      "Time left: 9 hours • 1 minute",
      "Milestones: 7, 1",
      "Already announced: 7",
      "Repeat: off",
      "Silenced: no",
      "Owner: <@u9>",
    ]);
  });
});
