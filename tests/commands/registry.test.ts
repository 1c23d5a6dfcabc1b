/**
 * Countdown Bot — tests/commands/registry.test.ts
 * WHAT: Slash command payloads, dispatch table, and command-level helpers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock("../../src/lib/sentry.js", () => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  setContext: vi.fn(),
  setTag: vi.fn(),
}));

import { getAllSlashCommands } from "../../src/commands/registry.js";
import { describeRefresh } from "../../src/commands/countdown/index.js";
import { parseEventTime } from "../../src/commands/event/index.js";
import { InputError } from "../../src/lib/errors.js";
import { CHICAGO, LAUNCH } from "../helpers/events.js";

function subcommandsOf(name: string): string[] {
  const body = getAllSlashCommands().find((c) => c.name === name);
  return (body?.options ?? []).map((o) => o.name);
}

describe("slash command payloads", () => {
  it("registers every top-level command once", () => {
    expect(getAllSlashCommands().map((c) => c.name)).toEqual(["event", "countdown", "linkserver", "help", "health"]);
  });

  it("exposes the /event subcommands", () => {
    expect(subcommandsOf("event")).toEqual([
      "add",
      "edit",
      "remove",
      "list",
      "info",
      "silence",
      "milestones",
      "clearmilestones",
      "repeat",
      "clearrepeat",
      "owner",
      "clearowner",
    ]);
  });

  it("exposes the /countdown subcommands", () => {
    expect(subcommandsOf("countdown")).toEqual([
      "channel",
      "mentionrole",
      "clearmentionrole",
      "timezone",
      "milestones",
      "theme",
      "digest",
      "adminrole",
      "removeadminrole",
      "adminroles",
      "allowmembers",
      "refresh",
      "purge",
      "resendsetup",
    ]);
  });
});

describe("parseEventTime", () => {
  it("reads the wall clock in the guild's zone", () => {
    expect(parseEventTime("04/12/2026", "09:00", CHICAGO)).toBe(LAUNCH);
    expect(parseEventTime("04/12/2026", "14:00", "UTC")).toBe(LAUNCH);
  });

  it("rejects malformed input with the expected format", () => {
    expect(() => parseEventTime("2026-04-12", "09:00", CHICAGO)).toThrow(InputError);
    expect(() => parseEventTime("04/12/2026", "9pm", CHICAGO)).toThrow(
      "Invalid date/time format. Use `MM/DD/YYYY` for date and `HH:MM` (24-hour) for time."
    );
  });
});

describe("describeRefresh", () => {
  it("confirms any successful refresh", () => {
    expect(describeRefresh({ status: "created", messageId: "m1" })).toBe("⏱ Countdown updated.");
    expect(describeRefresh({ status: "adopted", messageId: "m1" })).toBe("⏱ Countdown updated.");
  });

  it("points at /countdown channel when none is set", () => {
    expect(describeRefresh({ status: "skipped", messageId: null })).toBe(
      "There's no events channel yet. Set one with `/countdown channel`."
    );
  });

  it("names missing permissions when it gave up over them", () => {
    expect(
      describeRefresh({
        status: "gave_up",
        messageId: null,
        report: { guildId: "g1", channelId: "c1", operation: "status", missing: ["send", "embedLinks"] },
      })
    ).toBe("I couldn't update the countdown. I'm missing: Send Messages, Embed Links.");
    expect(describeRefresh({ status: "gave_up", messageId: null })).toBe(
      "I couldn't update the countdown right now. I'll keep trying every minute."
    );
  });
});
