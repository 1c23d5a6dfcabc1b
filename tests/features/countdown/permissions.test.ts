/**
 * Countdown Bot — tests/features/countdown/permissions.test.ts
 * WHAT: Tests for who may create and edit events.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  canCreateEvent,
  canEditEvent,
  isEventManager,
  type Actor,
} from "../../../src/features/countdown/permissions.js";

function actor(overrides: Partial<Actor> = {}): Actor {
  return { userId: "u1", isAdministrator: false, canManageGuild: false, roleIds: [], ...overrides };
}

const guild = { eventAdminRoleIds: ["role-events"], allowMemberEventCreation: false };

describe("isEventManager", () => {
  it("accepts server managers, event-admin roles, and bot owners", () => {
    expect(isEventManager(actor({ isAdministrator: true }), guild, [])).toBe(true);
    expect(isEventManager(actor({ canManageGuild: true }), guild, [])).toBe(true);
    expect(isEventManager(actor({ roleIds: ["role-other", "role-events"] }), guild, [])).toBe(true);
    expect(isEventManager(actor(), guild, ["u1"])).toBe(true);
  });

  it("rejects plain members and unconfigured guilds", () => {
    expect(isEventManager(actor({ roleIds: ["role-other"] }), guild, [])).toBe(false);
    expect(isEventManager(actor({ roleIds: ["role-events"] }), undefined, [])).toBe(false);
  });
});

describe("canEditEvent", () => {
  it("lets an event's owner edit it without manager rights", () => {
    expect(canEditEvent(actor(), guild, { ownerUserId: "u1" }, [])).toBe(true);
    expect(canEditEvent(actor(), guild, { ownerUserId: "u2" }, [])).toBe(false);
    expect(canEditEvent(actor(), guild, { ownerUserId: null }, [])).toBe(false);
  });
});

describe("canCreateEvent", () => {
  it("opens creation to everyone when the guild allows it", () => {
    expect(canCreateEvent(actor(), guild, [])).toBe(false);
    expect(canCreateEvent(actor(), { ...guild, allowMemberEventCreation: true }, [])).toBe(true);
  });
});
