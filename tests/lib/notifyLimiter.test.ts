/**
 * Countdown Bot — tests/lib/notifyLimiter.test.ts
 * WHAT: Unit tests for the owner-alert cooldown limiter.
 * WHY: Verify the 24h cooldown, cleanup, and key bound.
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

import { DEFAULT_ALERT_COOLDOWN_MS, InMemoryNotifyLimiter } from "../../src/lib/notifyLimiter.js";

describe("InMemoryNotifyLimiter", () => {
  let limiter: InMemoryNotifyLimiter;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T12:00:00Z"));
    limiter = new InMemoryNotifyLimiter();
  });

  afterEach(() => {
    limiter.destroy();
    vi.useRealTimers();
  });

  describe("canNotify", () => {
    it("allows a key it has never seen", () => {
      const result = limiter.canNotify("g1:c1:send");
      expect(result.ok).toBe(true);
      expect(result.reason).toBeUndefined();
    });

    it("blocks a key inside the cooldown and reports the seconds left", () => {
      limiter.recordNotify("g1:c1:send");
      vi.advanceTimersByTime(60 * 60 * 1000);

      const result = limiter.canNotify("g1:c1:send");
      expect(result.ok).toBe(false);
      expect(result.reason).toBe("cooldown_active (82800s remaining)");
    });

    it("allows the key again once 24 hours have passed", () => {
      limiter.recordNotify("g1:c1:send");
      vi.advanceTimersByTime(DEFAULT_ALERT_COOLDOWN_MS);

      expect(limiter.canNotify("g1:c1:send").ok).toBe(true);
    });

    it("keeps keys independent", () => {
      limiter.recordNotify("g1:c1:send");
      expect(limiter.canNotify("g1:c1:manageMessages").ok).toBe(true);
      expect(limiter.canNotify("g2:c1:send").ok).toBe(true);
    });

    it("honours a custom cooldown", () => {
      const short = new InMemoryNotifyLimiter(1000);
      short.recordNotify("k");
      expect(short.canNotify("k").ok).toBe(false);
      vi.advanceTimersByTime(1000);
      expect(short.canNotify("k").ok).toBe(true);
      short.destroy();
    });
  });

  describe("cleanup", () => {
    it("drops only expired keys", () => {
      limiter.recordNotify("old");
      vi.advanceTimersByTime(12 * 60 * 60 * 1000);
      limiter.recordNotify("new");
      vi.advanceTimersByTime(12 * 60 * 60 * 1000);

      limiter.cleanup();
      expect(limiter.size).toBe(1);
      expect(limiter.canNotify("new").ok).toBe(false);
    });

    it("runs hourly on its own", () => {
      limiter.recordNotify("k");
      vi.advanceTimersByTime(25 * 60 * 60 * 1000);
      expect(limiter.size).toBe(0);
    });
  });

  it("stops the sweep after destroy", () => {
    limiter.recordNotify("k");
    limiter.destroy();
    vi.advanceTimersByTime(25 * 60 * 60 * 1000);
    expect(limiter.size).toBe(1);
  });
});
