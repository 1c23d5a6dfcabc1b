/**
 * Countdown Bot — tests/commands/health.test.ts
 * WHAT: Tests for the /health formatting helpers.
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

import { formatRelativeTime, formatSchedulerStatus, formatUptime } from "../../src/commands/health.js";
import type { SchedulerHealth } from "../../src/lib/schedulerHealth.js";

const NOW = 1_800_000_000_000;

function health(overrides: Partial<SchedulerHealth> = {}): SchedulerHealth {
  return {
    name: "countdown",
    lastRunAt: NOW - 30_000,
    lastSuccessAt: NOW - 30_000,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 10,
    totalFailures: 0,
    lastDurationMs: 42,
    lastCounters: {},
    ...overrides,
  };
}

describe("formatUptime", () => {
  it("shows only non-zero units", () => {
    expect(formatUptime(90_061)).toBe("1d 1h 1m 1s");
    expect(formatUptime(3600)).toBe("1h");
  });

  it("shows 0s for zero", () => {
    expect(formatUptime(0)).toBe("0s");
  });
});

describe("formatRelativeTime", () => {
  it("picks the largest whole unit", () => {
    expect(formatRelativeTime(NOW - 5_000, NOW)).toBe("5s ago");
    expect(formatRelativeTime(NOW - 90_000, NOW)).toBe("1m ago");
    expect(formatRelativeTime(NOW - 2 * 3_600_000, NOW)).toBe("2h ago");
    expect(formatRelativeTime(NOW - 3 * 86_400_000, NOW)).toBe("3d ago");
  });

  it("says never for a job that has not run", () => {
    expect(formatRelativeTime(null, NOW)).toBe("never");
  });
});

describe("formatSchedulerStatus", () => {
  it("reports a healthy tick", () => {
    expect(formatSchedulerStatus(health(), NOW)).toBe("OK - Last: 30s ago");
  });

  it("warns with the failure streak and appends counters", () => {
    expect(
      formatSchedulerStatus(health({ consecutiveFailures: 2, lastCounters: { guilds: 3, sent: 1 } }), NOW)
    ).toBe("WARN (2 failures) - Last: 30s ago\nguilds=3 sent=1");
  });
});
