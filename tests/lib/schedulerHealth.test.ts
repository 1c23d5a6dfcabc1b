/**
 * Countdown Bot — tests/lib/schedulerHealth.test.ts
 * WHAT: Health bookkeeping for the countdown tick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: mockLogger,
}));

import {
  CONSECUTIVE_FAILURE_ALERT_THRESHOLD,
  _clearAllSchedulerHealth,
  getSchedulerHealth,
  getSchedulerHealthByName,
  recordSchedulerRun,
} from "../../src/lib/schedulerHealth.js";

const T0 = Date.UTC(2026, 3, 12, 14, 0, 0);

describe("schedulerHealth", () => {
  beforeEach(() => {
    _clearAllSchedulerHealth();
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  it("has no record before the first tick", () => {
    expect(getSchedulerHealthByName("countdown")).toBeUndefined();
    expect(getSchedulerHealth().size).toBe(0);
  });

  it("stamps a successful tick", () => {
    recordSchedulerRun("countdown", true, { durationMs: 120, counters: { guilds: 2, sent: 1 } });

    expect(getSchedulerHealthByName("countdown")).toEqual({
      name: "countdown",
      lastRunAt: T0,
      lastSuccessAt: T0,
      lastErrorAt: null,
      consecutiveFailures: 0,
      totalRuns: 1,
      totalFailures: 0,
      lastDurationMs: 120,
      lastCounters: { guilds: 2, sent: 1 },
    });
  });

  it("keeps the last success time through a failure", () => {
    recordSchedulerRun("countdown", true);
    vi.setSystemTime(T0 + 60_000);
    recordSchedulerRun("countdown", false);

    const health = getSchedulerHealthByName("countdown");
    expect(health?.lastSuccessAt).toBe(T0);
    expect(health?.lastErrorAt).toBe(T0 + 60_000);
    expect(health?.lastDurationMs).toBeNull();
  });

  it("keeps the previous counters when a run reports none", () => {
    recordSchedulerRun("countdown", true, { counters: { pruned: 4 } });
    recordSchedulerRun("countdown", false, { durationMs: 9 });

    expect(getSchedulerHealthByName("countdown")?.lastCounters).toEqual({ pruned: 4 });
  });

  it("clears the failure streak on the next success", () => {
    recordSchedulerRun("countdown", false);
    recordSchedulerRun("countdown", false);
    recordSchedulerRun("countdown", true);

    const health = getSchedulerHealthByName("countdown");
    expect(health?.consecutiveFailures).toBe(0);
    expect(health?.totalFailures).toBe(2);
    expect(health?.totalRuns).toBe(3);
  });

  it("raises an error log once the streak reaches the threshold", () => {
    for (let i = 1; i < CONSECUTIVE_FAILURE_ALERT_THRESHOLD; i++) {
      recordSchedulerRun("countdown", false);
    }
    expect(mockLogger.error).not.toHaveBeenCalled();

    recordSchedulerRun("countdown", false);
    recordSchedulerRun("countdown", false);

    expect(mockLogger.error).toHaveBeenCalledTimes(2);
    expect(mockLogger.error).toHaveBeenLastCalledWith(
      {
        evt: "scheduler_failing",
        scheduler: "countdown",
        consecutiveFailures: 4,
        totalFailures: 4,
        totalRuns: 4,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  });

  it("hands out copies that callers cannot mutate", () => {
    recordSchedulerRun("countdown", true, { counters: { sent: 1 } });

    const snapshot = getSchedulerHealth().get("countdown");
    if (snapshot) {
      snapshot.totalRuns = 99;
      snapshot.lastCounters.sent = 99;
    }

    expect(getSchedulerHealthByName("countdown")?.totalRuns).toBe(1);
    expect(getSchedulerHealthByName("countdown")?.lastCounters).toEqual({ sent: 1 });
  });

  it("tracks jobs independently", () => {
    recordSchedulerRun("countdown", false);
    recordSchedulerRun("other", true);

    expect(getSchedulerHealthByName("countdown")?.consecutiveFailures).toBe(1);
    expect(getSchedulerHealthByName("other")?.consecutiveFailures).toBe(0);
    expect([...getSchedulerHealth().keys()]).toEqual(["countdown", "other"]);
  });
});
