/**
 * Countdown Bot — src/lib/schedulerHealth.ts
 * WHAT: In-process health record for periodic jobs (the countdown tick).
 * WHY: /health shows whether ticks are running and succeeding; three failures
 *      in a row raise an error log that Sentry picks up.
 * FLOWS:
 *  - recordSchedulerRun(name, success, details?) → update record → alert at threshold
 *  - getSchedulerHealth() → snapshot of every record
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerRunDetails {
  durationMs?: number;
  /** Numeric counters from the run, e.g. notifications sent */
  counters?: Record<string, number>;
}

export interface SchedulerHealth {
  name: string;
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
  lastDurationMs: number | null;
  lastCounters: Record<string, number>;
}

export const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const records = new Map<string, SchedulerHealth>();

function blank(name: string): SchedulerHealth {
  return {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
    lastDurationMs: null,
    lastCounters: {},
  };
}

export function recordSchedulerRun(name: string, success: boolean, details: SchedulerRunDetails = {}): void {
  const now = Date.now();
  const health = records.get(name) ?? blank(name);

  health.lastRunAt = now;
  health.totalRuns++;
  health.lastDurationMs = details.durationMs ?? null;
  if (details.counters) health.lastCounters = { ...details.counters };

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  records.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        evt: "scheduler_failing",
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

export function getSchedulerHealth(): Map<string, SchedulerHealth> {
  return new Map([...records].map(([name, h]) => [name, { ...h, lastCounters: { ...h.lastCounters } }]));
}

export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = records.get(name);
  return health ? { ...health, lastCounters: { ...health.lastCounters } } : undefined;
}

/** Tests only */
export function _clearAllSchedulerHealth(): void {
  records.clear();
}
