/**
 * Countdown Bot — src/scheduler/countdownScheduler.ts
 * WHAT: Drives the countdown reconciliation tick on a fixed interval.
 * WHY: Ticks must never overlap, and shutdown must let a running tick finish
 *      its writes. setInterval gives neither, so each tick schedules the next
 *      one only after it has returned.
 * FLOWS:
 *  - start() → (initial delay) → tick → wait interval → tick → ...
 *  - stop() → cancel pending timer → await in-flight tick
 * DOCS:
 *  - setTimeout: https://nodejs.org/api/timers.html#settimeoutcallback-delay-args
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { classifyError, errorContext } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { runWithCtx } from "../lib/reqctx.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import type { TickSummary } from "../features/countdown/reconcile.js";

export const SCHEDULER_NAME = "countdown";

export interface TickRunner {
  runTick(): Promise<TickSummary>;
}

export interface CountdownSchedulerOptions {
  intervalMs: number;
  /** Delay before the first tick; discord.js caches fill in after ClientReady */
  initialDelayMs?: number;
}

export class CountdownScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;

  constructor(
    private readonly runner: TickRunner,
    private readonly opts: CountdownSchedulerOptions
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Returns false when already running or disabled via COUNTDOWN_SCHEDULER_DISABLED=1 */
  start(): boolean {
    if (process.env.COUNTDOWN_SCHEDULER_DISABLED === "1") {
      logger.debug("[countdown:scheduler] scheduler disabled via env flag");
      return false;
    }
    if (this.running) return false;

    this.running = true;
    logger.info({ intervalMs: this.opts.intervalMs }, "[countdown:scheduler] starting");
    this.schedule(this.opts.initialDelayMs ?? 5000);
    return true;
  }

  /** Resolves once any in-flight tick has finished; no tick starts afterwards */
  async stop(): Promise<void> {
    if (!this.running && !this.inFlight) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      logger.info("[countdown:scheduler] waiting for in-flight tick");
      await this.inFlight;
    }
    logger.info("[countdown:scheduler] stopped");
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runOnce().then(() => {
        this.inFlight = null;
        if (this.running) this.schedule(this.opts.intervalMs);
      });
    }, delayMs);
  }

  /**
   * One tick with health bookkeeping. Never rejects. A tick counts as failed
   * only when it threw, or when every guild it touched failed.
   */
  async runOnce(): Promise<TickSummary | null> {
    return runWithCtx({ kind: "tick", cmd: SCHEDULER_NAME }, async () => {
      const startedAt = Date.now();
      try {
        const summary = await this.runner.runTick();
        const durationMs = Date.now() - startedAt;
        const success = !(summary.failed > 0 && summary.processed === 0);
        recordSchedulerRun(SCHEDULER_NAME, success, {
          durationMs,
          counters: {
            guilds: summary.guilds,
            failed: summary.failed,
            sent: summary.notificationsSent,
            pruned: summary.eventsPruned,
          },
        });
        const level = summary.notificationsSent > 0 || summary.eventsPruned > 0 || summary.failed > 0 ? "info" : "debug";
        logger[level]({ evt: "countdown_tick", ...summary, durationMs }, "[countdown:scheduler] tick complete");
        return summary;
      } catch (err) {
        recordSchedulerRun(SCHEDULER_NAME, false, { durationMs: Date.now() - startedAt });
        const classified = classifyError(err);
        logger.error(
          { evt: "countdown_tick_failed", ...errorContext(classified), err },
          "[countdown:scheduler] tick failed"
        );
        return null;
      }
    });
  }
}
