/**
 * Countdown Bot — src/lib/notifyLimiter.ts
 * WHAT: Per-key cooldown limiter for out-of-band notifications (owner permission alerts).
 * WHY: A missing permission fails on every tick; the owner should hear about it once a day, not once a minute.
 * FLOWS:
 *  - canNotify(key) checks the cooldown
 *  - recordNotify(key) starts it; call once an attempt is made, delivered or not
 *  - cleanup() drops keys whose cooldown has elapsed
 * MULTI-INSTANCE: In-memory only. A restart forgets cooldowns, so an owner may
 *   get one repeat alert after a deploy.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface RateLimitCheck {
  ok: boolean;
  reason?: string;
}

export const DEFAULT_ALERT_COOLDOWN_MS = 24 * 60 * 60 * 1000;

// Bounds the map if some bug produced a fresh key every tick
const MAX_TRACKED_KEYS = 10_000;

export interface INotifyLimiter {
  canNotify(key: string): RateLimitCheck;
  recordNotify(key: string): void;
  cleanup(): void;
}

export class InMemoryNotifyLimiter implements INotifyLimiter {
  private lastNotifyAt = new Map<string, number>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(private readonly cooldownMs: number = DEFAULT_ALERT_COOLDOWN_MS) {
    // Hourly sweep; unref() so the interval never holds the process open on shutdown
    this.cleanupInterval = setInterval(() => this.cleanup(), 60 * 60 * 1000);
    this.cleanupInterval.unref();
  }

  canNotify(key: string): RateLimitCheck {
    const last = this.lastNotifyAt.get(key);
    if (last === undefined) return { ok: true };

    const elapsed = Date.now() - last;
    if (elapsed < this.cooldownMs) {
      return {
        ok: false,
        reason: `cooldown_active (${Math.ceil((this.cooldownMs - elapsed) / 1000)}s remaining)`,
      };
    }
    return { ok: true };
  }

  recordNotify(key: string): void {
    // Re-insert so Map iteration order stays oldest-first for eviction
    this.lastNotifyAt.delete(key);
    this.lastNotifyAt.set(key, Date.now());

    if (this.lastNotifyAt.size > MAX_TRACKED_KEYS) {
      const oldest = this.lastNotifyAt.keys().next();
      if (!oldest.done) this.lastNotifyAt.delete(oldest.value);
    }
  }

  cleanup(): void {
    const now = Date.now();
    let cleaned = 0;
    for (const [key, at] of this.lastNotifyAt) {
      if (now - at >= this.cooldownMs) {
        this.lastNotifyAt.delete(key);
        cleaned++;
      }
    }
    if (cleaned > 0) {
      logger.debug({ cleaned }, "[notifyLimiter] cleanup completed");
    }
  }

  get size(): number {
    return this.lastNotifyAt.size;
  }

  // Tests hang on the interval without this
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
