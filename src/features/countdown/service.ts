/**
 * Countdown Bot — src/features/countdown/service.ts
 * WHAT: Command-facing entry point: apply an eventOps mutation, then refresh the pinned status.
 * WHY: Every mutating command must update the public display right away instead of
 *      waiting up to a minute for the next tick.
 * USAGE:
 *  const ev = await service.update(guildId, (draft, now) => addEvent(draft, guildId, input, now));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { nowUtc } from "../../lib/time.js";
import type { AppState, GuildConfig } from "../../store/schema.js";
import type { StateStore } from "../../store/stateStore.js";
import type { PinnedStatusReconciler, RefreshOutcome } from "./pinnedStatus.js";

export interface CountdownServiceOptions {
  store: StateStore;
  pinned: PinnedStatusReconciler;
  defaultTimeZone: string;
  now?: () => number;
}

export class CountdownService {
  private readonly now: () => number;

  constructor(private readonly opts: CountdownServiceOptions) {
    this.now = opts.now ?? nowUtc;
  }

  get store(): StateStore {
    return this.opts.store;
  }

  nowSec(): number {
    return this.now();
  }

  guild(guildId: string): GuildConfig | undefined {
    return this.opts.store.getGuild(guildId);
  }

  timeZoneFor(guildId: string): string {
    return this.opts.store.getGuild(guildId)?.timezone ?? this.opts.defaultTimeZone;
  }

  /**
   * Runs `fn` inside the store's write section. InputErrors thrown by `fn`
   * propagate to the command layer with nothing written. The pinned refresh
   * afterwards is best effort: the change is already saved.
   */
  async update<T>(guildId: string, fn: (draft: AppState, nowSec: number) => T): Promise<T> {
    const nowSec = this.now();
    const result = await this.opts.store.mutate((draft) => fn(draft, nowSec));
    await this.refreshQuietly(guildId);
    return result;
  }

  /** Explicit refresh for /countdown refresh; failures propagate to the caller */
  async refresh(guildId: string): Promise<RefreshOutcome> {
    return this.opts.pinned.refresh(guildId, this.now());
  }

  private async refreshQuietly(guildId: string): Promise<void> {
    try {
      await this.opts.pinned.refresh(guildId, this.now());
    } catch (err) {
      logger.warn({ err, guildId }, "[countdown] pinned refresh after command failed; next tick will retry");
    }
  }
}
