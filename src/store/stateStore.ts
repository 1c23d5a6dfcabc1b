/**
 * Countdown Bot — src/store/stateStore.ts
 * WHAT: JSON-file-backed store for every guild's configuration and events.
 * WHY: One document, rewritten atomically, is all the persistence a single-process bot needs.
 * FLOWS:
 *  - load(): read file → parse → validate → (quarantine on failure) → in-memory state
 *  - mutate(fn): lock → clone → fn(draft) → write tmp → rename → swap in → unlock
 *  - reads (getGuild, listGuildIds, ...) return deep copies of the committed state
 * DOCS:
 *  - fs.renameSync: https://nodejs.org/api/fs.html#fsrenamesyncoldpath-newpath
 *  - structuredClone: https://nodejs.org/api/globals.html#structuredclonevalue
 *
 * INVARIANT: the in-memory state only ever reflects what is on disk. A throwing
 * mutator or a failed write leaves both untouched.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";
import { Mutex } from "../lib/mutex.js";
import {
  appStateSchema,
  defaultGuildConfig,
  emptyState,
  sortEvents,
  type AppState,
  type EventRecord,
  type GuildConfig,
} from "./schema.js";

export interface LoadResult {
  /** "fresh" when no file existed, "quarantined" when a bad file was moved aside */
  status: "loaded" | "fresh" | "quarantined";
  guildCount: number;
  quarantinePath?: string;
}

export class StateStore {
  private state: AppState = emptyState();
  private readonly lock = new Mutex();
  private loaded = false;

  constructor(readonly filePath: string) {}

  /**
   * Reads the document from disk. Missing file → empty state. A file that is
   * not JSON or fails validation is renamed to `<file>.corrupt-<timestamp>`
   * and the store starts empty; the bad file is kept for a human to inspect.
   */
  load(): LoadResult {
    this.loaded = true;

    let text: string;
    try {
      text = fs.readFileSync(this.filePath, "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        this.state = emptyState();
        logger.info({ path: this.filePath }, "[store] no state file yet; starting empty");
        return { status: "fresh", guildCount: 0 };
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      return this.quarantine("unparseable JSON", err);
    }

    const parsed = appStateSchema.safeParse(raw);
    if (!parsed.success) {
      return this.quarantine("schema validation failed", parsed.error.issues.slice(0, 5));
    }

    this.state = parsed.data;
    for (const guild of Object.values(this.state.guilds)) {
      sortEvents(guild.events);
    }

    const guildCount = Object.keys(this.state.guilds).length;
    logger.info({ path: this.filePath, guildCount }, "[store] state loaded");
    return { status: "loaded", guildCount };
  }

  private quarantine(reason: string, detail: unknown): LoadResult {
    const quarantinePath = `${this.filePath}.corrupt-${Date.now()}`;
    fs.renameSync(this.filePath, quarantinePath);
    this.state = emptyState();
    logger.error(
      { evt: "store_quarantine", path: this.filePath, quarantinePath, reason, detail },
      "[store] state file unreadable; moved aside and starting empty"
    );
    return { status: "quarantined", guildCount: 0, quarantinePath };
  }

  // ===== Reads =====

  listGuildIds(): string[] {
    return Object.keys(this.state.guilds);
  }

  /** Deep copy of one guild's config, events sorted; undefined if never configured */
  getGuild(guildId: string): GuildConfig | undefined {
    const guild = this.state.guilds[guildId];
    if (!guild) return undefined;
    const copy = structuredClone(guild);
    sortEvents(copy.events);
    return copy;
  }

  getEvent(guildId: string, eventId: string): EventRecord | undefined {
    const event = this.state.guilds[guildId]?.events.find((e) => e.id === eventId);
    return event ? structuredClone(event) : undefined;
  }

  getLinkedGuild(userId: string): string | undefined {
    return this.state.userLinks[userId];
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  // ===== Writes =====

  /**
   * The single write path. `fn` receives a private draft; whatever it returns
   * is passed back once the draft has been written to disk and committed.
   *
   * Calls are serialized, so two back-to-back mutations both persist. Do not
   * call mutate() from inside `fn`: the lock is not reentrant.
   */
  async mutate<T>(fn: (draft: AppState) => T): Promise<T> {
    if (!this.loaded) {
      throw new Error("StateStore.mutate called before load()");
    }

    return this.lock.runExclusive(() => {
      const draft = structuredClone(this.state);
      const result = fn(draft);
      for (const guild of Object.values(draft.guilds)) {
        sortEvents(guild.events);
      }
      this.writeAtomic(draft);
      this.state = draft;
      return result;
    });
  }

  /**
   * Whole-document rewrite: temp file in the same directory, then rename over
   * the target. A crash before the rename leaves the previous file intact.
   */
  private writeAtomic(doc: AppState): void {
    const dir = path.dirname(this.filePath);
    fs.mkdirSync(dir, { recursive: true });

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(doc, null, 2), "utf8");
    try {
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      try {
        fs.unlinkSync(tmpPath);
      } catch (cleanupErr) {
        logger.warn({ err: cleanupErr, tmpPath }, "[store] failed to remove temp file");
      }
      throw err;
    }
  }
}

/**
 * Returns the guild entry on the draft, creating it with defaults on first use.
 * Only valid inside a mutate() callback.
 */
export function ensureGuild(draft: AppState, guildId: string): GuildConfig {
  let guild = draft.guilds[guildId];
  if (!guild) {
    guild = defaultGuildConfig();
    draft.guilds[guildId] = guild;
  }
  return guild;
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
