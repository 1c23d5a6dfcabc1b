/**
 * Countdown Bot — src/lib/constants.ts
 * WHAT: Centralized application constants for timeouts, delays, and limits
 * WHY: Single source of truth for magic numbers
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions in messages (users, roles, everyone/here)
 * USE CASE: command replies and DMs that echo event names typed by members
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Timeouts & Delays =====

/** Health check timeout before aborting */
export const HEALTH_CHECK_TIMEOUT_MS = 5000;

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** Hard cap on graceful shutdown; a stuck tick must not keep the process alive forever */
export const SHUTDOWN_TIMEOUT_MS = 15_000;

// ===== Countdown =====

/** Digest goes out on the first tick at or after this local hour */
export const DIGEST_HOUR = 9;

/** How far ahead the daily digest looks */
export const DIGEST_LOOKAHEAD_DAYS = 7;
