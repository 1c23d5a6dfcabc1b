/**
 * Countdown Bot — tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: Placeholder credentials so nothing that reads env exits the worker; timers reset between tests.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

// Set at module load so they are in place before any test file imports src/
process.env.NODE_ENV = "test";
process.env.DISCORD_TOKEN ??= "test-token";
process.env.CLIENT_ID ??= "test-client";
// The countdown scheduler is started by index.ts only; keep it off if anything imports it.
process.env.COUNTDOWN_SCHEDULER_DISABLED = "1";

afterEach(() => {
  // A test using vi.useFakeTimers() must not leak fake timers into the next one.
  vi.clearAllTimers();
  vi.useRealTimers();
});
