/**
 * Countdown Bot — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail fast on missing secrets; keep process.env access in one place.
 * FLOWS: load .env → parse/validate → export typed env object
 *
 * Only src/index.ts and the command layer read this module. The countdown core
 * receives its settings as constructor parameters.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { isValidTimeZone } from "./time.js";

// override: false in tests so test env vars set before import win
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw extraction. Every variable gets trimmed; copy-paste whitespace in .env
 * files is common. Validation happens in one pass below.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DATA_PATH: process.env.DATA_PATH?.trim(),
  POLL_INTERVAL_SECONDS: process.env.POLL_INTERVAL_SECONDS?.trim(),
  DEFAULT_TZ: process.env.DEFAULT_TZ?.trim(),
  GRACE_WINDOW_MINUTES: process.env.GRACE_WINDOW_MINUTES?.trim(),
  KEEP_WINDOW_MINUTES: process.env.KEEP_WINDOW_MINUTES?.trim(),
  PLATFORM_TIMEOUT_MS: process.env.PLATFORM_TIMEOUT_MS?.trim(),
  OWNER_IDS: process.env.OWNER_IDS?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),
};

export const envSchema = z
  .object({
    // Core Discord credentials - bot won't start without these
    DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
    CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

    // Single JSON document holding every guild's configuration and events
    DATA_PATH: z.string().default("data/state.json"),

    POLL_INTERVAL_SECONDS: z.coerce.number().int().min(10).max(3600).default(60),
    DEFAULT_TZ: z
      .string()
      .default("America/Chicago")
      .refine((val) => isValidTimeZone(val), { message: "DEFAULT_TZ is not a known IANA time zone" }),
    GRACE_WINDOW_MINUTES: z.coerce.number().int().min(1).max(24 * 60).default(60),
    KEEP_WINDOW_MINUTES: z.coerce.number().int().min(1).max(7 * 24 * 60).default(60),
    PLATFORM_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120_000).default(10_000),

    // Comma-separated user IDs that may manage events in any guild
    OWNER_IDS: z.string().optional(),
    LOG_LEVEL: z.string().optional(),

    SENTRY_DSN: z.string().optional(),
    SENTRY_ENVIRONMENT: z.string().optional(),
    SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  })
  .refine((val) => val.KEEP_WINDOW_MINUTES >= val.GRACE_WINDOW_MINUTES, {
    message: "KEEP_WINDOW_MINUTES must be >= GRACE_WINDOW_MINUTES",
    path: ["KEEP_WINDOW_MINUTES"],
  });

/**
 * safeParse collects every issue at once so a broken .env is fixed in one go.
 */
const parsed = envSchema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env = parsed.data;

export const OWNER_IDS: string[] = env.OWNER_IDS
  ? env.OWNER_IDS.split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
  : [];
