/**
 * Countdown Bot — src/lib/errors.ts
 * WHAT: Discriminated union error types plus the InputError thrown at the command boundary.
 * WHY: The reconciliation loop and the command layer recover differently per error kind.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (retry next tick)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 *  - errorContext(err) / userFriendlyMessage(err) → log fields and reply text
 * USAGE:
 *  import { classifyError, isRecoverable } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10008) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * Base shape for the union. `kind` is the discriminator; it narrows in switch
 * statements and works across module boundaries where instanceof does not.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Discord API errors.
 *
 * Codes that matter here:
 * - 10003: Unknown Channel
 * - 10008: Unknown Message (status message deleted by a human)
 * - 50001: Missing Access (can't see channel)
 * - 50013: Missing Permissions
 * - 30003: Maximum pins reached
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** User input rejected before any state was touched */
export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
  value?: unknown;
}

/** Discord channel permission errors */
export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
  channelId?: string;
  guildId?: string;
}

/**
 * Node system errors on the way to Discord. The request never arrived or the
 * connection dropped; the next tick will try again.
 */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

/** State file I/O errors */
export interface StorageError extends AppError {
  kind: "storage";
  code: string;
  path?: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DiscordApiError
  | ValidationError
  | PermissionError
  | NetworkError
  | StorageError
  | UnknownError;

/**
 * Thrown by command-facing operations when input is invalid or refers to
 * something that does not exist. Always thrown before mutating state.
 */
export class InputError extends Error {
  readonly field: string;
  readonly value?: unknown;

  constructor(field: string, message: string, value?: unknown) {
    super(message);
    this.name = "InputError";
    this.field = field;
    this.value = value;
  }
}

/** Thrown by the platform adapter when a Discord call outlives its timeout */
export class PlatformTimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "PlatformTimeoutError";
  }
}

// ===== Error Classification =====

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];
const STORAGE_CODES = ["ENOENT", "EACCES", "EPERM", "ENOSPC", "EROFS", "EISDIR", "EBUSY", "EMFILE"];

/** Reads a property off an arbitrary thrown value; undefined for primitives */
function fieldOf(err: unknown, key: string): unknown {
  return typeof err === "object" && err !== null ? Reflect.get(err, key) : undefined;
}

function optString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Classify any caught error. Ordered most specific first: our own InputError,
 * Discord permission codes, other Discord errors, network, storage, fallback.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (err instanceof InputError) {
    return { kind: "validation", field: err.field, value: err.value, message: err.message, cause };
  }

  const message = optString(fieldOf(err, "message")) ?? String(err);
  const code = fieldOf(err, "code");
  const name = optString(fieldOf(err, "name"));

  // 50013 = Missing Permissions, 50001 = Missing Access (can't see the channel at all).
  // The error alone doesn't say which permission; callers consult getCapabilities().
  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  if (name === "DiscordAPIError" || (name?.includes("Discord") && typeof code === "number")) {
    return {
      kind: "discord_api",
      code: optNumber(code) ?? 0,
      httpStatus: optNumber(fieldOf(err, "httpStatus")) ?? optNumber(fieldOf(err, "status")),
      method: optString(fieldOf(err, "method")),
      path: optString(fieldOf(err, "path")) ?? optString(fieldOf(err, "url")),
      message,
      cause,
    };
  }

  if (name === "PlatformTimeoutError") {
    return { kind: "network", code: "ETIMEDOUT", message, cause };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: optString(fieldOf(err, "hostname")) ?? optString(fieldOf(err, "host")),
      message,
      cause,
    };
  }

  if (typeof code === "string" && STORAGE_CODES.includes(code)) {
    return { kind: "storage", code, path: optString(fieldOf(err, "path")), message, cause };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Worth trying again on the next tick. Discord rate limits (429) are queued by
 * discord.js itself, so they never surface here.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;
    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }
    case "storage":
      return err.code === "EBUSY" || err.code === "EMFILE";
    default:
      return false;
  }
}

export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10003, // Unknown channel (deleted)
        10008, // Unknown message (status message deleted)
        30003, // Max pins reached
        50013, // Missing permissions
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "network":
    case "validation":
    case "permission":
      return false;
    default:
      return true;
  }
}

export function isUnknownMessage(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10008;
}

export function isUnknownChannel(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10003;
}

// ===== Error Context Helpers =====

export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus, method: err.method, path: err.path };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, neededPerms: err.needed, channelId: err.channelId, guildId: err.guildId };
    case "storage":
      return { ...base, storageCode: err.code, path: err.path };
    case "validation":
      return { ...base, field: err.field };
    default:
      return base;
  }
}

/**
 * Text shown to the person who ran a command.
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "validation":
      return err.message;
    case "permission":
      return "I don't have the channel permissions I need for that. Check my role in the events channel.";
    case "discord_api":
      if (err.code === 10003) return "I can't find the configured events channel anymore.";
      return "Discord rejected that request. Please try again in a moment.";
    case "network":
      return "I couldn't reach Discord just now. Please try again.";
    case "storage":
      return "I couldn't save that change. Nothing was modified; please try again.";
    default:
      return "An unexpected error occurred.";
  }
}
