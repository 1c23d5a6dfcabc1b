/**
 * Countdown Bot — src/features/countdown/capabilities.ts
 * WHAT: Turns missing channel permissions into one structured report plus a fix-it checklist.
 * WHY: The owner gets a single actionable DM instead of a pile of raw 50013 errors.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ALL_CAPABILITIES, type Capability } from "./messaging.js";

export type CapabilityOperation = "announce" | "status" | "pin" | "digest";

export interface CapabilityReport {
  guildId: string;
  channelId: string;
  operation: CapabilityOperation;
  missing: Capability[];
}

/** Discord's name for each capability, as shown in channel permission settings */
const PERMISSION_LABELS: Record<Capability, string> = {
  view: "View Channel",
  send: "Send Messages",
  embedLinks: "Embed Links",
  readHistory: "Read Message History",
  manageMessages: "Manage Messages (needed to pin)",
  mentionEveryone: "Mention @everyone, @here, and All Roles",
};

const REQUIRED: Record<CapabilityOperation, Capability[]> = {
  announce: ["view", "send"],
  status: ["view", "send", "embedLinks", "readHistory"],
  pin: ["manageMessages"],
  digest: ["view", "send"],
};

export function requiredFor(operation: CapabilityOperation): Capability[] {
  return REQUIRED[operation];
}

/**
 * Missing capabilities in canonical order, so the same set always produces the
 * same report (and the same rate-limit key).
 */
export function missingCapabilities(
  have: ReadonlySet<Capability>,
  needed: readonly Capability[]
): Capability[] {
  return ALL_CAPABILITIES.filter((cap) => needed.includes(cap) && !have.has(cap));
}

export function buildReport(
  guildId: string,
  channelId: string,
  operation: CapabilityOperation,
  missing: Capability[]
): CapabilityReport | null {
  if (missing.length === 0) return null;
  return { guildId, channelId, operation, missing };
}

export function mergeReports(a: CapabilityReport | null, b: CapabilityReport | null): CapabilityReport | null {
  if (!a) return b;
  if (!b) return a;
  const merged = new Set<Capability>([...a.missing, ...b.missing]);
  return { ...a, missing: ALL_CAPABILITIES.filter((cap) => merged.has(cap)) };
}

export function remediationLabel(cap: Capability): string {
  return PERMISSION_LABELS[cap];
}

export function remediationChecklist(report: CapabilityReport): string {
  const lines = [
    `I'm missing permissions in <#${report.channelId}> and can't keep the countdown up to date.`,
    "",
    "Open the channel's settings → Permissions, select my role, and allow:",
    ...report.missing.map((cap) => `• ${remediationLabel(cap)}`),
    "",
    "Once that's fixed, run `/countdown refresh` or wait for the next update.",
  ];
  return lines.join("\n");
}
