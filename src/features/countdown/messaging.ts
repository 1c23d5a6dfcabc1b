/**
 * Countdown Bot — src/features/countdown/messaging.ts
 * WHAT: The narrow port the countdown core uses to talk to the chat platform.
 * WHY: Lets the reconciler run against an in-memory fake in tests; the discord.js
 *      adapter lives in discordMessaging.ts.
 *
 * Every call returns a PlatformResult instead of throwing. Adapters must bound
 * each call with a timeout.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type Capability =
  | "view"
  | "send"
  | "embedLinks"
  | "readHistory"
  | "manageMessages"
  | "mentionEveryone";

export const ALL_CAPABILITIES: readonly Capability[] = [
  "view",
  "send",
  "embedLinks",
  "readHistory",
  "manageMessages",
  "mentionEveryone",
];

export type FailureReason =
  | "missing_permissions"
  | "missing_access"
  | "not_found"
  | "rate_limited"
  | "timeout"
  | "network"
  | "unknown";

export type PlatformResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: FailureReason; detail?: string };

export interface ChannelHandle {
  id: string;
  guildId: string;
}

export interface MessageHandle {
  id: string;
  channelId: string;
  authorId: string;
  pinned: boolean;
}

/** Roles and users the platform may actually ping; anything else renders silently */
export interface MentionPolicy {
  roleIds: string[];
  userIds?: string[];
}

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface EmbedSpec {
  title: string;
  description?: string;
  color?: number;
  fields?: EmbedField[];
  footer?: string;
  imageUrl?: string;
}

export interface OutgoingMessage {
  content: string;
  embed?: EmbedSpec;
}

export interface MessagingPort {
  /** Id of the bot user; used to recognise our own pins */
  selfId(): string;
  /** Display name from the client's cache; undefined once the bot has left */
  guildName(guildId: string): string | undefined;
  resolveChannel(channelId: string): Promise<PlatformResult<ChannelHandle>>;
  sendMessage(
    channel: ChannelHandle,
    message: OutgoingMessage,
    mentions: MentionPolicy
  ): Promise<PlatformResult<MessageHandle>>;
  editMessage(message: MessageHandle, content: OutgoingMessage): Promise<PlatformResult<void>>;
  pinMessage(message: MessageHandle): Promise<PlatformResult<void>>;
  unpinMessage(message: MessageHandle): Promise<PlatformResult<void>>;
  fetchMessage(channel: ChannelHandle, messageId: string): Promise<PlatformResult<MessageHandle>>;
  /** Newest first */
  listPinned(channel: ChannelHandle): Promise<PlatformResult<MessageHandle[]>>;
  getCapabilities(channel: ChannelHandle): Promise<Set<Capability>>;
  getGuildOwnerId(guildId: string): Promise<PlatformResult<string>>;
  sendDirectMessage(userId: string, message: OutgoingMessage): Promise<PlatformResult<void>>;
  /** The guild's system channel, else the first text channel the bot can post in */
  findPostableChannel(guildId: string): Promise<PlatformResult<ChannelHandle>>;
}

export function ok<T>(value: T): PlatformResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(reason: FailureReason, detail?: string): PlatformResult<T> {
  return { ok: false, reason, detail };
}

export function isPermissionFailure(reason: FailureReason): boolean {
  return reason === "missing_permissions" || reason === "missing_access";
}
