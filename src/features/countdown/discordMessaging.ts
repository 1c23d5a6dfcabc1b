/**
 * Countdown Bot — src/features/countdown/discordMessaging.ts
 * WHAT: discord.js implementation of MessagingPort.
 * WHY: Confines every discord.js call the countdown core makes to one file, each
 *      bounded by a timeout and mapped to a FailureReason instead of throwing.
 * DOCS:
 *  - TextChannel: https://discord.js.org/#/docs/discord.js/main/class/TextChannel
 *  - PermissionFlagsBits: https://discord-api-types.dev/api/discord-api-types-v10#PermissionFlagsBits
 *  - Allowed mentions: https://discord.com/developers/docs/resources/message#allowed-mentions-object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  EmbedBuilder,
  PermissionFlagsBits,
  type Client,
  type Message,
  type NewsChannel,
  type TextChannel,
} from "discord.js";
import { classifyError, PlatformTimeoutError, type ClassifiedError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import {
  ALL_CAPABILITIES,
  fail,
  ok,
  type Capability,
  type ChannelHandle,
  type EmbedSpec,
  type FailureReason,
  type MentionPolicy,
  type MessageHandle,
  type MessagingPort,
  type OutgoingMessage,
  type PlatformResult,
} from "./messaging.js";

type StatusChannel = TextChannel | NewsChannel;

// Unknown Channel, Unknown Guild, Unknown Message, Unknown User
const NOT_FOUND_CODES = [10003, 10004, 10008, 10013];
// Cannot send messages to this user (DMs closed)
const DM_CLOSED_CODE = 50007;

const CAPABILITY_FLAGS: Record<Capability, bigint> = {
  view: PermissionFlagsBits.ViewChannel,
  send: PermissionFlagsBits.SendMessages,
  embedLinks: PermissionFlagsBits.EmbedLinks,
  readHistory: PermissionFlagsBits.ReadMessageHistory,
  manageMessages: PermissionFlagsBits.ManageMessages,
  mentionEveryone: PermissionFlagsBits.MentionEveryone,
};

export function toFailureReason(err: ClassifiedError): FailureReason {
  switch (err.kind) {
    case "permission":
      return err.needed.includes("ViewChannel") ? "missing_access" : "missing_permissions";
    case "discord_api":
      if (NOT_FOUND_CODES.includes(err.code)) return "not_found";
      if (err.code === DM_CLOSED_CODE) return "missing_access";
      if (err.httpStatus === 429) return "rate_limited";
      return "unknown";
    case "network":
      return err.code === "ETIMEDOUT" ? "timeout" : "network";
    default:
      return "unknown";
  }
}

export async function withTimeout<T>(label: string, work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PlatformTimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function toEmbed(spec: EmbedSpec): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle(spec.title);
  if (spec.description) embed.setDescription(spec.description);
  if (spec.color !== undefined) embed.setColor(spec.color);
  if (spec.fields?.length) embed.addFields(spec.fields.map((f) => ({ ...f, inline: f.inline ?? false })));
  if (spec.footer) embed.setFooter({ text: spec.footer });
  if (spec.imageUrl) embed.setImage(spec.imageUrl);
  return embed;
}

function notTextChannel<T>(channelId: string): PlatformResult<T> {
  return fail("not_found", `Channel ${channelId} is not a guild text channel`);
}

function toHandle(message: Message): MessageHandle {
  return {
    id: message.id,
    channelId: message.channelId,
    authorId: message.author.id,
    pinned: message.pinned,
  };
}

export class DiscordMessaging implements MessagingPort {
  constructor(
    private readonly client: Client,
    private readonly timeoutMs: number
  ) {}

  selfId(): string {
    // Only empty before login; the scheduler starts after ready
    return this.client.user?.id ?? "";
  }

  guildName(guildId: string): string | undefined {
    return this.client.guilds.cache.get(guildId)?.name;
  }

  /** Runs one platform call under the timeout; a throw becomes a classified failure. */
  private async call<T>(label: string, work: () => Promise<PlatformResult<T>>): Promise<PlatformResult<T>> {
    try {
      return await withTimeout(label, work(), this.timeoutMs);
    } catch (err) {
      const classified = classifyError(err);
      const reason = toFailureReason(classified);
      logger.debug({ label, reason, errorKind: classified.kind }, "[messaging] platform call failed");
      return fail(reason, classified.message);
    }
  }

  /** null when the id resolves to something other than a guild text or announcement channel */
  private async statusChannel(channelId: string): Promise<StatusChannel | null> {
    const channel = await this.client.channels.fetch(channelId);
    if (channel?.type === ChannelType.GuildText || channel?.type === ChannelType.GuildAnnouncement) {
      return channel;
    }
    return null;
  }

  private async message(handle: MessageHandle): Promise<Message | null> {
    const channel = await this.statusChannel(handle.channelId);
    return channel ? channel.messages.fetch(handle.id) : null;
  }

  async resolveChannel(channelId: string): Promise<PlatformResult<ChannelHandle>> {
    return this.call<ChannelHandle>("resolveChannel", async () => {
      const channel = await this.statusChannel(channelId);
      return channel ? ok({ id: channel.id, guildId: channel.guildId }) : notTextChannel(channelId);
    });
  }

  async sendMessage(
    channel: ChannelHandle,
    message: OutgoingMessage,
    mentions: MentionPolicy
  ): Promise<PlatformResult<MessageHandle>> {
    return this.call<MessageHandle>("sendMessage", async () => {
      const target = await this.statusChannel(channel.id);
      if (!target) return notTextChannel(channel.id);
      const sent = await target.send({
        content: message.content || undefined,
        embeds: message.embed ? [toEmbed(message.embed)] : [],
        allowedMentions: { parse: [], roles: mentions.roleIds, users: mentions.userIds ?? [] },
      });
      return ok(toHandle(sent));
    });
  }

  async editMessage(handle: MessageHandle, content: OutgoingMessage): Promise<PlatformResult<void>> {
    return this.call<void>("editMessage", async () => {
      const message = await this.message(handle);
      if (!message) return notTextChannel(handle.channelId);
      await message.edit({
        // null clears stale text when switching from plain text back to an embed
        content: content.content || null,
        embeds: content.embed ? [toEmbed(content.embed)] : [],
        allowedMentions: { parse: [] },
      });
      return ok(undefined);
    });
  }

  async pinMessage(handle: MessageHandle): Promise<PlatformResult<void>> {
    return this.call<void>("pinMessage", async () => {
      const message = await this.message(handle);
      if (!message) return notTextChannel(handle.channelId);
      await message.pin();
      return ok(undefined);
    });
  }

  async unpinMessage(handle: MessageHandle): Promise<PlatformResult<void>> {
    return this.call<void>("unpinMessage", async () => {
      const message = await this.message(handle);
      if (!message) return notTextChannel(handle.channelId);
      await message.unpin();
      return ok(undefined);
    });
  }

  async fetchMessage(channel: ChannelHandle, messageId: string): Promise<PlatformResult<MessageHandle>> {
    return this.call<MessageHandle>("fetchMessage", async () => {
      const target = await this.statusChannel(channel.id);
      if (!target) return notTextChannel(channel.id);
      return ok(toHandle(await target.messages.fetch(messageId)));
    });
  }

  async listPinned(channel: ChannelHandle): Promise<PlatformResult<MessageHandle[]>> {
    return this.call<MessageHandle[]>("listPinned", async () => {
      const target = await this.statusChannel(channel.id);
      if (!target) return notTextChannel(channel.id);
      const pinned = await target.messages.fetchPinned();
      return ok(
        [...pinned.values()]
          .sort((a, b) => b.createdTimestamp - a.createdTimestamp)
          .map(toHandle)
      );
    });
  }

  async getCapabilities(channel: ChannelHandle): Promise<Set<Capability>> {
    const result = await this.call<Set<Capability>>("getCapabilities", async () => {
      const target = await this.statusChannel(channel.id);
      if (!target) return notTextChannel(channel.id);
      const me = target.guild.members.me ?? (await target.guild.members.fetchMe());
      const perms = target.permissionsFor(me);
      const caps = new Set<Capability>();
      for (const cap of ALL_CAPABILITIES) {
        if (perms.has(CAPABILITY_FLAGS[cap])) caps.add(cap);
      }
      return ok(caps);
    });
    if (result.ok) return result.value;
    // Permission lookup failed transiently: assume granted and let the real calls report what fails
    logger.warn({ channelId: channel.id, reason: result.reason }, "[messaging] capability lookup failed");
    return new Set<Capability>(ALL_CAPABILITIES);
  }

  async getGuildOwnerId(guildId: string): Promise<PlatformResult<string>> {
    return this.call<string>("getGuildOwnerId", async () => {
      const guild = await this.client.guilds.fetch(guildId);
      return ok(guild.ownerId);
    });
  }

  async sendDirectMessage(userId: string, message: OutgoingMessage): Promise<PlatformResult<void>> {
    return this.call<void>("sendDirectMessage", async () => {
      const user = await this.client.users.fetch(userId);
      await user.send({
        content: message.content || undefined,
        embeds: message.embed ? [toEmbed(message.embed)] : [],
        allowedMentions: { parse: [] },
      });
      return ok(undefined);
    });
  }

  async findPostableChannel(guildId: string): Promise<PlatformResult<ChannelHandle>> {
    return this.call<ChannelHandle>("findPostableChannel", async () => {
      const guild = await this.client.guilds.fetch(guildId);
      const me = guild.members.me ?? (await guild.members.fetchMe());
      const canPost = (channel: StatusChannel) =>
        channel.permissionsFor(me).has([PermissionFlagsBits.ViewChannel, PermissionFlagsBits.SendMessages]);

      const system = guild.systemChannel;
      if (system && canPost(system)) return ok({ id: system.id, guildId });

      const channels = await guild.channels.fetch();
      const candidates = [...channels.values()]
        .filter((c): c is StatusChannel => c?.type === ChannelType.GuildText || c?.type === ChannelType.GuildAnnouncement)
        .sort((a, b) => a.rawPosition - b.rawPosition);
      const target = candidates.find(canPost);
      return target ? ok({ id: target.id, guildId }) : fail("not_found", `No postable channel in guild ${guildId}`);
    });
  }
}
