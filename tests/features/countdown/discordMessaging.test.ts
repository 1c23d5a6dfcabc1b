/**
 * Countdown Bot — tests/features/countdown/discordMessaging.test.ts
 * WHAT: The discord.js adapter's failure mapping, against a stubbed client.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, afterEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { ChannelType, type Client } from "discord.js";
import { DiscordMessaging } from "../../../src/features/countdown/discordMessaging.js";

const CHANNEL = { id: "c1", guildId: "g1" };

function stubClient(parts: Record<string, unknown>): Client {
  return parts as unknown as Client;
}

function channelsReturning(channel: unknown) {
  return { fetch: vi.fn(async () => channel) };
}

function discordError(message: string, code: number): Error {
  return Object.assign(new Error(message), { name: "DiscordAPIError", code });
}

describe("DiscordMessaging", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves a guild text channel", async () => {
    const client = stubClient({ channels: channelsReturning({ type: ChannelType.GuildText, id: "c1", guildId: "g1" }) });

    await expect(new DiscordMessaging(client, 1000).resolveChannel("c1")).resolves.toEqual({
      ok: true,
      value: { id: "c1", guildId: "g1" },
    });
  });

  it("treats a voice channel as not found", async () => {
    const client = stubClient({ channels: channelsReturning({ type: ChannelType.GuildVoice, id: "c1", guildId: "g1" }) });

    await expect(new DiscordMessaging(client, 1000).resolveChannel("c1")).resolves.toEqual({
      ok: false,
      reason: "not_found",
      detail: "Channel c1 is not a guild text channel",
    });
  });

  it("sends nothing when the stored channel is no longer a text channel", async () => {
    const send = vi.fn();
    const client = stubClient({ channels: channelsReturning({ type: ChannelType.GuildVoice, id: "c1", send }) });

    const result = await new DiscordMessaging(client, 1000).sendMessage(CHANNEL, { content: "hi" }, { roleIds: [] });

    expect(result).toEqual({ ok: false, reason: "not_found", detail: "Channel c1 is not a guild text channel" });
    expect(send).not.toHaveBeenCalled();
  });

  it("maps Unknown Channel from Discord to not_found", async () => {
    const client = stubClient({
      channels: { fetch: vi.fn(async () => Promise.reject(discordError("Unknown Channel", 10003))) },
    });

    await expect(new DiscordMessaging(client, 1000).resolveChannel("c1")).resolves.toEqual({
      ok: false,
      reason: "not_found",
      detail: "Unknown Channel",
    });
  });

  it("maps closed DMs to missing_access", async () => {
    const send = vi.fn(async () => Promise.reject(discordError("Cannot send messages to this user", 50007)));
    const client = stubClient({ users: { fetch: vi.fn(async () => ({ send })) } });

    const result = await new DiscordMessaging(client, 1000).sendDirectMessage("u1", { content: "hi" });

    expect(result).toEqual({ ok: false, reason: "missing_access", detail: "Cannot send messages to this user" });
  });

  it("reports a guild with no postable channel as not found", async () => {
    const guild = {
      members: { me: { id: "bot-1" } },
      systemChannel: null,
      channels: { fetch: vi.fn(async () => new Map<string, unknown>()) },
    };
    const client = stubClient({ guilds: { fetch: vi.fn(async () => guild) } });

    await expect(new DiscordMessaging(client, 1000).findPostableChannel("g1")).resolves.toEqual({
      ok: false,
      reason: "not_found",
      detail: "No postable channel in guild g1",
    });
  });

  it("gives up on a call that outlives the timeout", async () => {
    vi.useFakeTimers();
    const client = stubClient({ guilds: { fetch: vi.fn(() => new Promise<never>(() => undefined)) } });

    const pending = new DiscordMessaging(client, 500).getGuildOwnerId("g1");
    await vi.advanceTimersByTimeAsync(500);

    await expect(pending).resolves.toEqual({
      ok: false,
      reason: "timeout",
      detail: "getGuildOwnerId timed out after 500ms",
    });
  });
});
