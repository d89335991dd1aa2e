/**
 * Hushkeeper -- tests/utils/discordMocks.ts
 * WHAT: Factory functions for minimal discord.js mocks: guilds, voice channels, members, interactions, messages.
 * WHY: Avoids boilerplate in test files and keeps mock shapes consistent.
 * USAGE:
 *  const guild = createMockGuild();
 *  const channel = createMockVoiceChannel({ name: "Game Night" });
 *  const caller = createMockGuildMember({ guild, id: "100000000000000001", channel, permissions: { mute: true } });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { vi } from "vitest";
import {
  Collection,
  PermissionFlagsBits,
  type ChatInputCommandInteraction,
  type Guild,
  type GuildMember,
  type Message,
  type PermissionsBitField,
  type User,
  type VoiceBasedChannel,
} from "discord.js";

// ===== Permissions =====

export type MockPermissions = { mute?: boolean; deafen?: boolean; admin?: boolean };

/** Only `has` is implemented; flags are matched exactly (no Administrator implication). */
export function createMockPermissions(perms: MockPermissions = {}): PermissionsBitField {
  const granted = new Set<bigint>();
  if (perms.mute) granted.add(PermissionFlagsBits.MuteMembers);
  if (perms.deafen) granted.add(PermissionFlagsBits.DeafenMembers);
  if (perms.admin) granted.add(PermissionFlagsBits.Administrator);
  return { has: vi.fn((flag: bigint) => granted.has(flag)) } as unknown as PermissionsBitField;
}

// ===== Users =====

export function createMockUser(overrides: { id?: string; username?: string; globalName?: string | null; bot?: boolean } = {}): User {
  const username = overrides.username ?? "testuser";
  return {
    id: overrides.id ?? "100000000000000001",
    username,
    globalName: overrides.globalName ?? null,
    tag: `${username}#0`,
    bot: overrides.bot ?? false,
  } as unknown as User;
}

// ===== Guilds and channels =====

/**
 * members.fetch resolves from the cache and rejects with Unknown Member (10007) otherwise.
 * members.edit resolves by default; override per test with mockImplementation.
 */
export function createMockGuild(overrides: { id?: string; name?: string } = {}): Guild {
  const cache = new Collection<string, GuildMember>();
  const members: { me: GuildMember | null } & Record<string, unknown> = {
    cache,
    me: null,
    fetch: vi.fn(async (id: string) => {
      const member = cache.get(id);
      if (!member) throw createDiscordAPIError(10007, "Unknown Member", 404);
      return member;
    }),
    fetchMe: vi.fn(async () => {
      if (!members.me) throw new Error("bot member not set");
      return members.me;
    }),
    edit: vi.fn().mockResolvedValue(undefined),
  };
  return {
    id: overrides.id ?? "200000000000000001",
    name: overrides.name ?? "Test Guild",
    members,
  } as unknown as Guild;
}

export function createMockVoiceChannel(overrides: { id?: string; name?: string } = {}): VoiceBasedChannel {
  return {
    id: overrides.id ?? "300000000000000001",
    name: overrides.name ?? "Game Night",
    members: new Collection<string, GuildMember>(),
  } as unknown as VoiceBasedChannel;
}

export type MockMemberOptions = {
  guild: Guild;
  id: string;
  username?: string;
  displayName?: string;
  globalName?: string | null;
  bot?: boolean;
  mute?: boolean;
  deaf?: boolean;
  channel?: VoiceBasedChannel | null;
  permissions?: MockPermissions;
};

/** Registers the member in the guild cache and, when given, in the channel roster. */
export function createMockGuildMember(options: MockMemberOptions): GuildMember {
  const user = createMockUser({
    id: options.id,
    username: options.username ?? `user${options.id.slice(-3)}`,
    globalName: options.globalName,
    bot: options.bot,
  });
  const channel = options.channel ?? null;
  const member = {
    id: options.id,
    user,
    guild: options.guild,
    displayName: options.displayName ?? user.username,
    permissions: createMockPermissions(options.permissions),
    voice: {
      channel,
      channelId: channel?.id ?? null,
      serverMute: options.mute ?? false,
      serverDeaf: options.deaf ?? false,
    },
  } as unknown as GuildMember;

  options.guild.members.cache.set(member.id, member);
  channel?.members.set(member.id, member);
  return member;
}

/** Sets guild.members.me, which the bot-capability guard reads. */
export function setBotMember(guild: Guild, permissions: MockPermissions): GuildMember {
  const bot = createMockGuildMember({ guild, id: "900000000000000001", username: "VoiceBot", bot: true, permissions });
  Reflect.set(guild.members, "me", bot);
  return bot;
}

// ===== Interactions =====

type MockOptionsConfig = {
  getString?: Record<string, string | null>;
  getUser?: Record<string, User | null>;
  getMember?: Record<string, GuildMember | null>;
};

function createMockOptions(config: MockOptionsConfig = {}) {
  return {
    getString: vi.fn((name: string) => config.getString?.[name] ?? null),
    getUser: vi.fn((name: string) => config.getUser?.[name] ?? null),
    getMember: vi.fn((name: string) => config.getMember?.[name] ?? null),
  };
}

/**
 * A slash interaction. With a `member` it behaves as a cached-guild interaction;
 * with `member: null` inCachedGuild() is false (DMs, uncached guilds).
 */
export function createMockInteraction(
  overrides: {
    commandName?: string;
    member?: GuildMember | null;
    guildId?: string | null;
    memberPermissions?: PermissionsBitField | null;
    options?: MockOptionsConfig;
  } = {}
): ChatInputCommandInteraction {
  const member = overrides.member ?? null;
  const user = member?.user ?? createMockUser();
  const guild = member?.guild ?? null;
  const interaction: { deferred: boolean; replied: boolean } & Record<string, unknown> = {
    id: "interaction-123",
    applicationId: "700000000000000001",
    commandName: overrides.commandName ?? "test",
    user,
    member,
    guild,
    guildId: overrides.guildId !== undefined ? overrides.guildId : (guild?.id ?? null),
    channelId: "channel-123",
    memberPermissions: overrides.memberPermissions ?? null,
    deferred: false,
    replied: false,
    options: createMockOptions(overrides.options),
    inCachedGuild: vi.fn(() => member !== null),
    reply: vi.fn(async () => {
      interaction.replied = true;
    }),
    deferReply: vi.fn(async () => {
      interaction.deferred = true;
    }),
    editReply: vi.fn().mockResolvedValue(undefined),
    followUp: vi.fn().mockResolvedValue(undefined),
  };
  return interaction as unknown as ChatInputCommandInteraction;
}

// ===== Messages =====

export function createMockMessage(
  overrides: {
    content?: string;
    member?: GuildMember | null;
    author?: User;
    webhookId?: string | null;
  } = {}
): Message {
  const member = overrides.member ?? null;
  const guild = member?.guild ?? null;
  return {
    id: "message-123",
    content: overrides.content ?? "",
    author: overrides.author ?? member?.user ?? createMockUser(),
    member,
    guild,
    guildId: guild?.id ?? null,
    channelId: "channel-123",
    webhookId: overrides.webhookId ?? null,
    inGuild: vi.fn(() => guild !== null),
    reply: vi.fn().mockResolvedValue(undefined),
  } as unknown as Message;
}

// ===== Errors =====

/**
 * Mirrors discord.js naming ("DiscordAPIError[50013]") so classifyError sees a Discord error.
 */
export function createDiscordAPIError(
  code: number,
  message: string,
  httpStatus = 400
): Error & { code: number; status: number } {
  return Object.assign(new Error(message), {
    name: `DiscordAPIError[${code}]`,
    code,
    status: httpStatus,
  });
}

export function createNetworkError(code: string, message = `Network error: ${code}`): Error & { code: string } {
  return Object.assign(new Error(message), { code });
}
