/**
 * Hushkeeper — src/features/voiceControl/discordContext.ts
 * WHAT: discord.js adapter: member/channel snapshots, capability reads, and the member editor.
 * WHY: Keeps GuildMember/VoiceState handling in one file; the dispatcher only sees plain data.
 * DOCS:
 *  - VoiceState: https://discord.js.org/#/docs/discord.js/main/class/VoiceState
 *  - GuildMemberManager#edit: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberManager?scrollTo=edit
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildMember, VoiceBasedChannel } from "discord.js";
import { MAX_AUDIT_REASON_LENGTH } from "../../lib/constants.js";
import { classifyError } from "../../lib/errors.js";
import { capabilitiesFromPermissions } from "./capabilities.js";
import type { DispatchContext } from "./dispatcher.js";
import type { MemberEditor, TargetState, VoiceChannelSnapshot, VoiceMember } from "./types.js";

/** Server-side flags only; self-mute/self-deafen are the member's own business. */
export function snapshotMember(member: GuildMember): VoiceMember {
  return {
    id: member.id,
    displayName: member.displayName,
    isBot: member.user.bot,
    mute: member.voice.serverMute ?? false,
    deaf: member.voice.serverDeaf ?? false,
    channelId: member.voice.channelId,
  };
}

export function snapshotChannel(channel: VoiceBasedChannel): VoiceChannelSnapshot {
  return {
    id: channel.id,
    name: channel.name,
    members: Array.from(channel.members.values(), snapshotMember),
  };
}

/**
 * Edits through the guild's member manager, so members that dropped out of the
 * cache mid-batch still get a request (and a real error if they left).
 */
export class GuildMemberEditor implements MemberEditor {
  constructor(
    private readonly guild: Guild,
    private readonly reason: string
  ) {}

  async apply(member: VoiceMember, target: TargetState): Promise<void> {
    await this.guild.members.edit(member.id, {
      ...(target.mute !== undefined ? { mute: target.mute } : {}),
      ...(target.deaf !== undefined ? { deaf: target.deaf } : {}),
      reason: this.reason,
    });
  }
}

// Unknown Member, Unknown User
const NOT_A_MEMBER_CODES = new Set([10007, 10013]);

/** Cache first, then REST. null when the user is not in the guild; other errors propagate. */
export async function fetchGuildMember(guild: Guild, userId: string): Promise<GuildMember | null> {
  const cached = guild.members.cache.get(userId);
  if (cached) return cached;
  try {
    return await guild.members.fetch(userId);
  } catch (err) {
    const classified = classifyError(err);
    if (classified.kind === "discord_api" && NOT_A_MEMBER_CODES.has(classified.code)) {
      return null;
    }
    throw err;
  }
}

export function auditReason(commandName: string, callerTag: string): string {
  return `${commandName} by ${callerTag}`.slice(0, MAX_AUDIT_REASON_LENGTH);
}

/**
 * Builds the lazy per-invocation context for a caller inside a guild.
 * Nothing is read until the dispatcher asks for it.
 */
export function buildGuildDispatchContext(
  caller: GuildMember,
  options: { commandName: string; target?: GuildMember }
): DispatchContext {
  const { guild } = caller;
  return {
    callerName: caller.displayName,
    callerChannel: async () => {
      const channel = caller.voice.channel;
      return channel ? snapshotChannel(channel) : null;
    },
    callerCapabilities: async () => capabilitiesFromPermissions(caller.permissions),
    botCapabilities: async () => {
      const me = guild.members.me ?? (await guild.members.fetchMe());
      return capabilitiesFromPermissions(me.permissions);
    },
    target: options.target ? snapshotMember(options.target) : undefined,
    editor: new GuildMemberEditor(guild, auditReason(options.commandName, caller.user.tag)),
  };
}
