/**
 * Hushkeeper — src/features/voiceControl/types.ts
 * WHAT: Plain-data model for one voice command invocation.
 * WHY: The selector, executor and dispatcher work on snapshots, not live discord.js objects,
 *      so all of them run in tests without a gateway.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** One member as seen at the moment the command started. */
export type VoiceMember = {
  id: string;
  displayName: string;
  isBot: boolean;
  /** server mute */
  mute: boolean;
  /** server deafen */
  deaf: boolean;
  channelId: string | null;
};

export type VoiceChannelSnapshot = {
  id: string;
  name: string;
  /** roster order; failure lists are sorted by it */
  members: VoiceMember[];
};

export type Capability = "mute" | "deafen";

export type Capabilities = {
  canMute: boolean;
  canDeafen: boolean;
};

/** An absent key leaves that dimension unchanged. */
export type TargetState = {
  mute?: boolean;
  deaf?: boolean;
};

/**
 * any-differing: select when at least one specified dimension differs (converges every dimension).
 * all-differing: select only when every specified dimension differs.
 */
export type SelectionMode = "any-differing" | "all-differing";

export type MutationFailureKind = "permission_denied" | "transient";

export type MutationFailure = {
  member: VoiceMember;
  kind: MutationFailureKind;
  error: unknown;
};

export type MutationOutcome = {
  attempted: VoiceMember[];
  succeeded: number;
  failures: MutationFailure[];
};

/** Applies a target state to one member. Rejects when Discord refuses or the request fails. */
export interface MemberEditor {
  apply(member: VoiceMember, target: TargetState): Promise<void>;
}

export type GuardFailure =
  | { kind: "no_voice_channel" }
  | { kind: "target_not_in_channel"; target: VoiceMember }
  | { kind: "caller_permission_denied"; missing: Capability[] }
  | { kind: "bot_permission_denied"; missing: Capability[] };

/** Problems a surface hits before it can build a dispatch context. */
export type ResolutionProblem = "guild_only" | "missing_target" | "member_not_found";
