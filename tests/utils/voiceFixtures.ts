/**
 * Hushkeeper -- tests/utils/voiceFixtures.ts
 * WHAT: Plain-data builders for voice snapshots, a recording MemberEditor, and dispatch contexts.
 * USAGE:
 *  const alice = voiceMember({ id: "a", displayName: "Alice", mute: true });
 *  const editor = recordingEditor({ failWith: { b: createDiscordAPIError(50013, "Missing Permissions", 403) } });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { vi } from "vitest";
import type { DispatchContext } from "../../src/features/voiceControl/dispatcher.js";
import type {
  Capabilities,
  MemberEditor,
  TargetState,
  VoiceChannelSnapshot,
  VoiceMember,
} from "../../src/features/voiceControl/types.js";

export const CHANNEL_ID = "voice-1";

export function voiceMember(overrides: Partial<VoiceMember> & { id: string }): VoiceMember {
  return {
    displayName: overrides.id,
    isBot: false,
    mute: false,
    deaf: false,
    channelId: CHANNEL_ID,
    ...overrides,
  };
}

export function channelSnapshot(members: VoiceMember[], name = "Game Night"): VoiceChannelSnapshot {
  return { id: CHANNEL_ID, name, members };
}

export type RecordedEdit = { memberId: string; target: TargetState };

/**
 * Records every apply() in call order. Members listed in failWith reject with that error.
 * delayMs (per member id) makes completion order differ from call order.
 */
export function recordingEditor(
  options: { failWith?: Record<string, unknown>; delayMs?: Record<string, number> } = {}
): MemberEditor & { calls: RecordedEdit[]; maxInFlight: () => number } {
  const calls: RecordedEdit[] = [];
  let inFlight = 0;
  let peak = 0;
  return {
    calls,
    maxInFlight: () => peak,
    async apply(member: VoiceMember, target: TargetState) {
      calls.push({ memberId: member.id, target });
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      try {
        const delay = options.delayMs?.[member.id] ?? 0;
        await new Promise((resolve) => setTimeout(resolve, delay));
        if (options.failWith && member.id in options.failWith) {
          throw options.failWith[member.id];
        }
      } finally {
        inFlight -= 1;
      }
    },
  };
}

export const ALL_CAPABILITIES: Capabilities = { canMute: true, canDeafen: true };

/** Caller and bot hold every capability unless overridden. */
export function dispatchContext(
  overrides: Partial<{
    channel: VoiceChannelSnapshot | null;
    caller: Capabilities;
    bot: Capabilities;
    target: VoiceMember;
    editor: MemberEditor;
    callerName: string;
  }> = {}
): DispatchContext {
  const channel = overrides.channel === undefined ? channelSnapshot([]) : overrides.channel;
  return {
    callerName: overrides.callerName ?? "Host",
    callerChannel: vi.fn(async () => channel),
    callerCapabilities: vi.fn(async () => overrides.caller ?? ALL_CAPABILITIES),
    botCapabilities: vi.fn(async () => overrides.bot ?? ALL_CAPABILITIES),
    target: overrides.target,
    editor: overrides.editor ?? recordingEditor(),
  };
}
