/**
 * Hushkeeper — src/features/voiceControl/commandTable.ts
 * WHAT: The eight voice transitions and the sixteen commands derived from them.
 * WHY: Every surface (slash builders, prefix parser, help embed) reads this table instead of
 *      carrying its own copy of names, targets and permission requirements.
 * FLOWS: VOICE_TRANSITIONS → VOICE_COMMANDS (bulk "<key>all" + member "<key>") → findVoiceCommand(name)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Capability, SelectionMode, TargetState } from "./types.js";

export type VoiceTransitionKey =
  | "mute"
  | "unmute"
  | "deafen"
  | "undeafen"
  | "mutedeafen"
  | "muteundeafen"
  | "unmuteundeafen"
  | "unmutedeafen";

export type VoiceTransition = {
  key: VoiceTransitionKey;
  target: TargetState;
  requires: readonly Capability[];
  selection: SelectionMode;
  /** past tense for audit lines: "muted", "muted+undeafened" */
  pastTense: string;
  /** fragment for descriptions: "Mute and undeafen" */
  action: string;
};

export type VoiceCommandScope = "bulk" | "member";

export type VoiceCommandSpec = {
  name: string;
  scope: VoiceCommandScope;
  description: string;
  transition: VoiceTransition;
};

const MUTE: readonly Capability[] = ["mute"];
const DEAFEN: readonly Capability[] = ["deafen"];
const BOTH: readonly Capability[] = ["mute", "deafen"];

/**
 * Every transition selects with any-differing, so a bulk run always converges each
 * specified dimension. Members already at the target on every dimension are skipped.
 */
export const VOICE_TRANSITIONS: readonly VoiceTransition[] = [
  { key: "mute", target: { mute: true }, requires: MUTE, selection: "any-differing", pastTense: "muted", action: "Mute" },
  { key: "unmute", target: { mute: false }, requires: MUTE, selection: "any-differing", pastTense: "unmuted", action: "Unmute" },
  { key: "deafen", target: { deaf: true }, requires: DEAFEN, selection: "any-differing", pastTense: "deafened", action: "Deafen" },
  { key: "undeafen", target: { deaf: false }, requires: DEAFEN, selection: "any-differing", pastTense: "undeafened", action: "Undeafen" },
  {
    key: "mutedeafen",
    target: { mute: true, deaf: true },
    requires: BOTH,
    selection: "any-differing",
    pastTense: "muted+deafened",
    action: "Mute and deafen",
  },
  {
    key: "muteundeafen",
    target: { mute: true, deaf: false },
    requires: BOTH,
    selection: "any-differing",
    pastTense: "muted+undeafened",
    action: "Mute and undeafen",
  },
  {
    key: "unmuteundeafen",
    target: { mute: false, deaf: false },
    requires: BOTH,
    selection: "any-differing",
    pastTense: "unmuted+undeafened",
    action: "Unmute and undeafen",
  },
  {
    key: "unmutedeafen",
    target: { mute: false, deaf: true },
    requires: BOTH,
    selection: "any-differing",
    pastTense: "unmuted+deafened",
    action: "Unmute and deafen",
  },
];

export function bulkCommandName(key: VoiceTransitionKey): string {
  return `${key}all`;
}

export const VOICE_COMMANDS: readonly VoiceCommandSpec[] = VOICE_TRANSITIONS.flatMap((transition) => [
  {
    name: bulkCommandName(transition.key),
    scope: "bulk" as const,
    description: `${transition.action} all members in your voice channel`,
    transition,
  },
  {
    name: transition.key,
    scope: "member" as const,
    description: `${transition.action} a specific user in your voice channel`,
    transition,
  },
]);

const byName = new Map(VOICE_COMMANDS.map((spec) => [spec.name, spec]));

/** Case-insensitive; undefined for anything that isn't a voice command. */
export function findVoiceCommand(name: string): VoiceCommandSpec | undefined {
  return byName.get(name.toLowerCase());
}
