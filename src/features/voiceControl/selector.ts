/**
 * Hushkeeper — src/features/voiceControl/selector.ts
 * WHAT: Picks the members of a roster that actually need an edit.
 * WHY: Skipping members already at the target keeps repeat runs free (zero API calls)
 *      and keeps the success count honest.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { SelectionMode, TargetState, VoiceMember } from "./types.js";

type Dimension = "mute" | "deaf";

function specifiedDimensions(target: TargetState): Dimension[] {
  const dims: Dimension[] = [];
  if (target.mute !== undefined) dims.push("mute");
  if (target.deaf !== undefined) dims.push("deaf");
  return dims;
}

function differsOn(member: VoiceMember, target: TargetState, dim: Dimension): boolean {
  const wanted = target[dim];
  return wanted !== undefined && member[dim] !== wanted;
}

/** True when at least one specified dimension differs. */
export function differsFromTarget(member: VoiceMember, target: TargetState): boolean {
  return specifiedDimensions(target).some((dim) => differsOn(member, target, dim));
}

/** Exact match on every specified dimension. An empty target matches everyone. */
export function matchesTarget(member: VoiceMember, target: TargetState): boolean {
  return !differsFromTarget(member, target);
}

/**
 * Bots are never selected. Roster order is preserved.
 * An empty result is a valid outcome (everyone already there), not an error.
 */
export function selectMembers(
  roster: readonly VoiceMember[],
  target: TargetState,
  mode: SelectionMode
): VoiceMember[] {
  const dims = specifiedDimensions(target);
  if (dims.length === 0) return [];

  return roster.filter((member) => {
    if (member.isBot) return false;
    return mode === "any-differing"
      ? dims.some((dim) => differsOn(member, target, dim))
      : dims.every((dim) => differsOn(member, target, dim));
  });
}
