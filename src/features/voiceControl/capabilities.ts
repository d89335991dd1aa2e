/**
 * Hushkeeper — src/features/voiceControl/capabilities.ts
 * WHAT: Boolean mute/deafen capability reads for the caller and the bot.
 * WHY: Guards only need two flags; deriving them fresh per invocation means a role change
 *      takes effect on the next command.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { PermissionFlagsBits, type PermissionsBitField } from "discord.js";
import type { Capabilities, Capability } from "./types.js";

export const NO_CAPABILITIES: Capabilities = Object.freeze({ canMute: false, canDeafen: false });

/**
 * Guild-level MuteMembers/DeafenMembers. Administrator implies both, which
 * PermissionsBitField.has already accounts for. A missing bitfield reads as no capability.
 */
export function capabilitiesFromPermissions(
  permissions: Readonly<PermissionsBitField> | null | undefined
): Capabilities {
  if (!permissions) return NO_CAPABILITIES;
  return {
    canMute: permissions.has(PermissionFlagsBits.MuteMembers),
    canDeafen: permissions.has(PermissionFlagsBits.DeafenMembers),
  };
}

export function hasCapability(caps: Capabilities, capability: Capability): boolean {
  return capability === "mute" ? caps.canMute : caps.canDeafen;
}

export function missingCapabilities(caps: Capabilities, required: readonly Capability[]): Capability[] {
  return required.filter((capability) => !hasCapability(caps, capability));
}

export function hasCapabilities(caps: Capabilities, required: readonly Capability[]): boolean {
  return missingCapabilities(caps, required).length === 0;
}
