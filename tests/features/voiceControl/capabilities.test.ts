/**
 * WHAT: Proves capability reads from permission bitfields and the missing-capability helpers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { PermissionFlagsBits, PermissionsBitField } from "discord.js";
import {
  capabilitiesFromPermissions,
  hasCapabilities,
  missingCapabilities,
  NO_CAPABILITIES,
} from "../../../src/features/voiceControl/capabilities.js";

describe("capabilitiesFromPermissions", () => {
  it("reads MuteMembers and DeafenMembers independently", () => {
    expect(capabilitiesFromPermissions(new PermissionsBitField(PermissionFlagsBits.MuteMembers))).toEqual({
      canMute: true,
      canDeafen: false,
    });
    expect(capabilitiesFromPermissions(new PermissionsBitField(PermissionFlagsBits.DeafenMembers))).toEqual({
      canMute: false,
      canDeafen: true,
    });
  });

  it("grants both to administrators", () => {
    expect(capabilitiesFromPermissions(new PermissionsBitField(PermissionFlagsBits.Administrator))).toEqual({
      canMute: true,
      canDeafen: true,
    });
  });

  it("treats a missing bitfield as no capability", () => {
    expect(capabilitiesFromPermissions(null)).toEqual(NO_CAPABILITIES);
    expect(capabilitiesFromPermissions(undefined)).toEqual(NO_CAPABILITIES);
  });
});

describe("missingCapabilities", () => {
  it("lists what is required but not held, in requirement order", () => {
    expect(missingCapabilities({ canMute: false, canDeafen: false }, ["mute", "deafen"])).toEqual(["mute", "deafen"]);
    expect(missingCapabilities({ canMute: true, canDeafen: false }, ["mute", "deafen"])).toEqual(["deafen"]);
    expect(hasCapabilities({ canMute: true, canDeafen: false }, ["mute"])).toBe(true);
    expect(hasCapabilities({ canMute: true, canDeafen: false }, ["deafen"])).toBe(false);
  });
});
