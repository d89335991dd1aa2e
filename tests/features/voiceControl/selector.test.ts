/**
 * WHAT: Proves member selection skips bots, keeps roster order, and honours both selection modes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { differsFromTarget, matchesTarget, selectMembers } from "../../../src/features/voiceControl/selector.js";
import { voiceMember } from "../../utils/voiceFixtures.js";

describe("selectMembers", () => {
  const alice = voiceMember({ id: "alice", mute: false, deaf: false });
  const bob = voiceMember({ id: "bob", mute: true, deaf: false });
  const carol = voiceMember({ id: "carol", mute: false, deaf: true });
  const dave = voiceMember({ id: "dave", mute: true, deaf: true });
  const botty = voiceMember({ id: "botty", isBot: true });

  it("picks unmuted humans for a mute and skips bots", () => {
    const selected = selectMembers([alice, botty, bob, carol], { mute: true }, "any-differing");
    expect(selected.map((m) => m.id)).toEqual(["alice", "carol"]);
  });

  it("returns an empty list when everyone is already at the target", () => {
    expect(selectMembers([bob, dave], { mute: true }, "any-differing")).toEqual([]);
  });

  it("returns an empty list for an empty roster", () => {
    expect(selectMembers([], { deaf: true }, "any-differing")).toEqual([]);
  });

  it("returns an empty list for an empty target", () => {
    expect(selectMembers([alice, bob], {}, "any-differing")).toEqual([]);
  });

  it("any-differing selects members that differ in either dimension of a paired target", () => {
    // target mute+deaf: only dave already matches
    const selected = selectMembers([alice, bob, carol, dave], { mute: true, deaf: true }, "any-differing");
    expect(selected.map((m) => m.id)).toEqual(["alice", "bob", "carol"]);
  });

  it("all-differing selects only members that differ in every dimension", () => {
    const selected = selectMembers([alice, bob, carol, dave], { mute: true, deaf: true }, "all-differing");
    expect(selected.map((m) => m.id)).toEqual(["alice"]);
  });

  it("all-differing on a mixed target (mute on, deaf off) needs both to differ", () => {
    // wants mute=true, deaf=false: carol (false, true) differs on both
    const selected = selectMembers([alice, bob, carol, dave], { mute: true, deaf: false }, "all-differing");
    expect(selected.map((m) => m.id)).toEqual(["carol"]);
  });

  it("never selects a bot even when it differs", () => {
    const loudBot = voiceMember({ id: "loud", isBot: true, mute: false });
    expect(selectMembers([loudBot], { mute: true }, "all-differing")).toEqual([]);
  });
});

describe("differsFromTarget / matchesTarget", () => {
  it("compares only the specified dimensions", () => {
    const member = voiceMember({ id: "x", mute: true, deaf: false });
    expect(differsFromTarget(member, { mute: true })).toBe(false);
    expect(differsFromTarget(member, { deaf: true })).toBe(true);
    expect(matchesTarget(member, { mute: true, deaf: false })).toBe(true);
    expect(matchesTarget(member, { mute: true, deaf: true })).toBe(false);
  });

  it("treats an empty target as already matched", () => {
    expect(matchesTarget(voiceMember({ id: "x" }), {})).toBe(true);
  });
});
