/**
 * Hushkeeper — src/features/voiceControl/dispatcher.ts
 * WHAT: Runs one voice command: guards in fixed order, selection, edits, audit line.
 * WHY: Sixteen commands on two surfaces share one code path, so guard order, selection
 *      and outcomes cannot drift between them.
 * FLOWS:
 *  1. caller in voice? (member commands: target in the same channel?)
 *  2. caller capability → 3. bot capability
 *  4. bulk: select, empty → noop | member: exact match → already
 *  5. beforeEdits hook → executeBatch → 6. audit line when log_actions is on
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { ctx as reqCtx } from "../../lib/reqctx.js";
import { missingCapabilities } from "./capabilities.js";
import type { VoiceCommandSpec } from "./commandTable.js";
import { DEFAULT_EDIT_CONCURRENCY, executeBatch } from "./executor.js";
import { matchesTarget, selectMembers } from "./selector.js";
import type {
  Capabilities,
  GuardFailure,
  MemberEditor,
  MutationFailure,
  MutationOutcome,
  ResolutionProblem,
  VoiceChannelSnapshot,
  VoiceMember,
} from "./types.js";

/**
 * Per-invocation view of Discord. Reads are lazy so a failed guard never pays for
 * (or is influenced by) the checks after it.
 */
export interface DispatchContext {
  callerName: string;
  /** null when the caller is not connected to voice */
  callerChannel(): Promise<VoiceChannelSnapshot | null>;
  callerCapabilities(): Promise<Capabilities>;
  botCapabilities(): Promise<Capabilities>;
  /** member commands only */
  target?: VoiceMember;
  editor: MemberEditor;
  /** Runs once before a bulk batch starts, e.g. to acknowledge a slow slash command. */
  beforeEdits?: () => Promise<void>;
}

export type DispatchOutcome =
  | { kind: "guard_failed"; spec: VoiceCommandSpec; failure: GuardFailure }
  | { kind: "noop"; spec: VoiceCommandSpec; channel: VoiceChannelSnapshot }
  | { kind: "bulk_done"; spec: VoiceCommandSpec; channel: VoiceChannelSnapshot; outcome: MutationOutcome }
  | { kind: "already"; spec: VoiceCommandSpec; member: VoiceMember }
  | { kind: "member_done"; spec: VoiceCommandSpec; member: VoiceMember; channel: VoiceChannelSnapshot }
  | { kind: "member_failed"; spec: VoiceCommandSpec; member: VoiceMember; failure: MutationFailure }
  | { kind: "unresolved"; spec: VoiceCommandSpec; problem: ResolutionProblem }
  | { kind: "operation_failed"; spec: VoiceCommandSpec };

export type DispatcherOptions = {
  concurrency?: number;
  logActions?: boolean;
  select?: typeof selectMembers;
};

export class VoiceCommandDispatcher {
  private readonly concurrency: number;
  private readonly logActions: boolean;
  private readonly select: typeof selectMembers;

  constructor(options: DispatcherOptions = {}) {
    this.concurrency = options.concurrency ?? DEFAULT_EDIT_CONCURRENCY;
    this.logActions = options.logActions ?? false;
    this.select = options.select ?? selectMembers;
  }

  /**
   * Unexpected exceptions propagate; the surface runner turns them into operation_failed.
   */
  async dispatch(spec: VoiceCommandSpec, context: DispatchContext): Promise<DispatchOutcome> {
    const guarded = await this.runGuards(spec, context);
    if ("failure" in guarded) {
      return { kind: "guard_failed", spec, failure: guarded.failure };
    }
    const { channel } = guarded;
    const { target: desired, selection } = spec.transition;

    if (spec.scope === "bulk") {
      const selected = this.select(channel.members, desired, selection);
      if (selected.length === 0) {
        return { kind: "noop", spec, channel };
      }

      await context.beforeEdits?.();
      const outcome = await executeBatch(selected, desired, context.editor, {
        concurrency: this.concurrency,
      });
      this.audit(`${context.callerName} ${spec.transition.pastTense} ${outcome.succeeded} members in ${channel.name}`, {
        cmd: spec.name,
        channelId: channel.id,
        attempted: outcome.attempted.length,
        succeeded: outcome.succeeded,
        failed: outcome.failures.length,
      });
      return { kind: "bulk_done", spec, channel, outcome };
    }

    const { target } = guarded;
    if (!target) {
      return { kind: "unresolved", spec, problem: "missing_target" };
    }
    // stricter than the bulk predicate: the command names an exact state
    if (matchesTarget(target, desired)) {
      return { kind: "already", spec, member: target };
    }

    const outcome = await executeBatch([target], desired, context.editor, { concurrency: 1 });
    const [failure] = outcome.failures;
    if (failure) {
      return { kind: "member_failed", spec, member: target, failure };
    }
    this.audit(`${context.callerName} ${spec.transition.pastTense} ${target.displayName} in ${channel.name}`, {
      cmd: spec.name,
      channelId: channel.id,
      memberId: target.id,
    });
    return { kind: "member_done", spec, member: target, channel };
  }

  private async runGuards(
    spec: VoiceCommandSpec,
    context: DispatchContext
  ): Promise<{ channel: VoiceChannelSnapshot; target?: VoiceMember } | { failure: GuardFailure }> {
    const channel = await context.callerChannel();
    if (!channel) {
      return { failure: { kind: "no_voice_channel" } };
    }

    const { target } = context;
    if (spec.scope === "member" && target && target.channelId !== channel.id) {
      return { failure: { kind: "target_not_in_channel", target } };
    }

    const required = spec.transition.requires;
    const callerMissing = missingCapabilities(await context.callerCapabilities(), required);
    if (callerMissing.length > 0) {
      return { failure: { kind: "caller_permission_denied", missing: callerMissing } };
    }

    const botMissing = missingCapabilities(await context.botCapabilities(), required);
    if (botMissing.length > 0) {
      return { failure: { kind: "bot_permission_denied", missing: botMissing } };
    }

    return { channel, target };
  }

  private audit(line: string, fields: Record<string, unknown>): void {
    if (!this.logActions) return;
    logger.info({ evt: "voice_action", traceId: reqCtx().traceId, ...fields }, line);
  }
}
