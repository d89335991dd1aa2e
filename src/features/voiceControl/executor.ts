/**
 * Hushkeeper — src/features/voiceControl/executor.ts
 * WHAT: Applies one target state to many members with a bounded number of edits in flight.
 * WHY: Crowded channels finish faster in parallel, and one member leaving mid-batch must not
 *      cost everyone else their edit.
 * FLOWS: for each member → wait while inFlight >= concurrency → apply → record success/failure
 *        → sort failures by roster position → MutationOutcome
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { classifyError, errorContext, shouldReportToSentry } from "../../lib/errors.js";
import { ctx as reqCtx } from "../../lib/reqctx.js";
import type {
  MemberEditor,
  MutationFailure,
  MutationFailureKind,
  MutationOutcome,
  TargetState,
  VoiceMember,
} from "./types.js";

export const DEFAULT_EDIT_CONCURRENCY = 5;

export type ExecuteOptions = {
  /** maximum edits in flight; values below 1 are treated as 1 */
  concurrency?: number;
};

/** Discord refusing the edit is permission_denied; everything else is transient. */
export function classifyMutationFailure(err: unknown): MutationFailureKind {
  return classifyError(err).kind === "permission" ? "permission_denied" : "transient";
}

/**
 * Never rejects because of a member's edit; each failure is logged and recorded.
 * Empty input resolves to an empty outcome without touching the editor.
 */
export async function executeBatch(
  members: readonly VoiceMember[],
  target: TargetState,
  editor: MemberEditor,
  options: ExecuteOptions = {}
): Promise<MutationOutcome> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_EDIT_CONCURRENCY));
  const { traceId } = reqCtx();
  const failures: Array<MutationFailure & { position: number }> = [];
  let succeeded = 0;

  const applyOne = async (member: VoiceMember, position: number): Promise<void> => {
    try {
      await editor.apply(member, target);
      succeeded += 1;
    } catch (err) {
      const classified = classifyError(err);
      const kind = classifyMutationFailure(err);
      const payload = {
        evt: "voice_edit_fail",
        traceId,
        memberId: member.id,
        failure: kind,
        ...errorContext(classified),
        err,
      };
      if (kind === "permission_denied") {
        logger.warn(payload, `Cannot update ${member.displayName} - insufficient permissions`);
      } else if (!shouldReportToSentry(classified)) {
        // member left or dropped out of voice mid-batch
        logger.warn(payload, `Error updating ${member.displayName}`);
      } else {
        logger.error(payload, `Error updating ${member.displayName}`);
      }
      failures.push({ member, kind, error: err, position });
    }
  };

  const inFlight = new Set<Promise<void>>();
  for (const [position, member] of members.entries()) {
    if (inFlight.size >= concurrency) {
      await Promise.race(inFlight);
    }
    const promise = applyOne(member, position).finally(() => {
      inFlight.delete(promise);
    });
    inFlight.add(promise);
  }
  await Promise.all(inFlight);

  // completion order is nondeterministic; report in roster order
  failures.sort((a, b) => a.position - b.position);

  return {
    attempted: [...members],
    succeeded,
    failures: failures.map(({ member, kind, error }) => ({ member, kind, error })),
  };
}
