/**
 * Hushkeeper — src/features/voiceControl/responses.ts
 * WHAT: Turns a DispatchOutcome into the reply text and its visibility.
 * WHY: Both surfaces send exactly this, so wording only changes in the message table.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { renderMessage, type MessageTable } from "../../config/botConfig.js";
import type { DispatchOutcome } from "./dispatcher.js";
import type { GuardFailure } from "./types.js";

export type FormattedResponse = {
  content: string;
  /** visible only to the caller (slash surface); successes are public */
  ephemeral: boolean;
};

const GUARD_MESSAGE_KEYS: Record<GuardFailure["kind"], string> = {
  no_voice_channel: "no_voice_channel",
  target_not_in_channel: "target_not_in_channel",
  caller_permission_denied: "no_permission",
  bot_permission_denied: "bot_no_permission",
};

// failure lines list at most this many names before summarising
const MAX_NAMED_FAILURES = 10;

function listNames(names: string[]): string {
  if (names.length <= MAX_NAMED_FAILURES) return names.join(", ");
  return `${names.slice(0, MAX_NAMED_FAILURES).join(", ")} and ${names.length - MAX_NAMED_FAILURES} more`;
}

/**
 * @param extra - values for `{prefix}`/`{command}` in surface-specific messages
 */
export function formatOutcome(
  outcome: DispatchOutcome,
  messages: MessageTable,
  extra: { prefix?: string } = {}
): FormattedResponse {
  const key = outcome.spec.transition.key;

  switch (outcome.kind) {
    case "guard_failed":
      return { content: renderMessage(messages, GUARD_MESSAGE_KEYS[outcome.failure.kind]), ephemeral: true };

    case "unresolved":
      return {
        content: renderMessage(messages, outcome.problem, {
          prefix: extra.prefix ?? "/",
          command: outcome.spec.name,
        }),
        ephemeral: true,
      };

    case "noop":
      return { content: renderMessage(messages, `${key}_all_noop`), ephemeral: true };

    case "bulk_done": {
      const { succeeded, failures } = outcome.outcome;
      let content = `${renderMessage(messages, `${key}_all_success`)} (${succeeded} members)`;
      if (failures.length > 0) {
        const failureLine = renderMessage(messages, "bulk_partial_failure", {
          count: failures.length,
          members: listNames(failures.map((f) => f.member.displayName)),
        });
        content = `${content}\n${failureLine}`;
      }
      return { content, ephemeral: false };
    }

    case "already":
      return { content: renderMessage(messages, `${key}_already`, { member: outcome.member.displayName }), ephemeral: true };

    case "member_done":
      return { content: renderMessage(messages, `${key}_success`, { member: outcome.member.displayName }), ephemeral: false };

    case "member_failed":
      if (outcome.failure.kind === "permission_denied") {
        return {
          content: renderMessage(messages, `${key}_forbidden`, { member: outcome.member.displayName }),
          ephemeral: true,
        };
      }
      return { content: renderMessage(messages, "error_occurred"), ephemeral: true };

    case "operation_failed":
      return { content: renderMessage(messages, "error_occurred"), ephemeral: true };
  }
}
