/**
 * Hushkeeper — src/features/voiceControl/index.ts
 * WHAT: Entry point shared by the slash and prefix surfaces: resolve context, dispatch, format.
 * WHY: Both surfaces must produce the same outcome and text for the same situation.
 * FLOWS: resolveContext() → (problem → unresolved) | dispatcher.dispatch() → formatOutcome()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { getBotConfig, type MessageTable } from "../../config/botConfig.js";
import { classifyError, errorContext, shouldReportToSentry } from "../../lib/errors.js";
import { env } from "../../lib/env.js";
import { logger } from "../../lib/logger.js";
import { ctx as reqCtx } from "../../lib/reqctx.js";
import { captureException } from "../../lib/sentry.js";
import type { VoiceCommandSpec } from "./commandTable.js";
import { VoiceCommandDispatcher, type DispatchContext, type DispatchOutcome } from "./dispatcher.js";
import { formatOutcome, type FormattedResponse } from "./responses.js";
import type { ResolutionProblem } from "./types.js";

export { findVoiceCommand, VOICE_COMMANDS, VOICE_TRANSITIONS } from "./commandTable.js";
export type { VoiceCommandSpec } from "./commandTable.js";
export { buildGuildDispatchContext, fetchGuildMember } from "./discordContext.js";
export type { FormattedResponse } from "./responses.js";

export type ContextResolver = () => Promise<DispatchContext | ResolutionProblem>;

export type RunOptions = {
  dispatcher?: VoiceCommandDispatcher;
  messages?: MessageTable;
  /** shown in usage hints; "/" for slash */
  prefix?: string;
};

export type RunResult = {
  outcome: DispatchOutcome;
  response: FormattedResponse;
};

export function createDefaultDispatcher(): VoiceCommandDispatcher {
  return new VoiceCommandDispatcher({
    concurrency: env.VOICE_EDIT_CONCURRENCY,
    logActions: getBotConfig().features.log_actions,
  });
}

/**
 * Never throws. Anything unexpected from resolution or dispatch becomes operation_failed
 * and is logged (and reported, where reportable) here.
 */
export async function runVoiceCommand(
  spec: VoiceCommandSpec,
  resolveContext: ContextResolver,
  options: RunOptions = {}
): Promise<RunResult> {
  const { traceId } = reqCtx();
  let outcome: DispatchOutcome;

  try {
    const context = await resolveContext();
    if (typeof context === "string") {
      outcome = { kind: "unresolved", spec, problem: context };
    } else {
      const dispatcher = options.dispatcher ?? createDefaultDispatcher();
      outcome = await dispatcher.dispatch(spec, context);
    }
  } catch (err) {
    const classified = classifyError(err);
    const fields = { evt: "voice_cmd_error", traceId, cmd: spec.name, ...errorContext(classified) };
    if (shouldReportToSentry(classified)) {
      // no `err` key: the logger hook would send this error to Sentry a second time
      logger.error({ ...fields, errorStack: err instanceof Error ? err.stack : undefined }, `Error in ${spec.name}`);
      captureException(err, { cmd: spec.name, traceId });
    } else {
      logger.warn({ ...fields, err }, `Error in ${spec.name}`);
    }
    outcome = { kind: "operation_failed", spec };
  }

  logger.debug({ evt: "voice_cmd_outcome", traceId, cmd: spec.name, outcome: outcome.kind }, "[voice] outcome");

  const messages = options.messages ?? getBotConfig().messages;
  return { outcome, response: formatOutcome(outcome, messages, { prefix: options.prefix }) };
}
