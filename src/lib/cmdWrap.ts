/**
 * Hushkeeper — src/lib/cmdWrap.ts
 * WHAT: Helpers that standardize the slash-command lifecycle: tracing, step logging, safe defers/replies.
 * WHY: Discord has a 3-second window for the first response; every command acknowledges the same way.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → generic error reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - Interaction replies: https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Response rules (3s window): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  DiscordAPIError,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
} from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId } from "./reqctx.js";
import {
  classifyError,
  errorContext,
  isAlreadyAcknowledged,
  isInteractionExpired,
  shouldReportToSentry,
} from "./errors.js";
import { getBotConfig } from "../config/botConfig.js";

/** Label for where a command is in its execution, e.g. "resolve_context", "reply" */
type Phase = string;

/**
 * Passed to every wrapped handler. Call step() to mark progress; traceId ties
 * the handler's own logs to the wrapper's.
 */
export type CommandContext = {
  interaction: ChatInputCommandInteraction;
  step: (phase: Phase) => void;
  readonly traceId: string;
};

type CommandExecutor = (ctx: CommandContext) => Promise<void>;

/**
 * REST metadata from a DiscordAPIError for logs. Body is redacted and clipped.
 * Returns null for anything else so callers can spread safely.
 */
export function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  let bodySnippet: string | undefined;
  const body = err.requestBody;
  if (body.json !== undefined) {
    try {
      bodySnippet = redact(JSON.stringify(body.json));
    } catch {
      bodySnippet = "[unserializable]";
    }
  } else if (body.files?.length) {
    bodySnippet = `[files:${body.files.length}]`;
  }
  if (bodySnippet && bodySnippet.length > 120) {
    bodySnippet = `${bodySnippet.slice(0, 120)}...`;
  }
  return {
    status: err.status,
    code: err.code,
    method: err.method,
    url: err.url,
    bodySnippet,
  };
}

/**
 * wrapCommand
 * WHAT: Decorates a slash handler with tracing, step logging, and a generic failure reply.
 * RETURNS: A handler compatible with the interactionCreate router.
 * THROWS: Never; errors are logged, optionally reported, and answered with `error_occurred`.
 */
export function wrapCommand(name: string, fn: CommandExecutor) {
  return async (interaction: ChatInputCommandInteraction) => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const cmdName = store.cmd ?? name;
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: cmdName, phase });
        addBreadcrumb({
          category: "cmd",
          message: cmdName,
          data: { phase, traceId },
          level: "info",
        });
        setTag("phase", phase);
      },
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: cmdName,
        kind: "slash",
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );

    setTag("cmd", cmdName);
    setTag("traceId", traceId);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId ?? null,
    });

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: cmdName, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const classified = classifyError(error);
      logger.error(
        {
          evt: "cmd_error",
          traceId,
          cmd: cmdName,
          phase,
          ...errorContext(classified),
          err,
        },
        `command error: ${classified.message}`
      );
      setTag("errorKind", classified.kind);

      if (shouldReportToSentry(classified)) {
        captureException(err, { cmd: cmdName, phase, traceId, errorKind: classified.kind });
      }

      try {
        await replyOrEdit(interaction, { content: getBotConfig().messages.error_occurred });
      } catch (replyErr) {
        logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to send error reply");
      }
    }
  };
}

/**
 * Mark a phase and run some work under it. Exceptions propagate to wrapCommand.
 */
export async function withStep<T>(
  ctx: CommandContext,
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * First-time acknowledgement with deferReply. 10062 (expired) is logged and
 * swallowed; anything else is rethrown.
 */
export async function ensureDeferred(interaction: ChatInputCommandInteraction, ephemeral = true) {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
    logger.debug({ evt: "cmd_deferred", traceId: reqCtx().traceId, ephemeral }, "[cmd] deferred reply");
  } catch (err) {
    const logPayload = {
      evt: "cmd_defer_fail",
      traceId: reqCtx().traceId,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (isInteractionExpired(classifyError(err))) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state.
 *
 * Replies default to ephemeral; public output passes `{ ephemeral: false }`.
 * Explicit `payload.flags` win over both.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions,
  options: { ephemeral?: boolean } = {}
) {
  const ephemeral = options.ephemeral ?? true;
  const withFlags: InteractionReplyOptions =
    payload.flags !== undefined || !ephemeral ? payload : { ...payload, flags: MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      // editReply can't change visibility; the defer already decided it
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const classified = classifyError(err);
    const logPayload = {
      evt: "cmd_reply_fail",
      traceId: reqCtx().traceId,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (isInteractionExpired(classified)) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (isAlreadyAcknowledged(classified)) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
