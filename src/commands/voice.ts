/**
 * Hushkeeper — src/commands/voice.ts
 * WHAT: Slash builders and handlers for the sixteen voice commands.
 * WHY: One builder/handler pair per command table entry; names and descriptions come from the table.
 * FLOWS:
 *  - VOICE_COMMANDS → SlashCommandBuilder (member commands get a required "user" option)
 *  - execute: resolve caller/target → runVoiceCommand (bulk defers before edits) → replyOrEdit
 * DOCS:
 *  - Slash command options: https://discordjs.guide/slash-commands/advanced-creation.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { InteractionContextType, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import {
  buildGuildDispatchContext,
  fetchGuildMember,
  runVoiceCommand,
  VOICE_COMMANDS,
  type ContextResolver,
  type VoiceCommandSpec,
} from "../features/voiceControl/index.js";

export const TARGET_OPTION = "user";

export function buildVoiceCommand(spec: VoiceCommandSpec): SlashCommandBuilder {
  const builder = new SlashCommandBuilder()
    .setName(spec.name)
    .setDescription(spec.description)
    .setContexts(InteractionContextType.Guild);

  if (spec.scope === "member") {
    builder.addUserOption((option) =>
      option.setName(TARGET_OPTION).setDescription("The member to update").setRequired(true)
    );
  }
  return builder;
}

export const voiceCommandData: SlashCommandBuilder[] = VOICE_COMMANDS.map(buildVoiceCommand);

/**
 * Guild check first, then the target. Members picked in the client are usually in the
 * interaction payload already; the fetch covers cache misses.
 *
 * Bulk commands defer publicly once there is work to do: a crowded channel can take
 * longer than the 3s window. Guard failures and no-ops still answer ephemerally.
 */
export function slashContextResolver(
  interaction: ChatInputCommandInteraction,
  spec: VoiceCommandSpec
): ContextResolver {
  return async () => {
    if (!interaction.inCachedGuild()) return "guild_only";
    const caller = interaction.member;

    if (spec.scope === "bulk") {
      return {
        ...buildGuildDispatchContext(caller, { commandName: spec.name }),
        beforeEdits: () => ensureDeferred(interaction, false),
      };
    }

    const user = interaction.options.getUser(TARGET_OPTION);
    if (!user) return "missing_target";
    const target = interaction.options.getMember(TARGET_OPTION) ?? (await fetchGuildMember(interaction.guild, user.id));
    if (!target) return "member_not_found";

    return buildGuildDispatchContext(caller, { commandName: spec.name, target });
  };
}

export function createVoiceExecutor(spec: VoiceCommandSpec) {
  return async (ctx: CommandContext): Promise<void> => {
    const { interaction } = ctx;
    const { response } = await withStep(ctx, "dispatch", () =>
      runVoiceCommand(spec, slashContextResolver(interaction, spec))
    );
    await withStep(ctx, "reply", () =>
      replyOrEdit(
        interaction,
        { content: response.content, allowedMentions: SAFE_ALLOWED_MENTIONS },
        { ephemeral: response.ephemeral }
      )
    );
  };
}
