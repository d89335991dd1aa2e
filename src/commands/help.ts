/**
 * Hushkeeper — src/commands/help.ts
 * WHAT: /help: ephemeral embed listing the voice commands, use cases, and requirements.
 * WHY: Command lines are generated from the command table so the embed never lists a command
 *      that doesn't exist.
 * DOCS:
 *  - EmbedBuilder: https://discord.js.org/#/docs/builders/main/class/EmbedBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, InteractionContextType, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { VOICE_COMMANDS } from "../features/voiceControl/index.js";

export const data = new SlashCommandBuilder()
  .setName("help")
  .setDescription("Show available commands and their usage")
  .setContexts(InteractionContextType.Guild, InteractionContextType.BotDM);

const HELP_COLOR = 0x00ff00;

const USE_CASES = [
  "• **Among Us**: Mute everyone during gameplay, unmute between rounds",
  "• **Deceit**: Mute team members when using in-game voice chat",
  "• **Any team game**: Quick mute/unmute for better communication control",
].join("\n");

const REQUIREMENTS = [
  "• You must be in a voice channel",
  "• You need 'Mute Members' and/or 'Deafen Members' permission",
  "• The bot needs the same permissions",
].join("\n");

export function commandLines(scope: "bulk" | "member"): string {
  return VOICE_COMMANDS.filter((spec) => spec.scope === scope)
    .map((spec) => (scope === "member" ? `\`/${spec.name} <user>\` - ${spec.description}` : `\`/${spec.name}\` - ${spec.description}`))
    .join("\n");
}

export function buildHelpEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("🎮 Voice Channel Mute Manager Bot")
    .setDescription("A bot designed to help manage voice channels during gaming sessions")
    .setColor(HELP_COLOR)
    .addFields(
      { name: "🎯 Primary Commands", value: commandLines("bulk"), inline: false },
      { name: "👤 Individual Commands", value: commandLines("member"), inline: false },
      { name: "🎮 Use Cases", value: USE_CASES, inline: false },
      { name: "⚠️ Requirements", value: REQUIREMENTS, inline: false }
    )
    .setFooter({ text: "Perfect for gaming sessions where voice control is essential!" });
}

export async function execute(ctx: CommandContext): Promise<void> {
  const embed = await withStep(ctx, "build_embed", () => buildHelpEmbed());
  await withStep(ctx, "reply", () => replyOrEdit(ctx.interaction, { embeds: [embed] }));
}
