/**
 * Hushkeeper — src/listeners/prefixCommands.ts
 * WHAT: Legacy text commands ("!muteall", "!mute @someone") on top of the shared voice runner.
 * WHY: Older servers still type prefix commands; they must behave exactly like the slash versions.
 * HOW: parse prefix + name → command table lookup → resolve target (mention, id, name) → runVoiceCommand → reply.
 * SECURITY:
 *  - Skips bots and webhooks
 *  - Replies never ping (display names are user-controlled)
 *  - Unknown commands are ignored silently
 * DOCS:
 *  - Message: https://discord.js.org/#/docs/discord.js/main/class/Message
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Events, type Guild, type GuildMember, type Message } from "discord.js";
import { getBotConfig } from "../config/botConfig.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import { logger } from "../lib/logger.js";
import { ctx as reqCtx, runWithCtx } from "../lib/reqctx.js";
import {
  buildGuildDispatchContext,
  fetchGuildMember,
  findVoiceCommand,
  runVoiceCommand,
  type ContextResolver,
  type VoiceCommandSpec,
} from "../features/voiceControl/index.js";

export const name = Events.MessageCreate;

export type ParsedPrefixCommand = {
  name: string;
  args: string[];
};

/** null unless the message starts with the prefix followed directly by a word. */
export function parsePrefixCommand(content: string, prefix: string): ParsedPrefixCommand | null {
  if (!prefix || !content.startsWith(prefix)) return null;
  const [commandName, ...args] = content.slice(prefix.length).trim().split(/\s+/);
  if (!commandName) return null;
  return { name: commandName.toLowerCase(), args };
}

const MENTION_RE = /^<@!?(\d{17,20})>$/;
const SNOWFLAKE_RE = /^\d{17,20}$/;

/** Mention or raw id → the id; anything else → null. */
export function memberIdFromArgument(arg: string): string | null {
  const mention = MENTION_RE.exec(arg);
  if (mention?.[1]) return mention[1];
  return SNOWFLAKE_RE.test(arg) ? arg : null;
}

/**
 * Names match cached members only, case-insensitively, against username, global name,
 * then nickname/display name. The first match in cache order wins.
 */
export function findMemberByName(guild: Guild, query: string): GuildMember | null {
  const needle = query.toLowerCase();
  return (
    guild.members.cache.find(
      (member) =>
        member.user.username.toLowerCase() === needle ||
        member.user.globalName?.toLowerCase() === needle ||
        member.displayName.toLowerCase() === needle
    ) ?? null
  );
}

/**
 * A leading mention or id wins and trailing words are ignored ("!mute @Alice please");
 * otherwise every argument forms one name, since names may contain spaces.
 */
export async function resolveMemberArguments(guild: Guild, args: readonly string[]): Promise<GuildMember | null> {
  const id = args[0] ? memberIdFromArgument(args[0]) : null;
  if (id) return fetchGuildMember(guild, id);
  return findMemberByName(guild, args.join(" ").trim());
}

export function prefixContextResolver(message: Message, spec: VoiceCommandSpec, args: string[]): ContextResolver {
  return async () => {
    if (!message.inGuild()) return "guild_only";
    const caller = message.member ?? (await fetchGuildMember(message.guild, message.author.id));
    if (!caller) return "guild_only";

    if (spec.scope === "bulk") {
      return buildGuildDispatchContext(caller, { commandName: spec.name });
    }

    if (args.length === 0) return "missing_target";
    const target = await resolveMemberArguments(message.guild, args);
    if (!target) return "member_not_found";

    return buildGuildDispatchContext(caller, { commandName: spec.name, target });
  };
}

export async function execute(message: Message): Promise<void> {
  if (message.author.bot || message.webhookId) return;

  const { bot_settings: settings, messages } = getBotConfig();
  const parsed = parsePrefixCommand(message.content, settings.command_prefix);
  if (!parsed) return;
  const spec = findVoiceCommand(parsed.name);
  if (!spec) return;

  await runWithCtx(
    {
      cmd: spec.name,
      kind: "prefix",
      userId: message.author.id,
      guildId: message.guildId,
      channelId: message.channelId,
    },
    async () => {
      const { traceId } = reqCtx();
      logger.info(
        { evt: "cmd_start", traceId, cmd: spec.name, kind: "prefix", userId: message.author.id, guildId: message.guildId ?? "dm" },
        "command start"
      );

      const { outcome, response } = await runVoiceCommand(spec, prefixContextResolver(message, spec, parsed.args), {
        messages,
        prefix: settings.command_prefix,
      });

      try {
        await message.reply({ content: response.content, allowedMentions: SAFE_ALLOWED_MENTIONS });
      } catch (err) {
        logger.warn({ evt: "cmd_reply_fail", traceId, cmd: spec.name, err }, "[prefix] reply failed");
        return;
      }
      logger.info({ evt: "cmd_ok", traceId, cmd: spec.name, outcome: outcome.kind }, "command ok");
    }
  );
}
