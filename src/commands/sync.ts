/**
 * Hushkeeper — src/commands/sync.ts
 * WHAT: Slash-command sync helpers plus the /sync_commands admin command.
 * WHY: Guild syncs show up instantly while testing; global syncs are what real servers see.
 * FLOWS:
 *  - putGuildCommands / putGlobalCommands: serialize registry → REST PUT (bulk overwrite) → count
 *  - syncOnStartup: global, then DISCORD_GUILD_ID if set; logs, never throws
 *  - execute: admin check → defer → guild (option or current) sync + persist id | global sync
 * DOCS:
 *  - Bulk overwrite (guild): https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { PermissionFlagsBits, REST, Routes, SlashCommandBuilder } from "discord.js";
import { getAllSlashCommands } from "./registry.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { env } from "../lib/env.js";
import { persistEnvVar } from "../lib/envFile.js";
import { logger } from "../lib/logger.js";
import { classifyError, errorContext } from "../lib/errors.js";
import { DISCORD_COMMAND_SYNC_DELAY_MS } from "../lib/constants.js";
import { getBotConfig, renderMessage } from "../config/botConfig.js";

/** Only the part of REST we call; tests hand in a stub. */
export type CommandRest = Pick<REST, "put">;

export type SyncTarget = {
  rest: CommandRest;
  applicationId: string;
};

export function createRest(token: string = env.DISCORD_TOKEN): REST {
  return new REST({ version: "10" }).setToken(token);
}

function countSynced(result: unknown, sent: number): number {
  return Array.isArray(result) ? result.length : sent;
}

/**
 * PUT replaces the whole set, so removed commands disappear too.
 * Guild-scoped commands update instantly.
 */
export async function putGuildCommands(target: SyncTarget, guildId: string): Promise<number> {
  const body = getAllSlashCommands();
  const result = await target.rest.put(Routes.applicationGuildCommands(target.applicationId, guildId), { body });
  const count = countSynced(result, body.length);
  logger.info({ evt: "cmd_sync", scope: "guild", guildId, count }, `[cmdsync] synced ${count} command(s) to guild ${guildId}`);
  return count;
}

/** Global commands can take up to an hour to show up in every client. */
export async function putGlobalCommands(target: SyncTarget): Promise<number> {
  const body = getAllSlashCommands();
  const result = await target.rest.put(Routes.applicationCommands(target.applicationId), { body });
  const count = countSynced(result, body.length);
  logger.info({ evt: "cmd_sync", scope: "global", count }, `[cmdsync] globally synced ${count} command(s)`);
  return count;
}

/**
 * Failures are logged and swallowed: a bot with stale commands still works,
 * a bot that refuses to start doesn't.
 */
export async function syncOnStartup(
  target: SyncTarget,
  guildId?: string,
  delayMs: number = DISCORD_COMMAND_SYNC_DELAY_MS
): Promise<void> {
  try {
    await putGlobalCommands(target);
  } catch (err) {
    logger.error({ evt: "cmd_sync_fail", scope: "global", ...errorContext(classifyError(err)), err }, "[cmdsync] global sync failed");
  }

  if (!guildId) return;
  // two PUTs back to back trip the per-route rate limit
  await new Promise((resolve) => setTimeout(resolve, delayMs));
  try {
    await putGuildCommands(target, guildId);
  } catch (err) {
    logger.error(
      { evt: "cmd_sync_fail", scope: "guild", guildId, ...errorContext(classifyError(err)), err },
      "[cmdsync] guild sync failed"
    );
  }
}

export const data = new SlashCommandBuilder()
  .setName("sync_commands")
  .setDescription("(Admin) Sync application commands globally or to a guild (useful for testing)")
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .addStringOption((option) =>
    option
      .setName("guild_id")
      .setDescription("Optional guild id to sync to (for immediate registration)")
      .setRequired(false)
  );

const SNOWFLAKE = /^\d{17,20}$/;

/**
 * @param rest - injectable for tests; defaults to a token-authenticated client
 */
export async function execute(ctx: CommandContext, rest: CommandRest = createRest()): Promise<void> {
  const { interaction } = ctx;
  const { messages } = getBotConfig();

  // default member permissions hide the command, but server owners can override that
  if (!interaction.memberPermissions?.has(PermissionFlagsBits.Administrator)) {
    await replyOrEdit(interaction, { content: renderMessage(messages, "sync_admin_only") });
    return;
  }

  await withStep(ctx, "defer", () => ensureDeferred(interaction));

  const target: SyncTarget = { rest, applicationId: interaction.applicationId };
  const requested = interaction.options.getString("guild_id")?.trim() || null;
  const guildId = requested ?? interaction.guildId;

  try {
    if (guildId) {
      if (!SNOWFLAKE.test(guildId)) {
        throw new Error(`Invalid guild id: ${guildId}`);
      }
      const count = await withStep(ctx, "sync_guild", () => putGuildCommands(target, guildId));
      await replyOrEdit(interaction, { content: renderMessage(messages, "sync_guild_done", { count, guild: guildId }) });

      if (!persistEnvVar("DISCORD_GUILD_ID", guildId)) {
        logger.warn({ evt: "cmd_sync_persist_fail", traceId: ctx.traceId, guildId }, "Could not persist DISCORD_GUILD_ID to .env");
      }
      return;
    }

    const count = await withStep(ctx, "sync_global", () => putGlobalCommands(target));
    await replyOrEdit(interaction, { content: renderMessage(messages, "sync_global_done", { count }) });
  } catch (err) {
    logger.error(
      { evt: "cmd_sync_fail", traceId: ctx.traceId, guildId, ...errorContext(classifyError(err)), err },
      "Error syncing commands"
    );
    await replyOrEdit(interaction, { content: renderMessage(messages, "sync_failed") });
  }
}
