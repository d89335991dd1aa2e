/**
 * Hushkeeper — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite slash commands (guild or global) and verify what Discord now lists.
 * WHY: Faster iteration on guild-scoped commands without starting the bot.
 * USAGE:
 *  npm run deploy:cmds                   # DISCORD_GUILD_ID if set, else global
 *  npm run deploy:cmds -- --guild 123…   # one guild
 *  npm run deploy:cmds -- --global
 * DOCS:
 *  - Bulk overwrite guild commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Routes } from "discord.js";
import { env } from "../src/lib/env.js";
import { logger } from "../src/lib/logger.js";
import { createRest, putGlobalCommands, putGuildCommands, type SyncTarget } from "../src/commands/sync.js";
import { getAllSlashCommands } from "../src/commands/registry.js";

type DeployScope = { kind: "global" } | { kind: "guild"; guildId: string };

function parseArgs(argv: string[]): DeployScope {
  if (argv.includes("--global")) return { kind: "global" };
  const flag = argv.indexOf("--guild");
  const guildId = flag >= 0 ? argv[flag + 1] : env.DISCORD_GUILD_ID;
  return guildId ? { kind: "guild", guildId } : { kind: "global" };
}

function namesOf(listed: unknown): string[] {
  if (!Array.isArray(listed)) return [];
  return listed.flatMap((cmd: unknown) => {
    const name: unknown = cmd && typeof cmd === "object" ? Reflect.get(cmd, "name") : undefined;
    return typeof name === "string" ? [name] : [];
  });
}

async function main() {
  if (!env.CLIENT_ID) {
    logger.error("[deploy] CLIENT_ID is required to deploy without a running bot");
    process.exit(1);
  }

  const rest = createRest();
  const target: SyncTarget = { rest, applicationId: env.CLIENT_ID };
  const scope = parseArgs(process.argv.slice(2));

  const count =
    scope.kind === "guild" ? await putGuildCommands(target, scope.guildId) : await putGlobalCommands(target);

  const route =
    scope.kind === "guild"
      ? Routes.applicationGuildCommands(env.CLIENT_ID, scope.guildId)
      : Routes.applicationCommands(env.CLIENT_ID);
  const listed = namesOf(await rest.get(route));
  const expected = getAllSlashCommands().map((cmd) => cmd.name);
  const missing = expected.filter((name) => !listed.includes(name));

  if (missing.length > 0) {
    logger.error({ scope, missing }, "[deploy] Discord is missing commands after sync");
    process.exit(1);
  }
  logger.info({ scope, count }, `[deploy] ${count} command(s) deployed and verified`);
}

main().catch((err) => {
  logger.error({ err }, "[deploy] failed");
  process.exit(1);
});
