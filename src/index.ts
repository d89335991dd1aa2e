/**
 * Hushkeeper — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, routes slash and prefix commands, syncs commands.
 * WHY: Startup, routing and shutdown in one place.
 * FLOWS:
 *  - Ready: log identity → presence from bot_config → global sync (+ DISCORD_GUILD_ID sync)
 *  - interactionCreate: slash only → runWithCtx → wrapped handler from the registry
 *  - messageCreate: prefix listener (ignored unless it names a voice command)
 *  - SIGINT/SIGTERM: destroy client → flush Sentry → exit
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, addBreadcrumb, setUser, setTag, captureException, flushSentry } from "./lib/sentry.js";
import { SHUTDOWN_FLUSH_TIMEOUT_MS, UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import { Client, Events, GatewayIntentBits, Options } from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { newTraceId, runWithCtx } from "./lib/reqctx.js";
import { presenceFromSettings } from "./lib/presence.js";
import { getBotConfig } from "./config/botConfig.js";
import { buildCommandHandlers } from "./commands/registry.js";
import { createRest, syncOnStartup } from "./commands/sync.js";
import * as prefixCommands from "./listeners/prefixCommands.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // discord.js recovers from most rejections; keep running
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception - bot may be in unstable state");
  captureException(error, { context: "uncaughtException", origin });
  // give Sentry a moment to flush
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildVoiceStates,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent, // prefix commands
  ],
  // See: https://discordjs.guide/popular-topics/caching.html#limiting-cache-size
  makeCache: Options.cacheWithLimits({
    ...Options.DefaultMakeCacheSettings,
    MessageManager: 0,
    PresenceManager: 0,
    ReactionManager: 0,
    ReactionUserManager: 0,
    GuildStickerManager: 0,
    GuildScheduledEventManager: 0,
    StageInstanceManager: 0,
    ThreadMemberManager: 0,
  }),
});

const commands = buildCommandHandlers();

client.once(Events.ClientReady, async (readyClient) => {
  logger.info({ tag: readyClient.user.tag, id: readyClient.user.id, guilds: readyClient.guilds.cache.size }, "Bot ready");
  setTag("bot_id", readyClient.user.id);
  setTag("bot_username", readyClient.user.username);
  addBreadcrumb({ message: "Bot successfully connected to Discord", category: "bot", level: "info" });

  const { bot_settings: settings } = getBotConfig();
  try {
    readyClient.user.setPresence(presenceFromSettings(settings));
    logger.info(
      { activityType: settings.activity_type, activityName: settings.activity_name },
      "[startup] presence set from bot config"
    );
  } catch (err) {
    logger.warn({ err }, "[startup] failed to set presence - continuing with default");
  }

  const applicationId = env.CLIENT_ID ?? readyClient.user.id;
  await syncOnStartup({ rest: createRest(), applicationId }, env.DISCORD_GUILD_ID);

  // ===== Graceful Shutdown =====
  let isShuttingDown = false;
  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    try {
      client.removeAllListeners();
      await client.destroy();
      logger.debug("[shutdown] Discord client destroyed");
      await flushSentry(SHUTDOWN_FLUSH_TIMEOUT_MS);
      logger.info("[shutdown] Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
});

client.on(
  Events.InteractionCreate,
  wrapEvent("interactionCreate", async (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    const traceId = newTraceId();
    await runWithCtx(
      {
        traceId,
        kind: "slash",
        cmd: interaction.commandName,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? null,
        channelId: interaction.channelId ?? null,
      },
      async () => {
        setUser({ id: interaction.user.id, username: interaction.user.username });

        const handler = commands.get(interaction.commandName);
        if (!handler) {
          // stale registration: the command was removed but Discord still lists it
          logger.warn({ evt: "cmd_unknown", traceId, cmd: interaction.commandName }, "Unknown slash command");
          return;
        }
        await handler(interaction);
      }
    );
  })
);

client.on(Events.MessageCreate, wrapEvent("messageCreate", prefixCommands.execute));

client.on(Events.Error, (err) => {
  logger.error({ evt: "client_error", err }, "[client] error");
});

async function main() {
  logger.info(
    { nodeEnv: env.NODE_ENV, prefix: getBotConfig().bot_settings.command_prefix },
    "[startup] starting voice bot"
  );
  if (!env.DISCORD_GUILD_ID) {
    logger.info("[startup] DISCORD_GUILD_ID not set - commands register globally only");
  }
  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot outside the test runner
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
