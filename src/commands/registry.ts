/**
 * Hushkeeper — src/commands/registry.ts
 * WHAT: Command registry: slash payloads for sync, and the name → handler map for the router.
 * WHY: Registration and dispatch read the same list, so a command can't be synced without a handler.
 * FLOWS:
 *  - getAllSlashCommands() → buildCommands() → JSON bodies for REST PUT
 *  - buildCommandHandlers() → Collection<name, wrapCommand(...)>
 * DOCS:
 *  - Slash command deployment: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Collection, type ChatInputCommandInteraction } from "discord.js";
import { buildCommands } from "./buildCommands.js";
import { createVoiceExecutor } from "./voice.js";
import * as help from "./help.js";
import * as sync from "./sync.js";
import { wrapCommand } from "../lib/cmdWrap.js";
import { VOICE_COMMANDS } from "../features/voiceControl/index.js";

export type CommandHandler = (interaction: ChatInputCommandInteraction) => Promise<void>;

export function getAllSlashCommands() {
  return buildCommands();
}

export function buildCommandHandlers(): Collection<string, CommandHandler> {
  const handlers = new Collection<string, CommandHandler>();
  for (const spec of VOICE_COMMANDS) {
    handlers.set(spec.name, wrapCommand(spec.name, createVoiceExecutor(spec)));
  }
  handlers.set(help.data.name, wrapCommand("help", help.execute));
  handlers.set(sync.data.name, wrapCommand("sync_commands", (ctx) => sync.execute(ctx)));
  return handlers;
}
