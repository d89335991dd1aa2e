// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates every slash command definition for bulk registration with Discord.
// buildCommands() returns the JSON payloads that get PUT to Discord's API.
//
// GOTCHA: Discord caches slash commands aggressively. Global commands can take up to
// an hour to propagate; guild commands update instantly, so prefer a guild sync
// (/sync_commands or DISCORD_GUILD_ID) while developing.

import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { voiceCommandData } from "./voice.js";
import { data as helpData } from "./help.js";
import { data as syncData } from "./sync.js";

// 16 voice commands + help + sync_commands; Discord allows 100 per scope.
export function buildCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [
    // Voice commands, bulk then individual for each transition
    ...voiceCommandData.map((builder) => builder.toJSON()),

    helpData.toJSON(),
    syncData.toJSON(),
  ];
}
