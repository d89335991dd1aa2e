/**
 * Hushkeeper — src/lib/presence.ts
 * WHAT: Maps the bot_settings activity fields to a discord.js presence payload.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ActivityType, type PresenceData } from "discord.js";
import type { ActivityTypeName, BotSettings } from "../config/botConfig.js";

const ACTIVITY_TYPE_MAP: Record<ActivityTypeName, Exclude<ActivityType, ActivityType.Custom>> = {
  playing: ActivityType.Playing,
  streaming: ActivityType.Streaming,
  listening: ActivityType.Listening,
  watching: ActivityType.Watching,
  competing: ActivityType.Competing,
};

/** No activity name means no activity, just "online". */
export function presenceFromSettings(settings: Pick<BotSettings, "activity_type" | "activity_name">): PresenceData {
  const name = settings.activity_name.trim();
  if (!name) {
    return { status: "online", activities: [] };
  }
  return {
    status: "online",
    activities: [{ type: ACTIVITY_TYPE_MAP[settings.activity_type], name }],
  };
}
