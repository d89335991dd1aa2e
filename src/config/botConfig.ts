/**
 * Hushkeeper — src/config/botConfig.ts
 * WHAT: Loads the bot configuration document (prefix, presence, message table, feature flags).
 * WHY: Operators reword every reply and toggle audit logging without touching code.
 * FLOWS:
 *  - loadBotConfig(path): read JSON → zod validate → merge over built-in defaults
 *  - missing file / bad JSON / schema mismatch → log error, return defaults (startup continues)
 *  - getBotConfig(): process-wide cached copy loaded from BOT_CONFIG_PATH
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { DEFAULT_BOT_CONFIG_PATH } from "../lib/constants.js";
import { logger } from "../lib/logger.js";

// ===== Schema =====

export const ACTIVITY_TYPES = ["playing", "streaming", "listening", "watching", "competing"] as const;
export type ActivityTypeName = (typeof ACTIVITY_TYPES)[number];

const DEFAULT_SETTINGS = {
  command_prefix: "!",
  description: "Voice Channel Mute Manager Bot",
  activity_type: "playing",
  activity_name: "with voice channels",
} as const;

const botSettingsSchema = z.object({
  command_prefix: z.string().trim().min(1).max(8).default(DEFAULT_SETTINGS.command_prefix),
  description: z.string().default(DEFAULT_SETTINGS.description),
  // unknown activity names fall back to "playing" rather than rejecting the whole document
  activity_type: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(ACTIVITY_TYPES))
    .catch(DEFAULT_SETTINGS.activity_type)
    .default(DEFAULT_SETTINGS.activity_type),
  activity_name: z.string().default(DEFAULT_SETTINGS.activity_name),
});

const messageTableSchema = z.record(z.string(), z.string());

export const botConfigSchema = z.object({
  bot_settings: botSettingsSchema.default({}),
  messages: messageTableSchema.default({}),
  features: z
    .object({
      log_actions: z.boolean().default(true),
    })
    .default({}),
});

export type BotSettings = z.infer<typeof botSettingsSchema>;
export type MessageTable = Readonly<Record<string, string>>;
export type BotConfig = {
  bot_settings: BotSettings;
  messages: MessageTable;
  features: { log_actions: boolean };
};

// ===== Defaults =====

const DEFAULT_MESSAGES_URL = new URL("../../config/default_messages.json", import.meta.url);

function readDefaultMessages(): MessageTable {
  // Ships with the repo; if this fails the install is broken, so let it throw.
  const raw: unknown = JSON.parse(fs.readFileSync(fileURLToPath(DEFAULT_MESSAGES_URL), "utf-8"));
  return messageTableSchema.parse(raw);
}

export const DEFAULT_MESSAGES: MessageTable = readDefaultMessages();

export function defaultBotConfig(): BotConfig {
  return {
    bot_settings: { ...DEFAULT_SETTINGS },
    messages: { ...DEFAULT_MESSAGES },
    features: { log_actions: true },
  };
}

// ===== Loading =====

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Never throws. Configured messages override defaults key by key, so a document
 * that only rewords one reply keeps every other default.
 */
export function loadBotConfig(filePath: string): BotConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      logger.error({ evt: "bot_config_missing", filePath }, "Configuration file not found! Using defaults");
    } else {
      logger.error({ evt: "bot_config_unreadable", filePath, err }, "Configuration file unreadable! Using defaults");
    }
    return defaultBotConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    logger.error({ evt: "bot_config_bad_json", filePath, err }, "Invalid JSON in configuration file! Using defaults");
    return defaultBotConfig();
  }

  const parsed = botConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    logger.error({ evt: "bot_config_invalid", filePath, issues }, "Configuration file failed validation! Using defaults");
    return defaultBotConfig();
  }

  const config: BotConfig = {
    bot_settings: parsed.data.bot_settings,
    messages: { ...DEFAULT_MESSAGES, ...parsed.data.messages },
    features: parsed.data.features,
  };
  logger.info(
    {
      evt: "bot_config_loaded",
      filePath,
      prefix: config.bot_settings.command_prefix,
      overriddenMessages: Object.keys(parsed.data.messages).length,
      logActions: config.features.log_actions,
    },
    "bot configuration loaded"
  );
  return config;
}

let cached: BotConfig | null = null;

/**
 * Loaded once from BOT_CONFIG_PATH (default DEFAULT_BOT_CONFIG_PATH).
 * Read lazily so tests and scripts that never touch it don't pay for it.
 */
export function getBotConfig(): BotConfig {
  if (!cached) {
    cached = loadBotConfig(process.env.BOT_CONFIG_PATH?.trim() || DEFAULT_BOT_CONFIG_PATH);
  }
  return cached;
}

export function resetBotConfigCache(): void {
  cached = null;
}

// ===== Message rendering =====

/**
 * Fill `{name}` placeholders. Unknown placeholders are left as written so a
 * typo in the config shows up in the reply instead of vanishing.
 */
export function renderMessage(
  messages: MessageTable,
  key: string,
  vars: Record<string, string | number> = {}
): string {
  const template: string | undefined = messages[key] ?? DEFAULT_MESSAGES[key];
  if (template === undefined) {
    logger.warn({ evt: "message_key_missing", key }, `No message configured for ${key}`);
    return key;
  }
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in vars ? String(vars[name]) : match
  );
}
