/**
 * Hushkeeper — src/lib/constants.ts
 * WHAT: Shared timeouts, delays and Discord message options
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions (users, roles, everyone/here).
 * Replies echo member display names, which are user-controlled.
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Configuration =====

/** Bot config document, relative to the working directory, when BOT_CONFIG_PATH is unset */
export const DEFAULT_BOT_CONFIG_PATH = "config/bot_config.json";

// ===== Discord API Constraints =====

/** Keeps consecutive command-sync PUTs under 2 req/sec */
export const DISCORD_COMMAND_SYNC_DELAY_MS = 650;

/** Audit-log reason attached to every voice edit (Discord caps reasons at 512 chars) */
export const MAX_AUDIT_REASON_LENGTH = 512;

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** Sentry flush budget during graceful shutdown */
export const SHUTDOWN_FLUSH_TIMEOUT_MS = 2000;
