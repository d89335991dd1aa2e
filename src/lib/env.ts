/**
 * Hushkeeper — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail fast on a missing token; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_BOT_CONFIG_PATH } from "./constants.js";

// override: true outside tests so .env wins over a stale shell; tests set vars before import
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

export { DEFAULT_BOT_CONFIG_PATH };

/**
 * Every value is trimmed; stray whitespace from copy-pasted .env lines is common.
 * DISCORD_BOT_TOKEN is the older name for the token and is still honoured.
 */
export function readRawEnv(source: NodeJS.ProcessEnv = process.env) {
  return {
    DISCORD_TOKEN: (source.DISCORD_TOKEN ?? source.DISCORD_BOT_TOKEN)?.trim(),
    CLIENT_ID: source.CLIENT_ID?.trim() || undefined,
    DISCORD_GUILD_ID: source.DISCORD_GUILD_ID?.trim() || undefined,
    NODE_ENV: source.NODE_ENV?.trim(),
    LOG_LEVEL: source.LOG_LEVEL?.trim(),
    SENTRY_DSN: source.SENTRY_DSN?.trim() || undefined,
    SENTRY_ENVIRONMENT: source.SENTRY_ENVIRONMENT?.trim() || undefined,
    SENTRY_TRACES_SAMPLE_RATE: source.SENTRY_TRACES_SAMPLE_RATE?.trim() || undefined,
    BOT_CONFIG_PATH: source.BOT_CONFIG_PATH?.trim() || undefined,
    VOICE_EDIT_CONCURRENCY: source.VOICE_EDIT_CONCURRENCY?.trim() || undefined,
  };
}

export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN (or DISCORD_BOT_TOKEN)"),
  // Falls back to the logged-in application's id when unset
  CLIENT_ID: z.string().optional(),
  // Guild that receives an instant command sync on startup
  DISCORD_GUILD_ID: z.string().regex(/^\d+$/, "DISCORD_GUILD_ID must be a snowflake").optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.string().optional(),

  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  BOT_CONFIG_PATH: z.string().default(DEFAULT_BOT_CONFIG_PATH),
  // Parallel member edits per bulk command. Discord's per-route limits make anything above 10 pointless.
  VOICE_EDIT_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(5),
});

export type Env = z.infer<typeof envSchema>;

/**
 * safeParse so every problem is reported at once, not one per restart.
 */
const parsed = envSchema.safeParse(readRawEnv());
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env = parsed.data;
