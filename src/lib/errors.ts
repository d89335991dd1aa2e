/**
 * Hushkeeper — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Voice edits need to tell "Discord refused" apart from "something broke", and logs need the detail.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - shouldReportToSentry(err) → boolean (filter noise)
 *  - errorContext(err) → flat fields for structured logs
 * USAGE:
 *  import { classifyError } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "permission") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Discord API errors.
 *
 * Codes that matter here:
 * - 10062: Unknown Interaction (3s window expired)
 * - 40060: Already acknowledged
 * - 10007: Unknown Member (left the guild mid-batch)
 * - 40032: Target user is not connected to voice
 *
 * 50013/50001 never land here; they classify as "permission".
 * See: https://discord.com/developers/docs/topics/opcodes-and-status-codes
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Discord refused the action (Missing Permissions / Missing Access / HTTP 403) */
export interface PermissionError extends AppError {
  kind: "permission";
  code?: number;
  needed: string[];
}

/** Node.js socket-level failures; the request never completed */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DiscordApiError
  | PermissionError
  | NetworkError
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readString(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" ? value : undefined;
}

function readNumber(obj: object, key: string): number | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "number" ? value : undefined;
}

// ===== Error Classification =====

/**
 * Classify any caught error into the union. Ordered most specific first:
 * permission refusals, then other Discord errors, then socket errors.
 *
 * discord.js names its errors "DiscordAPIError[50013]", so the name check is a prefix match.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }
  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const cause = err instanceof Error ? err : undefined;
  const message = readString(err, "message") ?? String(err);
  const name = readString(err, "name");
  const numericCode = readNumber(err, "code");
  const stringCode = readString(err, "code");
  const httpStatus = readNumber(err, "httpStatus") ?? readNumber(err, "status");

  if (numericCode === 50013 || httpStatus === 403) {
    return { kind: "permission", code: numericCode, needed: ["Unknown"], message, cause };
  }

  // 50001: the bot can't see the channel at all
  if (numericCode === 50001) {
    return { kind: "permission", code: numericCode, needed: ["ViewChannel"], message, cause };
  }

  if (numericCode !== undefined && name?.startsWith("DiscordAPIError")) {
    return {
      kind: "discord_api",
      code: numericCode,
      httpStatus,
      method: readString(err, "method"),
      path: readString(err, "path") ?? readString(err, "url"),
      message,
      cause,
    };
  }

  if (stringCode !== undefined && NETWORK_CODES.includes(stringCode)) {
    return {
      kind: "network",
      code: stringCode,
      host: readString(err, "hostname") ?? readString(err, "host"),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Sentry alerts should mean something is broken, not that Discord had a hiccup.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Interaction already acknowledged
        10007, // Unknown member (left mid-batch)
        40032, // Target user is not connected to voice
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "network":
      return false;
    case "permission":
      return false; // guild configuration, not a bug
    default:
      return true;
  }
}

export function isInteractionExpired(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10062;
}

export function isAlreadyAcknowledged(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 40060;
}

// ===== Error Context Helpers =====

export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, discordCode: err.code, neededPerms: err.needed };
    default:
      return base;
  }
}
