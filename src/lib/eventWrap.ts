/**
 * Hushkeeper — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers
 * WHY: One failing interaction or message must never take the process down.
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches and classifies errors, warns when slow
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  client.on(Events.MessageCreate, wrapEvent("messageCreate", async (message) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * A bulk edit on a crowded channel can take a while under rate limits. The timeout
 * only warns; the handler keeps running and its errors are still reported.
 */
export const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "30000", 10);

/**
 * @param eventName - Name of the event for logging
 * @param timeoutMs - Warn if the handler is still running after this long
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    const timer = setTimeout(() => {
      logger.warn(
        { evt: "event_slow", event: eventName, timeoutMs, ...extractEventContext(args) },
        `[${eventName}] handler still running after ${timeoutMs}ms`
      );
    }, timeoutMs);
    try {
      await handler(...args);
    } catch (err) {
      // never rethrow: a listener rejection would surface as an unhandled rejection
      reportEventError(eventName, err, extractEventContext(args));
    } finally {
      clearTimeout(timer);
    }
  };
}

function reportEventError(eventName: string, err: unknown, contextIds: Record<string, string>): void {
  const classified = classifyError(err);

  logger.error(
    {
      evt: "event_error",
      event: eventName,
      ...errorContext(classified, contextIds),
      err,
    },
    `[${eventName}] event handler failed: ${classified.message}`
  );

  if (shouldReportToSentry(classified)) {
    captureException(err instanceof Error ? err : new Error(String(err)), {
      event: eventName,
      errorKind: classified.kind,
      ...contextIds,
    });
  }
}

/**
 * Probe polymorphic event payloads (Message, Interaction, GuildMember) for ids worth logging.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId: unknown = Reflect.get(arg, "guildId");
    if (typeof guildId === "string") context.guildId = guildId;

    const channelId: unknown = Reflect.get(arg, "channelId");
    if (typeof channelId === "string") context.channelId = channelId;

    const id: unknown = Reflect.get(arg, "id");
    if (typeof id === "string" && !context.entityId) context.entityId = id;

    // Interactions carry `user`, messages carry `author`
    for (const key of ["user", "author"]) {
      const actor: unknown = Reflect.get(arg, key);
      if (actor && typeof actor === "object") {
        const actorId: unknown = Reflect.get(actor, "id");
        if (typeof actorId === "string") context.userId = actorId;
      }
    }
  }

  return context;
}
