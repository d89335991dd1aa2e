/**
 * WHAT: Proves wrapEvent swallows handler failures, logs them with event ids, warns about
 *       slow handlers, and only reports what Sentry should see.
 * HOW: Hoisted logger/sentry mocks; fake timers for the slow path.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";

const loggerMock = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
}));

const sentryMock = vi.hoisted(() => ({
  captureException: vi.fn(),
}));

vi.mock("../../src/lib/sentry.js", () => sentryMock);

import { extractEventContext, wrapEvent } from "../../src/lib/eventWrap.js";
import { createDiscordAPIError } from "../utils/discordMocks.js";

const message = {
  id: "message-1",
  guildId: "guild-1",
  channelId: "channel-1",
  author: { id: "user-1" },
};

describe("wrapEvent", () => {
  it("passes the event arguments through", async () => {
    const handler = vi.fn(async (_m: typeof message) => undefined);

    await wrapEvent("messageCreate", handler)(message);

    expect(handler).toHaveBeenCalledWith(message);
    expect(loggerMock.error).not.toHaveBeenCalled();
  });

  it("logs and reports a failing handler without rethrowing", async () => {
    const boom = new Error("boom");
    const wrapped = wrapEvent("messageCreate", async (_m: typeof message) => {
      throw boom;
    });

    await expect(wrapped(message)).resolves.toBeUndefined();

    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({
        evt: "event_error",
        event: "messageCreate",
        errorKind: "unknown",
        guildId: "guild-1",
        channelId: "channel-1",
        userId: "user-1",
        err: boom,
      }),
      "[messageCreate] event handler failed: boom"
    );
    expect(sentryMock.captureException).toHaveBeenCalledWith(
      boom,
      expect.objectContaining({ event: "messageCreate", errorKind: "unknown", entityId: "message-1" })
    );
  });

  it("does not report noise to Sentry", async () => {
    const wrapped = wrapEvent("interactionCreate", async () => {
      throw createDiscordAPIError(10062, "Unknown interaction", 404);
    });

    await wrapped();

    expect(loggerMock.error).toHaveBeenCalled();
    expect(sentryMock.captureException).not.toHaveBeenCalled();
  });

  it("warns about a slow handler without treating it as a failure", async () => {
    vi.useFakeTimers();
    const wrapped = wrapEvent(
      "messageCreate",
      (_m: typeof message) => new Promise<void>((resolve) => setTimeout(resolve, 5000)),
      1000
    );

    const pending = wrapped(message);
    await vi.advanceTimersByTimeAsync(1000);

    expect(loggerMock.warn).toHaveBeenCalledWith(
      {
        evt: "event_slow",
        event: "messageCreate",
        timeoutMs: 1000,
        guildId: "guild-1",
        channelId: "channel-1",
        entityId: "message-1",
        userId: "user-1",
      },
      "[messageCreate] handler still running after 1000ms"
    );

    await vi.advanceTimersByTimeAsync(4000);
    await pending;

    expect(loggerMock.error).not.toHaveBeenCalled();
    expect(sentryMock.captureException).not.toHaveBeenCalled();
  });

  it("still reports a slow handler that eventually fails", async () => {
    vi.useFakeTimers();
    const wrapped = wrapEvent(
      "messageCreate",
      () =>
        new Promise<void>((_, reject) => {
          setTimeout(() => reject(new Error("late boom")), 2000);
        }),
      1000
    );

    const pending = wrapped();
    await vi.advanceTimersByTimeAsync(2000);
    await pending;

    expect(loggerMock.warn).toHaveBeenCalledTimes(1);
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "event_error", errorMessage: "late boom" }),
      "[messageCreate] event handler failed: late boom"
    );
  });
});

describe("extractEventContext", () => {
  it("reads ids from messages and interactions", () => {
    expect(extractEventContext([message])).toEqual({
      guildId: "guild-1",
      channelId: "channel-1",
      entityId: "message-1",
      userId: "user-1",
    });
    expect(extractEventContext([{ id: "int-1", user: { id: "user-2" } }])).toEqual({
      entityId: "int-1",
      userId: "user-2",
    });
  });

  it("ignores primitives and nulls", () => {
    expect(extractEventContext([null, 42, "text", undefined])).toEqual({});
  });
});
