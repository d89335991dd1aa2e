/**
 * Hushkeeper — src/lib/reqctx.ts
 * WHAT: Async-local request context for tracing one command invocation.
 * WHY: traceId/cmd/surface follow nested async calls (executor fan-out included) without threading params.
 * FLOWS: newTraceId() → runWithCtx(meta, fn) → ctx() inside nested helpers
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

/** Which front-end produced the invocation */
export type Surface = "slash" | "prefix";

export type ReqContext = {
  traceId: string;
  cmd?: string;
  kind?: Surface;
  userId?: string;
  guildId?: string | null;
  channelId?: string | null;
};

const storage = new AsyncLocalStorage<ReqContext>();

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const TRACE_ID_LENGTH = 11;

/**
 * 11-char base62 id (~65 bits). The modulo bias is irrelevant for log correlation.
 */
export function newTraceId(): string {
  const bytes = randomBytes(TRACE_ID_LENGTH);
  let out = "";
  for (const byte of bytes) {
    out += BASE62[byte % BASE62.length];
  }
  return out;
}

/**
 * Binds a merged context for fn and every async call it makes. Nested calls inherit
 * the parent's fields unless they override them.
 *
 * discord.js listeners do not inherit a context; wrap each handler.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  const next: ReqContext = {
    traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
    cmd: meta.cmd ?? parent?.cmd,
    kind: meta.kind ?? parent?.kind,
    userId: meta.userId ?? parent?.userId,
    guildId: meta.guildId ?? parent?.guildId ?? null,
    channelId: meta.channelId ?? parent?.channelId ?? null,
  };
  return storage.run(next, fn);
}

/** Current context, or {} outside any invocation. */
export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}
