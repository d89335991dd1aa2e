/**
 * Hushkeeper — tests/utils/contextFactory.ts
 * WHAT: Builds CommandContext objects for handler tests.
 * USAGE:
 *  const ctx = createTestCommandContext(createMockInteraction({ commandName: "help" }));
 *  await execute(ctx);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction } from "discord.js";
import type { CommandContext } from "../../src/lib/cmdWrap.js";

/** Fixed trace id; `phases` records every step() in order. */
export function createTestCommandContext(
  interaction: ChatInputCommandInteraction,
  options: { traceId?: string } = {}
): CommandContext & { phases: string[] } {
  const traceId = options.traceId ?? "test-trace-123";
  const phases: string[] = [];

  return {
    interaction,
    phases,
    step: (phase: string) => {
      phases.push(phase);
    },
    traceId,
  };
}
