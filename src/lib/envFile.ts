/**
 * Hushkeeper — src/lib/envFile.ts
 * WHAT: Write or update one KEY=value line in a .env file.
 * WHY: /sync_commands remembers the guild it synced to, so the next startup syncs there instantly.
 * FLOWS: read lines (file may not exist) → replace first KEY= line or append → write back
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import { logger } from "./logger.js";

const ENV_KEY_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Other lines (comments, blank lines, unrelated keys) are kept byte-for-byte.
 *
 * @returns true when the file was written; failures are logged, never thrown
 */
export function persistEnvVar(key: string, value: string, envPath = ".env"): boolean {
  if (!ENV_KEY_RE.test(key) || /[\r\n]/.test(value)) {
    logger.error({ evt: "env_persist_invalid", key }, `Refusing to persist ${key}: invalid key or multi-line value`);
    return false;
  }

  try {
    const existing = fs.existsSync(envPath) ? fs.readFileSync(envPath, "utf-8") : "";
    const lines = existing === "" ? [] : existing.split(/\r?\n/);
    // a trailing newline leaves one empty element behind
    if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

    const prefix = `${key}=`;
    const index = lines.findIndex((line) => line.trim().startsWith(prefix));
    const entry = `${key}=${value}`;
    if (index >= 0) {
      lines[index] = entry;
    } else {
      lines.push(entry);
    }

    fs.writeFileSync(envPath, `${lines.join("\n")}\n`, "utf-8");
    logger.info({ evt: "env_persisted", key, envPath }, `Persisted ${key} to ${envPath}`);
    return true;
  } catch (err) {
    logger.error({ evt: "env_persist_fail", key, envPath, err }, `Failed to persist env var ${key}`);
    return false;
  }
}
