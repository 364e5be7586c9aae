/**
 * Shared CLI option parsing
 */

import { z } from "zod";
import type { LevelWithSilent } from "pino";
import { DEFAULT_CONFIG_FILE, ENV } from "@fsfault/shared";

const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

/**
 * CLI flag > FSFAULT_LOG_LEVEL > info
 */
export function parseLogLevel(flag?: string): LevelWithSilent {
  const value = flag ?? process.env[ENV.LOG_LEVEL] ?? "info";
  const parsed = LogLevelSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new Error(`Invalid log level: ${value}`);
  }
  return parsed.data;
}

export function defaultConfigPath(): string {
  return process.env[ENV.CONFIG] ?? DEFAULT_CONFIG_FILE;
}
