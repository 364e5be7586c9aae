/**
 * Logger construction
 *
 * Levels used by the engine: info for lifecycle, debug for every injected
 * fault ("detail"), trace for fault table dumps ("dump").
 */

import { pino, type Logger, type LevelWithSilent } from "pino";

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";

  if (options.pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }

  return pino({ level });
}
