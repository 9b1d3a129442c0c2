import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerConfig {
  level?: LevelWithSilent | undefined;
  name?: string | undefined;
}

/**
 * Creates the process logger. Level falls back to LOG_LEVEL, then "info".
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return pino({
    level: config.level ?? process.env["LOG_LEVEL"] ?? "info",
    ...(config.name !== undefined ? { name: config.name } : {}),
  });
}

// Components default to this when no logger is injected
export function disabledLogger(): Logger {
  return pino({ enabled: false });
}
