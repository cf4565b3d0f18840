/**
 * Console logger with level filtering
 */

import { config, type LogLevel } from "./config";

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(scope: string, level: LogLevel = config.LOG_LEVEL): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  const prefix = `[${scope}]`;

  return {
    debug(message, ...args) {
      if (enabled("debug")) console.debug(prefix, message, ...args);
    },
    info(message, ...args) {
      if (enabled("info")) console.log(prefix, message, ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      if (enabled("error")) console.error(prefix, message, ...args);
    },
  };
}
