/**
 * Switchboard Logger
 *
 * Structured logger that prefixes output with its scope and drops
 * everything below the configured level.
 */

import type { Logger } from "../plugins/api.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const prefix = `[${scope}]`;
  const enabled = (at: LogLevel) => RANK[at] >= RANK[level];

  return {
    debug(message, data) {
      if (!enabled("debug")) return;
      if (data) console.debug(prefix, message, data);
      else console.debug(prefix, message);
    },
    info(message, data) {
      if (!enabled("info")) return;
      if (data) console.info(prefix, message, data);
      else console.info(prefix, message);
    },
    warn(message, data) {
      if (!enabled("warn")) return;
      if (data) console.warn(prefix, message, data);
      else console.warn(prefix, message);
    },
    error(message, data) {
      if (!enabled("error")) return;
      if (data) console.error(prefix, message, data);
      else console.error(prefix, message);
    },
  };
}
