/**
 * Structured logging with level filtering.
 *
 * Only operational events are logged. Keys, pads, hash matrices, messages and
 * measured strings never reach the log.
 *
 * @module log
 */
import { loadConfig } from "./config.js";
import type { LogLevel } from "./config.js";

const LOG_LEVELS = { error: 0, warn: 1, info: 2, debug: 3 } as const;

const config = loadConfig();
let currentLogLevel: number = LOG_LEVELS[config.logLevel];

export function log(level: LogLevel, msg: string): void {
  if (LOG_LEVELS[level] > currentLogLevel) return;
  const ts = config.logTimestamps ? new Date().toISOString() + " " : "";
  console.error(`${ts}[${level.toUpperCase()}] ${msg}`);
}

/** Override the configured level, e.g. to silence batch warnings in a harness. */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = LOG_LEVELS[level];
}
