/**
 * Runtime configuration read from environment variables.
 *
 * @module config
 */
import { fileURLToPath } from "url";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface CoreConfig {
  /** Minimum level written by the logger. */
  logLevel: LogLevel;
  /** Whether to prefix log lines with an ISO timestamp. */
  logTimestamps: boolean;
  /** Directory holding `<code>.json` code tables. */
  codesDir: string;
}

const LOG_LEVEL_NAMES: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/** The code tables shipped with the package. */
export const BUNDLED_CODES_DIR = fileURLToPath(new URL("../codes/", import.meta.url));

function envBool(key: string, defaultVal: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return defaultVal;
  return val === "1" || val.toLowerCase() === "true";
}

function envLogLevel(key: string, defaultVal: LogLevel): LogLevel {
  const val = process.env[key]?.toLowerCase();
  return LOG_LEVEL_NAMES.find((level) => level === val) ?? defaultVal;
}

/**
 * Load configuration from the environment.
 *
 * CERTDEL_LOG_LEVEL       error | warn | info | debug (default warn)
 * CERTDEL_LOG_TIMESTAMPS  1 / true to timestamp log lines
 * CERTDEL_CODES_DIR       override for the code table directory
 */
export function loadConfig(): CoreConfig {
  return {
    logLevel: envLogLevel("CERTDEL_LOG_LEVEL", "warn"),
    logTimestamps: envBool("CERTDEL_LOG_TIMESTAMPS", false),
    codesDir: process.env["CERTDEL_CODES_DIR"] ?? BUNDLED_CODES_DIR,
  };
}
