/**
 * Option loader for the normalize command
 */

import type { LogLevel } from "./logger.js";
import { isLogLevel, logger } from "./logger.js";
import { ConfigurationError } from "./errors.js";

export interface NormalizeCliOptions {
  coerce?: boolean;
  logLevel?: string;
}

export interface NormalizeFileOptions {
  coerce?: boolean;
  logLevel?: LogLevel;
}

export interface ResolvedNormalizeOptions {
  coerce: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_COERCE = true;

/**
 * Merge CLI flags and route file options
 *
 * @example
 * loadNormalizeOptions({ coerce: false }, { coerce: true, logLevel: "debug" });
 * // => { coerce: false, logLevel: "debug" } (CLI takes precedence)
 *
 * Without either, the log level stays at the logger's current level
 * (LOG_LEVEL or info).
 */
export function loadNormalizeOptions(
  cliOptions: NormalizeCliOptions = {},
  fileOptions: NormalizeFileOptions = {},
): ResolvedNormalizeOptions {
  if (cliOptions.logLevel !== undefined && !isLogLevel(cliOptions.logLevel)) {
    throw new ConfigurationError(
      `Invalid log level: ${cliOptions.logLevel}. Must be one of error, warn, info, debug`,
    );
  }

  // Precedence: CLI > route file > defaults
  const options: ResolvedNormalizeOptions = {
    coerce: cliOptions.coerce ?? fileOptions.coerce ?? DEFAULT_COERCE,
    logLevel:
      (isLogLevel(cliOptions.logLevel) ? cliOptions.logLevel : undefined) ??
      fileOptions.logLevel ??
      logger.getLevel(),
  };

  logger.debug("Normalize options loaded", { ...options });
  return options;
}
