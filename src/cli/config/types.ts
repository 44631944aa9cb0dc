/**
 * CLI configuration types
 */

import type { ShortcutDescriptor } from "../../lib/catalog/types.js";
import type { RouteDefinition } from "../../types/route.js";
import type { LogLevel } from "../../utils/logger.js";

/**
 * Options that may be set in the route file or on the command line
 */
export interface NormalizeOptionsConfig {
  coerce?: boolean;
  logLevel?: LogLevel;
}

/**
 * Complete route file structure
 */
export interface RouteFileConfig {
  routes: RouteDefinition[];
  shortcuts?: ShortcutDescriptor[];
  services?: Record<string, unknown>;
  options?: NormalizeOptionsConfig;
}

/**
 * CLI command options (from commander)
 */
export interface NormalizeCommandOptions {
  output?: string;
  coerce?: boolean;
}

export interface HintsCommandOptions {
  kind?: string;
  name?: string;
}

// commander requires an index-signature compatible type here
export type GlobalOptions = {
  logLevel?: string;
};
