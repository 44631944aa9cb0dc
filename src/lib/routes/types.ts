/**
 * Route pipeline types
 */

import type { ExpressionResolver, ServiceRegistry } from "../../types/shortcut.js";
import type { ShortcutCatalog } from "../catalog/index.js";

export interface NormalizeRoutesOptions {
  catalog?: ShortcutCatalog;
  resolver?: ExpressionResolver;
  registry?: ServiceRegistry;
  /** Convert values to their declared field types (default: true) */
  coerce?: boolean;
}
