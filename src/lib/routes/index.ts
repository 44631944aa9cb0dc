/**
 * Route pipeline - normalizes and binds every predicate and filter of a route list
 */

import type {
  BoundShortcut,
  NormalizedRoute,
  RouteDefinition,
  ShortcutDeclaration,
  ShortcutKind,
} from "../../types/route.js";
import type { RawArgs } from "../../types/shortcut.js";
import { ConfigurationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { bindConfig } from "../binder/index.js";
import { createDefaultCatalog } from "../catalog/index.js";
import { TemplateExpressionResolver } from "../expression/index.js";
import { normalizeShortcut } from "../normalizer/index.js";
import { EMPTY_REGISTRY } from "../registry/index.js";
import { parseShortcut, toRawArgs } from "../tokenizer/index.js";
import type { NormalizeRoutesOptions } from "./types.js";

export * from "./types.js";

type RequiredOptions = Required<NormalizeRoutesOptions>;

/**
 * Name and raw args of a declaration in either shorthand or expanded form
 */
export function toParsedDeclaration(declaration: ShortcutDeclaration): {
  name: string;
  args: RawArgs;
} {
  if (typeof declaration === "string") {
    return parseShortcut(declaration);
  }
  return { name: declaration.name, args: toRawArgs(declaration.args ?? {}) };
}

function declarationLabel(declaration: ShortcutDeclaration): string {
  if (typeof declaration !== "string") {
    return declaration.name;
  }
  const eqIdx = declaration.indexOf("=");
  return eqIdx > 0 ? declaration.slice(0, eqIdx) : declaration;
}

function bindDeclaration(
  routeId: string,
  kind: ShortcutKind,
  declaration: ShortcutDeclaration,
  options: RequiredOptions,
): BoundShortcut {
  try {
    const { name, args } = toParsedDeclaration(declaration);
    const descriptor = options.catalog.require(kind, name);
    const normalized = normalizeShortcut(
      args,
      descriptor,
      options.resolver,
      options.registry,
    );

    logger.debug("Normalized shortcut", { routeId, kind, name, fields: Object.keys(normalized) });

    return {
      name,
      args: bindConfig(normalized, descriptor, { coerce: options.coerce }),
    };
  } catch (error) {
    logger.error(`Invalid ${kind} on route ${routeId}`, {
      routeId,
      kind,
      name: declarationLabel(declaration),
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

export function normalizeRoute(
  route: RouteDefinition,
  options: NormalizeRoutesOptions = {},
): NormalizedRoute {
  const resolved: RequiredOptions = {
    catalog: options.catalog ?? createDefaultCatalog(),
    resolver: options.resolver ?? new TemplateExpressionResolver(),
    registry: options.registry ?? EMPTY_REGISTRY,
    coerce: options.coerce ?? true,
  };

  return {
    id: route.id,
    uri: route.uri,
    order: route.order ?? 0,
    predicates: (route.predicates ?? []).map((declaration) =>
      bindDeclaration(route.id, "predicate", declaration, resolved),
    ),
    filters: (route.filters ?? []).map((declaration) =>
      bindDeclaration(route.id, "filter", declaration, resolved),
    ),
    metadata: { ...(route.metadata ?? {}) },
  };
}

/**
 * Normalize a list of routes with shared catalog, resolver and registry
 *
 * @throws ConfigurationError on duplicate route ids or unknown shortcut names
 */
export function normalizeRoutes(
  routes: RouteDefinition[],
  options: NormalizeRoutesOptions = {},
): NormalizedRoute[] {
  const shared: NormalizeRoutesOptions = {
    ...options,
    catalog: options.catalog ?? createDefaultCatalog(),
    resolver: options.resolver ?? new TemplateExpressionResolver(),
  };

  const seen = new Set<string>();
  for (const route of routes) {
    if (seen.has(route.id)) {
      throw new ConfigurationError(`Duplicate route id: ${route.id}`, { routeId: route.id });
    }
    seen.add(route.id);
  }

  logger.info("Normalizing routes", { count: routes.length });
  const normalized = routes.map((route) => normalizeRoute(route, shared));
  logger.info("Route normalization complete", {
    routes: normalized.length,
    predicates: normalized.reduce((sum, route) => sum + route.predicates.length, 0),
    filters: normalized.reduce((sum, route) => sum + route.filters.length, 0),
  });

  return normalized;
}
