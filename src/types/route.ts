/**
 * Route definition types
 */

export type ShortcutKind = "predicate" | "filter";

/**
 * A predicate or filter declared either as shorthand text (`Path=/a/**`) or
 * in expanded form with named arguments.
 */
export type ShortcutDeclaration =
  | string
  | {
      name: string;
      args?: Record<string, string | number | boolean | null>;
    };

export interface RouteDefinition {
  id: string;
  uri: string;
  order?: number;
  predicates?: ShortcutDeclaration[];
  filters?: ShortcutDeclaration[];
  metadata?: Record<string, unknown>;
}

export interface BoundShortcut {
  name: string;
  args: Record<string, unknown>;
}

export interface NormalizedRoute {
  id: string;
  uri: string;
  order: number;
  predicates: BoundShortcut[];
  filters: BoundShortcut[];
  metadata: Record<string, unknown>;
}
