/**
 * Shortcut catalog - field hints per predicate and filter name
 */

import type { ShortcutKind } from "../../types/route.js";
import { isNormalizationMode } from "../../types/shortcut.js";
import { ConfigurationError } from "../../utils/errors.js";
import { DEFAULT_FILTERS, DEFAULT_PREDICATES } from "./defaults.js";
import { FIELD_TYPES, type ShortcutDescriptor } from "./types.js";

export * from "./types.js";
export { DEFAULT_FILTERS, DEFAULT_PREDICATES } from "./defaults.js";

const GATHER_HINT_COUNTS = {
  GATHER_LIST: 1,
  GATHER_LIST_TAIL_FLAG: 2,
} as const;

/**
 * Check a descriptor before it reaches the normalizer
 */
export function validateDescriptor(descriptor: ShortcutDescriptor): void {
  const { name, kind, mode, fieldOrder, fieldTypes } = descriptor;

  if (name.trim() === "" || name.includes("=")) {
    throw new ConfigurationError(`Invalid ${kind} shortcut name: '${name}'`);
  }
  if (!isNormalizationMode(mode)) {
    throw new ConfigurationError(`Unknown shortcut type for ${kind} ${name}: ${String(mode)}`);
  }
  if (mode !== "DEFAULT" && fieldOrder.length !== GATHER_HINT_COUNTS[mode]) {
    throw new ConfigurationError(
      `Shortcut type ${mode} must have field hints of size ${GATHER_HINT_COUNTS[mode]}`,
      { name, kind, fieldOrder: [...fieldOrder] },
    );
  }
  if (new Set(fieldOrder).size !== fieldOrder.length) {
    throw new ConfigurationError(`Duplicate field hints for ${kind} ${name}`, {
      fieldOrder: [...fieldOrder],
    });
  }

  for (const [field, type] of Object.entries(fieldTypes ?? {})) {
    if (!fieldOrder.includes(field)) {
      throw new ConfigurationError(
        `Field type declared for unknown field '${field}' of ${kind} ${name}`,
      );
    }
    if (!FIELD_TYPES.includes(type)) {
      throw new ConfigurationError(
        `Unknown field type '${String(type)}' for field '${field}' of ${kind} ${name}`,
      );
    }
  }
}

export class ShortcutCatalog {
  private descriptors = new Map<string, ShortcutDescriptor>();

  private static keyOf(kind: ShortcutKind, name: string): string {
    return `${kind}:${name}`;
  }

  /**
   * Add or replace a descriptor
   */
  register(descriptor: ShortcutDescriptor): this {
    validateDescriptor(descriptor);
    this.descriptors.set(
      ShortcutCatalog.keyOf(descriptor.kind, descriptor.name),
      descriptor,
    );
    return this;
  }

  get(kind: ShortcutKind, name: string): ShortcutDescriptor | undefined {
    return this.descriptors.get(ShortcutCatalog.keyOf(kind, name));
  }

  require(kind: ShortcutKind, name: string): ShortcutDescriptor {
    const descriptor = this.get(kind, name);
    if (!descriptor) {
      throw new ConfigurationError(`Unable to find ${kind} shortcut with name ${name}`, {
        kind,
        name,
      });
    }
    return descriptor;
  }

  list(kind?: ShortcutKind): ShortcutDescriptor[] {
    const all = Array.from(this.descriptors.values());
    return kind ? all.filter((descriptor) => descriptor.kind === kind) : all;
  }

  get size(): number {
    return this.descriptors.size;
  }
}

export function createDefaultCatalog(): ShortcutCatalog {
  const catalog = new ShortcutCatalog();
  for (const descriptor of [...DEFAULT_PREDICATES, ...DEFAULT_FILTERS]) {
    catalog.register(descriptor);
  }
  return catalog;
}
