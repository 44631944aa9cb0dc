/**
 * Binder - applies declared field types and prefix to a normalized config
 */

import type { NormalizedConfig } from "../../types/shortcut.js";
import type { FieldType, ShortcutDescriptor } from "../catalog/types.js";
import { ValidationError } from "../../utils/errors.js";

export interface BindOptions {
  /** Convert values to their declared field types (default: true) */
  coerce?: boolean;
}

const BOOLEAN_LITERAL = /^(true|false)$/i;

function mismatch(field: string, type: FieldType, value: unknown): ValidationError {
  return new ValidationError(
    `Field '${field}' expects a ${type} value, got ${Array.isArray(value) ? "list" : typeof value} '${String(value)}'`,
    { field, type },
  );
}

export function coerceValue(field: string, type: FieldType, value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  switch (type) {
    case "string":
      if (typeof value === "string") {
        return value;
      }
      if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
      }
      throw mismatch(field, type, value);

    case "boolean":
      if (typeof value === "boolean") {
        return value;
      }
      if (typeof value === "string" && BOOLEAN_LITERAL.test(value.trim())) {
        return value.trim().toLowerCase() === "true";
      }
      throw mismatch(field, type, value);

    case "number": {
      if (typeof value === "number" && Number.isFinite(value)) {
        return value;
      }
      const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : NaN;
      if (Number.isFinite(parsed)) {
        return parsed;
      }
      throw mismatch(field, type, value);
    }

    case "list":
      if (Array.isArray(value)) {
        return value;
      }
      if (typeof value === "string") {
        return value
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item.length > 0);
      }
      throw mismatch(field, type, value);
  }
}

/**
 * Produce the argument map handed to a predicate or filter factory
 *
 * @throws ValidationError when a value cannot be converted to its declared type
 */
export function bindConfig(
  normalized: NormalizedConfig,
  descriptor: ShortcutDescriptor,
  options: BindOptions = {},
): Record<string, unknown> {
  const coerce = options.coerce ?? true;
  const fieldTypes = descriptor.fieldTypes ?? {};
  const prefix = descriptor.fieldPrefix ?? "";

  return Object.fromEntries(
    Object.entries(normalized).map(([field, value]): [string, unknown] => {
      const type = Object.hasOwn(fieldTypes, field) ? fieldTypes[field] : undefined;
      const bound = coerce && type ? coerceValue(field, type, value) : value;
      return [prefix ? `${prefix}.${field}` : field, bound];
    }),
  );
}
