/**
 * Key and value normalization shared by all shortcut strategies
 */

import type {
  ExpressionResolver,
  FieldHints,
  ScalarValue,
  ServiceRegistry,
} from "../../types/shortcut.js";
import { isGeneratedName } from "../../utils/name-utils.js";

export const EXPRESSION_PREFIX = "#{";
export const EXPRESSION_SUFFIX = "}";

/**
 * Replace a synthetic placeholder key with the field hint at the same position.
 * Explicitly named keys are returned unchanged.
 */
export function normalizeKey(
  key: string,
  entryIdx: number,
  fieldHints: FieldHints,
  argCount: number,
): string {
  if (
    isGeneratedName(key) &&
    fieldHints.length > 0 &&
    entryIdx < argCount &&
    entryIdx < fieldHints.length
  ) {
    return fieldHints[entryIdx] ?? key;
  }
  return key;
}

export function isExpression(rawValue: string): boolean {
  return (
    rawValue.trim().startsWith(EXPRESSION_PREFIX) &&
    rawValue.endsWith(EXPRESSION_SUFFIX)
  );
}

/**
 * Evaluate `#{...}` values through the resolver; everything else passes
 * through untouched, including null.
 */
export function resolveValue(
  rawValue: string | null,
  resolver: ExpressionResolver,
  registry: ServiceRegistry,
): ScalarValue {
  if (rawValue === null) {
    return null;
  }
  if (isExpression(rawValue)) {
    return resolver.resolve(rawValue, registry);
  }
  return rawValue;
}
