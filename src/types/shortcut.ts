/**
 * Shortcut argument data model
 */

/**
 * Ordered raw shorthand arguments. Keys are real field names or synthetic
 * placeholders (see `generateName`).
 */
export type RawArgs = ReadonlyMap<string, string | null>;

/**
 * Ordered target field names used as positional fallbacks
 */
export type FieldHints = readonly string[];

export type NormalizationMode = "DEFAULT" | "GATHER_LIST" | "GATHER_LIST_TAIL_FLAG";

export const NORMALIZATION_MODES: readonly NormalizationMode[] = [
  "DEFAULT",
  "GATHER_LIST",
  "GATHER_LIST_TAIL_FLAG",
];

/**
 * Plain strings, null pass-through, or whatever an expression evaluates to
 */
export type ScalarValue = unknown;

export type ResolvedValue = ScalarValue | ScalarValue[];

export type NormalizedConfig = Record<string, ResolvedValue>;

/**
 * Read-only lookup of named services referenced from expressions (`@name`)
 */
export interface ServiceRegistry {
  has(name: string): boolean;
  get(name: string): unknown;
}

export interface ExpressionResolver {
  /**
   * Evaluate a template expression against the registry.
   * @throws ExpressionEvaluationError when the expression cannot be parsed or evaluated
   */
  resolve(rawValue: string, registry: ServiceRegistry): ScalarValue;
}

/**
 * Per config type hints: positional field names, normalization mode and the
 * prefix applied to bound field names.
 */
export interface FieldHintProvider {
  fieldOrder: FieldHints;
  mode?: NormalizationMode;
  fieldPrefix?: string;
}

export function isNormalizationMode(value: unknown): value is NormalizationMode {
  return NORMALIZATION_MODES.some((mode) => mode === value);
}
