/**
 * Normalizer module types
 */

import type {
  FieldHints,
  NormalizedConfig,
  RawArgs,
  ScalarValue,
} from "../../types/shortcut.js";

/**
 * Resolves one raw value, with the resolver and registry already bound
 */
export type ValueEvaluator = (rawValue: string | null) => ScalarValue;

export type NormalizeStrategy = (
  rawArgs: RawArgs,
  fieldHints: FieldHints,
  evaluate: ValueEvaluator,
) => NormalizedConfig;
