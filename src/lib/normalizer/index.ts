/**
 * Normalizer module - turns ordered shorthand arguments into a config map
 */

import type {
  ExpressionResolver,
  FieldHintProvider,
  FieldHints,
  NormalizationMode,
  NormalizedConfig,
  RawArgs,
  ServiceRegistry,
} from "../../types/shortcut.js";
import { EMPTY_REGISTRY } from "../registry/index.js";
import { STRATEGIES } from "./strategies.js";
import { resolveValue } from "./value-resolver.js";

export * from "./types.js";
export * from "./strategies.js";
export * from "./value-resolver.js";

/**
 * Normalize raw shorthand arguments for one predicate or filter.
 *
 * @throws ConfigurationError when a gather mode gets the wrong number of hints
 * @throws ExpressionEvaluationError when a `#{...}` value fails to evaluate
 */
export function normalize(
  rawArgs: RawArgs,
  fieldHints: FieldHints,
  mode: NormalizationMode,
  resolver: ExpressionResolver,
  registry: ServiceRegistry = EMPTY_REGISTRY,
): NormalizedConfig {
  const strategy = STRATEGIES[mode];
  return strategy(rawArgs, fieldHints, (value) =>
    resolveValue(value, resolver, registry),
  );
}

/**
 * Normalize using the hints a config type declares for itself
 */
export function normalizeShortcut(
  rawArgs: RawArgs,
  provider: FieldHintProvider,
  resolver: ExpressionResolver,
  registry: ServiceRegistry = EMPTY_REGISTRY,
): NormalizedConfig {
  return normalize(
    rawArgs,
    provider.fieldOrder,
    provider.mode ?? "DEFAULT",
    resolver,
    registry,
  );
}
