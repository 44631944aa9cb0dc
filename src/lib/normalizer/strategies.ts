/**
 * Normalization strategies, one per shortcut mode
 */

import type {
  FieldHints,
  NormalizationMode,
  NormalizedConfig,
  ResolvedValue,
} from "../../types/shortcut.js";
import { ConfigurationError } from "../../utils/errors.js";
import type { NormalizeStrategy } from "./types.js";
import { normalizeKey } from "./value-resolver.js";

const BOOLEAN_FLAG = /^(true|false)$/i;

function requireHintCount(
  mode: NormalizationMode,
  fieldHints: FieldHints,
  expected: number,
): string[] {
  if (fieldHints.length !== expected) {
    throw new ConfigurationError(
      `Shortcut type ${mode} must have field hints of size ${expected}`,
      { mode, fieldHints: [...fieldHints] },
    );
  }
  return [...fieldHints];
}

function toConfig(entries: Iterable<[string, ResolvedValue]>): NormalizedConfig {
  // fromEntries defines own properties, so "__proto__" stays an ordinary key
  return Object.fromEntries(entries);
}

/**
 * Each argument becomes its own field. Later duplicates of a normalized key
 * overwrite earlier ones.
 */
export const normalizeDefault: NormalizeStrategy = (rawArgs, fieldHints, evaluate) => {
  const entries = new Map<string, ResolvedValue>();
  let entryIdx = 0;
  for (const [rawKey, rawValue] of rawArgs) {
    const key = normalizeKey(rawKey, entryIdx, fieldHints, rawArgs.size);
    entries.set(key, evaluate(rawValue));
    entryIdx++;
  }
  return toConfig(entries);
};

/**
 * All argument values, keys ignored, gathered into the single hinted field
 */
export const normalizeGatherList: NormalizeStrategy = (rawArgs, fieldHints, evaluate) => {
  const [fieldName] = requireHintCount("GATHER_LIST", fieldHints, 1);
  const values = Array.from(rawArgs.values(), (value) => evaluate(value));
  return toConfig([[fieldName, values]]);
};

/**
 * Like GATHER_LIST, except a trailing `true`/`false` goes to the second hint
 */
export const normalizeGatherListTailFlag: NormalizeStrategy = (
  rawArgs,
  fieldHints,
  evaluate,
) => {
  const [listField, flagField] = requireHintCount(
    "GATHER_LIST_TAIL_FLAG",
    fieldHints,
    2,
  );
  const entries: [string, ResolvedValue][] = [];
  let values = Array.from(rawArgs.values());

  const lastValue = values[values.length - 1];
  if (typeof lastValue === "string" && BOOLEAN_FLAG.test(lastValue)) {
    values = values.slice(0, -1);
    entries.push([flagField, evaluate(lastValue)]);
  }

  entries.unshift([listField, values.map((value) => evaluate(value))]);
  return toConfig(entries);
};

export const STRATEGIES: Readonly<Record<NormalizationMode, NormalizeStrategy>> = {
  DEFAULT: normalizeDefault,
  GATHER_LIST: normalizeGatherList,
  GATHER_LIST_TAIL_FLAG: normalizeGatherListTailFlag,
};
