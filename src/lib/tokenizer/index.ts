/**
 * Shorthand tokenizer - `Name=arg1,arg2` into a name and ordered raw args
 */

import type { RawArgs } from "../../types/shortcut.js";
import { ValidationError } from "../../utils/errors.js";
import { generateName } from "../../utils/name-utils.js";

export interface ParsedShortcut {
  name: string;
  args: RawArgs;
}

export type RawArgValue = string | number | boolean | null;

export type RawArgInput =
  | Record<string, RawArgValue>
  | Iterable<readonly [string, RawArgValue]>;

function isIterable(
  input: RawArgInput,
): input is Iterable<readonly [string, RawArgValue]> {
  return Symbol.iterator in input;
}

/**
 * Split on a delimiter, trimming tokens and dropping empty ones
 */
export function tokenizeToStringArray(text: string, delimiter: string): string[] {
  return text
    .split(delimiter)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/**
 * Parse shorthand text. Arguments get synthetic positional keys
 * (`_genkey_0`, `_genkey_1`, ...) for the normalizer to rename.
 */
export function parseShortcut(text: string): ParsedShortcut {
  const eqIdx = text.indexOf("=");
  if (eqIdx <= 0) {
    throw new ValidationError(
      `Unable to parse shortcut text '${text}', must be of the form name=value`,
      { text },
    );
  }

  const args = new Map<string, string>();
  tokenizeToStringArray(text.slice(eqIdx + 1), ",").forEach((arg, i) => {
    args.set(generateName(i), arg);
  });

  return { name: text.slice(0, eqIdx), args };
}

/**
 * Build ordered raw args from an object or entry list. YAML scalars such as
 * `true` or `5` come back as strings.
 */
export function toRawArgs(input: RawArgInput): RawArgs {
  const entries: (readonly [string, RawArgValue])[] = isIterable(input)
    ? Array.from(input)
    : Object.entries(input);
  return new Map(
    entries.map(([key, value]): [string, string | null] => [
      key,
      value === null ? null : String(value),
    ]),
  );
}
