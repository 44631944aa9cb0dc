/**
 * Splits `literal #{expr} literal` templates into parts
 */

import { ExpressionEvaluationError } from "../../utils/errors.js";
import { EXPRESSION_PREFIX, EXPRESSION_SUFFIX } from "../normalizer/value-resolver.js";
import type { TemplatePart } from "./types.js";

/**
 * Index of the `}` closing the expression that starts at `start`, skipping
 * quoted strings and nested braces. -1 when unterminated.
 */
function findSuffix(template: string, start: number): number {
  let depth = 0;
  let quote: string | null = null;

  for (let i = start; i < template.length; i++) {
    const ch = template.charAt(i);
    if (quote !== null) {
      if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "{") {
      depth++;
    } else if (ch === EXPRESSION_SUFFIX) {
      if (depth === 0) {
        return i;
      }
      depth--;
    }
  }
  return -1;
}

export function splitTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const prefixIdx = template.indexOf(EXPRESSION_PREFIX, cursor);
    if (prefixIdx === -1) {
      parts.push({ type: "literal", text: template.slice(cursor) });
      break;
    }
    if (prefixIdx > cursor) {
      parts.push({ type: "literal", text: template.slice(cursor, prefixIdx) });
    }

    const exprStart = prefixIdx + EXPRESSION_PREFIX.length;
    const suffixIdx = findSuffix(template, exprStart);
    if (suffixIdx === -1) {
      throw new ExpressionEvaluationError(
        `No ending suffix '${EXPRESSION_SUFFIX}' for expression starting at character ${prefixIdx}`,
        { expression: template },
      );
    }

    const source = template.slice(exprStart, suffixIdx);
    if (source.trim() === "") {
      throw new ExpressionEvaluationError(
        `No expression defined within delimiter '${EXPRESSION_PREFIX}${EXPRESSION_SUFFIX}' at character ${prefixIdx}`,
        { expression: template },
      );
    }
    parts.push({ type: "expression", source, offset: exprStart });
    cursor = suffixIdx + EXPRESSION_SUFFIX.length;
  }

  return parts;
}
