/**
 * Template expression resolver for `#{...}` argument values
 */

import type {
  ExpressionResolver,
  ScalarValue,
  ServiceRegistry,
} from "../../types/shortcut.js";
import { ExpressionEvaluationError } from "../../utils/errors.js";
import { evaluate } from "./evaluator.js";
import { parseExpression } from "./parser.js";
import { splitTemplate } from "./template.js";
import type { ExpressionNode } from "./types.js";

export * from "./types.js";
export { splitTemplate } from "./template.js";
export { parseExpression, tokenize } from "./parser.js";
export { evaluate } from "./evaluator.js";

export const DEFAULT_TEMPLATE_CACHE_SIZE = 256;

export interface TemplateExpressionResolverOptions {
  /** Compiled templates kept before the oldest is evicted */
  cacheSize?: number;
}

type CompiledPart =
  | { type: "literal"; text: string }
  | { type: "expression"; source: string; node: ExpressionNode };

/**
 * Resolves templates mixing literal text and `#{expr}` segments. A template
 * that is a single segment yields the raw evaluated value; anything else is
 * concatenated into a string.
 *
 * Compiled templates are cached per resolver; past `cacheSize` the oldest
 * entry is evicted, and a size of 0 disables caching.
 */
export class TemplateExpressionResolver implements ExpressionResolver {
  private cache = new Map<string, CompiledPart[]>();
  private readonly maxCacheSize: number;

  constructor(options: TemplateExpressionResolverOptions = {}) {
    this.maxCacheSize = Math.max(0, options.cacheSize ?? DEFAULT_TEMPLATE_CACHE_SIZE);
  }

  get cachedTemplates(): number {
    return this.cache.size;
  }

  resolve(rawValue: string, registry: ServiceRegistry): ScalarValue {
    const parts = this.compile(rawValue);

    const [only] = parts;
    if (parts.length === 1 && only?.type === "expression") {
      return evaluate(only.node, registry, only.source);
    }

    return parts
      .map((part) =>
        part.type === "literal"
          ? part.text
          : String(evaluate(part.node, registry, part.source)),
      )
      .join("");
  }

  private compile(template: string): CompiledPart[] {
    const cached = this.cache.get(template);
    if (cached) {
      return cached;
    }

    const compiled = splitTemplate(template).map((part): CompiledPart => {
      if (part.type === "literal") {
        return part;
      }
      try {
        return { type: "expression", source: part.source, node: parseExpression(part.source) };
      } catch (error) {
        if (error instanceof ExpressionEvaluationError) {
          throw new ExpressionEvaluationError(
            `Failed to parse expression '${part.source}': ${error.message}`,
            { expression: template, offset: part.offset },
            { cause: error },
          );
        }
        throw error;
      }
    });

    if (this.maxCacheSize > 0) {
      if (this.cache.size >= this.maxCacheSize) {
        // Map iteration order is insertion order, so the first key is the oldest
        const oldest = this.cache.keys().next();
        if (!oldest.done) {
          this.cache.delete(oldest.value);
        }
      }
      this.cache.set(template, compiled);
    }
    return compiled;
  }
}
