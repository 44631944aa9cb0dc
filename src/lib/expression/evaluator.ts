/**
 * Evaluates parsed expressions against a service registry
 */

import type { ServiceRegistry } from "../../types/shortcut.js";
import { ExpressionEvaluationError } from "../../utils/errors.js";
import type { ExpressionNode } from "./types.js";

const BLOCKED_MEMBERS = new Set(["constructor", "prototype", "__proto__"]);

function describeValue(value: unknown): string {
  return value === null ? "null" : typeof value;
}

function memberOf(
  target: unknown,
  name: string,
  source: string,
): unknown {
  if (BLOCKED_MEMBERS.has(name)) {
    throw new ExpressionEvaluationError(`Access to '${name}' is not allowed`, {
      expression: source,
    });
  }
  const holder: object = Object(target);
  try {
    const member: unknown = Reflect.get(holder, name);
    return member;
  } catch (error) {
    throw new ExpressionEvaluationError(
      `Failed to read property '${name}'`,
      { expression: source },
      { cause: error },
    );
  }
}

export function evaluate(
  node: ExpressionNode,
  registry: ServiceRegistry,
  source: string,
): unknown {
  switch (node.type) {
    case "literal":
      return node.value;

    case "service":
      if (!registry.has(node.name)) {
        throw new ExpressionEvaluationError(
          `No service registered under name '${node.name}'`,
          { expression: source, service: node.name },
        );
      }
      return registry.get(node.name);

    case "property": {
      const target = evaluate(node.target, registry, source);
      if (target === null || target === undefined) {
        if (node.nullSafe) {
          return null;
        }
        throw new ExpressionEvaluationError(
          `Cannot read property '${node.name}' of ${describeValue(target)}`,
          { expression: source },
        );
      }
      return memberOf(target, node.name, source);
    }

    case "call": {
      const target = evaluate(node.target, registry, source);
      if (target === null || target === undefined) {
        if (node.nullSafe) {
          return null;
        }
        throw new ExpressionEvaluationError(
          `Cannot call method '${node.name}' on ${describeValue(target)}`,
          { expression: source },
        );
      }
      const method = memberOf(target, node.name, source);
      if (typeof method !== "function") {
        throw new ExpressionEvaluationError(
          `Method '${node.name}' not found on ${describeValue(target)}`,
          { expression: source },
        );
      }
      const args = node.args.map((arg) => evaluate(arg, registry, source));
      try {
        const result: unknown = Reflect.apply(method, target, args);
        return result;
      } catch (error) {
        throw new ExpressionEvaluationError(
          `Method '${node.name}' threw an exception`,
          { expression: source },
          { cause: error },
        );
      }
    }
  }
}
