/**
 * Unit tests for the template expression resolver
 */

import { describe, it, expect } from 'vitest';
import {
  TemplateExpressionResolver,
  parseExpression,
  splitTemplate,
  tokenize,
} from '../../src/lib/expression/index.js';
import { InMemoryServiceRegistry } from '../../src/lib/registry/index.js';
import { ExpressionEvaluationError } from '../../src/utils/errors.js';

class Counter {
  base = 10;

  plus(n: number): number {
    return this.base + n;
  }
}

function createRegistry(): InMemoryServiceRegistry {
  return new InMemoryServiceRegistry({
    config: { timeout: 30, nested: { value: 'deep' }, missing: undefined },
    counter: new Counter(),
    joiner: { join: (a: string, b: string) => `${a}-${b}` },
    broken: {
      fail: () => {
        throw new Error('service down');
      },
    },
    guarded: {
      get secret(): string {
        throw new TypeError('getter failed');
      },
    },
    tag: 'x',
    count: 1,
  });
}

describe('splitTemplate', () => {
  it('should split literal text and expressions', () => {
    expect(splitTemplate('a-#{@x}-b')).toEqual([
      { type: 'literal', text: 'a-' },
      { type: 'expression', source: '@x', offset: 4 },
      { type: 'literal', text: '-b' },
    ]);
  });

  it('should skip braces inside quoted strings', () => {
    expect(splitTemplate("#{'}'}")).toEqual([
      { type: 'expression', source: "'}'", offset: 2 },
    ]);
  });

  it('should reject an unterminated expression', () => {
    expect(() => splitTemplate('#{@a')).toThrow(
      "No ending suffix '}' for expression starting at character 0",
    );
  });

  it('should reject an empty expression', () => {
    expect(() => splitTemplate('x#{ }')).toThrow(
      "No expression defined within delimiter '#{}' at character 1",
    );
  });
});

describe('tokenize', () => {
  it('should produce typed tokens', () => {
    expect(tokenize("@a?.b('c', -2)").map((token) => token.type)).toEqual([
      'at',
      'identifier',
      'safe-dot',
      'identifier',
      'lparen',
      'string',
      'comma',
      'number',
      'rparen',
      'eof',
    ]);
  });

  it('should reject unknown characters', () => {
    expect(() => tokenize('@a + 1')).toThrow("Unexpected character '+' at position 3");
  });
});

describe('parseExpression', () => {
  it('should build a call chain', () => {
    expect(parseExpression("@svc.items.find('k')")).toEqual({
      type: 'call',
      name: 'find',
      nullSafe: false,
      args: [{ type: 'literal', value: 'k' }],
      target: {
        type: 'property',
        name: 'items',
        nullSafe: false,
        target: { type: 'service', name: 'svc' },
      },
    });
  });

  it('should reject trailing tokens', () => {
    expect(() => parseExpression('@a @b')).toThrow("Unexpected token '@' at position 3");
  });
});

describe('TemplateExpressionResolver', () => {
  const resolver = new TemplateExpressionResolver();
  const registry = createRegistry();

  it('should evaluate literals', () => {
    expect(resolver.resolve("#{'abc'}", registry)).toBe('abc');
    expect(resolver.resolve('#{"abc"}', registry)).toBe('abc');
    expect(resolver.resolve('#{42}', registry)).toBe(42);
    expect(resolver.resolve('#{-1.5}', registry)).toBe(-1.5);
    expect(resolver.resolve('#{true}', registry)).toBe(true);
    expect(resolver.resolve('#{null}', registry)).toBeNull();
  });

  it('should unescape doubled quotes', () => {
    expect(resolver.resolve("#{'it''s'}", registry)).toBe("it's");
  });

  it('should return plain text unchanged', () => {
    expect(resolver.resolve('plain', registry)).toBe('plain');
  });

  it('should return service values unconverted', () => {
    expect(resolver.resolve('#{@config.timeout}', registry)).toBe(30);
    expect(resolver.resolve('#{@config.nested.value}', registry)).toBe('deep');
    expect(resolver.resolve('#{@config}', registry)).toEqual({
      timeout: 30,
      nested: { value: 'deep' },
      missing: undefined,
    });
  });

  it('should call methods with arguments', () => {
    expect(resolver.resolve("#{@joiner.join('a', 'b')}", registry)).toBe('a-b');
  });

  it('should bind methods to their service', () => {
    expect(resolver.resolve('#{@counter.plus(5)}', registry)).toBe(15);
  });

  it('should allow members of primitive values', () => {
    expect(resolver.resolve("#{'abc'.toUpperCase()}", registry)).toBe('ABC');
    expect(resolver.resolve("#{'abc'.length}", registry)).toBe(3);
  });

  it('should concatenate composite templates', () => {
    expect(resolver.resolve('prefix-#{@config.timeout}-suffix', registry)).toBe(
      'prefix-30-suffix',
    );
    expect(resolver.resolve('#{@tag}#{@count}', registry)).toBe('x1');
  });

  it('should short-circuit null-safe access', () => {
    expect(resolver.resolve('#{@config.missing?.value}', registry)).toBeNull();
    expect(resolver.resolve('#{@config.missing?.get()}', registry)).toBeNull();
  });

  it('should fail on property access of undefined', () => {
    expect(() => resolver.resolve('#{@config.missing.value}', registry)).toThrow(
      "Cannot read property 'value' of undefined",
    );
  });

  it('should fail on unknown services', () => {
    expect(() => resolver.resolve('#{@nope}', registry)).toThrow(ExpressionEvaluationError);
    expect(() => resolver.resolve('#{@nope}', registry)).toThrow(
      "No service registered under name 'nope'",
    );
  });

  it('should fail when calling a non-function', () => {
    expect(() => resolver.resolve('#{@config.timeout()}', registry)).toThrow(
      "Method 'timeout' not found on object",
    );
  });

  it('should block reflective members', () => {
    expect(() => resolver.resolve('#{@config.constructor}', registry)).toThrow(
      "Access to 'constructor' is not allowed",
    );
    expect(() => resolver.resolve('#{@config.__proto__}', registry)).toThrow(
      "Access to '__proto__' is not allowed",
    );
  });

  it('should wrap exceptions thrown by service methods', () => {
    let caught: unknown;
    try {
      resolver.resolve('#{@broken.fail()}', registry);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExpressionEvaluationError);
    expect(caught).toMatchObject({
      message: "Method 'fail' threw an exception",
      details: { expression: '@broken.fail()' },
    });
    expect(caught).toHaveProperty('cause', new Error('service down'));
  });

  it('should wrap exceptions thrown by property getters', () => {
    let caught: unknown;
    try {
      resolver.resolve('#{@guarded.secret}', registry);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExpressionEvaluationError);
    expect(caught).toMatchObject({
      message: "Failed to read property 'secret'",
      details: { expression: '@guarded.secret' },
    });
    expect(caught).toHaveProperty('cause', new TypeError('getter failed'));
  });

  it('should report parse errors with the expression', () => {
    let caught: unknown;
    try {
      resolver.resolve('#{foo}', registry);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExpressionEvaluationError);
    expect(caught).toMatchObject({
      message:
        "Failed to parse expression 'foo': Unsupported reference 'foo', services are referenced as '@foo' at position 0",
      details: { expression: '#{foo}', offset: 2 },
    });
  });
});

describe('TemplateExpressionResolver cache', () => {
  const registry = createRegistry();

  it('should evict the oldest template once full', () => {
    const resolver = new TemplateExpressionResolver({ cacheSize: 2 });

    expect(resolver.resolve('#{1}', registry)).toBe(1);
    expect(resolver.resolve('#{2}', registry)).toBe(2);
    expect(resolver.resolve('#{3}', registry)).toBe(3);
    expect(resolver.cachedTemplates).toBe(2);
    expect(resolver.resolve('#{1}', registry)).toBe(1);
    expect(resolver.cachedTemplates).toBe(2);
  });

  it('should reuse a cached template', () => {
    const resolver = new TemplateExpressionResolver({ cacheSize: 2 });

    resolver.resolve('#{@tag}', registry);
    resolver.resolve('#{@tag}', registry);

    expect(resolver.cachedTemplates).toBe(1);
  });

  it('should not cache with a size of 0', () => {
    const resolver = new TemplateExpressionResolver({ cacheSize: 0 });

    expect(resolver.resolve('#{@count}', registry)).toBe(1);
    expect(resolver.cachedTemplates).toBe(0);
  });
});
