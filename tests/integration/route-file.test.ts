/**
 * Integration tests for route file parsing and the normalize command pipeline
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  parseRouteFile,
  parseRouteFileContent,
} from '../../src/cli/config/parser.js';
import { normalizeRouteFile, writeOutput } from '../../src/cli/commands/normalize.js';
import { createProgram } from '../../src/cli/program.js';
import { listHints } from '../../src/cli/commands/hints.js';
import { FileIOError, ValidationError } from '../../src/utils/errors.js';
import { logger } from '../../src/utils/logger.js';

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe('route file', () => {
  beforeEach(() => {
    logger.setLevel('error');
  });

  afterEach(() => {
    logger.setLevel('info');
  });

  describe('parseRouteFile', () => {
    it('should parse a YAML route file', () => {
      const config = parseRouteFile(fixture('routes.yaml'));

      expect(config.routes.map((route) => route.id)).toEqual(['orders', 'health']);
      expect(config.shortcuts?.map((shortcut) => shortcut.name)).toEqual([
        'Tenant',
        'CircuitBreaker',
      ]);
      expect(config.services).toEqual({ tenant: { id: 'acme' }, limits: { maxParts: 2 } });
      expect(config.options).toEqual({ coerce: true });
    });

    it('should report schema violations', () => {
      let caught: unknown;
      try {
        parseRouteFile(fixture('invalid-routes.json'));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({
        details: { errors: ["/routes/0 must have required property 'uri'"] },
      });
    });

    it('should fail on missing files', () => {
      expect(() => parseRouteFile(fixture('does-not-exist.yaml'))).toThrow(FileIOError);
    });
  });

  describe('parseRouteFileContent', () => {
    it('should parse JSON content', () => {
      const config = parseRouteFileContent(
        '{"routes":[{"id":"a","uri":"lb://a","predicates":["Method=GET"]}]}',
        'routes.json',
      );

      expect(config.routes).toEqual([{ id: 'a', uri: 'lb://a', predicates: ['Method=GET'] }]);
    });

    it('should reject unsupported extensions', () => {
      expect(() => parseRouteFileContent('routes: []', 'routes.txt')).toThrow(
        'Unsupported route file format: routes.txt. Must be .json, .yaml, or .yml',
      );
    });

    it('should reject malformed JSON', () => {
      expect(() => parseRouteFileContent('{', 'routes.json')).toThrow(
        'Failed to parse route file: routes.json',
      );
    });

    it('should reject unknown normalization modes', () => {
      expect(() =>
        parseRouteFileContent(
          'routes: []\nshortcuts:\n  - {name: X, kind: filter, mode: SPLIT, fieldOrder: [a]}\n',
          'routes.yml',
        ),
      ).toThrow(ValidationError);
    });
  });

  describe('normalizeRouteFile', () => {
    it('should normalize every route with custom shortcuts and services', () => {
      const routes = normalizeRouteFile(parseRouteFile(fixture('routes.yaml')), { coerce: true });

      expect(routes).toEqual([
        {
          id: 'orders',
          uri: 'http://orders.internal:8080',
          order: 10,
          predicates: [
            {
              name: 'Path',
              args: { patterns: ['/orders/**', '/carts/**'], matchTrailingSlash: true },
            },
            { name: 'Method', args: { methods: ['GET', 'POST'] } },
            { name: 'Tenant', args: { tenants: ['acme', 'beta'], strict: false } },
          ],
          filters: [
            { name: 'StripPrefix', args: { parts: 2 } },
            { name: 'AddRequestHeader', args: { name: 'X-Tenant', value: 'acme' } },
            {
              name: 'CircuitBreaker',
              args: { 'circuit.name': 'ordersCb', 'circuit.fallbackUri': 'forward:/fallback' },
            },
          ],
          metadata: { team: 'checkout' },
        },
        {
          id: 'health',
          uri: 'http://health.internal:8080',
          order: 0,
          predicates: [{ name: 'Path', args: { patterns: ['/health'] } }],
          filters: [],
          metadata: {},
        },
      ]);
    });
  });

  describe('listHints', () => {
    it('should filter by kind and name', () => {
      expect(listHints({ kind: 'predicate', name: 'method' })).toEqual([
        {
          kind: 'predicate',
          name: 'Method',
          mode: 'GATHER_LIST',
          fieldOrder: ['methods'],
          fieldTypes: { methods: 'list' },
        },
      ]);
    });

    it('should list every filter', () => {
      expect(listHints({ kind: 'filter' })).toHaveLength(14);
    });

    it('should reject unknown kinds', () => {
      expect(() => listHints({ kind: 'route' })).toThrow(
        'Invalid kind: route. Must be predicate or filter',
      );
    });
  });

  describe('normalize command', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'shortcut-args-'));
    });

    afterEach(() => {
      vi.restoreAllMocks();
      rmSync(dir, { recursive: true, force: true });
    });

    it('should write the result to --output', async () => {
      const output = join(dir, 'nested', 'routes.json');

      await createProgram().parseAsync(['normalize', fixture('routes.yaml'), '--output', output], {
        from: 'user',
      });

      const written = JSON.parse(readFileSync(output, 'utf8'));
      expect(written.status).toBe('success');
      expect(written.phase).toBe('normalize');
      expect(written.routes.map((route: { id: string }) => route.id)).toEqual(['orders', 'health']);
    });

    it('should apply --log-level before parsing the route file', async () => {
      logger.setLevel('info');
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      await createProgram().parseAsync(
        ['--log-level', 'error', 'normalize', fixture('routes.yaml'), '--output', join(dir, 'out.json')],
        { from: 'user' },
      );

      const infoLines = write.mock.calls.filter(([chunk]) => String(chunk).includes('INFO:'));
      expect(infoLines).toEqual([]);
      expect(logger.getLevel()).toBe('error');
    });

    it('should wrap output write failures in FileIOError', async () => {
      const blocker = join(dir, 'blocker');
      writeFileSync(blocker, 'not a directory');
      const target = join(blocker, 'out.json');

      await expect(writeOutput(target, '{}')).rejects.toThrow(FileIOError);
      await expect(writeOutput(target, '{}')).rejects.toThrow(`Failed to write output: ${target}`);
    });
  });
});
