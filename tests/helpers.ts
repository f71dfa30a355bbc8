/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { Logger, type LogLevel } from '../src/observability/logger.js';
import type { UnitDefinition } from '../src/model/types.js';

export function createCapturingLogger(level: LogLevel = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({ level, output: { write: (s: string) => lines.push(s) } });
  return { logger, lines };
}

export function parseLines(lines: string[]): Array<Record<string, unknown>> {
  return lines.map((line) => JSON.parse(line) as Record<string, unknown>);
}

export function touch(root: string, relativePath: string, content = ''): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  return full;
}

/** A route marker whose `value` and `path` both forward to `Mapping.path`. */
export const Mapping: UnitDefinition = {
  name: 'Mapping',
  attributes: [
    { name: 'path', type: 'string[]', default: [] },
    { name: 'method', type: 'enum', default: 'GET', enumValues: ['GET', 'POST'] },
  ],
};

export const Route: UnitDefinition = {
  name: 'Route',
  attributes: [
    { name: 'value', type: 'string[]', default: [], aliasFor: { unit: 'Mapping', attribute: 'path' } },
    { name: 'path', type: 'string[]', default: [], aliasFor: { unit: 'Mapping' } },
    { name: 'verb', type: 'enum', default: 'GET', enumValues: ['GET', 'POST'], aliasFor: { unit: 'Mapping', attribute: 'method' } },
  ],
  composes: [Mapping],
};
