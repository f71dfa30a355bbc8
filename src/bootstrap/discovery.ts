/**
 * Automatic capability discovery collaborators.
 */

import { existsSync, readFileSync } from 'node:fs';

/** Proposes auto-configuration candidates, in import order. */
export interface Discoverer {
  discover(): readonly string[] | Promise<readonly string[]>;
}

/** Drops repeated names, keeping the first occurrence. */
export function removeDuplicates(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

export class StaticDiscoverer implements Discoverer {
  private _candidates: readonly string[];

  constructor(candidates: readonly string[]) {
    this._candidates = Object.freeze(removeDuplicates(candidates));
  }

  discover(): readonly string[] {
    return this._candidates;
  }
}

/**
 * Parses an imports file: one qualified name per line, `#` starts a
 * comment, blank lines are ignored.
 */
export function parseImports(content: string): string[] {
  const names: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const hash = line.indexOf('#');
    const name = (hash === -1 ? line : line.slice(0, hash)).trim();
    if (name !== '') names.push(name);
  }
  return names;
}

/**
 * Reads candidates from imports files, in file order. Missing files are
 * skipped; an unreadable file fails discovery.
 */
export class ImportsFileDiscoverer implements Discoverer {
  private _paths: readonly string[];

  constructor(paths: string | readonly string[]) {
    this._paths = typeof paths === 'string' ? [paths] : [...paths];
  }

  discover(): string[] {
    const names: string[] = [];
    for (const path of this._paths) {
      if (!existsSync(path)) {
        console.warn(`[bootmark:discovery] Imports file not found, skipping: ${path}`);
        continue;
      }
      names.push(...parseImports(readFileSync(path, 'utf-8')));
    }
    return removeDuplicates(names);
  }
}
