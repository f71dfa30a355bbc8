/**
 * Directory scanner that maps a package tree onto source files.
 *
 * `com.example.web.UserController` lives at `<root>/com/example/web/UserController.ts`.
 * An optional `<Name>_meta.yaml` beside it lists the component's
 * `annotations` and `supertypes`.
 */

import { existsSync, lstatSync, readdirSync, readFileSync, realpathSync, statSync } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from '../errors.js';
import type { Candidate } from '../filters/types.js';
import type { ScanSpec } from './builder.js';

const SKIP_DIR_NAMES = new Set(['node_modules']);
const VALID_EXTENSIONS = new Set(['.ts', '.js']);
const SKIP_SUFFIXES = ['.d.ts', '.test.ts', '.test.js', '.spec.ts', '.spec.js'];

const ComponentMetaSchema = Type.Object({
  annotations: Type.Optional(Type.Array(Type.String())),
  supertypes: Type.Optional(Type.Array(Type.String())),
});

export interface ScannedComponent extends Candidate {
  readonly filePath: string;
  readonly annotations: readonly string[];
  readonly supertypes: readonly string[];
}

/** Turns a ScanSpec into the components found under its base packages. */
export interface ComponentScanner {
  scan(spec: ScanSpec): readonly ScannedComponent[] | Promise<readonly ScannedComponent[]>;
}

function existsAndIsDir(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export function loadComponentMeta(metaPath: string): { annotations: string[]; supertypes: string[] } {
  if (!existsSync(metaPath)) return { annotations: [], supertypes: [] };

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(metaPath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid YAML in component metadata file: ${metaPath}`, { metaPath }, {
      cause: e instanceof Error ? e : undefined,
    });
  }

  if (parsed === null || parsed === undefined) return { annotations: [], supertypes: [] };
  if (!Value.Check(ComponentMetaSchema, parsed)) {
    throw new ConfigError(`Component metadata must map 'annotations' and 'supertypes' to lists: ${metaPath}`, {
      metaPath,
    });
  }
  return { annotations: parsed.annotations ?? [], supertypes: parsed.supertypes ?? [] };
}

export class DirectoryScanner implements ComponentScanner {
  private _root: string;
  private _maxDepth: number;
  private _followSymlinks: boolean;

  constructor(root: string, options?: { maxDepth?: number; followSymlinks?: boolean }) {
    this._root = resolve(root);
    this._maxDepth = options?.maxDepth ?? 8;
    this._followSymlinks = options?.followSymlinks ?? false;
  }

  scan(spec: ScanSpec): ScannedComponent[] {
    if (!existsAndIsDir(this._root)) {
      throw new ConfigNotFoundError(this._root);
    }

    const results: ScannedComponent[] = [];
    const seen = new Set<string>();

    for (const pkg of spec.basePackages) {
      const pkgDir = pkg === '' ? this._root : join(this._root, ...pkg.split('.'));
      if (!existsAndIsDir(pkgDir)) {
        console.warn(`[bootmark:scanner] No directory for package '${pkg}': ${pkgDir}`);
        continue;
      }
      for (const component of this._scanPackage(pkgDir, pkg)) {
        if (seen.has(component.name)) continue;
        seen.add(component.name);
        if (spec.excludeFilters.excludes(component)) continue;
        results.push(component);
      }
    }

    return results;
  }

  private _scanPackage(pkgDir: string, pkg: string): ScannedComponent[] {
    const found: ScannedComponent[] = [];
    const visitedRealPaths = new Set([realpathSync(pkgDir)]);
    const maxDepth = this._maxDepth;
    const followSymlinks = this._followSymlinks;

    function scanDir(dirPath: string, prefix: string, depth: number): void {
      if (depth > maxDepth) {
        console.warn(`[bootmark:scanner] Max depth ${maxDepth} exceeded at: ${dirPath}`);
        return;
      }

      let entries: string[];
      try {
        entries = readdirSync(dirPath).sort();
      } catch {
        console.warn(`[bootmark:scanner] Cannot read directory: ${dirPath}`);
        return;
      }

      for (const name of entries) {
        if (name.startsWith('.') || name.startsWith('_')) continue;
        if (SKIP_DIR_NAMES.has(name)) continue;

        const entryPath = join(dirPath, name);
        let stat;
        try {
          stat = statSync(entryPath);
        } catch {
          console.warn(`[bootmark:scanner] Cannot stat entry: ${entryPath}`);
          continue;
        }

        if (stat.isDirectory()) {
          if (lstatSync(entryPath).isSymbolicLink() && !followSymlinks) continue;
          const real = realpathSync(entryPath);
          if (visitedRealPaths.has(real)) continue;
          visitedRealPaths.add(real);
          scanDir(entryPath, prefix === '' ? name : `${prefix}.${name}`, depth + 1);
        } else if (stat.isFile()) {
          const ext = extname(name);
          if (!VALID_EXTENSIONS.has(ext)) continue;
          if (SKIP_SUFFIXES.some((s) => name.endsWith(s))) continue;

          const stem = basename(name, ext);
          const meta = loadComponentMeta(join(dirPath, `${stem}_meta.yaml`));
          found.push(Object.freeze({
            name: prefix === '' ? stem : `${prefix}.${stem}`,
            filePath: entryPath,
            annotations: Object.freeze(meta.annotations),
            supertypes: Object.freeze(meta.supertypes),
          }));
        }
      }
    }

    scanDir(pkgDir, pkg, 1);
    return found;
  }
}
