/**
 * Derives a ScanSpec from the effective `ComponentScan` attributes of an
 * application instance.
 */

import type { ResolvedAttributes } from '../alias/resolver.js';
import type { Config } from '../config.js';
import { builtInFilters, ExclusionHookRegistry } from '../filters/builtin.js';
import { ExclusionFilterChain } from '../filters/chain.js';
import { regexFilter, type ExclusionFilter } from '../filters/types.js';
import type { TypeRef } from '../type-ref.js';
import { resolvePlaceholders, tokenizePackages } from './packages.js';

export const SCAN_UNIT = 'ComponentScan';

export interface ScanSpec {
  /** Ordered and free of duplicates. */
  readonly basePackages: readonly string[];
  /** `null` leaves the container's own naming strategy in place. */
  readonly nameGenerator: TypeRef | null;
  readonly lazyInit: boolean;
  readonly excludeFilters: ExclusionFilterChain;
}

export interface ScanSpecOptions {
  /** The annotated entry point; its package is the fallback scan root. */
  entryPoint: TypeRef;
  hooks?: ExclusionHookRegistry;
  /** Names produced by automatic discovery, read lazily by the built-in filter. */
  discovered?: () => ReadonlySet<string>;
  additionalFilters?: readonly ExclusionFilter[];
  config?: Config | null;
}

const NOTHING_DISCOVERED: ReadonlySet<string> = new Set();

export function buildScanSpec(attributes: ResolvedAttributes, options: ScanSpecOptions): ScanSpec {
  const config = options.config ?? null;

  const packages = new Set<string>();
  for (const declared of attributes.stringList(`${SCAN_UNIT}.basePackages`)) {
    for (const pkg of tokenizePackages(resolvePlaceholders(declared, config))) {
      packages.add(pkg);
    }
  }
  for (const ref of attributes.typeList(`${SCAN_UNIT}.basePackageClasses`)) {
    packages.add(ref.packageName);
  }
  if (packages.size === 0) {
    packages.add(options.entryPoint.packageName);
  }

  const generatorKey = `${SCAN_UNIT}.nameGenerator`;
  const generator = attributes.type(generatorKey);
  const nameGenerator = generator === attributes.defaultOf(generatorKey) ? null : generator;

  const configuredPatterns = config?.getList('scan.exclude-patterns') ?? [];
  const excludeFilters = new ExclusionFilterChain([
    ...builtInFilters({
      hooks: options.hooks ?? new ExclusionHookRegistry(),
      discovered: options.discovered ?? (() => NOTHING_DISCOVERED),
    }),
    ...(options.additionalFilters ?? []),
    ...configuredPatterns.map((pattern) => regexFilter(pattern)),
  ]);

  return Object.freeze({
    basePackages: Object.freeze([...packages]),
    nameGenerator,
    lazyInit: attributes.boolean(`${SCAN_UNIT}.lazyInit`),
    excludeFilters,
  });
}
