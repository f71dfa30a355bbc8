/**
 * Orders automatically discovered imports after explicit registrations.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ResolvedAttributes } from '../alias/resolver.js';
import type { CancelToken } from '../cancel.js';
import { BootstrapError, DiscoveryError } from '../errors.js';
import { Logger } from '../observability/logger.js';
import type { ScanSpec } from '../scan/builder.js';
import type { ComponentScanner } from '../scan/scanner.js';
import type { Application, AutoConfigurationExclusions } from './application.js';
import type { Container } from './container.js';
import { removeDuplicates, type Discoverer } from './discovery.js';

export interface DeferredImports {
  /** Candidates that survive exclusion, in discovery order. */
  readonly imports: readonly string[];
  readonly excluded: readonly string[];
  /** Exclusion entries that matched no candidate. They have no effect. */
  readonly unmatched: readonly string[];
}

/**
 * Candidates minus excluded ones, order preserved. Type exclusions match on
 * the qualified name of the interned reference; name exclusions compare
 * strings only and never resolve the named type.
 */
export function computeDeferredImports(
  candidates: readonly string[],
  exclusions: AutoConfigurationExclusions,
): DeferredImports {
  const excludedTypes = new Set(exclusions.exclude.map((ref) => ref.qualifiedName));
  const excludedNames = new Set([...exclusions.excludeName, ...exclusions.configured]);

  const imports: string[] = [];
  const excluded: string[] = [];
  for (const candidate of removeDuplicates(candidates)) {
    if (excludedTypes.has(candidate) || excludedNames.has(candidate)) {
      excluded.push(candidate);
    } else {
      imports.push(candidate);
    }
  }

  const hit = new Set(excluded);
  const unmatched = removeDuplicates([
    ...exclusions.exclude.map((ref) => ref.qualifiedName),
    ...excludedNames,
  ]).filter((name) => !hit.has(name));

  return Object.freeze({
    imports: Object.freeze(imports),
    excluded: Object.freeze(excluded),
    unmatched: Object.freeze(unmatched),
  });
}

export interface ImportEvent {
  readonly bootstrapId: string;
  readonly imports: readonly string[];
  readonly exclusions: readonly string[];
}

export type ImportListener = (event: ImportEvent) => void;

export interface BootstrapCollaborators {
  container: Container;
  discoverer?: Discoverer;
  scanner?: ComponentScanner;
  cancelToken?: CancelToken;
}

export interface BootstrapResult {
  readonly bootstrapId: string;
  readonly attributes: ResolvedAttributes;
  readonly scanSpec: ScanSpec;
  /** Explicit registrations: the entry point, then scanned components. */
  readonly components: readonly string[];
  readonly imports: readonly string[];
  readonly exclusions: readonly string[];
  /** Deferred imports the container skipped because an explicit one won. */
  readonly skippedImports: readonly string[];
  readonly proxyBeanMethods: boolean;
}

export class BootstrapCoordinator {
  private _logger: Logger;
  private _listeners: ImportListener[] = [];

  constructor(options?: { logger?: Logger }) {
    this._logger = options?.logger ?? new Logger({ name: 'bootmark.bootstrap' });
  }

  onImports(listener: ImportListener): void {
    this._listeners.push(listener);
  }

  /**
   * Runs one bootstrap. Configuration errors surface before any discovery
   * or scanning; a failed or cancelled run registers nothing.
   */
  async bootstrap(app: Application, collaborators: BootstrapCollaborators): Promise<BootstrapResult> {
    const bootstrapId = uuidv4();
    const log = this._logger.forRun(bootstrapId);
    const { container, discoverer, scanner, cancelToken } = collaborators;
    const previouslyDiscovered = app.discovered;

    log.info('Bootstrap started', { entry_point: app.entryPoint.qualifiedName, marker: app.definition.name });
    try {
      const attributes = app.attributes();
      const scanSpec = app.scanSpec();
      const exclusions = app.exclusions();
      log.debug('Scan configuration resolved', {
        base_packages: scanSpec.basePackages,
        name_generator: scanSpec.nameGenerator?.qualifiedName ?? null,
        exclude_filters: scanSpec.excludeFilters.size,
      });

      const candidates = await this._discover(discoverer, bootstrapId);
      cancelToken?.check();
      app.recordDiscovered(candidates);

      const scanned = scanner ? await scanner.scan(scanSpec) : [];
      cancelToken?.check();

      const deferred = computeDeferredImports(candidates, exclusions);
      if (deferred.unmatched.length > 0) {
        log.debug('Exclusions matched no candidate', { unmatched: deferred.unmatched });
      }

      const components = removeDuplicates([app.entryPoint.qualifiedName, ...scanned.map((c) => c.name)]);
      const proxyBeanMethods = app.proxyBeanMethods();
      await container.registerExplicit(components, {
        proxyBeanMethods,
        nameGenerator: scanSpec.nameGenerator,
        lazyInit: scanSpec.lazyInit,
      });
      const outcome = await container.applyDeferredImports(deferred.imports);

      const event: ImportEvent = Object.freeze({
        bootstrapId,
        imports: deferred.imports,
        exclusions: deferred.excluded,
      });
      for (const listener of this._listeners) {
        try {
          listener(event);
        } catch (e) {
          log.warn('Import listener failed', { error_message: String(e) });
        }
      }

      log.info('Bootstrap completed', {
        components: components.length,
        imports: outcome.imported.length,
        excluded: deferred.excluded.length,
        skipped: outcome.skipped.length,
      });

      return Object.freeze({
        bootstrapId,
        attributes,
        scanSpec,
        components: Object.freeze(components),
        imports: deferred.imports,
        exclusions: deferred.excluded,
        skippedImports: outcome.skipped,
        proxyBeanMethods,
      });
    } catch (e) {
      app.recordDiscovered([...previouslyDiscovered]);
      log.error('Bootstrap failed', {
        error_type: e instanceof BootstrapError ? e.code : e instanceof Error ? e.name : typeof e,
        error_message: String(e),
      });
      throw e;
    }
  }

  private async _discover(discoverer: Discoverer | undefined, bootstrapId: string): Promise<string[]> {
    if (discoverer === undefined) return [];
    try {
      return removeDuplicates(await discoverer.discover());
    } catch (e) {
      if (e instanceof Error) {
        throw new DiscoveryError(e.message, { cause: e, bootstrapId });
      }
      throw new DiscoveryError(String(e), { bootstrapId });
    }
  }
}
