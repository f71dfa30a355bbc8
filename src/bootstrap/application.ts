/**
 * An annotated application entry point: one instance of a composed marker.
 *
 * Effective attribute values and the ScanSpec are computed on first use and
 * memoized for the lifetime of the instance.
 */

import type { AliasGraph } from '../alias/graph.js';
import { resolveAttributes, type ExplicitAttributes, type ResolvedAttributes } from '../alias/resolver.js';
import type { Config } from '../config.js';
import type { ExclusionHookRegistry } from '../filters/builtin.js';
import type { ExclusionFilter } from '../filters/types.js';
import type { UnitDefinition } from '../model/types.js';
import { defaultDescriptorRegistry, type DescriptorRegistry } from '../registry/descriptor-registry.js';
import { buildScanSpec, type ScanSpec } from '../scan/builder.js';
import { TypeRef } from '../type-ref.js';
import { BootApplication } from './directives.js';

export const AUTO_CONFIGURATION_UNIT = 'EnableAutoConfiguration';
export const CONFIGURATION_UNIT = 'Configuration';

export interface AutoConfigurationExclusions {
  readonly exclude: readonly TypeRef[];
  readonly excludeName: readonly string[];
  /** From the `autoconfigure.exclude` configuration key. */
  readonly configured: readonly string[];
}

export interface ApplicationOptions {
  entryPoint: TypeRef | string;
  attributes?: ExplicitAttributes;
  /** The marker placed on the entry point; `BootApplication` unless given. */
  definition?: UnitDefinition;
  registry?: DescriptorRegistry;
  config?: Config | null;
  hooks?: ExclusionHookRegistry;
  excludeFilters?: readonly ExclusionFilter[];
}

export class Application {
  readonly entryPoint: TypeRef;
  readonly definition: UnitDefinition;
  readonly config: Config | null;
  private _explicit: ExplicitAttributes;
  private _registry: DescriptorRegistry;
  private _hooks: ExclusionHookRegistry | undefined;
  private _excludeFilters: readonly ExclusionFilter[];
  private _attributes: ResolvedAttributes | null = null;
  private _scanSpec: ScanSpec | null = null;
  private _discovered: ReadonlySet<string> = new Set();

  constructor(options: ApplicationOptions) {
    this.entryPoint = typeof options.entryPoint === 'string' ? TypeRef.of(options.entryPoint) : options.entryPoint;
    this.definition = options.definition ?? BootApplication;
    this.config = options.config ?? null;
    this._explicit = Object.freeze({ ...(options.attributes ?? {}) });
    this._registry = options.registry ?? defaultDescriptorRegistry;
    this._hooks = options.hooks;
    this._excludeFilters = Object.freeze([...(options.excludeFilters ?? [])]);
  }

  graph(): AliasGraph {
    return this._registry.get(this.definition);
  }

  attributes(): ResolvedAttributes {
    if (this._attributes === null) {
      this._attributes = resolveAttributes(this.graph(), this._explicit);
    }
    return this._attributes;
  }

  scanSpec(): ScanSpec {
    if (this._scanSpec === null) {
      this._scanSpec = buildScanSpec(this.attributes(), {
        entryPoint: this.entryPoint,
        hooks: this._hooks,
        discovered: () => this._discovered,
        additionalFilters: this._excludeFilters,
        config: this.config,
      });
    }
    return this._scanSpec;
  }

  proxyBeanMethods(): boolean {
    return this.attributes().boolean(`${CONFIGURATION_UNIT}.proxyBeanMethods`);
  }

  exclusions(): AutoConfigurationExclusions {
    const attrs = this.attributes();
    return Object.freeze({
      exclude: attrs.typeList(`${AUTO_CONFIGURATION_UNIT}.exclude`),
      excludeName: attrs.stringList(`${AUTO_CONFIGURATION_UNIT}.excludeName`),
      configured: Object.freeze(this.config?.getList('autoconfigure.exclude') ?? []),
    });
  }

  /** Names automatic discovery produced; read by the built-in exclusion filter. */
  get discovered(): ReadonlySet<string> {
    return this._discovered;
  }

  recordDiscovered(names: readonly string[]): void {
    this._discovered = new Set(names);
  }
}

export function bootApplication(
  entryPoint: TypeRef | string,
  attributes?: ExplicitAttributes,
  options?: Omit<ApplicationOptions, 'entryPoint' | 'attributes'>,
): Application {
  return new Application({ ...options, entryPoint, attributes });
}
