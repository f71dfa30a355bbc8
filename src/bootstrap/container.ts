/**
 * Registration container: explicit registrations first, deferred
 * auto-configuration imports after them.
 */

import { InvalidInputError } from '../errors.js';
import type { TypeRef } from '../type-ref.js';

export const CONTAINER_EVENTS = Object.freeze({
  REGISTER: 'register',
  IMPORT: 'import',
} as const);

export type ContainerEvent = (typeof CONTAINER_EVENTS)[keyof typeof CONTAINER_EVENTS];

export type RegistrationSource = 'explicit' | 'auto-configuration';

export interface RegistrationOptions {
  /** Passed through untouched from the marker's `proxyBeanMethods`. */
  readonly proxyBeanMethods: boolean;
  /** `null` keeps the container's own naming strategy. */
  readonly nameGenerator: TypeRef | null;
  readonly lazyInit: boolean;
}

export interface ComponentRegistration {
  readonly identity: string;
  readonly componentName: string;
  readonly source: RegistrationSource;
  readonly proxyBeanMethods: boolean;
  readonly lazyInit: boolean;
}

export interface DeferredImportOutcome {
  readonly imported: readonly string[];
  /** Identities already registered explicitly. */
  readonly skipped: readonly string[];
}

export interface Container {
  registerExplicit(components: readonly string[], options: RegistrationOptions): void | Promise<void>;
  applyDeferredImports(imports: readonly string[]): DeferredImportOutcome | Promise<DeferredImportOutcome>;
}

export type NamingStrategy = (identity: string) => string;

/** Simple name with its first letter lower-cased. */
export const defaultNaming: NamingStrategy = (identity) => {
  const simple = identity.slice(identity.lastIndexOf('.') + 1);
  return simple.charAt(0).toLowerCase() + simple.slice(1);
};

type EventCallback = (registration: ComponentRegistration) => void;

export class ComponentRegistry implements Container {
  private _registrations: Map<string, ComponentRegistration> = new Map();
  private _namingStrategies: Map<TypeRef, NamingStrategy> = new Map();
  private _defaultNaming: NamingStrategy;
  private _callbacks: Map<ContainerEvent, EventCallback[]> = new Map([
    [CONTAINER_EVENTS.REGISTER, []],
    [CONTAINER_EVENTS.IMPORT, []],
  ]);

  constructor(options?: { naming?: NamingStrategy }) {
    this._defaultNaming = options?.naming ?? defaultNaming;
  }

  /** Makes a strategy selectable through a marker's `nameGenerator`. */
  registerNamingStrategy(type: TypeRef, strategy: NamingStrategy): void {
    this._namingStrategies.set(type, strategy);
  }

  registerExplicit(components: readonly string[], options: RegistrationOptions): void {
    const naming = this._naming(options.nameGenerator);
    const batch = new Set<string>();
    for (const identity of components) {
      if (this._registrations.has(identity) || batch.has(identity)) {
        throw new InvalidInputError(`Component already registered: ${identity}`);
      }
      batch.add(identity);
    }
    for (const identity of components) {
      this._add({
        identity,
        componentName: naming(identity),
        source: 'explicit',
        proxyBeanMethods: options.proxyBeanMethods,
        lazyInit: options.lazyInit,
      }, CONTAINER_EVENTS.REGISTER);
    }
  }

  applyDeferredImports(imports: readonly string[]): DeferredImportOutcome {
    const imported: string[] = [];
    const skipped: string[] = [];
    for (const identity of imports) {
      if (this._registrations.has(identity)) {
        skipped.push(identity);
        continue;
      }
      this._add({
        identity,
        componentName: identity,
        source: 'auto-configuration',
        proxyBeanMethods: true,
        lazyInit: false,
      }, CONTAINER_EVENTS.IMPORT);
      imported.push(identity);
    }
    return Object.freeze({ imported: Object.freeze(imported), skipped: Object.freeze(skipped) });
  }

  get(identity: string): ComponentRegistration | null {
    return this._registrations.get(identity) ?? null;
  }

  has(identity: string): boolean {
    return this._registrations.has(identity);
  }

  /** Registrations in the order they were applied. */
  list(source?: RegistrationSource): ComponentRegistration[] {
    const all = [...this._registrations.values()];
    return source === undefined ? all : all.filter((r) => r.source === source);
  }

  get count(): number {
    return this._registrations.size;
  }

  on(event: ContainerEvent, callback: EventCallback): void {
    this._callbacks.get(event)?.push(callback);
  }

  private _naming(generator: TypeRef | null): NamingStrategy {
    if (generator === null) return this._defaultNaming;
    const strategy = this._namingStrategies.get(generator);
    if (strategy === undefined) {
      throw new InvalidInputError(`No naming strategy registered for '${generator.qualifiedName}'`);
    }
    return strategy;
  }

  private _add(registration: ComponentRegistration, event: ContainerEvent): void {
    const frozen = Object.freeze(registration);
    this._registrations.set(frozen.identity, frozen);
    for (const cb of this._callbacks.get(event) ?? []) {
      try {
        cb(frozen);
      } catch (e) {
        console.warn(`[bootmark:container] Callback error for event '${event}':`, e);
      }
    }
  }
}
