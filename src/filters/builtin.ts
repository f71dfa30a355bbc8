/**
 * Built-in exclusion filters, always placed ahead of user-declared ones.
 */

import { TypeRef } from '../type-ref.js';
import type { Candidate, CandidatePredicate, ExclusionFilter } from './types.js';
import { customFilter } from './types.js';

export const TYPE_EXCLUDE_FILTER = 'TypeExcludeFilter';
export const AUTO_CONFIGURATION_EXCLUDE_FILTER = 'AutoConfigurationExcludeFilter';

/** Stereotype carried by auto-configuration units. */
export const AUTO_CONFIGURATION_ANNOTATION = TypeRef.of('bootmark.autoconfigure.AutoConfiguration');

interface RegisteredHook {
  readonly name: string;
  readonly predicate: CandidatePredicate;
}

/**
 * Externally registered exclusion hooks. The type-exclude filter treats
 * them as opaque predicates.
 */
export class ExclusionHookRegistry {
  private _hooks: RegisteredHook[] = [];

  register(name: string, predicate: CandidatePredicate): () => void {
    const hook = { name, predicate };
    this._hooks.push(hook);
    return () => {
      this._hooks = this._hooks.filter((h) => h !== hook);
    };
  }

  matches(candidate: Candidate): boolean {
    return this._hooks.some((hook) => hook.predicate(candidate));
  }

  names(): string[] {
    return this._hooks.map((hook) => hook.name);
  }

  get size(): number {
    return this._hooks.length;
  }
}

export function typeExcludeFilter(hooks: ExclusionHookRegistry): ExclusionFilter {
  return customFilter(TYPE_EXCLUDE_FILTER, (candidate) => hooks.matches(candidate));
}

/**
 * Excludes candidates that automatic discovery produced, so a capability is
 * never registered from both sources. `discovered` is read on every call;
 * discovery may complete after the chain is built.
 */
export function autoConfigurationExcludeFilter(discovered: () => ReadonlySet<string>): ExclusionFilter {
  return customFilter(
    AUTO_CONFIGURATION_EXCLUDE_FILTER,
    (candidate) =>
      discovered().has(candidate.name) ||
      (candidate.annotations ?? []).includes(AUTO_CONFIGURATION_ANNOTATION.qualifiedName),
  );
}

export interface BuiltInFilterSources {
  readonly hooks: ExclusionHookRegistry;
  readonly discovered: () => ReadonlySet<string>;
}

export function builtInFilters(sources: BuiltInFilterSources): ExclusionFilter[] {
  return [typeExcludeFilter(sources.hooks), autoConfigurationExcludeFilter(sources.discovered)];
}
