/**
 * Exclusion filters: a closed set of predicate kinds.
 */

import { ConfigError } from '../errors.js';
import type { TypeRef } from '../type-ref.js';

export interface Candidate {
  /** Fully qualified name. */
  readonly name: string;
  readonly supertypes?: readonly string[];
  readonly annotations?: readonly string[];
}

export type CandidatePredicate = (candidate: Candidate) => boolean;

export type ExclusionFilter =
  | { readonly kind: 'annotation'; readonly type: TypeRef }
  | { readonly kind: 'assignable'; readonly type: TypeRef }
  | { readonly kind: 'regex'; readonly pattern: RegExp }
  | { readonly kind: 'custom'; readonly name: string; readonly predicate: CandidatePredicate };

export type ExclusionFilterKind = ExclusionFilter['kind'];

export function annotationFilter(type: TypeRef): ExclusionFilter {
  return Object.freeze({ kind: 'annotation', type });
}

export function assignableFilter(type: TypeRef): ExclusionFilter {
  return Object.freeze({ kind: 'assignable', type });
}

/**
 * Matches when the whole qualified name matches `pattern`.
 *
 * @throws ConfigError if `pattern` is not a valid regular expression.
 */
export function regexFilter(pattern: string): ExclusionFilter {
  let compiled: RegExp;
  try {
    compiled = new RegExp(`^(?:${pattern})$`);
  } catch (e) {
    throw new ConfigError(`Invalid exclusion pattern '${pattern}'`, { pattern }, {
      cause: e instanceof Error ? e : undefined,
    });
  }
  return Object.freeze({ kind: 'regex', pattern: compiled });
}

export function customFilter(name: string, predicate: CandidatePredicate): ExclusionFilter {
  return Object.freeze({ kind: 'custom', name, predicate });
}

export function describeFilter(filter: ExclusionFilter): string {
  switch (filter.kind) {
    case 'annotation':
      return `annotation(${filter.type.qualifiedName})`;
    case 'assignable':
      return `assignable(${filter.type.qualifiedName})`;
    case 'regex':
      return `regex(${filter.pattern.source})`;
    case 'custom':
      return `custom(${filter.name})`;
  }
}
