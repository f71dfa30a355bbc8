/**
 * Ordered, immutable chain of exclusion filters.
 *
 * A candidate is excluded when any filter matches. Evaluation stops at the
 * first match, so custom predicates must not depend on running in order.
 */

import type { Candidate, ExclusionFilter } from './types.js';

function assertNever(value: never): never {
  throw new Error(`Unhandled exclusion filter: ${JSON.stringify(value)}`);
}

export function filterMatches(filter: ExclusionFilter, candidate: Candidate): boolean {
  switch (filter.kind) {
    case 'annotation':
      return (candidate.annotations ?? []).includes(filter.type.qualifiedName);
    case 'assignable':
      return (
        candidate.name === filter.type.qualifiedName ||
        (candidate.supertypes ?? []).includes(filter.type.qualifiedName)
      );
    case 'regex':
      return filter.pattern.test(candidate.name);
    case 'custom':
      return filter.predicate(candidate);
    default:
      return assertNever(filter);
  }
}

export class ExclusionFilterChain {
  readonly filters: readonly ExclusionFilter[];

  constructor(filters: readonly ExclusionFilter[] = []) {
    this.filters = Object.freeze([...filters]);
    Object.freeze(this);
  }

  excludes(candidate: Candidate): boolean {
    return this.filters.some((filter) => filterMatches(filter, candidate));
  }

  /** Every filter that matches, in chain order. */
  matching(candidate: Candidate): ExclusionFilter[] {
    return this.filters.filter((filter) => filterMatches(filter, candidate));
  }

  concat(filters: readonly ExclusionFilter[]): ExclusionFilterChain {
    return new ExclusionFilterChain([...this.filters, ...filters]);
  }

  get size(): number {
    return this.filters.length;
  }
}
