export {
  annotationFilter,
  assignableFilter,
  regexFilter,
  customFilter,
  describeFilter,
} from './types.js';
export type { Candidate, CandidatePredicate, ExclusionFilter, ExclusionFilterKind } from './types.js';
export { ExclusionFilterChain, filterMatches } from './chain.js';
export {
  ExclusionHookRegistry,
  typeExcludeFilter,
  autoConfigurationExcludeFilter,
  builtInFilters,
  TYPE_EXCLUDE_FILTER,
  AUTO_CONFIGURATION_EXCLUDE_FILTER,
  AUTO_CONFIGURATION_ANNOTATION,
} from './builtin.js';
export type { BuiltInFilterSources } from './builtin.js';
