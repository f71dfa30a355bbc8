/**
 * bootmark - composed bootstrap marker with attribute aliasing and
 * exclusion-filter composition.
 */

// Core
export { TypeRef } from './type-ref.js';
export { Config, SettingsSchema } from './config.js';
export { CancelToken } from './cancel.js';

// Errors
export {
  BootstrapError,
  ConfigNotFoundError,
  ConfigError,
  InvalidInputError,
  MalformedUnitError,
  AliasCycleError,
  AliasConflictError,
  DiscoveryError,
  BootstrapCancelledError,
  ErrorCodes,
} from './errors.js';
export type { ErrorOptions, ErrorCode, ConflictingAssignment } from './errors.js';

// Annotation model
export { describeUnit, attributeKey, schemaFor, conformsTo, valuesEqual, TTypeRef } from './model/index.js';
export type {
  AttributeType,
  AttributeValue,
  AttributeKey,
  AliasTarget,
  AttributeDefinition,
  UnitDefinition,
  Attribute,
  AliasEdge,
  UnitDescriptor,
} from './model/index.js';
export { DescriptorRegistry, defaultDescriptorRegistry } from './registry/index.js';

// Alias resolution
export { buildAliasGraph, resolveAttributes, ResolvedAttributes } from './alias/index.js';
export type { AliasClass, AliasGraph, EffectiveValue, ExplicitAttributes, ValueOrigin } from './alias/index.js';

// Exclusion filters
export {
  annotationFilter,
  assignableFilter,
  regexFilter,
  customFilter,
  describeFilter,
  ExclusionFilterChain,
  ExclusionHookRegistry,
  builtInFilters,
  typeExcludeFilter,
  autoConfigurationExcludeFilter,
  TYPE_EXCLUDE_FILTER,
  AUTO_CONFIGURATION_EXCLUDE_FILTER,
  AUTO_CONFIGURATION_ANNOTATION,
} from './filters/index.js';
export type { Candidate, CandidatePredicate, ExclusionFilter, ExclusionFilterKind } from './filters/index.js';

// Scanning
export { buildScanSpec, DirectoryScanner, tokenizePackages, resolvePlaceholders } from './scan/index.js';
export type { ScanSpec, ScanSpecOptions, ComponentScanner, ScannedComponent } from './scan/index.js';

// Bootstrap
export {
  Configuration,
  BootConfiguration,
  EnableAutoConfiguration,
  ComponentScan,
  BootApplication,
  NAME_GENERATOR_SENTINEL,
  Application,
  bootApplication,
  BootstrapCoordinator,
  computeDeferredImports,
  StaticDiscoverer,
  ImportsFileDiscoverer,
  ComponentRegistry,
  CONTAINER_EVENTS,
} from './bootstrap/index.js';
export type {
  ApplicationOptions,
  AutoConfigurationExclusions,
  BootstrapCollaborators,
  BootstrapResult,
  DeferredImports,
  ImportEvent,
  ImportListener,
  Discoverer,
  Container,
  ComponentRegistration,
  DeferredImportOutcome,
  NamingStrategy,
  RegistrationOptions,
} from './bootstrap/index.js';

// Observability
export { Logger } from './observability/index.js';
export type { LogLevel, LogFormat, LoggerOptions, WritableOutput } from './observability/index.js';

export const VERSION = '0.1.0';
