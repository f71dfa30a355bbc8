export {
  Configuration,
  BootConfiguration,
  EnableAutoConfiguration,
  ComponentScan,
  BootApplication,
  NAME_GENERATOR_SENTINEL,
} from './directives.js';
export { Application, bootApplication, AUTO_CONFIGURATION_UNIT, CONFIGURATION_UNIT } from './application.js';
export type { ApplicationOptions, AutoConfigurationExclusions } from './application.js';
export { BootstrapCoordinator, computeDeferredImports } from './coordinator.js';
export type {
  BootstrapCollaborators,
  BootstrapResult,
  DeferredImports,
  ImportEvent,
  ImportListener,
} from './coordinator.js';
export { StaticDiscoverer, ImportsFileDiscoverer, parseImports, removeDuplicates } from './discovery.js';
export type { Discoverer } from './discovery.js';
export { ComponentRegistry, CONTAINER_EVENTS, defaultNaming } from './container.js';
export type {
  Container,
  ContainerEvent,
  ComponentRegistration,
  DeferredImportOutcome,
  NamingStrategy,
  RegistrationOptions,
  RegistrationSource,
} from './container.js';
