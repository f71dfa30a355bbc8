/**
 * Static definitions of the built-in directives and the composed
 * `BootApplication` marker.
 */

import type { UnitDefinition } from '../model/types.js';
import { TypeRef } from '../type-ref.js';

/**
 * Default of every `nameGenerator` attribute. Leaving it in place means "use
 * whatever generator the container would use anyway".
 */
export const NAME_GENERATOR_SENTINEL = TypeRef.of('bootmark.naming.NameGenerator');

export const Configuration: UnitDefinition = {
  name: 'Configuration',
  description: 'Declares factory methods for components.',
  attributes: [
    { name: 'value', type: 'string', default: '' },
    { name: 'proxyBeanMethods', type: 'boolean', default: true },
  ],
};

export const BootConfiguration: UnitDefinition = {
  name: 'BootConfiguration',
  description: 'Application-level configuration; at most one per application.',
  attributes: [
    { name: 'proxyBeanMethods', type: 'boolean', default: true, aliasFor: { unit: 'Configuration' } },
  ],
  composes: [Configuration],
};

export const EnableAutoConfiguration: UnitDefinition = {
  name: 'EnableAutoConfiguration',
  description: 'Imports automatically discovered capabilities after explicit registrations.',
  attributes: [
    { name: 'exclude', type: 'type[]', default: [] },
    { name: 'excludeName', type: 'string[]', default: [] },
  ],
};

export const ComponentScan: UnitDefinition = {
  name: 'ComponentScan',
  description: 'Scans packages for components.',
  attributes: [
    { name: 'value', type: 'string[]', default: [], aliasFor: { attribute: 'basePackages' } },
    { name: 'basePackages', type: 'string[]', default: [], aliasFor: { attribute: 'value' } },
    { name: 'basePackageClasses', type: 'type[]', default: [] },
    { name: 'nameGenerator', type: 'type', default: NAME_GENERATOR_SENTINEL },
    { name: 'lazyInit', type: 'boolean', default: false },
  ],
};

export const BootApplication: UnitDefinition = {
  name: 'BootApplication',
  description: 'Configuration, auto-configuration and component scanning in one marker.',
  attributes: [
    { name: 'exclude', type: 'type[]', default: [], aliasFor: { unit: 'EnableAutoConfiguration' } },
    { name: 'excludeName', type: 'string[]', default: [], aliasFor: { unit: 'EnableAutoConfiguration' } },
    {
      name: 'scanBasePackages',
      type: 'string[]',
      default: [],
      aliasFor: { unit: 'ComponentScan', attribute: 'basePackages' },
    },
    {
      name: 'scanBasePackageClasses',
      type: 'type[]',
      default: [],
      aliasFor: { unit: 'ComponentScan', attribute: 'basePackageClasses' },
    },
    {
      name: 'nameGenerator',
      type: 'type',
      default: NAME_GENERATOR_SENTINEL,
      aliasFor: { unit: 'ComponentScan' },
    },
    { name: 'proxyBeanMethods', type: 'boolean', default: true, aliasFor: { unit: 'BootConfiguration' } },
  ],
  composes: [BootConfiguration, EnableAutoConfiguration, ComponentScan],
};
