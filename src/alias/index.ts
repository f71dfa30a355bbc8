export { buildAliasGraph } from './graph.js';
export type { AliasClass, AliasGraph } from './graph.js';
export { resolveAttributes, ResolvedAttributes } from './resolver.js';
export type { EffectiveValue, ExplicitAttributes, ValueOrigin } from './resolver.js';
