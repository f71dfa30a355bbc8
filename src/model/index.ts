export { describeUnit } from './annotation-model.js';
export { TTypeRef, schemaFor, conformsTo, valuesEqual, renderValue } from './values.js';
export { attributeKey } from './types.js';
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
} from './types.js';
