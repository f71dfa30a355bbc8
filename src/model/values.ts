/**
 * TypeBox schemas for attribute types, plus value comparison.
 */

import { Kind, Type, TypeRegistry, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { TypeRef } from '../type-ref.js';
import type { AttributeType, AttributeValue } from './types.js';

const TYPE_REF_KIND = 'BootmarkTypeRef';

if (!TypeRegistry.Has(TYPE_REF_KIND)) {
  TypeRegistry.Set(TYPE_REF_KIND, (_schema, value) => value instanceof TypeRef);
}

export const TTypeRef = Type.Unsafe<TypeRef>({ [Kind]: TYPE_REF_KIND });

export function schemaFor(type: AttributeType, enumValues: readonly string[] = []): TSchema {
  switch (type) {
    case 'string':
      return Type.String();
    case 'string[]':
      return Type.Array(Type.String());
    case 'type':
      return TTypeRef;
    case 'type[]':
      return Type.Array(TTypeRef);
    case 'boolean':
      return Type.Boolean();
    case 'enum':
      return enumValues.length === 0 ? Type.Never() : Type.Union(enumValues.map((v) => Type.Literal(v)));
  }
}

export function conformsTo(schema: TSchema, value: unknown): value is AttributeValue {
  return Value.Check(schema, value);
}

/** Arrays compare element-wise; type references by identity. */
export function valuesEqual(a: AttributeValue, b: AttributeValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

export function freezeValue(value: AttributeValue): AttributeValue {
  return Array.isArray(value) ? Object.freeze([...value]) : value;
}

export function renderValue(value: AttributeValue): string {
  return JSON.stringify(value);
}
