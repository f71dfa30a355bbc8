/**
 * Declarative unit definitions and their parsed descriptors.
 */

import type { TSchema } from '@sinclair/typebox';
import type { TypeRef } from '../type-ref.js';

export type AttributeType = 'string' | 'string[]' | 'type' | 'type[]' | 'boolean' | 'enum';

export type AttributeValue = string | boolean | TypeRef | readonly string[] | readonly TypeRef[];

/** `Unit.attribute`. */
export type AttributeKey = string;

/**
 * Where an attribute's value is forwarded. An omitted `unit` means the
 * declaring unit (a synonym); an omitted `attribute` means the same name on
 * the target unit.
 */
export interface AliasTarget {
  readonly unit?: string;
  readonly attribute?: string;
}

export interface AttributeDefinition {
  readonly name: string;
  readonly type: AttributeType;
  readonly default: AttributeValue;
  readonly enumValues?: readonly string[];
  readonly aliasFor?: AliasTarget;
}

export interface UnitDefinition {
  readonly name: string;
  readonly description?: string;
  readonly attributes: readonly AttributeDefinition[];
  /** Directives this unit aggregates. */
  readonly composes?: readonly UnitDefinition[];
}

export interface Attribute {
  readonly unit: string;
  readonly name: string;
  readonly key: AttributeKey;
  readonly type: AttributeType;
  readonly defaultValue: AttributeValue;
  readonly enumValues: readonly string[] | null;
  readonly schema: TSchema;
}

export interface AliasEdge {
  readonly source: AttributeKey;
  readonly target: AttributeKey;
}

export interface UnitDescriptor {
  readonly name: string;
  readonly definition: UnitDefinition;
  /** The root unit first, then composed units in depth-first order. */
  readonly units: readonly string[];
  readonly attributes: ReadonlyMap<AttributeKey, Attribute>;
  readonly edges: readonly AliasEdge[];
}

export function attributeKey(unit: string, attribute: string): AttributeKey {
  return `${unit}.${attribute}`;
}
