/**
 * Per-instance alias resolution: explicit assignments on an annotated entry
 * point are propagated across each alias class.
 */

import { AliasConflictError, InvalidInputError } from '../errors.js';
import type { AttributeKey, AttributeValue } from '../model/types.js';
import { attributeKey } from '../model/types.js';
import { conformsTo, freezeValue, valuesEqual } from '../model/values.js';
import { TypeRef } from '../type-ref.js';
import type { AliasGraph } from './graph.js';

export type ValueOrigin = 'explicit' | 'default';

export interface EffectiveValue {
  readonly value: AttributeValue;
  readonly origin: ValueOrigin;
  /** Attribute keys from the one that supplied the value to the one read. */
  readonly resolvedFrom: readonly AttributeKey[];
}

/**
 * Explicit assignments. A bare name addresses the root unit; `Unit.attr`
 * addresses any unit in the composition.
 */
export type ExplicitAttributes = Readonly<Record<string, AttributeValue>>;

export class ResolvedAttributes {
  readonly unit: string;
  private _values: ReadonlyMap<AttributeKey, EffectiveValue>;
  private _defaults: ReadonlyMap<AttributeKey, AttributeValue>;

  constructor(
    unit: string,
    values: Map<AttributeKey, EffectiveValue>,
    defaults: Map<AttributeKey, AttributeValue>,
  ) {
    this.unit = unit;
    this._values = values;
    this._defaults = defaults;
    Object.freeze(this);
  }

  private _key(key: string): AttributeKey {
    return key.includes('.') ? key : attributeKey(this.unit, key);
  }

  get(key: string): EffectiveValue {
    const value = this._values.get(this._key(key));
    if (value === undefined) {
      throw new InvalidInputError(`Unknown attribute '${key}' on '${this.unit}'`);
    }
    return value;
  }

  value(key: string): AttributeValue {
    return this.get(key).value;
  }

  isExplicit(key: string): boolean {
    return this.get(key).origin === 'explicit';
  }

  /** The declared default, for identity checks against sentinel values. */
  defaultOf(key: string): AttributeValue {
    const value = this._defaults.get(this._key(key));
    if (value === undefined) {
      throw new InvalidInputError(`Unknown attribute '${key}' on '${this.unit}'`);
    }
    return value;
  }

  string(key: string): string {
    const value = this.value(key);
    if (typeof value !== 'string') throw this._mismatch(key, 'string');
    return value;
  }

  boolean(key: string): boolean {
    const value = this.value(key);
    if (typeof value !== 'boolean') throw this._mismatch(key, 'boolean');
    return value;
  }

  type(key: string): TypeRef {
    const value = this.value(key);
    if (!(value instanceof TypeRef)) throw this._mismatch(key, 'type');
    return value;
  }

  stringList(key: string): readonly string[] {
    const value = this.value(key);
    if (!Array.isArray(value)) throw this._mismatch(key, 'string[]');
    return value.filter((item): item is string => typeof item === 'string');
  }

  typeList(key: string): readonly TypeRef[] {
    const value = this.value(key);
    if (!Array.isArray(value)) throw this._mismatch(key, 'type[]');
    return value.filter((item): item is TypeRef => item instanceof TypeRef);
  }

  private _mismatch(key: string, expected: string): InvalidInputError {
    return new InvalidInputError(`Attribute '${key}' on '${this.unit}' is not of type '${expected}'`);
  }

  keys(): AttributeKey[] {
    return [...this._values.keys()];
  }

  toJSON(): Record<string, AttributeValue> {
    const obj: Record<string, AttributeValue> = {};
    for (const [key, effective] of this._values) {
      obj[key] = effective.value;
    }
    return obj;
  }
}

export function resolveAttributes(graph: AliasGraph, explicit: ExplicitAttributes = {}): ResolvedAttributes {
  const { descriptor } = graph;
  const assigned = new Map<AttributeKey, AttributeValue>();

  for (const [rawKey, value] of Object.entries(explicit)) {
    const key = rawKey.includes('.') ? rawKey : attributeKey(descriptor.name, rawKey);
    const attr = descriptor.attributes.get(key);
    if (attr === undefined) {
      throw new InvalidInputError(`Unknown attribute '${rawKey}' on '${descriptor.name}'`);
    }
    if (!conformsTo(attr.schema, value)) {
      throw new InvalidInputError(`Value for '${key}' does not match its declared type '${attr.type}'`);
    }
    assigned.set(key, freezeValue(value));
  }

  const values = new Map<AttributeKey, EffectiveValue>();
  for (const aliasClass of graph.classes) {
    const setters = aliasClass.members.filter((key) => assigned.has(key));
    const setterValues = setters.map((key) => ({ key, value: assigned.get(key) ?? aliasClass.defaultValue }));
    if (setterValues.some((entry) => !valuesEqual(entry.value, setterValues[0].value))) {
      throw new AliasConflictError(setterValues);
    }

    const origin = setters[0];
    for (const key of aliasClass.members) {
      const effective: EffectiveValue = origin === undefined
        ? { value: aliasClass.defaultValue, origin: 'default', resolvedFrom: Object.freeze([key]) }
        : {
            value: assigned.get(origin) ?? aliasClass.defaultValue,
            origin: 'explicit',
            resolvedFrom: Object.freeze(pathBetween(graph, origin, key)),
          };
      values.set(key, Object.freeze(effective));
    }
  }

  const defaults = new Map<AttributeKey, AttributeValue>();
  for (const attr of descriptor.attributes.values()) {
    defaults.set(attr.key, attr.defaultValue);
  }

  return new ResolvedAttributes(descriptor.name, values, defaults);
}

function pathBetween(graph: AliasGraph, from: AttributeKey, to: AttributeKey): AttributeKey[] {
  if (from === to) return [from];
  const previous = new Map<AttributeKey, AttributeKey>();
  const queue: AttributeKey[] = [from];
  const seen = new Set([from]);
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of graph.neighbours.get(current) ?? []) {
      if (seen.has(next)) continue;
      seen.add(next);
      previous.set(next, current);
      if (next === to) {
        const path = [to];
        let step = previous.get(to);
        while (step !== undefined) {
          path.unshift(step);
          step = previous.get(step);
        }
        return path;
      }
      queue.push(next);
    }
  }
  return [from, to];
}
