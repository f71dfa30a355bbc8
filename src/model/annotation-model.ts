/**
 * Parses a declarative unit definition, and every unit it composes, into a
 * flat descriptor of attributes and alias edges.
 */

import { AliasCycleError, MalformedUnitError } from '../errors.js';
import type {
  AliasEdge,
  Attribute,
  AttributeDefinition,
  AttributeKey,
  UnitDefinition,
  UnitDescriptor,
} from './types.js';
import { attributeKey } from './types.js';
import { conformsTo, freezeValue, schemaFor } from './values.js';

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function describeUnit(definition: UnitDefinition): UnitDescriptor {
  const units = collectUnits(definition);
  const closures = new Map<string, Set<string>>();
  for (const unit of units.values()) {
    closures.set(unit.name, compositionClosure(unit));
  }

  const attributes = new Map<AttributeKey, Attribute>();
  for (const unit of units.values()) {
    for (const attr of unit.attributes) {
      const attribute = toAttribute(unit, attr);
      if (attributes.has(attribute.key)) {
        throw new MalformedUnitError(unit.name, `attribute '${attr.name}' is declared twice`);
      }
      attributes.set(attribute.key, attribute);
    }
  }

  const edges: AliasEdge[] = [];
  for (const unit of units.values()) {
    for (const attr of unit.attributes) {
      if (attr.aliasFor === undefined) continue;
      edges.push(toEdge(unit, attr, attributes, closures.get(unit.name) ?? new Set()));
    }
  }

  return Object.freeze({
    name: definition.name,
    definition,
    units: Object.freeze([...units.keys()]),
    attributes,
    edges: Object.freeze(edges),
  });
}

function collectUnits(root: UnitDefinition): Map<string, UnitDefinition> {
  const units = new Map<string, UnitDefinition>();
  const path: string[] = [];

  function visit(unit: UnitDefinition): void {
    if (!NAME_PATTERN.test(unit.name)) {
      throw new MalformedUnitError(unit.name, 'unit names must be identifiers');
    }
    const onPath = path.indexOf(unit.name);
    if (onPath !== -1) {
      throw new AliasCycleError([...path.slice(onPath), unit.name]);
    }
    const seen = units.get(unit.name);
    if (seen !== undefined) {
      if (seen !== unit) {
        throw new MalformedUnitError(unit.name, 'two different definitions share this name');
      }
      return;
    }
    units.set(unit.name, unit);
    path.push(unit.name);
    for (const child of unit.composes ?? []) {
      visit(child);
    }
    path.pop();
  }

  visit(root);
  return units;
}

function compositionClosure(unit: UnitDefinition): Set<string> {
  const closure = new Set<string>();
  const stack = [...(unit.composes ?? [])];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || closure.has(next.name)) continue;
    closure.add(next.name);
    stack.push(...(next.composes ?? []));
  }
  return closure;
}

function toAttribute(unit: UnitDefinition, attr: AttributeDefinition): Attribute {
  if (!NAME_PATTERN.test(attr.name)) {
    throw new MalformedUnitError(unit.name, `attribute name '${attr.name}' is not an identifier`);
  }
  const enumValues = attr.type === 'enum' ? Object.freeze([...(attr.enumValues ?? [])]) : null;
  if (enumValues !== null && enumValues.length === 0) {
    throw new MalformedUnitError(unit.name, `enum attribute '${attr.name}' declares no values`);
  }
  const schema = schemaFor(attr.type, enumValues ?? []);
  if (!conformsTo(schema, attr.default)) {
    throw new MalformedUnitError(
      unit.name,
      `default of '${attr.name}' does not match its declared type '${attr.type}'`,
    );
  }
  return Object.freeze({
    unit: unit.name,
    name: attr.name,
    key: attributeKey(unit.name, attr.name),
    type: attr.type,
    defaultValue: freezeValue(attr.default),
    enumValues,
    schema,
  });
}

function toEdge(
  unit: UnitDefinition,
  attr: AttributeDefinition,
  attributes: Map<AttributeKey, Attribute>,
  closure: Set<string>,
): AliasEdge {
  const targetUnit = attr.aliasFor?.unit ?? unit.name;
  const targetName = attr.aliasFor?.attribute ?? attr.name;

  if (targetUnit !== unit.name && !closure.has(targetUnit)) {
    throw new MalformedUnitError(
      unit.name,
      `'${attr.name}' aliases unit '${targetUnit}', which '${unit.name}' does not compose`,
    );
  }

  const source = attributeKey(unit.name, attr.name);
  const target = attributeKey(targetUnit, targetName);
  const targetAttr = attributes.get(target);
  if (targetAttr === undefined) {
    throw new MalformedUnitError(unit.name, `alias target '${target}' of '${attr.name}' does not exist`);
  }

  const sourceAttr = attributes.get(source);
  if (sourceAttr === undefined || sourceAttr.type !== targetAttr.type) {
    throw new MalformedUnitError(
      unit.name,
      `'${attr.name}' (${attr.type}) cannot alias '${target}' (${targetAttr.type})`,
    );
  }
  if (!sameEnumValues(sourceAttr.enumValues, targetAttr.enumValues)) {
    throw new MalformedUnitError(unit.name, `'${attr.name}' and '${target}' declare different enum values`);
  }

  return Object.freeze({ source, target });
}

function sameEnumValues(a: readonly string[] | null, b: readonly string[] | null): boolean {
  if (a === null || b === null) return a === b;
  return a.length === b.length && a.every((v) => b.includes(v));
}
