/**
 * Definition-time validation of a unit's alias edges.
 *
 * Attributes joined by alias edges (in either direction) form one
 * equivalence class; every member of a class must declare the same default.
 * Directed cycles are rejected, except the mirrored pair two synonyms on the
 * same unit form.
 */

import { AliasCycleError, MalformedUnitError } from '../errors.js';
import type { AliasEdge, AttributeKey, AttributeValue, UnitDescriptor } from '../model/types.js';
import { renderValue, valuesEqual } from '../model/values.js';

export interface AliasClass {
  readonly members: readonly AttributeKey[];
  readonly defaultValue: AttributeValue;
}

export interface AliasGraph {
  readonly descriptor: UnitDescriptor;
  readonly classes: readonly AliasClass[];
  readonly classOf: ReadonlyMap<AttributeKey, AliasClass>;
  /** Undirected adjacency, neighbours in edge declaration order. */
  readonly neighbours: ReadonlyMap<AttributeKey, readonly AttributeKey[]>;
}

class UnionFind {
  private _parent = new Map<string, string>();

  add(key: string): void {
    if (!this._parent.has(key)) this._parent.set(key, key);
  }

  find(key: string): string {
    let root = key;
    let parent = this._parent.get(root);
    while (parent !== undefined && parent !== root) {
      root = parent;
      parent = this._parent.get(root);
    }
    // Path compression
    let current = key;
    while (current !== root) {
      const next = this._parent.get(current) ?? root;
      this._parent.set(current, root);
      current = next;
    }
    return root;
  }

  union(a: string, b: string): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA !== rootB) this._parent.set(rootB, rootA);
  }
}

function unitOf(key: AttributeKey): string {
  return key.slice(0, key.indexOf('.'));
}

export function buildAliasGraph(descriptor: UnitDescriptor): AliasGraph {
  detectCycles(descriptor.edges);
  checkSynonymsMirrored(descriptor.edges);

  const uf = new UnionFind();
  for (const key of descriptor.attributes.keys()) uf.add(key);
  for (const edge of descriptor.edges) uf.union(edge.source, edge.target);

  const grouped = new Map<string, AttributeKey[]>();
  for (const key of descriptor.attributes.keys()) {
    const root = uf.find(key);
    const members = grouped.get(root);
    if (members) {
      members.push(key);
    } else {
      grouped.set(root, [key]);
    }
  }

  const classes: AliasClass[] = [];
  const classOf = new Map<AttributeKey, AliasClass>();
  for (const members of grouped.values()) {
    const aliasClass = Object.freeze({
      members: Object.freeze(members),
      defaultValue: sharedDefault(descriptor, members),
    });
    classes.push(aliasClass);
    for (const key of members) classOf.set(key, aliasClass);
  }

  const neighbours = new Map<AttributeKey, AttributeKey[]>();
  const link = (from: AttributeKey, to: AttributeKey): void => {
    const list = neighbours.get(from);
    if (list === undefined) {
      neighbours.set(from, [to]);
    } else if (!list.includes(to)) {
      list.push(to);
    }
  };
  for (const edge of descriptor.edges) {
    link(edge.source, edge.target);
    link(edge.target, edge.source);
  }

  return Object.freeze({
    descriptor,
    classes: Object.freeze(classes),
    classOf,
    neighbours,
  });
}

function sharedDefault(descriptor: UnitDescriptor, members: AttributeKey[]): AttributeValue {
  const first = descriptor.attributes.get(members[0]);
  if (first === undefined) {
    throw new MalformedUnitError(descriptor.name, `unknown attribute '${members[0]}'`);
  }
  for (const key of members.slice(1)) {
    const other = descriptor.attributes.get(key);
    if (other === undefined) {
      throw new MalformedUnitError(descriptor.name, `unknown attribute '${key}'`);
    }
    if (!valuesEqual(first.defaultValue, other.defaultValue)) {
      throw new MalformedUnitError(
        other.unit,
        `'${first.key}' and '${other.key}' are aliases but declare different defaults ` +
          `(${renderValue(first.defaultValue)} vs ${renderValue(other.defaultValue)})`,
      );
    }
  }
  return first.defaultValue;
}

function isSynonymEdge(edge: AliasEdge, declared: Set<string>): boolean {
  return unitOf(edge.source) === unitOf(edge.target) && declared.has(`${edge.target}>${edge.source}`);
}

function detectCycles(edges: readonly AliasEdge[]): void {
  const declared = new Set(edges.map((e) => `${e.source}>${e.target}`));
  const adjacency = new Map<AttributeKey, AttributeKey[]>();
  for (const edge of edges) {
    if (edge.source === edge.target) {
      throw new AliasCycleError([edge.source, edge.target]);
    }
    if (isSynonymEdge(edge, declared)) continue;
    const list = adjacency.get(edge.source);
    if (list) {
      list.push(edge.target);
    } else {
      adjacency.set(edge.source, [edge.target]);
    }
  }

  const done = new Set<AttributeKey>();
  const stack: AttributeKey[] = [];

  function visit(key: AttributeKey): void {
    const onStack = stack.indexOf(key);
    if (onStack !== -1) {
      throw new AliasCycleError([...stack.slice(onStack), key]);
    }
    if (done.has(key)) return;
    stack.push(key);
    for (const next of adjacency.get(key) ?? []) visit(next);
    stack.pop();
    done.add(key);
  }

  for (const key of adjacency.keys()) visit(key);
}

function checkSynonymsMirrored(edges: readonly AliasEdge[]): void {
  const declared = new Set(edges.map((e) => `${e.source}>${e.target}`));
  for (const edge of edges) {
    if (unitOf(edge.source) !== unitOf(edge.target)) continue;
    if (!declared.has(`${edge.target}>${edge.source}`)) {
      throw new MalformedUnitError(
        unitOf(edge.source),
        `'${edge.source}' aliases '${edge.target}' but '${edge.target}' does not alias it back`,
      );
    }
  }
}
