/**
 * Cache of validated alias graphs, keyed by unit definition name.
 *
 * A graph is a pure function of its static definition, so one entry serves
 * every instance and every concurrent bootstrap. Filling happens synchronously
 * inside `get`, which makes it compute-once per name.
 */

import { buildAliasGraph, type AliasGraph } from '../alias/graph.js';
import { MalformedUnitError } from '../errors.js';
import { describeUnit } from '../model/annotation-model.js';
import type { UnitDefinition } from '../model/types.js';

export class DescriptorRegistry {
  private _graphs: Map<string, AliasGraph> = new Map();
  private _builds = 0;

  get(definition: UnitDefinition): AliasGraph {
    const cached = this._graphs.get(definition.name);
    if (cached !== undefined) {
      if (cached.descriptor.definition !== definition) {
        throw new MalformedUnitError(definition.name, 'a different definition is already registered under this name');
      }
      return cached;
    }

    this._builds++;
    const graph = buildAliasGraph(describeUnit(definition));
    this._graphs.set(definition.name, graph);
    return graph;
  }

  has(name: string): boolean {
    return this._graphs.has(name);
  }

  /** Number of graphs built on a cache miss, failed builds included. */
  get buildCount(): number {
    return this._builds;
  }

  get size(): number {
    return this._graphs.size;
  }

  clear(): void {
    this._graphs.clear();
  }
}

export const defaultDescriptorRegistry = new DescriptorRegistry();
