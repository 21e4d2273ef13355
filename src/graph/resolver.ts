/**
 * graphform — Dependency Resolver
 *
 * Kahn's algorithm in layers: every item in a layer depends only on items in
 * earlier layers, so one layer may be applied concurrently. Ties keep the
 * input order, which makes identical input produce identical plans.
 */

import { CyclicDependencyError } from "../errors.js";
import type { ResourceAddress, ResourceGraph, ResourceNode } from "./types.js";

export type ResolvedOrder = {
  layers: ResourceNode[][];
  /** Layers concatenated; every node appears after all its dependencies. */
  order: ResourceNode[];
  layerOf: Map<ResourceAddress, number>;
};

/**
 * Topologically order the graph.
 *
 * @throws CyclicDependencyError naming the cycle members
 */
export function resolveOrder(graph: ResourceGraph): ResolvedOrder {
  const layers = layerItems(
    graph.nodes,
    (n) => n.address,
    (n) => graph.dependencies.get(n.address) ?? [],
  );

  const layerOf = new Map<ResourceAddress, number>();
  layers.forEach((layer, i) => layer.forEach((n) => layerOf.set(n.address, i)));

  return { layers, order: layers.flat(), layerOf };
}

/** Teardown order: dependents before their dependencies. */
export function reverseLayers<T>(layers: readonly T[][]): T[][] {
  return [...layers].reverse().map((layer) => [...layer]);
}

/**
 * Layered topological sort over any keyed items. Dependencies naming keys
 * outside `items` are ignored, which lets callers layer a subset of a graph.
 *
 * @throws CyclicDependencyError when the items cannot be ordered
 */
export function layerItems<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  dependenciesOf: (item: T) => Iterable<string>,
): T[][] {
  const byKey = new Map<string, T>();
  const position = new Map<string, number>();
  items.forEach((item, i) => {
    byKey.set(keyOf(item), item);
    position.set(keyOf(item), i);
  });

  const inDegree = new Map<string, number>();
  const adj = new Map<string, string[]>();
  for (const key of byKey.keys()) {
    inDegree.set(key, 0);
    adj.set(key, []);
  }

  for (const item of items) {
    const key = keyOf(item);
    for (const dep of new Set(dependenciesOf(item))) {
      if (!byKey.has(dep)) continue;
      adj.get(dep)?.push(key);
      inDegree.set(key, (inDegree.get(key) ?? 0) + 1);
    }
  }

  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  const layers: T[][] = [];
  let queue = [...inDegree.entries()].filter(([, d]) => d === 0).map(([k]) => k).sort(byPosition);
  let processed = 0;

  while (queue.length > 0) {
    const layer: T[] = [];
    for (const key of queue) {
      const item = byKey.get(key);
      if (item !== undefined) layer.push(item);
    }
    layers.push(layer);
    processed += queue.length;

    const next: string[] = [];
    for (const key of queue) {
      for (const dependent of adj.get(key) ?? []) {
        const deg = (inDegree.get(dependent) ?? 1) - 1;
        inDegree.set(dependent, deg);
        if (deg === 0) next.push(dependent);
      }
    }
    queue = next.sort(byPosition);
  }

  if (processed < byKey.size) {
    const remaining = [...inDegree.entries()].filter(([, d]) => d > 0).map(([k]) => k).sort(byPosition);
    const deps = new Map<string, string[]>();
    for (const key of remaining) {
      const item = byKey.get(key);
      deps.set(key, item === undefined ? [] : [...dependenciesOf(item)].filter((d) => byKey.has(d)));
    }
    throw new CyclicDependencyError(findCycle(remaining, deps) ?? remaining);
  }

  return layers;
}

// =============================================================================
// Cycle reconstruction
// =============================================================================

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * DFS over the given nodes; returns the first cycle found as a closed path
 * (`a → b → a`), or null.
 */
export function findCycle(keys: readonly string[], deps: Map<string, readonly string[]>): string[] | null {
  const color = new Map<string, number>(keys.map((k) => [k, WHITE]));
  const stack: string[] = [];

  const visit = (key: string): string[] | null => {
    color.set(key, GRAY);
    stack.push(key);
    for (const dep of deps.get(key) ?? []) {
      if (!color.has(dep)) continue;
      if (color.get(dep) === GRAY) {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (color.get(dep) === WHITE) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    color.set(key, BLACK);
    return null;
  };

  for (const key of keys) {
    if (color.get(key) !== WHITE) continue;
    const cycle = visit(key);
    if (cycle) return cycle;
  }
  return null;
}
