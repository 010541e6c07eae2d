/**
 * Job dependency graph.
 *
 * Jobs are independent unless a template declares `needs`; this validates the
 * resulting edges and answers the ordering questions the aggregator and the
 * plan command ask.
 */
import { ConfigurationError } from "./errors.js";

export interface DagNode {
  name: string;
  needs: readonly string[];
}

/**
 * Validate the graph for missing dependencies and cycles.
 */
export function validateDag(nodes: readonly DagNode[]): void {
  const byName = new Map(nodes.map((n) => [n.name, n]));

  for (const node of nodes) {
    for (const dep of node.needs) {
      if (!byName.has(dep)) {
        throw new ConfigurationError(`Job '${node.name}' depends on unknown job '${dep}'`);
      }
    }
  }

  const visited = new Set<string>();
  const stack = new Set<string>();

  function visit(name: string): void {
    if (stack.has(name)) {
      throw new ConfigurationError(`Circular dependency detected involving job '${name}'`);
    }
    if (visited.has(name)) return;

    stack.add(name);
    for (const dep of byName.get(name)?.needs ?? []) {
      visit(dep);
    }
    stack.delete(name);
    visited.add(name);
  }

  for (const node of nodes) {
    visit(node.name);
  }
}

/**
 * The selected jobs plus everything they transitively depend on.
 */
export function withDependencies(nodes: readonly DagNode[], selected: Iterable<string>): Set<string> {
  const byName = new Map(nodes.map((n) => [n.name, n]));
  const result = new Set<string>();
  const queue = [...selected];

  while (queue.length > 0) {
    const name = queue.pop();
    if (name === undefined || result.has(name)) continue;
    result.add(name);
    queue.push(...(byName.get(name)?.needs ?? []));
  }

  return result;
}

/**
 * Group jobs into layers; every job's dependencies sit in earlier layers.
 */
export function getParallelLayers(nodes: readonly DagNode[]): string[][] {
  const layers: string[][] = [];
  const assigned = new Set<string>();

  while (assigned.size < nodes.length) {
    const layer = nodes
      .filter((n) => !assigned.has(n.name) && n.needs.every((dep) => assigned.has(dep)))
      .map((n) => n.name);

    if (layer.length === 0) {
      throw new ConfigurationError("Unable to make progress - possible cycle detected");
    }

    for (const name of layer) assigned.add(name);
    layers.push(layer);
  }

  return layers;
}
