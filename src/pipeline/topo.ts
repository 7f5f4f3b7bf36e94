import { CycleError } from './errors.ts';
import type { DependencyGraph } from './graph.ts';

/**
 * Kahn's algorithm. The queue is seeded with zero in-degree tools in
 * registration order and drained FIFO, so a fixed registration sequence
 * always yields the same order.
 *
 * @throws CycleError when some tools can never become ready
 */
export function topoSort(graph: DependencyGraph): string[] {
  const indeg = new Map(graph.inDegree);
  const queue: string[] = graph.nodes.filter((n) => indeg.get(n) === 0);
  const out: string[] = [];

  let head = 0;
  while (head < queue.length) {
    const current = queue[head++];
    out.push(current);
    for (const next of graph.adjacency.get(current) ?? []) {
      const remaining = (indeg.get(next) ?? 0) - 1;
      indeg.set(next, remaining);
      if (remaining === 0) queue.push(next);
    }
  }

  if (out.length !== graph.nodes.length) {
    const emitted = new Set(out);
    const unreached = graph.nodes.filter((n) => !emitted.has(n));
    throw new CycleError(unreached, findCycle(graph, new Set(unreached)));
  }
  return out;
}

/**
 * Walks dependency edges backwards from the first unreached tool. Every
 * unreached tool has at least one unreached dependency, so the walk must
 * revisit a node; the loop from that node is returned as
 * `[a, b, ..., a]` where each entry depends on the next.
 */
function findCycle(graph: DependencyGraph, unreached: Set<string>): string[] {
  const dependenciesOf = new Map<string, string[]>();
  for (const [dep, dependents] of graph.adjacency) {
    if (!unreached.has(dep)) continue;
    for (const d of dependents) {
      if (!unreached.has(d)) continue;
      const list = dependenciesOf.get(d) ?? [];
      list.push(dep);
      dependenciesOf.set(d, list);
    }
  }

  const start = graph.nodes.find((n) => unreached.has(n));
  if (start === undefined) return [];

  const path: string[] = [];
  const position = new Map<string, number>();
  let current: string | undefined = start;
  while (current !== undefined && !position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    current = dependenciesOf.get(current)?.[0];
  }
  if (current === undefined) return [];

  const loop = path.slice(position.get(current));
  return [...loop, current];
}
