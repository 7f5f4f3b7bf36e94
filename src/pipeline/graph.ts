// Dependency graph derived from the registered tool set
import type { Tool } from '../tools/tool.ts';
import { MissingDependencyError } from './errors.ts';

export type ToolDescriptor = Pick<Tool, 'name' | 'dependencies'>;

export interface DependencyGraph {
  nodes: string[]; // registration order
  adjacency: Map<string, string[]>; // dependency -> dependents
  inDegree: Map<string, number>; // unsatisfied dependencies per tool
}

/**
 * Builds adjacency and in-degree for the whole tool set. Iteration follows
 * the map's insertion order, which is registration order.
 *
 * @throws MissingDependencyError when a declared dependency is not registered
 */
export function buildDependencyGraph(
  tools: ReadonlyMap<string, ToolDescriptor>,
): DependencyGraph {
  const nodes = Array.from(tools.keys());
  const adjacency = new Map<string, string[]>();
  const inDegree = new Map<string, number>();

  for (const name of nodes) {
    adjacency.set(name, []);
    inDegree.set(name, 0);
  }

  for (const [name, tool] of tools) {
    for (const dep of tool.dependencies) {
      const dependents = adjacency.get(dep);
      if (!dependents) {
        throw new MissingDependencyError(name, dep);
      }
      dependents.push(name);
      inDegree.set(name, (inDegree.get(name) ?? 0) + 1);
    }
  }

  return { nodes, adjacency, inDegree };
}

/** Checks dependency closure only, without building the graph. */
export function validateDependencies(tools: ReadonlyMap<string, ToolDescriptor>): void {
  for (const [name, tool] of tools) {
    for (const dep of tool.dependencies) {
      if (!tools.has(dep)) throw new MissingDependencyError(name, dep);
    }
  }
}

/** Transitive dependencies of `name` (not including itself). */
export function ancestorsOf(
  tools: ReadonlyMap<string, ToolDescriptor>,
  name: string,
): Set<string> {
  const seen = new Set<string>();
  const stack = [...(tools.get(name)?.dependencies ?? [])];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    stack.push(...(tools.get(current)?.dependencies ?? []));
  }
  return seen;
}
