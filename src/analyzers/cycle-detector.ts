import { Cycle, DependencyGraph } from '../types';

/**
 * Enumerate dependency cycles with a depth-first search that tracks the current
 * recursion stack. Each edge back into the stack records the path segment from
 * that node to the current one. Cycles reached from different entry points may be
 * recorded more than once; they are not deduplicated.
 */
export function detectCycles(graph: DependencyGraph): Cycle[] {
  const visited = new Set<string>();
  const recursionStack = new Set<string>();
  const cycles: Cycle[] = [];
  const path: string[] = [];

  const dfs = (node: string): void => {
    visited.add(node);
    recursionStack.add(node);
    path.push(node);

    for (const neighbor of graph.get(node) ?? []) {
      if (!visited.has(neighbor)) {
        dfs(neighbor);
      } else if (recursionStack.has(neighbor)) {
        const cycleStartIndex = path.indexOf(neighbor);
        if (cycleStartIndex !== -1) {
          cycles.push(path.slice(cycleStartIndex));
        }
      }
    }

    path.pop();
    recursionStack.delete(node);
  };

  // Run DFS from each unvisited node
  for (const node of graph.keys()) {
    if (!visited.has(node)) {
      dfs(node);
    }
  }

  return cycles;
}

/**
 * Directed edges that lie on at least one detected cycle, as `from->to` keys
 */
export function cycleEdgeKeys(cycles: Cycle[]): Set<string> {
  const keys = new Set<string>();

  for (const cycle of cycles) {
    cycle.forEach((node, i) => {
      const next = cycle[(i + 1) % cycle.length];
      if (next !== undefined) {
        keys.add(`${node}->${next}`);
      }
    });
  }

  return keys;
}
