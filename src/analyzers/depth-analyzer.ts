import { DependencyGraph } from '../types';
import { SCCAnalyzer } from './scc-analyzer';

/**
 * Longest dependency chain (in edges) starting at each node of the graph; a leaf is 0.
 *
 * A chain never revisits a file, and targets that are not graph keys add no hop.
 * Components of the condensation are settled dependencies-first, so the search for
 * the longest simple path only ever backtracks inside one strongly connected component.
 * Once it leaves the component it adds the depth already settled for the exit target.
 */
export function calculateDependencyDepths(graph: DependencyGraph): Map<string, number> {
  const { components } = new SCCAnalyzer().findStronglyConnectedComponents(graph);
  const settled = new Map<string, number>();

  for (const component of components) {
    const members = new Set(component.nodes);
    for (const node of component.nodes) {
      if (graph.has(node)) {
        settled.set(node, longestSimplePath(node, graph, members, settled, new Set([node])));
      }
    }
  }

  const depths = new Map<string, number>();
  for (const node of graph.keys()) {
    depths.set(node, settled.get(node) ?? 0);
  }

  return depths;
}

function longestSimplePath(
  node: string,
  graph: DependencyGraph,
  members: Set<string>,
  settled: Map<string, number>,
  visited: Set<string>
): number {
  let longest = 0;

  for (const next of graph.get(node) ?? []) {
    if (!graph.has(next) || visited.has(next)) continue;

    if (!members.has(next)) {
      longest = Math.max(longest, 1 + (settled.get(next) ?? 0));
      continue;
    }

    visited.add(next);
    longest = Math.max(longest, 1 + longestSimplePath(next, graph, members, settled, visited));
    visited.delete(next);
  }

  return longest;
}

/**
 * Max and mean of the per-node depths; both null for an empty graph
 */
export function summarizeDepths(depths: Map<string, number>): {
  maxDepth: number | null;
  averageDepth: number | null;
} {
  const values = [...depths.values()];
  if (values.length === 0) {
    return { maxDepth: null, averageDepth: null };
  }

  return {
    maxDepth: Math.max(...values),
    averageDepth: values.reduce((sum, value) => sum + value, 0) / values.length,
  };
}

/**
 * Deepest chain from `start`, following the successor whose depth is one hop less
 */
export function deepestChain(start: string, graph: DependencyGraph, depths: Map<string, number>): string[] {
  const chain = [start];
  const seen = new Set(chain);
  let current = start;

  for (;;) {
    const currentDepth = depths.get(current) ?? 0;
    const next = (graph.get(current) ?? []).find(
      neighbor => !seen.has(neighbor) && (depths.get(neighbor) ?? 0) === currentDepth - 1
    );
    if (next === undefined) {
      return chain;
    }
    chain.push(next);
    seen.add(next);
    current = next;
  }
}
