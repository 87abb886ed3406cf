import { DependencyGraph } from '../types';

/**
 * Strongly Connected Component (SCC) of the file dependency graph
 */
export interface StronglyConnectedComponent {
  id: string;
  nodes: string[];
  size: number;
  internalEdges: number;
  isSelfDependent: boolean; // Single file importing itself
}

/**
 * SCC analysis result.
 * `components` lists every component, trivial ones included, in the order Tarjan's
 * algorithm completes them: a component always comes after every component it depends on.
 */
export interface SCCAnalysisResult {
  components: StronglyConnectedComponent[];
  totalComponents: number;
  cyclicComponents: StronglyConnectedComponent[];
  largestComponentSize: number;
  componentMap: Map<string, string>; // node -> componentId
}

/**
 * Tarjan's algorithm for finding Strongly Connected Components
 */
export class SCCAnalyzer {
  private index: number;
  private stack: string[];
  private indices: Map<string, number>;
  private lowLinks: Map<string, number>;
  private onStack: Set<string>;
  private components: StronglyConnectedComponent[];
  private adjacencyList: Map<string, Set<string>>;

  constructor() {
    this.index = 0;
    this.stack = [];
    this.indices = new Map();
    this.lowLinks = new Map();
    this.onStack = new Set();
    this.components = [];
    this.adjacencyList = new Map();
  }

  /**
   * Find all strongly connected components using Tarjan's algorithm
   */
  findStronglyConnectedComponents(graph: DependencyGraph): SCCAnalysisResult {
    this.reset();
    this.buildAdjacencyList(graph);

    for (const node of this.adjacencyList.keys()) {
      if (!this.indices.has(node)) {
        this.strongConnect(node);
      }
    }

    this.components.forEach((component, i) => {
      component.id = `scc-${i + 1}`;
    });

    const cyclicComponents = this.components.filter(c => c.size > 1 || c.isSelfDependent);
    const largestComponentSize = Math.max(...this.components.map(c => c.size), 0);

    return {
      components: this.components,
      totalComponents: this.components.length,
      cyclicComponents,
      largestComponentSize,
      componentMap: this.createComponentMap(),
    };
  }

  /**
   * Calculate condensation graph (DAG of SCCs), keyed by component id
   */
  calculateCondensationGraph(graph: DependencyGraph): {
    result: SCCAnalysisResult;
    edges: Map<string, Set<string>>;
  } {
    const result = this.findStronglyConnectedComponents(graph);
    const edges = new Map<string, Set<string>>();

    for (const component of result.components) {
      edges.set(component.id, new Set());
    }

    for (const [from, successors] of this.adjacencyList) {
      const fromComponent = result.componentMap.get(from);
      if (!fromComponent) continue;

      for (const to of successors) {
        const toComponent = result.componentMap.get(to);
        if (toComponent && toComponent !== fromComponent) {
          edges.get(fromComponent)?.add(toComponent);
        }
      }
    }

    return { result, edges };
  }

  private reset(): void {
    this.index = 0;
    this.stack = [];
    this.indices.clear();
    this.lowLinks.clear();
    this.onStack.clear();
    this.components = [];
    this.adjacencyList.clear();
  }

  /**
   * Build adjacency list; targets that have no entry of their own become sink nodes
   */
  private buildAdjacencyList(graph: DependencyGraph): void {
    for (const [node, targets] of graph) {
      const successors = this.adjacencyList.get(node) ?? new Set<string>();
      for (const target of targets) {
        successors.add(target);
      }
      this.adjacencyList.set(node, successors);
    }

    for (const targets of graph.values()) {
      for (const target of targets) {
        if (!this.adjacencyList.has(target)) {
          this.adjacencyList.set(target, new Set());
        }
      }
    }
  }

  /**
   * Tarjan's algorithm - main recursive function
   */
  private strongConnect(node: string): void {
    const nodeIndex = this.index;
    this.indices.set(node, nodeIndex);
    this.lowLinks.set(node, nodeIndex);
    this.index++;
    this.stack.push(node);
    this.onStack.add(node);

    let lowLink = nodeIndex;
    const successors = this.adjacencyList.get(node) ?? new Set<string>();
    for (const successor of successors) {
      if (!this.indices.has(successor)) {
        // Successor has not yet been visited; recurse on it
        this.strongConnect(successor);
        lowLink = Math.min(lowLink, this.lowLinks.get(successor) ?? lowLink);
      } else if (this.onStack.has(successor)) {
        // Successor is in stack and hence in the current SCC
        lowLink = Math.min(lowLink, this.indices.get(successor) ?? lowLink);
      }
      this.lowLinks.set(node, lowLink);
    }

    // Root node: pop the stack and emit an SCC
    if (lowLink === nodeIndex) {
      const members: string[] = [];
      let member: string | undefined;

      do {
        member = this.stack.pop();
        if (member === undefined) break;
        this.onStack.delete(member);
        members.push(member);
      } while (member !== node);

      this.components.push({
        id: '', // Assigned once all components are known
        nodes: members,
        size: members.length,
        internalEdges: this.countInternalEdges(members),
        isSelfDependent: members.length === 1 && successors.has(node),
      });
    }
  }

  private countInternalEdges(nodes: string[]): number {
    const members = new Set(nodes);
    let count = 0;

    for (const node of nodes) {
      for (const successor of this.adjacencyList.get(node) ?? []) {
        if (members.has(successor)) {
          count++;
        }
      }
    }

    return count;
  }

  private createComponentMap(): Map<string, string> {
    const map = new Map<string, string>();

    for (const component of this.components) {
      for (const node of component.nodes) {
        map.set(node, component.id);
      }
    }

    return map;
  }
}
