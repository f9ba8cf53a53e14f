import type { NodeKey } from './types.js';

// ── Graph types ──────────────────────────────────────────────────────

export interface GraphNode {
  readonly key: NodeKey;
  readonly name: string;
}

export interface GraphEdge {
  readonly from: NodeKey;
  readonly to: NodeKey;
}

// ── ScenarioGraph ────────────────────────────────────────────────────

/**
 * Dependency graph over nodes (or rendered stages). Edges point from an
 * input to the node consuming it. Insertion order is declaration order
 * and breaks topological ties.
 */
export class ScenarioGraph<T extends GraphNode = GraphNode> {
  private readonly nodes: Map<NodeKey, T> = new Map();
  private readonly order: Map<NodeKey, number> = new Map();
  private readonly adjacency: Map<NodeKey, Set<NodeKey>> = new Map();
  private readonly reverseAdj: Map<NodeKey, Set<NodeKey>> = new Map();

  static fromNodes<N extends GraphNode & { readonly inputs: readonly NodeKey[] }>(
    nodes: readonly N[],
  ): ScenarioGraph<N> {
    const graph = new ScenarioGraph<N>();
    for (const node of nodes) {
      graph.addNode(node);
    }
    for (const node of nodes) {
      for (const input of node.inputs) {
        graph.addEdge(input, node.key);
      }
    }
    return graph;
  }

  addNode(node: T): void {
    if (!this.order.has(node.key)) {
      this.order.set(node.key, this.order.size);
    }
    this.nodes.set(node.key, node);
    this.edgeSet(this.adjacency, node.key);
    this.edgeSet(this.reverseAdj, node.key);
  }

  addEdge(from: NodeKey, to: NodeKey): void {
    this.edgeSet(this.adjacency, from).add(to);
    this.edgeSet(this.reverseAdj, to).add(from);
  }

  has(key: NodeKey): boolean {
    return this.nodes.has(key);
  }

  getNode(key: NodeKey): T | undefined {
    return this.nodes.get(key);
  }

  getConsumers(key: NodeKey): ReadonlySet<NodeKey> {
    return this.adjacency.get(key) ?? new Set();
  }

  getInputs(key: NodeKey): ReadonlySet<NodeKey> {
    return this.reverseAdj.get(key) ?? new Set();
  }

  getAllNodes(): T[] {
    return [...this.nodes.values()];
  }

  getAllEdges(): GraphEdge[] {
    const edges: GraphEdge[] = [];
    for (const [from, tos] of this.adjacency) {
      for (const to of tos) {
        edges.push({ from, to });
      }
    }
    return edges;
  }

  /** Nodes nothing else consumes, in declaration order. */
  getTerminalNodes(): T[] {
    return this.getAllNodes().filter((n) => this.getConsumers(n.key).size === 0);
  }

  // ── Topological sort ─────────────────────────────────────────────

  /**
   * Kahn's algorithm; among ready nodes the earliest declared goes first.
   * Throws if the graph has a cycle.
   */
  topologicalSort(): T[] {
    const inDegree = new Map<NodeKey, number>();
    for (const key of this.nodes.keys()) {
      inDegree.set(key, 0);
    }
    for (const [from, tos] of this.adjacency) {
      if (!this.nodes.has(from)) continue;
      for (const to of tos) {
        inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
      }
    }

    const ready: NodeKey[] = [];
    for (const [key, deg] of inDegree) {
      if (deg === 0) ready.push(key);
    }

    const sorted: T[] = [];
    while (ready.length > 0) {
      ready.sort((a, b) => this.position(a) - this.position(b));
      const key = ready.shift();
      if (key === undefined) break;

      const node = this.nodes.get(key);
      if (node) sorted.push(node);

      for (const neighbor of this.adjacency.get(key) ?? []) {
        const newDeg = (inDegree.get(neighbor) ?? 1) - 1;
        inDegree.set(neighbor, newDeg);
        if (newDeg === 0) ready.push(neighbor);
      }
    }

    if (sorted.length !== this.nodes.size) {
      const cycle = this.detectCycle();
      throw new Error(`Cycle detected in view graph: ${cycle?.join(' -> ') ?? 'unknown'}`);
    }

    return sorted;
  }

  // ── Cycle detection ──────────────────────────────────────────────

  /** Returns the display names along the first cycle found, or null. */
  detectCycle(): string[] | null {
    const WHITE = 0, GRAY = 1, BLACK = 2;
    const color = new Map<NodeKey, number>();
    for (const key of this.nodes.keys()) {
      color.set(key, WHITE);
    }

    const path: NodeKey[] = [];

    const dfs = (key: NodeKey): NodeKey[] | null => {
      color.set(key, GRAY);
      path.push(key);
      for (const neighbor of this.adjacency.get(key) ?? []) {
        if (color.get(neighbor) === GRAY) {
          return [...path.slice(path.indexOf(neighbor)), neighbor];
        }
        if (color.get(neighbor) === WHITE) {
          const found = dfs(neighbor);
          if (found) return found;
        }
      }
      path.pop();
      color.set(key, BLACK);
      return null;
    };

    for (const key of this.nodes.keys()) {
      if (color.get(key) !== WHITE) continue;
      const cycle = dfs(key);
      if (cycle) {
        return cycle.map((k) => this.nodes.get(k)?.name ?? k);
      }
    }

    return null;
  }

  // ── Internals ────────────────────────────────────────────────────

  private position(key: NodeKey): number {
    return this.order.get(key) ?? Number.MAX_SAFE_INTEGER;
  }

  private edgeSet(map: Map<NodeKey, Set<NodeKey>>, key: NodeKey): Set<NodeKey> {
    let set = map.get(key);
    if (!set) {
      set = new Set();
      map.set(key, set);
    }
    return set;
  }
}
