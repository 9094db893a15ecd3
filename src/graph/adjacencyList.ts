import {
  assertEdge,
  assertNodeCount,
  DEFAULT_EDGE_WEIGHT,
  formatEdge,
  isNodeIndex,
  NO_EDGE,
  type Edge,
  type WeightedDigraph,
} from "./types.js";

/**
 * Sparse weighted digraph. Each node owns a map from destination to weight so
 * edge lookups, overwrites and removals stay O(1) amortized while neighbor
 * iteration only touches the edges that exist.
 */
export class AdjacencyList implements WeightedDigraph {
  private readonly nodeCount: number;
  private readonly adjacency: Array<Map<number, number>>;

  constructor(nodeCount: number) {
    assertNodeCount(nodeCount);
    this.nodeCount = nodeCount;
    this.adjacency = Array.from({ length: nodeCount }, () => new Map<number, number>());
  }

  size(): number {
    return this.nodeCount;
  }

  /** Inserts the edge or overwrites the weight of an existing one. */
  addEdge(source: number, destination: number, weight: number = DEFAULT_EDGE_WEIGHT): void {
    assertEdge(source, destination, weight, this.nodeCount);
    this.adjacency[source].set(destination, weight);
  }

  getWeight(source: number, destination: number): number {
    if (!isNodeIndex(source, this.nodeCount) || !isNodeIndex(destination, this.nodeCount)) {
      return NO_EDGE;
    }
    return this.adjacency[source].get(destination) ?? NO_EDGE;
  }

  hasEdge(source: number, destination: number): boolean {
    if (!isNodeIndex(source, this.nodeCount) || !isNodeIndex(destination, this.nodeCount)) {
      return false;
    }
    return this.adjacency[source].has(destination);
  }

  removeEdge(source: number, destination: number): void {
    if (isNodeIndex(source, this.nodeCount) && isNodeIndex(destination, this.nodeCount)) {
      this.adjacency[source].delete(destination);
    }
  }

  /**
   * Returns the outgoing edges in first-insertion order. The array is a fresh
   * copy: later mutations of the store are not reflected in it.
   */
  neighbors(node: number): Edge[] {
    if (!isNodeIndex(node, this.nodeCount)) {
      return [];
    }
    const edges: Edge[] = [];
    for (const [destination, weight] of this.adjacency[node]) {
      edges.push({ destination, weight });
    }
    return edges;
  }

  degree(node: number): number {
    return isNodeIndex(node, this.nodeCount) ? this.adjacency[node].size : 0;
  }

  edgeCount(): number {
    let total = 0;
    for (const edges of this.adjacency) {
      total += edges.size;
    }
    return total;
  }

  toString(): string {
    const lines = [`Adjacency list (${this.nodeCount} nodes):`];
    for (let node = 0; node < this.nodeCount; node += 1) {
      const edges = this.neighbors(node);
      const rendered = edges.length === 0 ? "(no outgoing edges)" : edges.map(formatEdge).join(", ");
      lines.push(`Node ${node}: ${rendered}`);
    }
    return lines.join("\n");
  }
}
