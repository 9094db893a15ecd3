import {
  assertEdge,
  assertNodeCount,
  DEFAULT_EDGE_WEIGHT,
  isNodeIndex,
  NO_EDGE,
  type Edge,
  type WeightedDigraph,
} from "./types.js";

/**
 * Dense weighted digraph backed by a single row-major `Float64Array`. Absent
 * edges hold {@link NO_EDGE}. Lookups are O(1); neighbor iteration scans a
 * full row, so the sparse {@link AdjacencyList} is preferable for large graphs.
 */
export class AdjacencyMatrix implements WeightedDigraph {
  private readonly nodeCount: number;
  private readonly cells: Float64Array;

  constructor(nodeCount: number) {
    assertNodeCount(nodeCount);
    this.nodeCount = nodeCount;
    this.cells = new Float64Array(nodeCount * nodeCount).fill(NO_EDGE);
  }

  size(): number {
    return this.nodeCount;
  }

  addEdge(source: number, destination: number, weight: number = DEFAULT_EDGE_WEIGHT): void {
    assertEdge(source, destination, weight, this.nodeCount);
    this.cells[this.offset(source, destination)] = weight;
  }

  getWeight(source: number, destination: number): number {
    if (!isNodeIndex(source, this.nodeCount) || !isNodeIndex(destination, this.nodeCount)) {
      return NO_EDGE;
    }
    return this.cells[this.offset(source, destination)];
  }

  hasEdge(source: number, destination: number): boolean {
    return this.getWeight(source, destination) !== NO_EDGE;
  }

  removeEdge(source: number, destination: number): void {
    if (isNodeIndex(source, this.nodeCount) && isNodeIndex(destination, this.nodeCount)) {
      this.cells[this.offset(source, destination)] = NO_EDGE;
    }
  }

  /** Outgoing edges in ascending destination order. */
  neighbors(node: number): Edge[] {
    if (!isNodeIndex(node, this.nodeCount)) {
      return [];
    }
    const edges: Edge[] = [];
    const rowStart = node * this.nodeCount;
    for (let destination = 0; destination < this.nodeCount; destination += 1) {
      const weight = this.cells[rowStart + destination];
      if (weight !== NO_EDGE) {
        edges.push({ destination, weight });
      }
    }
    return edges;
  }

  degree(node: number): number {
    return this.neighbors(node).length;
  }

  edgeCount(): number {
    let total = 0;
    for (const weight of this.cells) {
      if (weight !== NO_EDGE) {
        total += 1;
      }
    }
    return total;
  }

  toString(): string {
    const lines = [`Adjacency matrix (${this.nodeCount} nodes):`];
    for (let source = 0; source < this.nodeCount; source += 1) {
      const row: string[] = [];
      for (let destination = 0; destination < this.nodeCount; destination += 1) {
        const weight = this.cells[this.offset(source, destination)];
        row.push(weight === NO_EDGE ? "∞" : String(weight));
      }
      lines.push(row.join(" "));
    }
    return lines.join("\n");
  }

  private offset(source: number, destination: number): number {
    return source * this.nodeCount + destination;
  }
}
