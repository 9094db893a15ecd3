import { ERROR_CODES, InvalidArgumentError } from "../types.js";

/** Weight reported for absent edges. No legitimate sum of weights reaches it. */
export const NO_EDGE = Number.POSITIVE_INFINITY;

/** Weight used when {@link WeightedDigraph.addEdge} is called without one. */
export const DEFAULT_EDGE_WEIGHT = 1;

/** Outgoing edge as reported by {@link WeightedDigraph.neighbors}. */
export interface Edge {
  readonly destination: number;
  readonly weight: number;
}

/**
 * Surface shared by the sparse and dense graph stores. Nodes are the dense
 * integers `[0, size())`; edges are directed and carry a non-negative weight.
 */
export interface WeightedDigraph {
  size(): number;
  addEdge(source: number, destination: number, weight?: number): void;
  getWeight(source: number, destination: number): number;
  hasEdge(source: number, destination: number): boolean;
  removeEdge(source: number, destination: number): void;
  /** Snapshot of the outgoing edges of `node`; empty when out of range. */
  neighbors(node: number): Edge[];
  degree(node: number): number;
  edgeCount(): number;
  /** Human-readable dump of the store, one line per node or matrix row. */
  toString(): string;
}

/** Returns true when `node` is an integer inside `[0, nodeCount)`. */
export function isNodeIndex(node: number, nodeCount: number): boolean {
  return Number.isInteger(node) && node >= 0 && node < nodeCount;
}

export function assertNodeCount(nodeCount: number): void {
  if (!Number.isInteger(nodeCount) || nodeCount <= 0) {
    throw new InvalidArgumentError(ERROR_CODES.GRAPH_NODE_COUNT, "Number of nodes must be a positive integer", {
      details: { nodeCount },
    });
  }
}

/**
 * Validates an edge before any store mutates its state. Checks run in the
 * order: index range, self-loop, weight.
 */
export function assertEdge(source: number, destination: number, weight: number, nodeCount: number): void {
  if (!isNodeIndex(source, nodeCount) || !isNodeIndex(destination, nodeCount)) {
    throw new InvalidArgumentError(
      ERROR_CODES.GRAPH_NODE_RANGE,
      `Node indices must be between 0 and ${nodeCount - 1}`,
      { details: { source, destination } },
    );
  }
  if (source === destination) {
    throw new InvalidArgumentError(ERROR_CODES.GRAPH_SELF_LOOP, `Cannot add self-loop on node ${source}`, {
      details: { node: source },
    });
  }
  if (!Number.isFinite(weight) || weight < 0) {
    throw new InvalidArgumentError(ERROR_CODES.GRAPH_WEIGHT, "Weight must be a non-negative finite number", {
      details: { source, destination, weight },
    });
  }
}

export function formatEdge(edge: Edge): string {
  return `${edge.destination}(${edge.weight})`;
}
