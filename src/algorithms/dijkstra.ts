import { loadRuntimeConfig } from "../config/env.js";
import { isNodeIndex, type WeightedDigraph } from "../graph/types.js";
import type { StructuredLogger } from "../logger.js";
import { BinaryHeapPriorityQueue, compareNumbers, type Comparator } from "../queue/binaryHeap.js";
import { ERROR_CODES, InvalidArgumentError } from "../types.js";

/** Distance returned when the target cannot be reached from the start node. */
export const UNREACHABLE = -1;

/** Part of the graph surface the search reads. Both stores satisfy it. */
export type TraversableGraph = Pick<WeightedDigraph, "size" | "neighbors">;

export interface ShortestPathOptions {
  /** Initial capacity of the queue. Defaults to `PATHS_HEAP_INITIAL_CAPACITY`. */
  readonly initialCapacity?: number;
  /** Receives a `shortest_path_resolved` debug entry once the query ends. */
  readonly logger?: StructuredLogger;
}

interface QueueEntry {
  readonly node: number;
  readonly distance: number;
}

const byDistance: Comparator<QueueEntry> = (left, right) => compareNumbers(left.distance, right.distance);

/**
 * Computes the minimum total weight of a path from `start` to `end`, or
 * {@link UNREACHABLE} when no path exists. Weights must be non-negative.
 *
 * Nodes are settled in non-decreasing distance order. A node may sit in the
 * queue several times (one entry per improvement); entries popped after the
 * node was settled are stale and skipped. The search stops as soon as `end`
 * is settled: every remaining entry is at least as far, so its distance is
 * final. Running out of entries therefore always means `end` was never
 * reached.
 *
 * Each call owns its distance table, settled flags and queue, so concurrent
 * queries may share a graph as long as nobody mutates it meanwhile.
 */
export function shortestPath(
  graph: TraversableGraph,
  start: number,
  end: number,
  options: ShortestPathOptions = {},
): number {
  const nodeCount = graph.size();
  if (!isNodeIndex(start, nodeCount) || !isNodeIndex(end, nodeCount)) {
    throw new InvalidArgumentError(ERROR_CODES.PATH_NODE_RANGE, `Node indices must be between 0 and ${nodeCount - 1}`, {
      details: { start, end },
    });
  }

  const distances = new Float64Array(nodeCount).fill(Number.POSITIVE_INFINITY);
  const settled = new Uint8Array(nodeCount);
  distances[start] = 0;

  const queue = new BinaryHeapPriorityQueue(byDistance, {
    initialCapacity: options.initialCapacity ?? loadRuntimeConfig().heapInitialCapacity,
  });
  queue.insert({ node: start, distance: 0 });
  let pushed = 1;
  let settledCount = 0;

  const finish = (distance: number): number => {
    options.logger?.debug("shortest_path_resolved", {
      start,
      end,
      distance,
      settled: settledCount,
      pushed,
    });
    return distance;
  };

  for (let current = queue.extractMin(); current !== undefined; current = queue.extractMin()) {
    const { node, distance } = current;
    if (settled[node] === 1) {
      continue;
    }
    settled[node] = 1;
    settledCount += 1;

    if (node === end) {
      return finish(distance);
    }

    for (const edge of graph.neighbors(node)) {
      if (settled[edge.destination] === 1) {
        continue;
      }
      const tentative = distance + edge.weight;
      if (tentative < distances[edge.destination]) {
        distances[edge.destination] = tentative;
        queue.insert({ node: edge.destination, distance: tentative });
        pushed += 1;
      }
    }
  }

  return finish(UNREACHABLE);
}
