import { z } from "zod";

import { ERROR_CODES, InvalidArgumentError } from "../types.js";
import { AdjacencyList } from "./adjacencyList.js";
import { AdjacencyMatrix } from "./adjacencyMatrix.js";
import { DEFAULT_EDGE_WEIGHT, type WeightedDigraph } from "./types.js";

const EdgeDescriptorSchema = z
  .object({
    from: z.number().int().nonnegative(),
    to: z.number().int().nonnegative(),
    weight: z.number().finite().nonnegative().default(DEFAULT_EDGE_WEIGHT),
  })
  .strict();

/**
 * JSON document describing a graph: its node count, the storage strategy and
 * the edge list. Range and self-loop checks are left to the stores so both
 * entry points report the same error codes.
 */
export const GraphDescriptorSchema = z
  .object({
    nodeCount: z.number().int().positive(),
    representation: z.enum(["list", "matrix"]).default("list"),
    edges: z.array(EdgeDescriptorSchema).default([]),
  })
  .strict();

export type GraphDescriptor = z.infer<typeof GraphDescriptorSchema>;
export type GraphRepresentation = GraphDescriptor["representation"];

export function parseGraphDescriptor(input: unknown): GraphDescriptor {
  const result = GraphDescriptorSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const first = issues[0];
    const summary = first ? `${first.path || "<root>"}: ${first.message}` : "invalid graph descriptor";
    throw new InvalidArgumentError(ERROR_CODES.GRAPH_INVALID_INPUT, `Invalid graph descriptor (${summary})`, {
      hint: "expected { nodeCount, representation?, edges: [{ from, to, weight? }] }",
      details: { issues },
    });
  }
  return result.data;
}

/** Creates the store selected by the descriptor and adds every edge in order. */
export function buildGraph(descriptor: GraphDescriptor): WeightedDigraph {
  const graph =
    descriptor.representation === "matrix"
      ? new AdjacencyMatrix(descriptor.nodeCount)
      : new AdjacencyList(descriptor.nodeCount);
  for (const edge of descriptor.edges) {
    graph.addEdge(edge.from, edge.to, edge.weight);
  }
  return graph;
}

export function loadGraph(input: unknown): WeightedDigraph {
  return buildGraph(parseGraphDescriptor(input));
}
