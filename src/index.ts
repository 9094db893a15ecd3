export * from "./types.js";
export * from "./logger.js";
export * from "./config/env.js";
export * from "./graph/types.js";
export * from "./graph/adjacencyList.js";
export * from "./graph/adjacencyMatrix.js";
export * from "./graph/descriptor.js";
export * from "./queue/binaryHeap.js";
export * from "./algorithms/dijkstra.js";
