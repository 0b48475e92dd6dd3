export * from "./errors.js";
export * from "./graph/types.js";
export * from "./graph/directedGraph.js";
export * from "./graph/compiledGraph.js";
export * from "./graph/compiler.js";
export * from "./views/dfs.js";
export * from "./views/bfs.js";
export * from "./views/topological.js";
export * from "./views/pipe.js";
export * from "./export/dot.js";
export * from "./io/edgeList.js";
export * from "./logger.js";
