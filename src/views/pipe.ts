import type { DirectedGraphLike, NodeId } from "../graph/types.js";
import { BreadthFirstView } from "./bfs.js";
import { DepthFirstView } from "./dfs.js";
import { TopologicalView, type TopologicalOptions } from "./topological.js";

/**
 * A view waiting for its graph. Adapters are built once and can be applied
 * to any number of graphs of any representation.
 */
export type GraphViewAdapter<TView> = (graph: DirectedGraphLike) => TView;

export function dfsView(start: NodeId): GraphViewAdapter<DepthFirstView> {
  return (graph) => new DepthFirstView(graph, start);
}

export function bfsView(start: NodeId): GraphViewAdapter<BreadthFirstView> {
  return (graph) => new BreadthFirstView(graph, start);
}

export function topologicalView(options: TopologicalOptions = {}): GraphViewAdapter<TopologicalView> {
  return (graph) => new TopologicalView(graph, options);
}

/**
 * Applies an adapter to a graph:
 *
 * ```ts
 * for (const node of applyView(compiled, bfsView(0))) { ... }
 * ```
 */
export function applyView<TView>(graph: DirectedGraphLike, adapter: GraphViewAdapter<TView>): TView {
  return adapter(graph);
}
