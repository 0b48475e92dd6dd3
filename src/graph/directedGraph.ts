import { compileGraph, type CompileOptions } from "./compiler.js";
import type { CompiledGraph } from "./compiledGraph.js";
import { assertNodeId, type DirectedGraphLike, type NodeId } from "./types.js";

const EMPTY_SUCCESSORS: ReadonlySet<NodeId> = new Set<NodeId>();

/**
 * Mutable adjacency-list graph used to build a topology edge by edge.
 *
 * Every node that appears as a destination is also registered as a key with
 * a (possibly empty) successor set, so {@link nodes} is complete and degree
 * queries never miss a known node. Removing edges never removes nodes.
 */
export class DirectedGraph implements DirectedGraphLike {
  private readonly adjacency = new Map<NodeId, Set<NodeId>>();

  /**
   * Inserts the edge. Idempotent; `to` is registered as a node even when it
   * has no successors of its own. Throws {@link InvalidNodeIdError} for
   * values outside the identifier range, leaving the graph untouched.
   */
  addEdge(from: NodeId, to: NodeId): void {
    assertNodeId(from, "source");
    assertNodeId(to, "destination");

    let successors = this.adjacency.get(from);
    if (!successors) {
      successors = new Set();
      this.adjacency.set(from, successors);
    }
    successors.add(to);
    if (!this.adjacency.has(to)) {
      this.adjacency.set(to, new Set());
    }
  }

  /** Removes the edge when present. Unknown sources and edges are ignored. */
  removeEdge(from: NodeId, to: NodeId): void {
    this.adjacency.get(from)?.delete(to);
  }

  hasEdge(from: NodeId, to: NodeId): boolean {
    return this.adjacency.get(from)?.has(to) ?? false;
  }

  /** Successors in set-iteration order; empty for unknown nodes. */
  successors(node: NodeId): ReadonlySet<NodeId> {
    return this.adjacency.get(node) ?? EMPTY_SUCCESSORS;
  }

  nodes(): IterableIterator<NodeId> {
    return this.adjacency.keys();
  }

  hasNode(node: NodeId): boolean {
    return this.adjacency.has(node);
  }

  nodeCount(): number {
    return this.adjacency.size;
  }

  edgeCount(): number {
    let total = 0;
    for (const successors of this.adjacency.values()) {
      total += successors.size;
    }
    return total;
  }

  /**
   * Produces an independent compact snapshot. The mutable graph is left as
   * is and later mutations never reach the returned graph.
   */
  compile(options: CompileOptions = {}): CompiledGraph {
    return compileGraph(this, options);
  }

  /** Builds a graph from a list of edges, validating every identifier. */
  static fromEdges(edges: Iterable<{ readonly from: NodeId; readonly to: NodeId }>): DirectedGraph {
    const graph = new DirectedGraph();
    for (const edge of edges) {
      graph.addEdge(edge.from, edge.to);
    }
    return graph;
  }
}
