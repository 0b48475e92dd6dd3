import { GraphCycleError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { DirectedGraphLike, NodeId } from "../graph/types.js";

export type TopologicalOutcome = "acyclic" | "has_cycle";

export interface TopologicalOptions {
  /**
   * Leaves self-loop edges out of the in-degree count so a node whose only
   * cycle is an edge to itself can still be ordered. Defaults to `false`.
   */
  readonly ignoreSelfLoops?: boolean;
  /** Receives a `topological_cycle_detected` warning for cyclic inputs. */
  readonly logger?: StructuredLogger;
}

/**
 * Topological order computed eagerly with Kahn's algorithm.
 *
 * Zero in-degree nodes are seeded in the graph's node enumeration order and
 * released FIFO. When the process stalls before every node is emitted the
 * remaining nodes sit on or behind a cycle: they are reported through
 * {@link unresolved} and the outcome becomes `has_cycle`. The partial
 * {@link order} still respects every edge between the nodes it contains.
 */
export class TopologicalView implements Iterable<NodeId> {
  readonly order: readonly NodeId[];
  readonly unresolved: readonly NodeId[];
  readonly outcome: TopologicalOutcome;

  constructor(graph: DirectedGraphLike, options: TopologicalOptions = {}) {
    const ignoreSelfLoops = options.ignoreSelfLoops ?? false;
    const inDegree = new Map<NodeId, number>();
    for (const node of graph.nodes()) {
      inDegree.set(node, 0);
    }
    for (const node of [...inDegree.keys()]) {
      for (const successor of graph.successors(node)) {
        if (ignoreSelfLoops && successor === node) {
          continue;
        }
        inDegree.set(successor, (inDegree.get(successor) ?? 0) + 1);
      }
    }

    const queue: NodeId[] = [];
    for (const [node, degree] of inDegree) {
      if (degree === 0) {
        queue.push(node);
      }
    }

    const order: NodeId[] = [];
    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      order.push(node);
      for (const successor of graph.successors(node)) {
        if (ignoreSelfLoops && successor === node) {
          continue;
        }
        const remaining = (inDegree.get(successor) ?? 0) - 1;
        inDegree.set(successor, remaining);
        if (remaining === 0) {
          queue.push(successor);
        }
      }
    }

    const emitted = new Set(order);
    this.order = order;
    this.unresolved = [...inDegree.keys()].filter((node) => !emitted.has(node));
    this.outcome = this.unresolved.length === 0 ? "acyclic" : "has_cycle";

    if (this.outcome === "has_cycle") {
      options.logger?.warn("topological_cycle_detected", {
        ordered: order.length,
        unresolved: this.unresolved.length,
      });
    }
  }

  /** True when every enumerated node was placed in the order. */
  isValid(): boolean {
    return this.outcome === "acyclic";
  }

  isEmpty(): boolean {
    return this.order.length === 0;
  }

  get length(): number {
    return this.order.length;
  }

  /** Throws {@link GraphCycleError} unless the whole graph was ordered. */
  assertAcyclic(): readonly NodeId[] {
    if (this.outcome === "has_cycle") {
      throw new GraphCycleError(this.unresolved);
    }
    return this.order;
  }

  [Symbol.iterator](): Iterator<NodeId> {
    return this.order[Symbol.iterator]();
  }
}
