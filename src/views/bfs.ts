import { isNodeId, type DirectedGraphLike, type NodeId } from "../graph/types.js";

/**
 * Lazy breadth-first traversal from a start node.
 *
 * Unlike {@link DepthFirstView}, nodes are marked when they are enqueued, so
 * the FIFO frontier never holds duplicates. Output follows BFS layering:
 * the start node, then its direct successors in enumeration order, and so on.
 * An invalid start id produces an empty sequence.
 */
export class BreadthFirstView implements IterableIterator<NodeId> {
  private queue: NodeId[];
  private head = 0;
  private visited = new Set<NodeId>();
  private done = false;

  constructor(
    private readonly graph: DirectedGraphLike,
    readonly start: NodeId,
  ) {
    if (isNodeId(start)) {
      this.queue = [start];
      this.visited.add(start);
    } else {
      this.queue = [];
    }
  }

  next(): IteratorResult<NodeId, undefined> {
    if (this.done || this.head >= this.queue.length) {
      this.release();
      return { done: true, value: undefined };
    }
    const node = this.queue[this.head];
    this.head++;
    for (const successor of this.graph.successors(node)) {
      if (!this.visited.has(successor)) {
        this.visited.add(successor);
        this.queue.push(successor);
      }
    }
    return { done: false, value: node };
  }

  return(): IteratorResult<NodeId, undefined> {
    this.release();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  toArray(): NodeId[] {
    return Array.from(this);
  }

  private release(): void {
    this.done = true;
    this.queue = [];
    this.head = 0;
    this.visited = new Set();
  }
}
