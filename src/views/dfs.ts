import { isNodeId, type DirectedGraphLike, type NodeId } from "../graph/types.js";

/**
 * Lazy depth-first traversal from a start node.
 *
 * The view is a single-pass iterator backed by an explicit LIFO frontier and
 * a visited set. A node is marked when it is popped, so the same id may sit
 * on the frontier more than once but is only produced once. The start node
 * always comes first, even when the graph does not know it. Sibling order is
 * whatever the graph's successor enumeration yields (ascending on a
 * {@link CompiledGraph}, reversed by the stack).
 *
 * An invalid start id produces an empty sequence.
 */
export class DepthFirstView implements IterableIterator<NodeId> {
  private frontier: NodeId[];
  private visited = new Set<NodeId>();
  private done = false;

  constructor(
    private readonly graph: DirectedGraphLike,
    readonly start: NodeId,
  ) {
    this.frontier = isNodeId(start) ? [start] : [];
  }

  next(): IteratorResult<NodeId, undefined> {
    while (!this.done) {
      const node = this.frontier.pop();
      if (node === undefined) {
        this.release();
        break;
      }
      if (this.visited.has(node)) {
        continue;
      }
      this.visited.add(node);
      for (const successor of this.graph.successors(node)) {
        if (!this.visited.has(successor)) {
          this.frontier.push(successor);
        }
      }
      return { done: false, value: node };
    }
    return { done: true, value: undefined };
  }

  /** Invoked by `break` inside `for..of`; drops the traversal state. */
  return(): IteratorResult<NodeId, undefined> {
    this.release();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Drains the remaining sequence. */
  toArray(): NodeId[] {
    return Array.from(this);
  }

  private release(): void {
    this.done = true;
    this.frontier = [];
    this.visited = new Set();
  }
}
