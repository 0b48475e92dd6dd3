import { InvalidLayoutError } from "../errors.js";
import { isNodeId, type DirectedGraphLike, type Edge, type NodeId, type NodeSpan } from "./types.js";

/**
 * Raw compressed-sparse-row arrays. `offsets` holds `maxNodeId + 2` slots;
 * the successors of `n` live in `destinations[offsets[n] .. offsets[n + 1])`,
 * sorted ascending and free of duplicates.
 */
export interface CsrLayout {
  readonly offsets: Uint32Array;
  readonly destinations: Uint16Array;
  readonly maxNodeId: NodeId;
}

const EMPTY_SPAN: NodeSpan = new Uint16Array(0);

/**
 * Immutable CSR graph produced by {@link compileGraph}. Successor lookups are
 * slice reads into a single destinations array, edge tests are binary
 * searches and iteration order is always ascending.
 *
 * The constructor copies the arrays it is given and throws
 * {@link InvalidLayoutError} unless they satisfy the {@link CsrLayout} rules.
 */
export class CompiledGraph implements DirectedGraphLike {
  readonly maxNodeId: NodeId;
  private readonly offsets: Uint32Array;
  private readonly destinations: Uint16Array;
  /** `1` for every id that is the destination of at least one edge. */
  private readonly destinationMask: Uint8Array;

  constructor(layout: CsrLayout) {
    validateLayout(layout);
    this.maxNodeId = layout.maxNodeId;
    this.offsets = Uint32Array.from(layout.offsets);
    this.destinations = Uint16Array.from(layout.destinations);
    this.destinationMask = new Uint8Array(layout.maxNodeId + 1);
    for (const destination of this.destinations) {
      this.destinationMask[destination] = 1;
    }
  }

  /** Sorted successors of `node`; empty for ids past {@link maxNodeId}. */
  successors(node: NodeId): NodeSpan {
    if (!this.hasSlot(node)) {
      return EMPTY_SPAN;
    }
    return this.destinations.subarray(this.offsets[node], this.offsets[node + 1]);
  }

  hasEdge(from: NodeId, to: NodeId): boolean {
    if (!this.hasSlot(from)) {
      return false;
    }
    let low = this.offsets[from];
    let high = this.offsets[from + 1];
    while (low < high) {
      const middle = (low + high) >>> 1;
      const candidate = this.destinations[middle];
      if (candidate === to) {
        return true;
      }
      if (candidate < to) {
        low = middle + 1;
      } else {
        high = middle;
      }
    }
    return false;
  }

  outDegree(node: NodeId): number {
    if (!this.hasSlot(node)) {
      return 0;
    }
    return this.offsets[node + 1] - this.offsets[node];
  }

  /**
   * Ids in `0 ..= maxNodeId` that own at least one edge or are the
   * destination of one, in ascending order. Gaps in the id range and nodes
   * whose every edge was removed before compilation are skipped.
   */
  *nodes(): IterableIterator<NodeId> {
    for (let node = 0; node <= this.maxNodeId; node++) {
      if (this.offsets[node] !== this.offsets[node + 1] || this.destinationMask[node] === 1) {
        yield node;
      }
    }
  }

  /** Every edge, ascending by source then destination. Each call starts over. */
  *edges(): IterableIterator<Edge> {
    for (let from = 0; from <= this.maxNodeId; from++) {
      const end = this.offsets[from + 1];
      for (let index = this.offsets[from]; index < end; index++) {
        yield { from, to: this.destinations[index] };
      }
    }
  }

  nodeCount(): number {
    let count = 0;
    for (const _node of this.nodes()) {
      count++;
    }
    return count;
  }

  edgeCount(): number {
    return this.destinations.length;
  }

  /** Copies of the underlying arrays, for inspection and diagnostics. */
  layout(): CsrLayout {
    return {
      offsets: this.offsets.slice(),
      destinations: this.destinations.slice(),
      maxNodeId: this.maxNodeId,
    };
  }

  private hasSlot(node: NodeId): boolean {
    return Number.isInteger(node) && node >= 0 && node <= this.maxNodeId;
  }
}

function validateLayout({ offsets, destinations, maxNodeId }: CsrLayout): void {
  if (!isNodeId(maxNodeId)) {
    throw new InvalidLayoutError(`maxNodeId must be a node id, got ${String(maxNodeId)}`, { maxNodeId });
  }
  if (offsets.length !== maxNodeId + 2) {
    throw new InvalidLayoutError(`expected ${maxNodeId + 2} offsets, got ${offsets.length}`, {
      maxNodeId,
      offsets: offsets.length,
    });
  }
  if (offsets[0] !== 0) {
    throw new InvalidLayoutError("offsets must start at 0", { first: offsets[0] });
  }
  if (offsets[maxNodeId + 1] !== destinations.length) {
    throw new InvalidLayoutError(
      `last offset ${offsets[maxNodeId + 1]} does not match ${destinations.length} destinations`,
      { last: offsets[maxNodeId + 1], destinations: destinations.length },
    );
  }
  for (let node = 0; node <= maxNodeId; node++) {
    const start = offsets[node];
    const end = offsets[node + 1];
    if (end < start) {
      throw new InvalidLayoutError(`offsets decrease at node ${node}`, { node, start, end });
    }
    if (end > destinations.length) {
      throw new InvalidLayoutError(`offset ${end} of node ${node + 1} is past the destinations`, { node, end });
    }
    for (let index = start; index < end; index++) {
      const destination = destinations[index];
      if (destination > maxNodeId) {
        throw new InvalidLayoutError(`destination ${destination} of node ${node} exceeds maxNodeId`, {
          node,
          destination,
        });
      }
      if (index > start && destination <= destinations[index - 1]) {
        throw new InvalidLayoutError(`successors of node ${node} are not strictly ascending`, { node });
      }
    }
  }
}
