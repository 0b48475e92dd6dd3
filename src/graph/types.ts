/**
 * Shared type definitions for the graph representations and the algorithms
 * written against them. Keeping the capability contract here avoids circular
 * imports between the concrete graphs and the traversal views.
 */
import { InvalidNodeIdError } from "../errors.js";

/**
 * Node identifier. Identifiers are unsigned 16-bit integers and the compact
 * representation sizes its offset table by the largest one observed, so the
 * id space is expected to stay dense near zero.
 */
export type NodeId = number;

/** Largest identifier accepted by {@link DirectedGraph.addEdge}. */
export const MAX_NODE_ID = 0xffff;

/** Ordered pair describing a directed edge. Self-loops are allowed. */
export interface Edge {
  readonly from: NodeId;
  readonly to: NodeId;
}

/**
 * Read-only window over a contiguous run of node identifiers. The compact
 * graph hands out typed-array slices that satisfy this shape without copying.
 */
export interface NodeSpan extends Iterable<NodeId> {
  readonly length: number;
  readonly [index: number]: NodeId;
}

/**
 * Minimal capability a graph must offer to be traversed, sorted or exported.
 * Both {@link DirectedGraph} and {@link CompiledGraph} satisfy it structurally;
 * any other representation exposing the same three operations works too.
 */
export interface DirectedGraphLike {
  /** Finite sequence of the direct successors of `node`, empty when unknown. */
  successors(node: NodeId): Iterable<NodeId>;
  /** Finite sequence of every known node. */
  nodes(): Iterable<NodeId>;
  hasEdge(from: NodeId, to: NodeId): boolean;
}

/** Type guard accepting integers within `0 ..= MAX_NODE_ID`. */
export function isNodeId(value: unknown): value is NodeId {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_NODE_ID;
}

/** Throws {@link InvalidNodeIdError} unless {@link value} is a valid identifier. */
export function assertNodeId(value: unknown, role: string): asserts value is NodeId {
  if (!isNodeId(value)) {
    throw new InvalidNodeIdError(value, role);
  }
}
