import type { StructuredLogger } from "../logger.js";
import { CompiledGraph } from "./compiledGraph.js";
import { assertNodeId, type DirectedGraphLike, type NodeId } from "./types.js";

export interface CompileOptions {
  /** Receives a `graph_compiled` debug entry once the snapshot is built. */
  readonly logger?: StructuredLogger;
}

/**
 * Compacts any graph exposing the capability contract into a CSR snapshot.
 *
 * Node ids are walked in ascending numeric order, not enumeration order, so
 * the result only depends on the edge set. Successors are sorted and
 * de-duplicated per node; ids below the maximum that never appeared get a
 * zero-width slot. An empty source yields `maxNodeId = 0` and no edges.
 */
export function compileGraph(source: DirectedGraphLike, options: CompileOptions = {}): CompiledGraph {
  const adjacency = new Map<NodeId, Uint16Array>();
  let maxNodeId = 0;

  for (const node of source.nodes()) {
    assertNodeId(node, "source");
    maxNodeId = Math.max(maxNodeId, node);
    const successors: NodeId[] = [];
    for (const successor of source.successors(node)) {
      assertNodeId(successor, "destination");
      maxNodeId = Math.max(maxNodeId, successor);
      successors.push(successor);
    }
    const previous = adjacency.get(node);
    adjacency.set(node, previous ? Uint16Array.from([...previous, ...successors]) : Uint16Array.from(successors));
  }

  const offsets = new Uint32Array(maxNodeId + 2);
  const runs: Uint16Array[] = [];
  let offset = 0;
  for (let node = 0; node <= maxNodeId; node++) {
    offsets[node] = offset;
    const successors = adjacency.get(node);
    if (!successors || successors.length === 0) {
      continue;
    }
    const run = uniqueSorted(successors);
    runs.push(run);
    offset += run.length;
  }
  offsets[maxNodeId + 1] = offset;

  const destinations = new Uint16Array(offset);
  let cursor = 0;
  for (const run of runs) {
    destinations.set(run, cursor);
    cursor += run.length;
  }

  const compiled = new CompiledGraph({ offsets, destinations, maxNodeId });
  options.logger?.debug("graph_compiled", {
    max_node_id: maxNodeId,
    slots: offsets.length,
    edges: destinations.length,
  });
  return compiled;
}

/** Sorts in place (typed arrays sort numerically) and drops repeated ids. */
function uniqueSorted(values: Uint16Array): Uint16Array {
  values.sort();
  let write = 0;
  for (let read = 0; read < values.length; read++) {
    if (read === 0 || values[read] !== values[write - 1]) {
      values[write] = values[read];
      write++;
    }
  }
  return values.subarray(0, write);
}
