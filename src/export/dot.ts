import { writeFile } from "node:fs/promises";

import type { DirectedGraphLike } from "../graph/types.js";

/** Graph names accepted unquoted by graphviz. */
export const DOT_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isDotName(value: string): boolean {
  return DOT_NAME_PATTERN.test(value);
}

/**
 * Renders a graph in graphviz `digraph` syntax. Node lines follow the graph's
 * `nodes()` enumeration and edge lines follow `nodes()` × `successors()`;
 * nothing is re-sorted here, so a {@link CompiledGraph} renders ascending and
 * a {@link DirectedGraph} renders in set order.
 */
export function toDot(graph: DirectedGraphLike, name = "G"): string {
  const lines = [`digraph ${name} {`];
  for (const node of graph.nodes()) {
    lines.push(`    ${node};`);
  }
  for (const from of graph.nodes()) {
    for (const to of graph.successors(from)) {
      lines.push(`    ${from} -> ${to};`);
    }
  }
  lines.push("}");
  return `${lines.join("\n")}\n`;
}

/** Writes {@link toDot} output to `filePath` as UTF-8. */
export async function writeDot(graph: DirectedGraphLike, filePath: string, name?: string): Promise<void> {
  await writeFile(filePath, toDot(graph, name), "utf8");
}
