import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { z } from "zod";

import { EdgeListParseError } from "../errors.js";
import { DOT_NAME_PATTERN } from "../export/dot.js";
import { DirectedGraph } from "../graph/directedGraph.js";
import { MAX_NODE_ID, type Edge } from "../graph/types.js";

/** Edges read from a file, with the graph name when the format carries one. */
export interface EdgeListDocument {
  readonly name?: string;
  readonly edges: readonly Edge[];
}

const NodeIdSchema = z
  .number()
  .int("node ids must be integers")
  .min(0, "node ids must not be negative")
  .max(MAX_NODE_ID, `node ids must not exceed ${MAX_NODE_ID}`);

const EdgeSchema = z.union([
  z.tuple([NodeIdSchema, NodeIdSchema]),
  z.object({ from: NodeIdSchema, to: NodeIdSchema }).strict(),
]);

/** JSON edge list: `{ "name"?: string, "edges": [[0, 1], { "from": 1, "to": 2 }] }`. */
export const EdgeListDocumentSchema = z
  .object({
    name: z
      .string()
      .regex(DOT_NAME_PATTERN, "graph names must be plain identifiers")
      .optional(),
    edges: z.array(EdgeSchema),
  })
  .strict();

/** `from to`, `from->to` or `from -> to`, optionally closed by `;`. */
const EDGE_LINE = /^(\s*)(\S+?)(\s*->\s*|\s+)(\S+?)\s*;?\s*$/;
const DIGITS = /^\d+$/;

/**
 * Parses the plain-text format: one edge per line, `#` starts a comment and
 * blank lines are skipped. Errors carry 1-based line and column numbers.
 */
export function parseEdgeListText(source: string): EdgeListDocument {
  const edges: Edge[] = [];
  const lines = source.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = index + 1;
    const commentStart = raw.indexOf("#");
    const content = commentStart >= 0 ? raw.slice(0, commentStart) : raw;
    if (content.trim().length === 0) {
      return;
    }

    const match = EDGE_LINE.exec(content);
    if (!match) {
      const column = content.length - content.trimStart().length + 1;
      throw new EdgeListParseError("expected '<from> <to>' or '<from> -> <to>'", line, column);
    }
    const [, leading, fromToken, separator, toToken] = match;
    const fromColumn = leading.length + 1;
    const toColumn = fromColumn + fromToken.length + separator.length;
    edges.push({
      from: parseNodeToken(fromToken, line, fromColumn),
      to: parseNodeToken(toToken, line, toColumn),
    });
  });

  return { edges };
}

/** Parses and validates the JSON format. */
export function parseEdgeListJson(source: string): EdgeListDocument {
  let payload: unknown;
  try {
    payload = JSON.parse(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EdgeListParseError(`invalid JSON edge list: ${reason}`, null, null);
  }

  const parsed = EdgeListDocumentSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new EdgeListParseError(`invalid JSON edge list: ${location}${issue?.message ?? "unknown issue"}`, null, null);
  }

  const edges = parsed.data.edges.map((edge): Edge =>
    Array.isArray(edge) ? { from: edge[0], to: edge[1] } : { from: edge.from, to: edge.to },
  );
  return parsed.data.name === undefined ? { edges } : { name: parsed.data.name, edges };
}

/** Reads an edge list from disk; `.json` files use the JSON format. */
export async function loadEdgeList(filePath: string): Promise<EdgeListDocument> {
  const contents = await readFile(filePath, "utf8");
  return extname(filePath).toLowerCase() === ".json" ? parseEdgeListJson(contents) : parseEdgeListText(contents);
}

export function buildGraph(document: EdgeListDocument): DirectedGraph {
  return DirectedGraph.fromEdges(document.edges);
}

function parseNodeToken(token: string, line: number, column: number): number {
  const value = DIGITS.test(token) ? Number.parseInt(token, 10) : Number.NaN;
  if (!Number.isSafeInteger(value) || value > MAX_NODE_ID) {
    throw new EdgeListParseError(`invalid node id '${token}'`, line, column);
  }
  return value;
}
