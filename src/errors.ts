/**
 * Error taxonomy shared by the graph representations, the edge-list readers
 * and the CLI. Read operations never throw: unknown or out-of-range node
 * identifiers simply resolve to empty results. The errors below cover the
 * few places where a caller hands over data the library cannot represent.
 */

/**
 * Stable error codes grouped by feature family. Keeping a single catalogue
 * lets the CLI and embedding applications branch on codes instead of parsing
 * messages.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    NODE_ID: "E-GRAPH-NODE-ID",
    CYCLE: "E-GRAPH-CYCLE",
    LAYOUT: "E-GRAPH-LAYOUT",
  },
  INPUT: {
    EDGE_LIST: "E-GRAPH-EDGE-LIST",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to the error codes (e.g. `ERROR_CODES.GRAPH_CYCLE`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union of every stable error code raised by the package. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Base class of every error raised by the package. */
export class GraphError extends Error {
  public readonly code: ErrorCode;
  public readonly hint: string | undefined;
  public readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: { hint?: string; details?: Record<string, unknown> } = {}) {
    super(message);
    this.name = "GraphError";
    this.code = code;
    this.hint = options.hint;
    this.details = options.details ?? {};
  }
}

/** Raised when a value cannot be used as a node identifier. */
export class InvalidNodeIdError extends GraphError {
  constructor(
    readonly value: unknown,
    readonly role: string,
  ) {
    super(ERROR_CODES.GRAPH_NODE_ID, `invalid ${role} node id '${String(value)}'`, {
      hint: "node ids must be integers between 0 and 65535",
      details: { value, role },
    });
    this.name = "InvalidNodeIdError";
  }
}

/** Raised when raw CSR arrays do not describe a compiled graph. */
export class InvalidLayoutError extends GraphError {
  constructor(reason: string, details: Record<string, unknown> = {}) {
    super(ERROR_CODES.GRAPH_LAYOUT, `invalid CSR layout: ${reason}`, {
      hint: "build compiled graphs with compileGraph() or DirectedGraph.compile()",
      details,
    });
    this.name = "InvalidLayoutError";
  }
}

/** Raised by {@link TopologicalView.assertAcyclic} when Kahn's algorithm stalls. */
export class GraphCycleError extends GraphError {
  constructor(readonly unresolved: readonly number[]) {
    super(ERROR_CODES.GRAPH_CYCLE, `graph contains a cycle through ${unresolved.length} node(s)`, {
      hint: "remove or reroute one of the cycle edges",
      details: { unresolved: [...unresolved] },
    });
    this.name = "GraphCycleError";
  }
}

/** Raised when an edge list cannot be parsed. Line and column are 1-based. */
export class EdgeListParseError extends GraphError {
  constructor(
    message: string,
    readonly line: number | null,
    readonly column: number | null,
  ) {
    super(
      ERROR_CODES.INPUT_EDGE_LIST,
      line === null ? message : `${message} (line ${line}, column ${column ?? 1})`,
      { details: { line, column } },
    );
    this.name = "EdgeListParseError";
  }
}
