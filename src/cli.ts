#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { loadSettings, type GraphSettings } from "./config/settings.js";
import { isDotName, toDot } from "./export/dot.js";
import type { CompiledGraph } from "./graph/compiledGraph.js";
import { isNodeId, type NodeId } from "./graph/types.js";
import { buildGraph, loadEdgeList } from "./io/edgeList.js";
import { StructuredLogger } from "./logger.js";
import { BreadthFirstView } from "./views/bfs.js";
import { DepthFirstView } from "./views/dfs.js";
import { TopologicalView } from "./views/topological.js";

interface CliAnalysis {
  readonly name: string;
  readonly args: string[];
}

interface CliOptions {
  readonly file: string;
  readonly format: "text" | "json";
  readonly analyses: CliAnalysis[];
  readonly name?: string;
  readonly ignoreSelfLoops: boolean;
}

interface AnalysisInput {
  readonly args: string[];
  readonly graph: CompiledGraph;
  readonly graphName: string;
  readonly ignoreSelfLoops: boolean;
  readonly logger: StructuredLogger;
}

interface StatsReport {
  readonly nodes: number;
  readonly edges: number;
  readonly maxNodeId: NodeId;
}

interface TraversalReport {
  readonly start: NodeId;
  readonly order: NodeId[];
}

interface TopologicalReport {
  readonly outcome: TopologicalView["outcome"];
  readonly order: NodeId[];
  readonly unresolved: NodeId[];
}

type AnalysisResult =
  | { readonly kind: "stats"; readonly report: StatsReport }
  | { readonly kind: "traversal"; readonly report: TraversalReport }
  | { readonly kind: "topological"; readonly report: TopologicalReport }
  | { readonly kind: "dot"; readonly report: string };

type AnalysisHandler = (input: AnalysisInput) => AnalysisResult;

const analysisHandlers: Record<string, AnalysisHandler> = {
  stats: ({ graph }) => ({
    kind: "stats",
    report: { nodes: graph.nodeCount(), edges: graph.edgeCount(), maxNodeId: graph.maxNodeId },
  }),
  dfs: ({ args, graph }) => {
    const start = parseStart("dfs", args);
    return { kind: "traversal", report: { start, order: new DepthFirstView(graph, start).toArray() } };
  },
  bfs: ({ args, graph }) => {
    const start = parseStart("bfs", args);
    return { kind: "traversal", report: { start, order: new BreadthFirstView(graph, start).toArray() } };
  },
  topological: ({ graph, ignoreSelfLoops, logger }) => {
    const view = new TopologicalView(graph, { ignoreSelfLoops, logger });
    return {
      kind: "topological",
      report: { outcome: view.outcome, order: [...view.order], unresolved: [...view.unresolved] },
    };
  },
  dot: ({ graph, graphName }) => ({ kind: "dot", report: toDot(graph, graphName) }),
};

/**
 * Runs the CLI and returns the process exit code. Reports go to stdout while
 * diagnostics are logged as JSON lines on stderr.
 */
async function main(argv: string[], settings: GraphSettings = loadSettings()): Promise<number> {
  if (argv.length === 0) {
    printUsage();
    return 1;
  }

  const options = parseArgs(argv);
  const logger = new StructuredLogger({ level: settings.logLevel, stream: "stderr", logFile: settings.logFile });
  try {
    const document = await loadEdgeList(options.file);
    logger.info("edge_list_loaded", { file: options.file, edges: document.edges.length });
    const graph = buildGraph(document).compile({ logger });

    const tasks = options.analyses.length > 0 ? options.analyses : [{ name: "stats", args: [] }];
    const input = {
      graph,
      graphName: options.name ?? document.name ?? settings.dotName,
      ignoreSelfLoops: options.ignoreSelfLoops || settings.ignoreSelfLoops,
      logger,
    };
    const reports = tasks.map((task) => {
      const handler = analysisHandlers[task.name];
      if (!handler) {
        throw new Error(`Unknown analysis '${task.name}'`);
      }
      return { name: task.name, result: handler({ ...input, args: task.args }) };
    });

    if (options.format === "json") {
      console.log(
        JSON.stringify(
          {
            file: options.file,
            analyses: reports.map((report) => ({ name: report.name, result: report.result.report })),
          },
          null,
          2,
        ),
      );
      return 0;
    }

    reports.forEach((report, index) => {
      if (index > 0) {
        console.log("");
      }
      console.log(`# ${report.name}`);
      formatTextReport(report.result);
    });
    return 0;
  } finally {
    await logger.flush();
  }
}

function formatTextReport(result: AnalysisResult): void {
  switch (result.kind) {
    case "stats":
      console.log(`Nodes: ${result.report.nodes}`);
      console.log(`Edges: ${result.report.edges}`);
      console.log(`Max node id: ${result.report.maxNodeId}`);
      break;
    case "traversal":
      console.log(`Start: ${result.report.start}`);
      console.log(`Order: ${result.report.order.join(", ")}`);
      break;
    case "topological":
      console.log(`Outcome: ${result.report.outcome}`);
      console.log(`Order: ${result.report.order.join(", ")}`);
      if (result.report.unresolved.length > 0) {
        console.log(`Unresolved: ${result.report.unresolved.join(", ")}`);
      }
      break;
    case "dot":
      console.log(result.report.trimEnd());
      break;
    default: {
      const exhaustive: never = result;
      return exhaustive;
    }
  }
}

function parseStart(analysis: string, args: string[]): NodeId {
  const [raw] = args;
  const start = raw !== undefined && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!isNodeId(start)) {
    throw new Error(`${analysis} requires a numeric <start> node between 0 and 65535`);
  }
  return start;
}

function parseArgs(argv: string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new Error("First positional argument must be the path to an edge list");
  }
  const analyses: CliAnalysis[] = [];
  let format: "text" | "json" = "text";
  let name: string | undefined;
  let ignoreSelfLoops = false;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--analysis": {
        const analysis = rest[++i];
        if (!analysis) {
          throw new Error("--analysis expects a name");
        }
        const args: string[] = [];
        while (i + 1 < rest.length && !rest[i + 1].startsWith("--")) {
          args.push(rest[++i]);
        }
        analyses.push({ name: analysis, args });
        break;
      }
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new Error("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--name": {
        const value = rest[++i];
        if (!value) {
          throw new Error("--name expects a value");
        }
        if (!isDotName(value)) {
          throw new Error(`--name must be a plain identifier (letters, digits, '_'), got '${value}'`);
        }
        name = value;
        break;
      }
      case "--ignore-self-loops":
        ignoreSelfLoops = true;
        break;
      default:
        throw new Error(`Unknown argument '${token}'`);
    }
  }

  return {
    file,
    format,
    analyses,
    ignoreSelfLoops,
    ...(name === undefined ? {} : { name }),
  };
}

function printUsage(): void {
  console.log(
    "Usage: compact-digraph <edges.txt|edges.json> [--analysis name args...] [--format json|text] [--name graph] [--ignore-self-loops]\n",
  );
  console.log("Analyses: stats, dfs <start>, bfs <start>, topological, dot");
  console.log("Examples:");
  console.log("  compact-digraph deps.txt");
  console.log("  compact-digraph deps.txt --analysis bfs 0 --analysis topological");
  console.log("  compact-digraph deps.json --analysis dot --name Deps > deps.dot");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return thisModulePath === realpathSync(executedFromCli);
  } catch {
    return thisModulePath === executedFromCli;
  }
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/**
 * Internal helpers exposed to the test suite without making them part of the
 * package API.
 */
export const __testing = {
  main,
  parseArgs,
  parseStart,
};
