import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import { EdgeListParseError, ERROR_CODES } from "../../src/errors.js";
import { buildGraph, loadEdgeList, parseEdgeListJson, parseEdgeListText } from "../../src/io/edgeList.js";

function captureParseError(run: () => unknown): EdgeListParseError {
  try {
    run();
  } catch (error) {
    if (error instanceof EdgeListParseError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the edge list to be rejected");
}

describe("edge list input", () => {
  describe("text format", () => {
    it("accepts both separators, comments, blank lines and semicolons", () => {
      const document = parseEdgeListText("# deps\n0 1\n1 -> 2;\n\n0->2 # inline\r\n  3 3\n");

      expect(document).to.deep.equal({
        edges: [
          { from: 0, to: 1 },
          { from: 1, to: 2 },
          { from: 0, to: 2 },
          { from: 3, to: 3 },
        ],
      });
    });

    it("points at the offending token", () => {
      const error = captureParseError(() => parseEdgeListText("0 1\n1 x\n"));

      expect(error.message).to.equal("invalid node id 'x' (line 2, column 3)");
      expect(error.line).to.equal(2);
      expect(error.column).to.equal(3);
      expect(error.code).to.equal(ERROR_CODES.INPUT_EDGE_LIST);
    });

    it("rejects lines with more than two ids", () => {
      const error = captureParseError(() => parseEdgeListText("  0 1 2"));

      expect(error.message).to.equal("expected '<from> <to>' or '<from> -> <to>' (line 1, column 3)");
    });

    it("rejects ids outside the 16-bit range", () => {
      const error = captureParseError(() => parseEdgeListText("70000 1"));

      expect(error.message).to.equal("invalid node id '70000' (line 1, column 1)");
    });

    it("rejects negative ids", () => {
      const error = captureParseError(() => parseEdgeListText("0 -1"));

      expect(error.message).to.equal("invalid node id '-1' (line 1, column 3)");
    });
  });

  describe("JSON format", () => {
    it("accepts tuples and objects", () => {
      const document = parseEdgeListJson('{"name":"Deps","edges":[[0,1],{"from":1,"to":2}]}');

      expect(document).to.deep.equal({
        name: "Deps",
        edges: [
          { from: 0, to: 1 },
          { from: 1, to: 2 },
        ],
      });
    });

    it("omits the name when the document has none", () => {
      expect(parseEdgeListJson('{"edges":[]}')).to.deep.equal({ edges: [] });
    });

    it("reports schema violations with their path", () => {
      const error = captureParseError(() => parseEdgeListJson('{"edges":3}'));

      expect(error.message).to.equal("invalid JSON edge list: edges: Expected array, received number");
      expect(error.line).to.equal(null);
    });

    it("rejects unknown top-level keys", () => {
      const error = captureParseError(() => parseEdgeListJson('{"edges":[],"weights":[]}'));

      expect(error.message).to.equal("invalid JSON edge list: Unrecognized key(s) in object: 'weights'");
    });

    it("rejects out-of-range ids", () => {
      const error = captureParseError(() => parseEdgeListJson('{"edges":[[0,-1]]}'));

      expect(error.message.startsWith("invalid JSON edge list: edges.0")).to.equal(true);
    });

    it("rejects malformed JSON", () => {
      const error = captureParseError(() => parseEdgeListJson("{"));

      expect(error.message.startsWith("invalid JSON edge list: ")).to.equal(true);
      expect(error.column).to.equal(null);
    });
  });

  describe("loadEdgeList", () => {
    let workdir: string;

    beforeEach(async () => {
      workdir = await mkdtemp(join(tmpdir(), "compact-digraph-edges-"));
    });

    afterEach(async () => {
      await rm(workdir, { recursive: true, force: true });
    });

    it("reads text files", async () => {
      const file = join(workdir, "deps.txt");
      await writeFile(file, "0 1\n1 2\n", "utf8");

      const graph = buildGraph(await loadEdgeList(file));
      expect(graph.edgeCount()).to.equal(2);
      expect(graph.hasEdge(1, 2)).to.equal(true);
    });

    it("picks the JSON reader from the extension", async () => {
      const file = join(workdir, "deps.JSON");
      await writeFile(file, '{"name":"Deps","edges":[[4,5]]}', "utf8");

      const document = await loadEdgeList(file);
      expect(document.name).to.equal("Deps");
      expect(document.edges).to.deep.equal([{ from: 4, to: 5 }]);
    });
  });
});
