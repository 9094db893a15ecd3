import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, before, describe, it } from "mocha";
import { expect } from "chai";

import { formatJsonReport, formatTextReport, main, parseArgs } from "../src/cli.js";
import { StructuredLogger, type LogEntry } from "../src/logger.js";
import { ERROR_CODES, InvalidArgumentError } from "../src/types.js";

interface Capture {
  readonly stdout: string[];
  readonly stderr: string[];
  readonly entries: LogEntry[];
}

async function run(argv: string[]): Promise<{ code: number } & Capture> {
  const capture: Capture = { stdout: [], stderr: [], entries: [] };
  const logger = new StructuredLogger({
    level: "debug",
    sink: { write: () => true },
    onEntry: (entry) => capture.entries.push(entry),
  });
  const code = await main(argv, {
    stdout: { write: (chunk: string) => capture.stdout.push(chunk) },
    stderr: { write: (chunk: string) => capture.stderr.push(chunk) },
    logger,
  });
  return { code, ...capture };
}

describe("cli", () => {
  let directory = "";
  let networkFile = "";
  let chainFile = "";
  let brokenFile = "";

  before(async () => {
    directory = await mkdtemp(join(tmpdir(), "weighted-paths-cli-"));
    networkFile = join(directory, "network.json");
    chainFile = join(directory, "chain.json");
    brokenFile = join(directory, "broken.json");
    await writeFile(
      networkFile,
      JSON.stringify({
        nodeCount: 6,
        edges: [
          { from: 0, to: 1, weight: 4 },
          { from: 0, to: 2, weight: 2 },
          { from: 1, to: 2, weight: 1 },
          { from: 1, to: 3, weight: 5 },
          { from: 2, to: 3, weight: 8 },
          { from: 2, to: 4, weight: 10 },
          { from: 3, to: 4, weight: 2 },
          { from: 3, to: 5, weight: 6 },
          { from: 4, to: 5, weight: 3 },
        ],
      }),
      "utf8",
    );
    await writeFile(
      chainFile,
      JSON.stringify({
        nodeCount: 3,
        representation: "list",
        edges: [
          { from: 0, to: 1, weight: 2 },
          { from: 1, to: 2, weight: 3 },
        ],
      }),
      "utf8",
    );
    await writeFile(brokenFile, "{ nodeCount: 3", "utf8");
  });

  after(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("prints the shortest distance as text", async () => {
    const result = await run([networkFile, "--from", "0", "--to", "5"]);
    expect(result.code).to.equal(0);
    expect(result.stdout).to.deep.equal(["Distance 0 -> 5: 14\n"]);
    expect(result.stderr).to.deep.equal([]);
    expect(result.entries.map((entry) => entry.message)).to.deep.equal(["graph_loaded", "shortest_path_resolved"]);
    expect(result.entries[0].payload).to.deep.equal({ file: networkFile, nodes: 6, edges: 9 });
  });

  it("prints a JSON report for unreachable targets", async () => {
    const result = await run([networkFile, "--from", "5", "--to", "0", "--format", "json"]);
    expect(result.code).to.equal(0);
    expect(result.stdout).to.have.length(1);
    expect(JSON.parse(result.stdout[0])).to.deep.equal({
      file: networkFile,
      from: 5,
      to: 0,
      reachable: false,
      distance: null,
    });
  });

  it("renders the graph before the distance", async () => {
    const result = await run([chainFile, "--render", "--from", "0", "--to", "2"]);
    expect(result.code).to.equal(0);
    expect(result.stdout).to.deep.equal([
      "Adjacency list (3 nodes):\nNode 0: 1(2)\nNode 1: 2(3)\nNode 2: (no outgoing edges)\n",
      "Distance 0 -> 2: 5\n",
    ]);
  });

  it("prints the usage when called without arguments", async () => {
    const result = await run([]);
    expect(result.code).to.equal(1);
    expect(result.stderr).to.have.length(1);
    expect(result.stderr[0].startsWith("Usage: weighted-paths <graph.json>")).to.equal(true);
  });

  it("fails on missing query flags", async () => {
    const result = await run([networkFile, "--from", "0"]);
    expect(result.code).to.equal(1);
    expect(result.stdout).to.deep.equal([]);
    expect(result.stderr).to.deep.equal(["Both --from and --to are required\n"]);
    expect(result.entries).to.have.length(1);
    expect(result.entries[0]).to.include({ level: "error", message: "query_failed" });
    expect(result.entries[0].payload).to.deep.equal({
      code: ERROR_CODES.CLI_INVALID_ARGUMENT,
      message: "Both --from and --to are required",
    });
  });

  it("fails on malformed JSON", async () => {
    const result = await run([brokenFile, "--from", "0", "--to", "1"]);
    expect(result.code).to.equal(1);
    expect(result.stderr).to.deep.equal([`File '${brokenFile}' is not valid JSON\n`]);
    expect(result.entries[0].payload).to.have.property("code", ERROR_CODES.GRAPH_INVALID_INPUT);
  });

  it("fails on nodes outside the graph", async () => {
    const result = await run([chainFile, "--from", "0", "--to", "3"]);
    expect(result.code).to.equal(1);
    expect(result.stderr).to.deep.equal(["Node indices must be between 0 and 2\n"]);
    expect(result.entries.at(-1)?.payload).to.have.property("code", ERROR_CODES.PATH_NODE_RANGE);
  });

  it("fails without an error code when the file cannot be read", async () => {
    const result = await run([join(directory, "missing.json"), "--from", "0", "--to", "1"]);
    expect(result.code).to.equal(1);
    expect(result.entries[0].payload).to.have.property("code", null);
  });

  describe("parseArgs", () => {
    it("parses every flag", () => {
      expect(parseArgs(["graph.json", "--to", "4", "--from", "1", "--format", "json", "--render"])).to.deep.equal({
        file: "graph.json",
        from: 1,
        to: 4,
        format: "json",
        render: true,
      });
    });

    it("rejects malformed input", () => {
      const cases: string[][] = [
        ["--from", "0"],
        ["graph.json", "--from", "-1", "--to", "2"],
        ["graph.json", "--from", "0", "--to", "2", "--format", "yaml"],
        ["graph.json", "--from", "0", "--to", "2", "--verbose"],
        ["graph.json", "--from"],
      ];
      for (const argv of cases) {
        expect(() => parseArgs(argv), argv.join(" "))
          .to.throw(InvalidArgumentError)
          .with.property("code", ERROR_CODES.CLI_INVALID_ARGUMENT);
      }
    });
  });

  it("formats reports", () => {
    expect(formatTextReport({ from: 2, to: 0 }, -1)).to.equal("Node 0 is unreachable from 2");
    expect(formatTextReport({ from: 0, to: 3 }, 2.5)).to.equal("Distance 0 -> 3: 2.5");
    expect(formatJsonReport({ file: "g.json", from: 0, to: 3 }, 2.5)).to.deep.equal({
      file: "g.json",
      from: 0,
      to: 3,
      reachable: true,
      distance: 2.5,
    });
  });
});
