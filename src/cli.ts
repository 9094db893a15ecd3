#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { shortestPath, UNREACHABLE } from "./algorithms/dijkstra.js";
import { loadRuntimeConfig } from "./config/env.js";
import { loadGraph } from "./graph/descriptor.js";
import { StructuredLogger, type LogSink } from "./logger.js";
import { ERROR_CODES, InvalidArgumentError, isInvalidArgumentError } from "./types.js";

export type OutputFormat = "text" | "json";

export interface CliOptions {
  readonly file: string;
  readonly from: number;
  readonly to: number;
  readonly format: OutputFormat;
  readonly render: boolean;
}

/** Streams used by {@link main}; tests swap them for in-memory sinks. */
export interface CliIo {
  readonly stdout: LogSink;
  readonly stderr: LogSink;
  readonly logger?: StructuredLogger;
}

const USAGE = [
  "Usage: weighted-paths <graph.json> --from <node> --to <node> [--format text|json] [--render]",
  "",
  "Examples:",
  "  weighted-paths network.json --from 0 --to 5",
  "  weighted-paths network.json --from 0 --to 5 --format json",
  "",
].join("\n");

/**
 * Runs one shortest-distance query and returns the process exit code. Results
 * go to stdout; diagnostics go to the structured logger (stderr by default).
 */
export async function main(argv: string[], io: CliIo = { stdout: process.stdout, stderr: process.stderr }): Promise<number> {
  if (argv.length === 0) {
    io.stderr.write(USAGE);
    return 1;
  }

  const config = loadRuntimeConfig();
  const logger =
    io.logger ?? new StructuredLogger({ level: config.logLevel, sink: io.stderr, logFile: config.logFile });

  try {
    const options = parseArgs(argv);
    const contents = await readFile(options.file, "utf8");
    const graph = loadGraph(parseJson(contents, options.file));
    logger.info("graph_loaded", { file: options.file, nodes: graph.size(), edges: graph.edgeCount() });

    const distance = shortestPath(graph, options.from, options.to, {
      logger,
      initialCapacity: config.heapInitialCapacity,
    });

    if (options.format === "json") {
      io.stdout.write(`${JSON.stringify(formatJsonReport(options, distance), null, 2)}\n`);
      return 0;
    }
    if (options.render) {
      io.stdout.write(`${graph.toString()}\n`);
    }
    io.stdout.write(`${formatTextReport(options, distance)}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("query_failed", {
      code: isInvalidArgumentError(error) ? error.code : null,
      message,
    });
    io.stderr.write(`${message}\n`);
    return 1;
  } finally {
    await logger.flush();
  }
}

export function formatTextReport(options: Pick<CliOptions, "from" | "to">, distance: number): string {
  if (distance === UNREACHABLE) {
    return `Node ${options.to} is unreachable from ${options.from}`;
  }
  return `Distance ${options.from} -> ${options.to}: ${distance}`;
}

export function formatJsonReport(
  options: Pick<CliOptions, "file" | "from" | "to">,
  distance: number,
): { file: string; from: number; to: number; reachable: boolean; distance: number | null } {
  const reachable = distance !== UNREACHABLE;
  return {
    file: options.file,
    from: options.from,
    to: options.to,
    reachable,
    distance: reachable ? distance : null,
  };
}

export function parseArgs(argv: string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw cliError("First positional argument must be the path to a graph descriptor");
  }
  let from: number | undefined;
  let to: number | undefined;
  let format: OutputFormat = "text";
  let render = false;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--from":
        from = parseNode("--from", rest[++i]);
        break;
      case "--to":
        to = parseNode("--to", rest[++i]);
        break;
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw cliError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--render":
        render = true;
        break;
      default:
        throw cliError(`Unknown argument '${String(token)}'`);
    }
  }

  if (from === undefined || to === undefined) {
    throw cliError("Both --from and --to are required");
  }
  return { file, from, to, format, render };
}

function parseNode(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw cliError(`${flag} expects a non-negative integer node index`);
  }
  return Number.parseInt(value, 10);
}

function parseJson(contents: string, file: string): unknown {
  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new InvalidArgumentError(ERROR_CODES.GRAPH_INVALID_INPUT, `File '${file}' is not valid JSON`, {
      details: { reason: error instanceof Error ? error.message : String(error) },
    });
  }
}

function cliError(message: string): InvalidArgumentError {
  return new InvalidArgumentError(ERROR_CODES.CLI_INVALID_ARGUMENT, message, { hint: USAGE.split("\n")[0] });
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }
  return fileURLToPath(import.meta.url) === realpathSync(executedFromCli);
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
