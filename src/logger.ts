import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Minimal writable surface accepted as log destination (stdout, stderr, test doubles). */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Optional file receiving a copy of every emitted line. */
  readonly logFile?: string | null;
  /** Destination of the JSON lines. Defaults to `process.stdout`. */
  readonly sink?: LogSink;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Fields merged into every object payload. */
  readonly bindings?: Record<string, unknown>;
}

/**
 * Appends lines to a file one after the other. Write failures are reported on
 * stderr and never reach the caller that logged the entry.
 */
class FileMirror {
  private writeQueue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(private readonly path: string) {}

  append(line: string): void {
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        if (!this.directoryReady) {
          await mkdir(dirname(this.path), { recursive: true });
          this.directoryReady = true;
        }
        await appendFile(this.path, line, "utf8");
      } catch (error) {
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: { path: this.path, message: error instanceof Error ? error.message : String(error) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
        // Let the next write retry the directory creation.
        this.directoryReady = false;
      }
    });
  }

  flush(): Promise<void> {
    return this.writeQueue;
  }
}

/**
 * Structured logger emitting one JSON object per line. Lines can be mirrored
 * to a file; those writes are queued so the file keeps the emission order.
 */
export class StructuredLogger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly bindings: Record<string, unknown>;
  private mirror: FileMirror | null;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.sink = options.sink ?? process.stdout;
    if (options.onEntry) {
      this.entryListener = options.onEntry;
    }
    this.bindings = { ...(options.bindings ?? {}) };
    this.mirror = options.logFile ? new FileMirror(options.logFile) : null;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  /**
   * Returns a logger sharing this one's destinations whose payloads always
   * carry {@link bindings}.
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger({
      level: this.level,
      sink: this.sink,
      bindings: { ...this.bindings, ...bindings },
      ...(this.entryListener ? { onEntry: this.entryListener } : {}),
    });
    child.mirror = this.mirror;
    return child;
  }

  /** Waits until every mirrored line reached the log file. */
  async flush(): Promise<void> {
    if (this.mirror) {
      await this.mirror.flush();
    }
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const merged = this.bind(payload);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(merged !== undefined ? { payload: merged } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.sink.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    if (this.mirror) {
      this.mirror.append(line);
    }
  }

  private bind(payload: unknown): unknown {
    if (Object.keys(this.bindings).length === 0) {
      return payload;
    }
    if (payload === undefined) {
      return { ...this.bindings };
    }
    if (payload !== null && typeof payload === "object" && !Array.isArray(payload)) {
      return { ...this.bindings, ...payload };
    }
    return { ...this.bindings, value: payload };
  }
}
