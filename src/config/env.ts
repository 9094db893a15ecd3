/**
 * Helpers reading environment variables with predictable coercion rules. Blank
 * values count as unset and invalid literals fall back to the caller's default.
 */
import { DEFAULT_HEAP_CAPACITY } from "../queue/binaryHeap.js";
import type { LogLevel } from "../logger.js";

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

/** Returns an integer when {@link name} contains a base-10 literal inside the bounds. */
export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/** Case-insensitive lookup of {@link name} inside an allow-list. */
export function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === lower);
}

export function readEnum<T extends string>(name: string, allowed: readonly T[], defaultValue: T): T {
  return readOptionalEnum(name, allowed) ?? defaultValue;
}

/** Largest initial queue capacity accepted from the environment. */
export const MAX_HEAP_INITIAL_CAPACITY = 1_048_576;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface RuntimeConfig {
  /** Initial capacity of the queue allocated by each shortest-path query. */
  readonly heapInitialCapacity: number;
  /** Entries below this level are dropped by the logger. */
  readonly logLevel: LogLevel;
  /** Optional file mirroring the command line's log lines. */
  readonly logFile: string | null;
}

/** Snapshot of the `PATHS_*` environment variables. */
export function loadRuntimeConfig(): RuntimeConfig {
  return Object.freeze({
    heapInitialCapacity: readInt("PATHS_HEAP_INITIAL_CAPACITY", DEFAULT_HEAP_CAPACITY, {
      min: 1,
      max: MAX_HEAP_INITIAL_CAPACITY,
    }),
    logLevel: readEnum("PATHS_LOG_LEVEL", LOG_LEVELS, "info"),
    logFile: readOptionalString("PATHS_LOG_FILE") ?? null,
  });
}
