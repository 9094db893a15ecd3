/**
 * Catalogue of stable error codes surfaced by the graph stores, the priority
 * queue, the shortest-path engine and the command line. Codes are grouped by
 * family so callers can branch on a prefix when they only care about the
 * component that rejected the input.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    NODE_COUNT: "E-GRAPH-NODE-COUNT",
    NODE_RANGE: "E-GRAPH-NODE-RANGE",
    SELF_LOOP: "E-GRAPH-SELF-LOOP",
    WEIGHT: "E-GRAPH-WEIGHT",
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
  },
  QUEUE: {
    CAPACITY: "E-QUEUE-CAPACITY",
    ELEMENT: "E-QUEUE-ELEMENT",
  },
  PATH: {
    NODE_RANGE: "E-PATH-NODE-RANGE",
  },
  CLI: {
    INVALID_ARGUMENT: "E-CLI-INVALID-ARGUMENT",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
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

/** Flat access to all stable error codes (e.g. `ERROR_CODES.GRAPH_SELF_LOOP`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union of every stable error code. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. Empty messages fall back to a generic text.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Error raised synchronously when a call violates one of its preconditions:
 * out-of-range node indices, negative weights, self-loops, non-positive sizes
 * or placeholder queue elements. The failing call never mutates state.
 */
export class InvalidArgumentError extends Error {
  public readonly code: ErrorCode;

  /** Optional hint describing how to fix the input. */
  public readonly hint?: string;

  /** Optional structured context (offending indices, validation issues, ...). */
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: { hint?: string; details?: Record<string, unknown> } = {}) {
    super(normaliseErrorMessage(message));
    this.name = "InvalidArgumentError";
    this.code = code;
    if (options.hint !== undefined) {
      this.hint = options.hint;
    }
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

/** Type guard used by callers that only want to recover from input errors. */
export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}
