import { ERROR_CODES, normaliseErrorHint, normaliseErrorMessage, type ErrorCode } from "../types.js";

/**
 * Base class of every error raised by the adapters and the wire codec. The
 * stable {@link code} lets callers branch on the failure kind without parsing
 * messages.
 */
export class GraphAdapterError extends Error {
  /** Stable error code taken from the shared catalogue. */
  public readonly code: ErrorCode;

  /** Optional hint describing how to recover from the error. */
  public readonly hint?: string;

  /** Optional structured details attached to the failure. */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options: { hint?: string; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(normaliseErrorMessage(message), options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "GraphAdapterError";
    this.code = code;
    this.hint = normaliseErrorHint(options.hint);
    this.details = options.details;
  }
}

/** Message carried by every rejected mutation on an immutable adapter. */
export const GRAPH_IS_IMMUTABLE = "graph is immutable";

/** Raised for every mutation attempted on an immutable adapter. */
export class GraphImmutableError extends GraphAdapterError {
  /** Kind of the rejected mutation (`addVertex`, `setEdgeWeight`, ...). */
  public readonly operation: string;

  constructor(operation: string) {
    super(ERROR_CODES.GRAPH_IMMUTABLE, GRAPH_IS_IMMUTABLE, {
      hint: "build a new value graph and wrap it in a fresh adapter",
      details: { operation },
    });
    this.name = "GraphImmutableError";
    this.operation = operation;
  }
}

/** Raised when a mutable adapter cannot express the requested mutation. */
export class UnsupportedMutationError extends GraphAdapterError {
  constructor(operation: string, reason: string) {
    super(ERROR_CODES.GRAPH_UNSUPPORTED, reason, { details: { operation } });
    this.name = "UnsupportedMutationError";
  }
}

export class NoSuchEdgeError extends GraphAdapterError {
  constructor(source: unknown, target: unknown) {
    super(ERROR_CODES.GRAPH_NO_EDGE, `no edge between ${describeNode(source)} and ${describeNode(target)}`, {
      details: { source, target },
    });
    this.name = "NoSuchEdgeError";
  }
}

export class NoSuchNodeError extends GraphAdapterError {
  constructor(node: unknown) {
    super(ERROR_CODES.GRAPH_NO_NODE, `no such vertex ${describeNode(node)}`, { details: { node } });
    this.name = "NoSuchNodeError";
  }
}

/** Raised when endpoints or an edge object do not fit the graph they target. */
export class InvalidEndpointsError extends GraphAdapterError {
  constructor(message: string, hint?: string) {
    super(ERROR_CODES.GRAPH_INVALID_INPUT, message, { hint });
    this.name = "InvalidEndpointsError";
  }
}

/** Raised at construction time when the weight converter cannot be persisted. */
export class InvalidConverterError extends GraphAdapterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.GRAPH_INVALID_CONVERTER, message, {
      hint: "give the converter a non-empty kind and JSON params",
      details,
    });
    this.name = "InvalidConverterError";
  }
}

/**
 * Raised when the structural copy used by `clone()` fails. The original error
 * is preserved as {@link Error.cause}.
 */
export class StructuralCopyError extends GraphAdapterError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ERROR_CODES.GRAPH_COPY_FAILED, `structural copy failed: ${reason}`, { cause });
    this.name = "StructuralCopyError";
  }
}

/** Raised when a byte stream does not follow the graph wire format. */
export class GraphFormatError extends GraphAdapterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.CODEC_FORMAT, message, { details });
    this.name = "GraphFormatError";
  }
}

/** Raised when a persisted descriptor claims mixed or multi-edge shapes. */
export class UnsupportedGraphShapeError extends GraphAdapterError {
  constructor(shape: { mixed: boolean; allowsMultipleEdges: boolean }) {
    super(ERROR_CODES.CODEC_UNSUPPORTED_SHAPE, "graph type not supported", {
      hint: "only simple directed or undirected graphs can be restored",
      details: { ...shape },
    });
    this.name = "UnsupportedGraphShapeError";
  }
}

/** Raised when a stream names a converter kind absent from the registry. */
export class UnknownConverterError extends GraphAdapterError {
  constructor(kind: string) {
    super(ERROR_CODES.CODEC_UNKNOWN_CONVERTER, `unknown weight converter '${kind}'`, {
      hint: "register the converter factory before reading the stream",
      details: { kind },
    });
    this.name = "UnknownConverterError";
  }
}

function describeNode(node: unknown): string {
  if (typeof node === "string") {
    return `'${node}'`;
  }
  if (typeof node === "number" || typeof node === "boolean" || typeof node === "bigint") {
    return String(node);
  }
  try {
    return JSON.stringify(node) ?? String(node);
  } catch {
    return String(node);
  }
}
