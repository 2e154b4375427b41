/**
 * Troubleshooting engine errors.
 *
 * Compile-time errors (ParseError family, EncodingError) block publishing.
 * Runtime errors (DecodeError, StaleTokenError, InvalidTransitionError) are
 * recovered by the Navigator and never reach the technician as a crash.
 */

export type ParseErrorCode =
  | "SYNTAX"
  | "ORPHAN_NODE"
  | "DANGLING_EDGE"
  | "AMBIGUOUS_ROUTE"
  | "INVALID_NODE"
  | "TOO_MANY_CHOICES"
  | "MISSING_ROOT";

export class ParseError extends Error {
  readonly code: ParseErrorCode;
  readonly nodeId: string | null;
  readonly edge: { source: string; target: string } | null;
  readonly line: number | null;

  constructor(
    message: string,
    opts: {
      code?: ParseErrorCode;
      nodeId?: string | null;
      edge?: { source: string; target: string } | null;
      line?: number | null;
    } = {}
  ) {
    super(message);
    this.name = "ParseError";
    this.code = opts.code ?? "SYNTAX";
    this.nodeId = opts.nodeId ?? null;
    this.edge = opts.edge ?? null;
    this.line = opts.line ?? null;
  }
}

export class OrphanNodeError extends ParseError {
  readonly orphans: string[];

  constructor(orphans: string[]) {
    super(`Unreachable from root: ${orphans.join(", ")}`, {
      code: "ORPHAN_NODE",
      nodeId: orphans[0] ?? null,
    });
    this.name = "OrphanNodeError";
    this.orphans = orphans;
  }
}

export class DanglingEdgeError extends ParseError {
  constructor(source: string, target: string, missing: string, line: number | null) {
    super(`Edge ${source} --> ${target} references undeclared node "${missing}"`, {
      code: "DANGLING_EDGE",
      nodeId: missing,
      edge: { source, target },
      line,
    });
    this.name = "DanglingEdgeError";
  }
}

export class AmbiguousRouteError extends ParseError {
  constructor(nodeId: string, reason: string, line: number | null = null) {
    super(`Ambiguous route at "${nodeId}": ${reason}`, {
      code: "AMBIGUOUS_ROUTE",
      nodeId,
      line,
    });
    this.name = "AmbiguousRouteError";
  }
}

/** A graph whose minimal navigation token cannot fit the payload budget. */
export class EncodingError extends Error {
  readonly code = "ENCODING_BUDGET" as const;

  constructor(message: string) {
    super(message);
    this.name = "EncodingError";
  }
}

export class DecodeError extends Error {
  readonly code: "DECODE_FAILED" | "STALE_TOKEN" = "DECODE_FAILED";

  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/** Token references a graph version this instance no longer (or never) served. */
export class StaleTokenError extends DecodeError {
  override readonly code = "STALE_TOKEN" as const;
  readonly versionIndex: number;
  /** 16-bit tag of the graph key, when the token header was readable */
  readonly graphKeyTag: number;

  constructor(versionIndex: number, graphKeyTag: number) {
    super(`Unknown or retired graph version index ${versionIndex}`);
    this.name = "StaleTokenError";
    this.versionIndex = versionIndex;
    this.graphKeyTag = graphKeyTag;
  }
}

export class InvalidTransitionError extends Error {
  readonly code = "INVALID_TRANSITION" as const;
  readonly nodeId: string;

  constructor(nodeId: string, reason: string) {
    super(`Invalid transition at "${nodeId}": ${reason}`);
    this.name = "InvalidTransitionError";
    this.nodeId = nodeId;
  }
}

/** Generative backend timed out, failed, or returned nothing usable. */
export class FallbackUnavailableError extends Error {
  readonly code = "FALLBACK_UNAVAILABLE" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FallbackUnavailableError";
  }
}

/** No graph is published under the requested key. */
export class GraphNotFoundError extends Error {
  readonly code = "GRAPH_NOT_FOUND" as const;
  readonly graphKey: string | null;

  constructor(graphKey: string | null) {
    super(graphKey ? `No graph published under "${graphKey}"` : "No graph available to start a session");
    this.name = "GraphNotFoundError";
    this.graphKey = graphKey;
  }
}

/** A gap or draft id that the knowledge store does not hold. */
export class RecordNotFoundError extends Error {
  readonly code = "NOT_FOUND" as const;

  constructor(kind: "gap" | "draft", id: string) {
    super(`No ${kind} with id "${id}"`);
    this.name = "RecordNotFoundError";
  }
}

/** A review step applied to a record in the wrong status. */
export class ReviewStateError extends Error {
  readonly code = "INVALID_STATE" as const;

  constructor(message: string) {
    super(message);
    this.name = "ReviewStateError";
  }
}
