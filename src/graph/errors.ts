import { ERROR_CODES, type ErrorCode } from "../types.js";

/**
 * Error thrown when a caller breaks the contract of the graph store: an index
 * outside `0..vertexCount-1`, an invalid vertex count or an unknown label.
 * These are programming errors; the library never catches them.
 */
export class GraphContractError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "GraphContractError";
    this.code = code;
    this.details = details;
  }
}

/** Error thrown when a graph is used after the sort consumed it. */
export class GraphConsumedError extends Error {
  public readonly code: ErrorCode = ERROR_CODES.GRAPH_CONSUMED;
  public readonly details: Record<string, unknown>;

  constructor(readonly operation: string) {
    super(`graph was consumed by toposortOrScc and cannot be used for '${operation}'`);
    this.name = "GraphConsumedError";
    this.details = { operation };
  }
}

/** Builds the error reported when `index` does not address one of `vertexCount` vertices. */
export function vertexIndexError(index: number, vertexCount: number, role: string): GraphContractError {
  return new GraphContractError(
    ERROR_CODES.GRAPH_INDEX,
    `${role} index ${index} is out of range for a graph of ${vertexCount} vertices`,
    { index, vertexCount, role },
  );
}
