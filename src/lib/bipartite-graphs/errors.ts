/**
 * Error taxonomy for bipartite graph operations.
 *
 * All errors are thrown synchronously at the point of misuse. Each class
 * carries a stable `code`.
 */

export type BipartiteErrorCode =
  | 'NOT_COMPLETED'
  | 'OUT_OF_RANGE'
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT';

export class BipartiteGraphError extends Error {
  readonly code: BipartiteErrorCode;

  constructor(code: BipartiteErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Backward adjacency (or an inverse matching) was needed but has not been
 * materialised. Recover by calling `complete()` first.
 */
export class NotCompletedError extends BipartiteGraphError {
  constructor(message: string) {
    super('NOT_COMPLETED', message);
  }
}

export class VertexRangeError extends BipartiteGraphError {
  constructor(message: string) {
    super('OUT_OF_RANGE', message);
  }
}

export class EdgeNotFoundError extends BipartiteGraphError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class InvalidArgumentError extends BipartiteGraphError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}
