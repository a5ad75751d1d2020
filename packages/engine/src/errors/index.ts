/**
 * Error taxonomy for the retrieval engine.
 *
 * Every error carries a stable `code` and the HTTP `status` the server's
 * error handler responds with.
 */

export abstract class EngineError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad caller input (empty query, out-of-range parameter). Never retried. */
export class InvalidInputError extends EngineError {
  readonly code = "INVALID_INPUT";
  readonly status = 400;
}

/** A graph traversal started from a node the store does not hold */
export class NotFoundError extends EngineError {
  readonly code = "NOT_FOUND";
  readonly status = 404;
}

/** The embedding index could not answer; retrieval has no semantic signal */
export class IndexUnavailableError extends EngineError {
  readonly code = "INDEX_UNAVAILABLE";
  readonly status = 503;
}

/** The knowledge graph could not answer; retrieval degrades to semantic-only */
export class GraphUnavailableError extends EngineError {
  readonly code = "GRAPH_UNAVAILABLE";
  readonly status = 503;
}

/** The query encoder failed for a reason other than bad input */
export class EncoderUnavailableError extends EngineError {
  readonly code = "ENCODER_UNAVAILABLE";
  readonly status = 503;
}

/** The narrative generator failed; the retrieval result is still valid */
export class GenerationError extends EngineError {
  readonly code = "GENERATION_FAILED";
  readonly status = 502;
}

/** An external call exceeded its timeout */
export class TimeoutError extends EngineError {
  readonly code = "TIMEOUT";
  readonly status = 504;

  constructor(
    readonly dependency: string,
    readonly timeoutMs: number,
  ) {
    super(`${dependency} timed out after ${timeoutMs}ms`);
  }
}

/** The caller cancelled the request; no partial result is produced */
export class RetrievalCancelledError extends EngineError {
  readonly code = "CANCELLED";
  readonly status = 499;

  constructor(message = "Retrieval cancelled") {
    super(message);
  }
}

/** One invariant violation found while validating a bulk load */
export interface ValidationIssue {
  /** Where in the batch, e.g. "nodes[3]" or "relationships[12]" */
  path: string;
  message: string;
}

/** A bulk graph load was rejected as a whole */
export class BulkLoadValidationError extends EngineError {
  readonly code = "BULK_LOAD_INVALID";
  readonly status = 422;

  constructor(readonly issues: ValidationIssue[]) {
    super(
      `Bulk load rejected: ${issues.length} invalid record(s)` +
        (issues[0] ? ` (first: ${issues[0].path}: ${issues[0].message})` : ""),
    );
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
