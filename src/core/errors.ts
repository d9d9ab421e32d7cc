/**
 * Error types for hybrid retrieval.
 *
 * Invariants:
 * - every error has a stable `name` and `code` for programmatic handling
 * - every error accepts a `cause` for wrapping underlying errors
 * - none of these is retryable: they describe an invalid request or input
 */

/**
 * Base class for all hybrid retrieval errors
 */
export abstract class HybridSearchError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a vector's size disagrees with the dense index dimension
 */
export class DimensionMismatchError extends HybridSearchError {
  readonly code = "DIMENSION_MISMATCH";

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    options?: ErrorOptions,
  ) {
    super(`Vector dimension mismatch: index expects ${expected}, got ${actual}`, options);
  }
}

/**
 * Thrown for an empty vector or one holding NaN/Infinity
 */
export class InvalidVectorError extends HybridSearchError {
  readonly code = "INVALID_VECTOR";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid vector: ${reason}`, options);
  }
}

/**
 * Thrown before retrieval when a fusion weight is negative or not finite
 */
export class InvalidWeightsError extends HybridSearchError {
  readonly code = "INVALID_WEIGHTS";

  constructor(
    public readonly sparseWeight: number,
    public readonly denseWeight: number,
    options?: ErrorOptions,
  ) {
    super(
      `Fusion weights must be finite and non-negative (sparseWeight=${sparseWeight}, denseWeight=${denseWeight})`,
      options,
    );
  }
}

/**
 * Thrown before retrieval when the request carries no usable signal for its mode
 */
export class EmptyQueryError extends HybridSearchError {
  readonly code = "EMPTY_QUERY";

  constructor(mode: string, reason: string, options?: ErrorOptions) {
    super(`Empty query for mode "${mode}": ${reason}`, options);
  }
}

/**
 * Thrown when configuration fails schema validation
 */
export class InvalidConfigError extends HybridSearchError {
  readonly code = "INVALID_CONFIG";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions,
  ) {
    super(`Invalid configuration: ${issues.join("; ")}`, options);
  }
}

/**
 * Thrown when an ingest document is malformed
 */
export class InvalidDocumentError extends HybridSearchError {
  readonly code = "INVALID_DOCUMENT";

  constructor(docId: string | null, reason: string, options?: ErrorOptions) {
    super(`Invalid document${docId ? ` "${docId}"` : ""}: ${reason}`, options);
  }
}
