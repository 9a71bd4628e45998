import { BackendFailureKind } from "../enums/backend.failure.kind";
import { ValidationFailureKind } from "../enums/validation.failure.kind";

/**
 * Base class for the typed failures the service reports to its callers.
 */
export abstract class ServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A file (or batch) was rejected before any embedding or backend work.
 * Never retried automatically.
 */
export class ValidationFailure extends ServiceError {
  constructor(
    public readonly kind: ValidationFailureKind,
    message: string,
    public readonly path?: string
  ) {
    super(message);
  }
}

/**
 * The embedding model could not produce a vector.
 */
export class EmbeddingFailure extends ServiceError {}

/**
 * The vector backend rejected a call or could not be reached.
 */
export class BackendFailure extends ServiceError {
  constructor(
    public readonly kind: BackendFailureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  /** Validation noise from the backend rather than a connectivity or auth problem. */
  get isValidationError(): boolean {
    return this.kind === "IndexEmpty" || this.kind === "DimensionMismatch" || this.kind === "Validation";
  }
}

/**
 * The caller supplied a malformed query (both or neither of vector/text, bad top_k, ...).
 */
export class QuerySpecError extends ServiceError {}
