/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A uniqueness rule was violated, either by the service's own pre-check
 * or by the store's unique constraint.
 */
export class DuplicateResourceError extends Error {
  constructor(message = 'Resource already exists') {
    super(message);
    this.name = 'DuplicateResourceError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A write carried a version that no longer matches the stored row.
 */
export class ConcurrencyError extends Error {
  constructor(
    public readonly expectedVersion: number,
    public readonly actualVersion: number
  ) {
    super(
      `Concurrency conflict: expected version ${expectedVersion}, but actual version is ${actualVersion}`
    );
    this.name = 'ConcurrencyError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
